import type {
  EquipmentAgeBand,
  HomeProfileV1,
  ResolvedHomeProfile,
  UsageBreakdown,
} from '../schema/AuditSchemaV1';
import type { AssumptionV1, CoverageGroup, InputCoverageV1 } from '../../contracts/AuditReportV1';
import { ASSUMPTION_IDS, type AssumptionId } from '../../contracts/assumptions.ids';
import { ASSUMPTION_CATALOG } from '../assumptions.catalog';

// ─── Defaults ─────────────────────────────────────────────────────────────────

type DefaultedProfile = Omit<ResolvedHomeProfile, 'state' | 'reportedAnnualKbtu'>;
type DefaultedField = keyof DefaultedProfile;
type TrackedField = DefaultedField | 'state';

export const PROFILE_DEFAULTS: DefaultedProfile = {
  squareFeet: 2000,
  stories: 1,
  homeType: 'single_family_detached',
  yearBuilt: 2000,
  occupants: 2,
  division: 'default',
  heatingDegreeDays: 5500,
  coolingDegreeDays: 800,
  insulation: 'adequate',
  draftiness: 'some',
  windowCountCategory: 3,
  windowType: 'double',
  heatingEquipment: 'furnace',
  heatingFuel: 'gas',
  heatingEquipmentAge: '11_15',
  hasProgrammableThermostat: false,
  winterSetpointF: 70,
  hasCentralAc: true,
  acEquipmentAge: '6_10',
  waterHeaterFuel: 'gas',
  refrigeratorCount: 1,
  refrigeratorAgeCategory: 3,
  incandescentCategory: 1,
  hasSmartMeter: false,
  roofOrientation: 'south',
  shadingFactor: 1.0,
};

/** Midpoint age in years for each survey age band. */
export const AGE_BAND_YEARS: Record<EquipmentAgeBand, number> = {
  new: 2,
  '1_5': 3,
  '6_10': 8,
  '11_15': 13,
  '16_20': 18,
  over_20: 25,
};

/** Weight kept on the modelled total when a bill-derived total is supplied. */
export const MODEL_TOTAL_WEIGHT = 0.7;

const FIELD_META: Record<DefaultedField, { group: CoverageGroup; assumption: AssumptionId }> = {
  squareFeet: { group: 'building_envelope', assumption: ASSUMPTION_IDS.SQFT_DEFAULTED },
  stories: { group: 'building_envelope', assumption: ASSUMPTION_IDS.STORIES_DEFAULTED },
  homeType: { group: 'building_envelope', assumption: ASSUMPTION_IDS.HOME_TYPE_DEFAULTED },
  yearBuilt: { group: 'building_envelope', assumption: ASSUMPTION_IDS.YEAR_BUILT_DEFAULTED },
  insulation: { group: 'building_envelope', assumption: ASSUMPTION_IDS.INSULATION_DEFAULTED },
  draftiness: { group: 'building_envelope', assumption: ASSUMPTION_IDS.DRAFTINESS_DEFAULTED },
  windowCountCategory: { group: 'building_envelope', assumption: ASSUMPTION_IDS.WINDOWS_DEFAULTED },
  windowType: { group: 'building_envelope', assumption: ASSUMPTION_IDS.WINDOWS_DEFAULTED },
  heatingEquipment: { group: 'hvac', assumption: ASSUMPTION_IDS.HEATING_EQUIPMENT_DEFAULTED },
  heatingFuel: { group: 'hvac', assumption: ASSUMPTION_IDS.HEATING_EQUIPMENT_DEFAULTED },
  heatingEquipmentAge: { group: 'hvac', assumption: ASSUMPTION_IDS.HEATING_AGE_DEFAULTED },
  hasCentralAc: { group: 'hvac', assumption: ASSUMPTION_IDS.COOLING_DEFAULTED },
  acEquipmentAge: { group: 'hvac', assumption: ASSUMPTION_IDS.COOLING_DEFAULTED },
  waterHeaterFuel: { group: 'water_heating', assumption: ASSUMPTION_IDS.WATER_HEATER_DEFAULTED },
  refrigeratorCount: { group: 'appliances', assumption: ASSUMPTION_IDS.APPLIANCES_DEFAULTED },
  refrigeratorAgeCategory: { group: 'appliances', assumption: ASSUMPTION_IDS.APPLIANCES_DEFAULTED },
  hasSmartMeter: { group: 'appliances', assumption: ASSUMPTION_IDS.SMART_METER_DEFAULTED },
  incandescentCategory: { group: 'lighting', assumption: ASSUMPTION_IDS.LIGHTING_DEFAULTED },
  hasProgrammableThermostat: { group: 'behavioral', assumption: ASSUMPTION_IDS.THERMOSTAT_DEFAULTED },
  winterSetpointF: { group: 'behavioral', assumption: ASSUMPTION_IDS.THERMOSTAT_DEFAULTED },
  occupants: { group: 'behavioral', assumption: ASSUMPTION_IDS.OCCUPANTS_DEFAULTED },
  division: { group: 'climate', assumption: ASSUMPTION_IDS.DIVISION_DEFAULTED },
  heatingDegreeDays: { group: 'climate', assumption: ASSUMPTION_IDS.HDD_DEFAULTED },
  coolingDegreeDays: { group: 'climate', assumption: ASSUMPTION_IDS.CDD_DEFAULTED },
  roofOrientation: { group: 'climate', assumption: ASSUMPTION_IDS.SOLAR_SITING_DEFAULTED },
  shadingFactor: { group: 'climate', assumption: ASSUMPTION_IDS.SOLAR_SITING_DEFAULTED },
};

const TRACKED_FIELD_COUNT = Object.keys(FIELD_META).length + 1; // + state

// ─── Helpers ──────────────────────────────────────────────────────────────────

function isSupplied(value: unknown): boolean {
  if (value === undefined || value === null || value === '') return false;
  if (typeof value === 'number') return Number.isFinite(value);
  return true;
}

function isPositive(n: number): boolean {
  return n > 0;
}

function isUnitInterval(n: number): boolean {
  return n >= 0 && n <= 1;
}

export function ageBandToYears(band: EquipmentAgeBand): number {
  return AGE_BAND_YEARS[band];
}

// ─── Main ─────────────────────────────────────────────────────────────────────

export interface NormalizedProfile {
  profile: ResolvedHomeProfile;
  assumptions: AssumptionV1[];
  inputCoverage: InputCoverageV1;
  notes: string[];
}

/**
 * Resolve every optional profile field to a concrete value.
 *
 * A missing (or non-finite, or out-of-range) field takes its default and
 * raises the assumption registered for it. Several fields share one
 * assumption; each assumption is listed once.
 */
export function normalizeProfile(input: HomeProfileV1): NormalizedProfile {
  const provided: TrackedField[] = [];
  const defaulted: DefaultedField[] = [];

  function take<T>(
    key: DefaultedField,
    value: T | undefined,
    fallback: T,
    isValid?: (v: T) => boolean,
  ): T {
    if (value !== undefined && isSupplied(value) && (isValid === undefined || isValid(value))) {
      provided.push(key);
      return value;
    }
    defaulted.push(key);
    return fallback;
  }

  const d = PROFILE_DEFAULTS;
  const profile: ResolvedHomeProfile = {
    squareFeet: take('squareFeet', input.squareFeet, d.squareFeet, isPositive),
    stories: take('stories', input.stories, d.stories, (n) => n >= 1),
    homeType: take('homeType', input.homeType, d.homeType),
    yearBuilt: take('yearBuilt', input.yearBuilt, d.yearBuilt, isPositive),
    occupants: take('occupants', input.occupants, d.occupants, isPositive),
    division: take('division', input.division, d.division),
    heatingDegreeDays: take('heatingDegreeDays', input.heatingDegreeDays, d.heatingDegreeDays, (n) => n >= 0),
    coolingDegreeDays: take('coolingDegreeDays', input.coolingDegreeDays, d.coolingDegreeDays, (n) => n >= 0),
    insulation: take('insulation', input.insulation, d.insulation),
    draftiness: take('draftiness', input.draftiness, d.draftiness),
    windowCountCategory: take('windowCountCategory', input.windowCountCategory, d.windowCountCategory),
    windowType: take('windowType', input.windowType, d.windowType),
    heatingEquipment: take('heatingEquipment', input.heatingEquipment, d.heatingEquipment),
    heatingFuel: take('heatingFuel', input.heatingFuel, d.heatingFuel),
    heatingEquipmentAge: take('heatingEquipmentAge', input.heatingEquipmentAge, d.heatingEquipmentAge),
    hasProgrammableThermostat: take(
      'hasProgrammableThermostat',
      input.hasProgrammableThermostat,
      d.hasProgrammableThermostat,
    ),
    winterSetpointF: take('winterSetpointF', input.winterSetpointF, d.winterSetpointF),
    hasCentralAc: take('hasCentralAc', input.hasCentralAc, d.hasCentralAc),
    acEquipmentAge: take('acEquipmentAge', input.acEquipmentAge, d.acEquipmentAge),
    waterHeaterFuel: take('waterHeaterFuel', input.waterHeaterFuel, d.waterHeaterFuel),
    refrigeratorCount: take('refrigeratorCount', input.refrigeratorCount, d.refrigeratorCount, (n) => n >= 0),
    refrigeratorAgeCategory: take('refrigeratorAgeCategory', input.refrigeratorAgeCategory, d.refrigeratorAgeCategory),
    incandescentCategory: take('incandescentCategory', input.incandescentCategory, d.incandescentCategory),
    hasSmartMeter: take('hasSmartMeter', input.hasSmartMeter, d.hasSmartMeter),
    roofOrientation: take('roofOrientation', input.roofOrientation, d.roofOrientation),
    shadingFactor: take('shadingFactor', input.shadingFactor, d.shadingFactor, isUnitInterval),
    state: input.state || undefined,
    reportedAnnualKbtu: input.reportedAnnualKbtu,
  };
  if (profile.state !== undefined) provided.push('state');

  // ── Assumptions (one per id, in field order) ─────────────────────────────
  const seen = new Set<AssumptionId>();
  const assumptions: AssumptionV1[] = [];
  for (const field of defaulted) {
    const id = FIELD_META[field].assumption;
    if (seen.has(id)) continue;
    seen.add(id);
    assumptions.push({ id, ...ASSUMPTION_CATALOG[id] });
  }

  // ── Coverage ─────────────────────────────────────────────────────────────
  const byGroup: Record<CoverageGroup, number> = {
    building_envelope: 0,
    hvac: 0,
    appliances: 0,
    water_heating: 0,
    lighting: 0,
    behavioral: 0,
    climate: 0,
  };
  for (const field of provided) {
    byGroup[field === 'state' ? 'climate' : FIELD_META[field].group] += 1;
  }

  const coveragePct = (provided.length / TRACKED_FIELD_COUNT) * 100;

  const notes: string[] = [
    `Profile: ${provided.length} of ${TRACKED_FIELD_COUNT} fields supplied ` +
      `(${coveragePct.toFixed(0)}% coverage); ${defaulted.length} defaulted.`,
  ];

  return {
    profile,
    assumptions,
    inputCoverage: {
      providedFields: provided,
      defaultedFields: defaulted,
      byGroup,
      coveragePct,
    },
    notes,
  };
}

/**
 * Blend the modelled annual total with a bill-derived total.
 * Returns the breakdown unchanged when no usable reported value is present.
 */
export function blendWithReportedUsage(
  breakdown: UsageBreakdown,
  reportedAnnualKbtu: number | undefined,
): { breakdown: UsageBreakdown; blended: boolean } {
  if (reportedAnnualKbtu === undefined || !Number.isFinite(reportedAnnualKbtu) || reportedAnnualKbtu <= 0) {
    return { breakdown, blended: false };
  }
  const totalKbtu =
    MODEL_TOTAL_WEIGHT * breakdown.totalKbtu + (1 - MODEL_TOTAL_WEIGHT) * reportedAnnualKbtu;
  return { breakdown: { ...breakdown, totalKbtu }, blended: true };
}
