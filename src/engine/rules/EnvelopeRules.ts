import type { InsulationGrade, WindowType } from '../schema/AuditSchemaV1';
import type { Recommendation } from '../../contracts/AuditReportV1';
import { EQUIPMENT_LIFESPANS } from '../modules/SavingsCalculator';
import { kbtuToDollars } from '../modules/UtilityRatesModule';
import { KBTU_TO_KWH, KBTU_TO_THERM } from '../utils/units';
import {
  buildRecommendation,
  capSavings,
  emissionsFor,
  fired,
  highOrMedium,
  paybackTiers,
  usd,
  type RuleContext,
} from './RuleKit';

// ─── Attic ────────────────────────────────────────────────────────────────────

/** Assumed existing attic R-value for each insulation grade. */
export const ATTIC_R_VALUES: Record<Exclude<InsulationGrade, 'well'>, number> = {
  adequate: 30,
  poor: 19,
  none: 11,
};
const ATTIC_TARGET_R = 49;
const ATTIC_MIN_HEATING_KBTU = 20_000;
const ATTIC_COST_PER_SQFT = 1.5;
const ATTIC_MIN_ANNUAL_DOLLARS = 75;

// ─── Walls ────────────────────────────────────────────────────────────────────

const WALL_MAX_YEAR_BUILT = 1980;
const WALL_MIN_HEATING_KBTU = 30_000;
const WALL_CURRENT_R = 4;
const WALL_TARGET_R = 13;
const WALL_COST_PER_SQFT = 2.5;
const WALL_MIN_ANNUAL_DOLLARS = 100;
// Square footprint, 8 ft per story, 15% of gross wall taken by openings.
const WALL_HEIGHT_FT = 8;
const NET_WALL_FRACTION = 0.85;

// ─── Windows ──────────────────────────────────────────────────────────────────

export const WINDOW_U_FACTORS: Record<WindowType, number> = {
  single: 1.1,
  double: 0.5,
  triple: 0.3,
};
const WINDOW_TARGET_U = 0.27;
const WINDOW_SQFT_EACH = 15;
const WINDOW_COST_EACH = 800;
const WINDOW_MIN_COUNT_CATEGORY = 3;
const WINDOW_MIN_HEATING_KBTU = 25_000;
const WINDOW_MIN_COOLING_KBTU = 15_000;
const WINDOW_MIN_ANNUAL_DOLLARS = 100;

/** Midpoint window count for each survey bucket. */
export const WINDOW_COUNT_MIDPOINTS: Record<number, number> = {
  1: 2,
  2: 4,
  3: 8,
  4: 13,
  5: 18,
  6: 25,
  7: 32,
};

// ─── Air sealing ──────────────────────────────────────────────────────────────

const AIR_SEALING_FRACTION = 0.15;
const AIR_SEALING_MIN_LOAD_KBTU = 25_000;
const AIR_SEALING_MIN_COST = 400;
const AIR_SEALING_COST_PER_SQFT = 0.25;
const AIR_SEALING_MIN_ANNUAL_DOLLARS = 50;

// ─── Geometry ─────────────────────────────────────────────────────────────────

export function atticAreaSqft(squareFeet: number, stories: number): number {
  return squareFeet / stories;
}

export function netWallAreaSqft(squareFeet: number, stories: number): number {
  const footprint = squareFeet / stories;
  const perimeter = 4 * Math.sqrt(footprint);
  return perimeter * WALL_HEIGHT_FT * stories * NET_WALL_FRACTION;
}

export function windowCountFor(category: number): number {
  const bucket = Math.min(7, Math.max(1, Math.round(category)));
  return WINDOW_COUNT_MIDPOINTS[bucket] ?? WINDOW_COUNT_MIDPOINTS[3];
}

// ─── Rules ────────────────────────────────────────────────────────────────────

function atticInsulation(ctx: RuleContext): Recommendation | null {
  const { profile, breakdown, calculator } = ctx;
  if (profile.insulation === 'well' || breakdown.heatingKbtu <= ATTIC_MIN_HEATING_KBTU) return null;

  const currentR = ATTIC_R_VALUES[profile.insulation];
  const area = atticAreaSqft(profile.squareFeet, profile.stories);
  const savings = capSavings(
    calculator.insulationSavings(currentR, ATTIC_TARGET_R, area, 'attic', profile.heatingFuel),
    breakdown.heatingKbtu,
  );

  return buildRecommendation(ctx, {
    category: 'Building Envelope',
    measure: 'attic_insulation',
    title: 'Upgrade Attic Insulation',
    description:
      `Add insulation over ${Math.round(area).toLocaleString('en-US')} sq ft of attic floor ` +
      `to reach R-${ATTIC_TARGET_R}. Most heat escapes upward, so the attic is usually ` +
      `the cheapest place to cut heating demand.`,
    currentCondition: `Attic insulation rated ${profile.insulation} (about R-${currentR})`,
    recommendedAction: `Blow in cellulose or fiberglass to R-${ATTIC_TARGET_R}`,
    costEstimate: area * ATTIC_COST_PER_SQFT,
    savings,
    minimumAnnualDollars: ATTIC_MIN_ANNUAL_DOLLARS,
    priority: highOrMedium(5),
    emissions: emissionsFor(savings, profile.heatingFuel),
    rebates: ['Federal tax credit: 30% of material cost, up to $1,200/yr', 'Utility insulation rebates of $0.25–$1.00/sq ft'],
  });
}

function wallInsulation(ctx: RuleContext): Recommendation | null {
  const { profile, breakdown, calculator } = ctx;
  if (profile.yearBuilt >= WALL_MAX_YEAR_BUILT || breakdown.heatingKbtu <= WALL_MIN_HEATING_KBTU) {
    return null;
  }

  const area = netWallAreaSqft(profile.squareFeet, profile.stories);
  const savings = capSavings(
    calculator.insulationSavings(WALL_CURRENT_R, WALL_TARGET_R, area, 'wall', profile.heatingFuel),
    breakdown.heatingKbtu,
  );

  return buildRecommendation(ctx, {
    category: 'Building Envelope',
    measure: 'wall_insulation',
    title: 'Add Wall Insulation',
    description:
      `Homes built before ${WALL_MAX_YEAR_BUILT} often have empty or settled wall cavities. ` +
      `Dense-pack insulation brings about ${Math.round(area).toLocaleString('en-US')} sq ft ` +
      `of exterior wall to R-${WALL_TARGET_R}.`,
    currentCondition: `Built ${profile.yearBuilt}; walls assumed near R-${WALL_CURRENT_R}`,
    recommendedAction: `Dense-pack cellulose into wall cavities to R-${WALL_TARGET_R}`,
    costEstimate: area * WALL_COST_PER_SQFT,
    savings,
    minimumAnnualDollars: WALL_MIN_ANNUAL_DOLLARS,
    priority: highOrMedium(7),
    emissions: emissionsFor(savings, profile.heatingFuel),
    rebates: ['Federal tax credit: 30% of material cost, up to $1,200/yr'],
  });
}

function windowReplacement(ctx: RuleContext): Recommendation | null {
  const { profile, breakdown, calculator } = ctx;
  if (profile.windowCountCategory < WINDOW_MIN_COUNT_CATEGORY) return null;
  if (
    breakdown.heatingKbtu <= WINDOW_MIN_HEATING_KBTU &&
    breakdown.coolingKbtu <= WINDOW_MIN_COOLING_KBTU
  ) {
    return null;
  }

  const windows = windowCountFor(profile.windowCountCategory);
  const currentU = WINDOW_U_FACTORS[profile.windowType];
  const savings = capSavings(
    calculator.windowUpgradeSavings(currentU, WINDOW_TARGET_U, windows * WINDOW_SQFT_EACH),
    breakdown.heatingKbtu + breakdown.coolingKbtu,
  );
  const coolingKbtu = savings.annualKbtu - savings.annualTherms / KBTU_TO_THERM;

  return buildRecommendation(ctx, {
    category: 'Building Envelope',
    measure: 'window_replacement',
    title: 'Replace Windows with ENERGY STAR Models',
    description:
      `Replace about ${windows} ${profile.windowType}-pane windows with low-e units ` +
      `(U-${WINDOW_TARGET_U}) to cut conductive losses in winter and heat gain in summer.`,
    currentCondition: `${windows} ${profile.windowType}-pane windows (U-${currentU.toFixed(2)})`,
    recommendedAction: `Install ENERGY STAR windows rated U-${WINDOW_TARGET_U} or lower`,
    costEstimate: windows * WINDOW_COST_EACH,
    savings,
    minimumAnnualDollars: WINDOW_MIN_ANNUAL_DOLLARS,
    priority: paybackTiers(5, 20),
    emissions: { kwh: Math.max(0, coolingKbtu) * KBTU_TO_KWH, therms: savings.annualTherms },
    rebates: ['Federal tax credit: 30% up to $600 for ENERGY STAR Most Efficient windows'],
  });
}

function airSealing(ctx: RuleContext): Recommendation | null {
  const { profile, breakdown, rates } = ctx;
  if (profile.draftiness === 'never') return null;
  if (breakdown.heatingKbtu + breakdown.coolingKbtu <= AIR_SEALING_MIN_LOAD_KBTU) return null;

  const heatingKbtu = breakdown.heatingKbtu * AIR_SEALING_FRACTION;
  const coolingKbtu = breakdown.coolingKbtu * AIR_SEALING_FRACTION;
  const electricHeat = profile.heatingFuel === 'elec';
  const savings = {
    annualKbtu: heatingKbtu + coolingKbtu,
    annualKwh: (heatingKbtu + coolingKbtu) * KBTU_TO_KWH,
    annualTherms: electricHeat ? 0 : heatingKbtu * KBTU_TO_THERM,
    annualDollars:
      kbtuToDollars(rates, heatingKbtu, profile.heatingFuel) +
      kbtuToDollars(rates, coolingKbtu, 'elec'),
    lifetimeYears: EQUIPMENT_LIFESPANS.air_sealing,
  };

  return buildRecommendation(ctx, {
    category: 'Building Envelope',
    measure: 'air_sealing',
    title: 'Professional Air Sealing',
    description:
      `Seal gaps around penetrations, rim joists, attic hatches and top plates. ` +
      `Typical sealing cuts heating and cooling use by about ` +
      `${(AIR_SEALING_FRACTION * 100).toFixed(0)}%.`,
    currentCondition: `Home reported drafty (${profile.draftiness} of the time)`,
    recommendedAction: 'Blower-door guided air sealing',
    costEstimate: Math.max(AIR_SEALING_MIN_COST, profile.squareFeet * AIR_SEALING_COST_PER_SQFT),
    savings,
    minimumAnnualDollars: AIR_SEALING_MIN_ANNUAL_DOLLARS,
    priority: highOrMedium(3),
    emissions: {
      kwh: (coolingKbtu + (electricHeat ? heatingKbtu : 0)) * KBTU_TO_KWH,
      therms: savings.annualTherms,
    },
    rebates: ['Federal tax credit: 30% up to $1,200/yr', `Many utilities cover blower-door testing (worth about ${usd(150)})`],
  });
}

export function evaluateEnvelopeRules(ctx: RuleContext): Recommendation[] {
  return fired(atticInsulation(ctx), wallInsulation(ctx), windowReplacement(ctx), airSealing(ctx));
}
