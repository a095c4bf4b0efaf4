export type FuelType = 'gas' | 'elec' | 'propane' | 'fuel_oil';

/** Pricing policy accepted by kbtuToDollars: a single fuel or the 60/40 gas/electric blend. */
export type PricingFuel = FuelType | 'blended';

export type InsulationGrade = 'well' | 'adequate' | 'poor' | 'none';

export type Draftiness = 'never' | 'some' | 'most' | 'always';

export type WindowType = 'single' | 'double' | 'triple';

export type HeatingEquipment =
  | 'furnace'
  | 'boiler'
  | 'heat_pump'
  | 'electric_baseboard'
  | 'other'
  | 'none';

/** Equipment age band as captured by the household survey. */
export type EquipmentAgeBand = 'new' | '1_5' | '6_10' | '11_15' | '16_20' | 'over_20';

export type HomeType =
  | 'mobile'
  | 'single_family_detached'
  | 'single_family_attached'
  | 'apartment_small'
  | 'apartment_large';

export type RoofOrientation = 'south' | 'east' | 'west' | 'north';

/**
 * Household profile as supplied by the survey / inference collaborator.
 *
 * Every field is optional: the normalizer resolves missing values to the
 * documented defaults and records an assumption for each one.
 */
export interface HomeProfileV1 {
  // Building
  squareFeet?: number;
  stories?: number;
  homeType?: HomeType;
  yearBuilt?: number;
  occupants?: number;

  // Location & climate
  division?: string;
  state?: string;
  heatingDegreeDays?: number;
  coolingDegreeDays?: number;

  // Envelope
  insulation?: InsulationGrade;
  draftiness?: Draftiness;
  /** Survey window-count bucket (1 = 1–2 windows … 7 = 30+). */
  windowCountCategory?: number;
  windowType?: WindowType;

  // Heating
  heatingEquipment?: HeatingEquipment;
  heatingFuel?: FuelType;
  heatingEquipmentAge?: EquipmentAgeBand;
  hasProgrammableThermostat?: boolean;
  winterSetpointF?: number;

  // Cooling
  hasCentralAc?: boolean;
  acEquipmentAge?: EquipmentAgeBand;

  // Water heating
  waterHeaterFuel?: FuelType;

  // Appliances & lighting
  refrigeratorCount?: number;
  /** Survey refrigerator-age bucket (1 = under 2 years … 6 = 20+ years). */
  refrigeratorAgeCategory?: number;
  /** Survey incandescent-usage bucket (0 = none … 4 = all or almost all). */
  incandescentCategory?: number;

  // Smart home
  hasSmartMeter?: boolean;

  // Solar siting
  roofOrientation?: RoofOrientation;
  shadingFactor?: number;

  /** Annual consumption derived from the household's own utility bills (kBTU). */
  reportedAnnualKbtu?: number;
}

/** Profile with every default applied. Rules only ever see this shape. */
export type ResolvedHomeProfile = Required<Omit<HomeProfileV1, 'state' | 'reportedAnnualKbtu'>> &
  Pick<HomeProfileV1, 'state' | 'reportedAnnualKbtu'>;

/** Predicted annual consumption by end use, kBTU/year. `totalKbtu` is authoritative. */
export interface UsageBreakdown {
  heatingKbtu: number;
  coolingKbtu: number;
  waterKbtu: number;
  baseloadKbtu: number;
  totalKbtu: number;
}

/** Opaque inference collaborator: profile in, kBTU by end use out. */
export type UsagePredictor = (profile: HomeProfileV1) => UsageBreakdown;

export interface CustomRates {
  elec?: number;
  gas?: number;
  propane?: number;
  fuelOil?: number;
}

/** Average site EUI (kBTU/sqft/yr) keyed by census region, plus a 'National' fallback. */
export type BenchmarkTable = Partial<Record<string, number>>;

export interface AuditRequestV1 {
  profile: HomeProfileV1;
  breakdown: UsageBreakdown;
  customRates?: CustomRates;
  benchmarks?: BenchmarkTable;
}

// ─── Rates ────────────────────────────────────────────────────────────────────

export type Region = 'Northeast' | 'Midwest' | 'South' | 'West' | 'default';

export interface UtilityRateSet {
  /** $/kWh */
  electricity: number;
  /** $/therm */
  gas: number;
  /** $/gallon */
  propane: number;
  /** $/gallon */
  fuelOil: number;
  region: Region;
  division: string;
  state?: string;
}

// ─── Calculator results ───────────────────────────────────────────────────────

export interface SavingsResult {
  annualKbtu: number;
  annualKwh: number;
  annualTherms: number;
  annualDollars: number;
  lifetimeYears: number;
}

export interface FinancialResult {
  /** Infinity when annual savings are zero or negative. */
  paybackYears: number;
  roiPercent: number;
}

export interface LifetimeSavingsResult {
  lifetimeDollars: number;
  npv: number;
  simplePaybackYears: number;
}

export interface ClimateContext {
  hdd: number;
  cdd: number;
}
