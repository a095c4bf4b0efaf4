import type { CustomRates, PricingFuel, Region, UtilityRateSet } from '../schema/AuditSchemaV1';
import {
  KBTU_TO_KWH,
  KBTU_TO_THERM,
  PROPANE_KBTU_PER_GALLON,
  FUEL_OIL_KBTU_PER_GALLON,
} from '../utils/units';

// ─── Rate tables (EIA 2020–2024 residential averages) ─────────────────────────

type DivisionRates = Record<string, number> & { default: number };

type RegionalRateTable = Record<Exclude<Region, 'default'>, DivisionRates> & { default: number };

/** Electricity, $/kWh by census region → division. */
export const ELECTRICITY_RATES: RegionalRateTable = {
  Northeast: { 'New England': 0.22, 'Middle Atlantic': 0.16, default: 0.19 },
  Midwest: { 'East North Central': 0.13, 'West North Central': 0.12, default: 0.125 },
  South: {
    'South Atlantic': 0.12,
    'East South Central': 0.11,
    'West South Central': 0.11,
    default: 0.113,
  },
  West: { Mountain: 0.12, Pacific: 0.18, default: 0.15 },
  default: 0.14, // national average
};

/** Natural gas, $/therm by census region → division. */
export const GAS_RATES: RegionalRateTable = {
  Northeast: { 'New England': 1.8, 'Middle Atlantic': 1.2, default: 1.5 },
  Midwest: { 'East North Central': 1.0, 'West North Central': 0.9, default: 0.95 },
  South: {
    'South Atlantic': 1.1,
    'East South Central': 1.0,
    'West South Central': 0.85,
    default: 0.98,
  },
  West: { Mountain: 0.95, Pacific: 1.4, default: 1.18 },
  default: 1.2,
};

/** Propane, $/gallon by region. */
export const PROPANE_RATES: Record<Region, number> = {
  Northeast: 2.8,
  Midwest: 2.2,
  South: 2.1,
  West: 2.5,
  default: 2.4,
};

/** Heating oil, $/gallon by region. */
export const FUEL_OIL_RATES: Record<Region, number> = {
  Northeast: 3.2,
  Midwest: 3.0,
  South: 3.1,
  West: 3.3,
  default: 3.15,
};

/** Share of a 'blended' kBTU quantity priced as natural gas; the rest is electric. */
const BLENDED_GAS_SHARE = 0.6;

// ─── Region resolution ────────────────────────────────────────────────────────

/**
 * Classify a census division (or region) string into a rate region.
 *
 * Order matters: "West North Central" is Midwest and "West South Central" is
 * South, so the West test runs last.
 */
export function classifyRegion(division: string | undefined): Region {
  if (!division) return 'default';
  if (
    division.includes('Northeast') ||
    division.includes('New England') ||
    division.includes('Middle Atlantic')
  ) {
    return 'Northeast';
  }
  if (division.includes('Midwest') || division.includes('North Central')) return 'Midwest';
  if (division.includes('South')) return 'South';
  if (division.includes('West') || division.includes('Mountain') || division.includes('Pacific')) {
    return 'West';
  }
  return 'default';
}

function lookupDivisionRate(table: RegionalRateTable, region: Region, division: string): number {
  if (region === 'default') return table.default;
  const regionRates = table[region];
  return division in regionRates ? regionRates[division] : regionRates.default;
}

/** $/kWh for a division; a custom `elec` rate wins. */
export function getElectricityRate(division?: string, customRates: CustomRates = {}): number {
  return customRates.elec ?? lookupDivisionRate(ELECTRICITY_RATES, classifyRegion(division), division || 'default');
}

/** $/therm for a division; a custom `gas` rate wins. */
export function getGasRate(division?: string, customRates: CustomRates = {}): number {
  return customRates.gas ?? lookupDivisionRate(GAS_RATES, classifyRegion(division), division || 'default');
}

export function getPropaneRate(division?: string, customRates: CustomRates = {}): number {
  return customRates.propane ?? PROPANE_RATES[classifyRegion(division)];
}

export function getFuelOilRate(division?: string, customRates: CustomRates = {}): number {
  return customRates.fuelOil ?? FUEL_OIL_RATES[classifyRegion(division)];
}

/**
 * Resolve the unit prices for a household.
 *
 * `state` is accepted for forward compatibility with state-level tables and
 * is carried through unchanged; pricing is resolved at division granularity.
 * Custom overrides win over every table entry.
 */
export function resolveUtilityRates(
  division?: string,
  state?: string,
  customRates: CustomRates = {},
): UtilityRateSet {
  return {
    electricity: getElectricityRate(division, customRates),
    gas: getGasRate(division, customRates),
    propane: getPropaneRate(division, customRates),
    fuelOil: getFuelOilRate(division, customRates),
    region: classifyRegion(division),
    division: division || 'default',
    state,
  };
}

// ─── Pricing ──────────────────────────────────────────────────────────────────

/**
 * Convert an energy quantity to dollars under a fuel pricing policy.
 *
 * 'blended' prices 60% of the quantity as gas and 40% as electricity
 * regardless of the home's actual heating fuel.
 */
export function kbtuToDollars(rates: UtilityRateSet, kbtu: number, fuel: PricingFuel): number {
  switch (fuel) {
    case 'elec':
      return kbtu * KBTU_TO_KWH * rates.electricity;
    case 'gas':
      return kbtu * KBTU_TO_THERM * rates.gas;
    case 'propane':
      return (kbtu / PROPANE_KBTU_PER_GALLON) * rates.propane;
    case 'fuel_oil':
      return (kbtu / FUEL_OIL_KBTU_PER_GALLON) * rates.fuelOil;
    case 'blended':
      return (
        kbtuToDollars(rates, kbtu * BLENDED_GAS_SHARE, 'gas') +
        kbtuToDollars(rates, kbtu * (1 - BLENDED_GAS_SHARE), 'elec')
      );
  }
}
