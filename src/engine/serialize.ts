import type { AuditReportV1 } from '../contracts/AuditReportV1';

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

// ─── Rounding policy by field name ────────────────────────────────────────────

const WHOLE_NUMBER_KEYS = new Set([
  // money
  'annualDollars',
  'lifetimeDollars',
  'npv',
  'low',
  'mid',
  'high',
  'estimate',
  'cost',
  'savings',
  'annualCost',
  'monthlyAvg',
  'totalInvestment',
  'totalAnnualSavings',
  'totalLifetimeSavings',
  'availableRebates',
  'netInvestment',
  'cumulativeSavings',
  'netSavings',
  'totalInvestmentAtBreakEven',
  'minimumDollars',
  // energy
  'annualBtu',
  'annualKwh',
  'annualTherms',
  'totalKbtu',
  'totalKwh',
  'totalTherms',
  'kbtu',
  'similarHomesAvgKbtu',
  'energyStarTargetKbtu',
  'netZeroTargetKbtu',
  'months',
  'equivalentTreesPlanted',
]);

const ONE_DECIMAL_KEYS = new Set([
  // percentages
  'roiPercent',
  'roi',
  'pct',
  'reductionPct',
  'improvementPotentialPct',
  'coveragePct',
  // years
  'paybackYears',
  'averagePayback',
  'years',
  // intensity
  'eui',
  'targetEui',
]);

const TWO_DECIMAL_KEYS = new Set(['co2ReductionTons', 'co2ReductionLifetime', 'carbonTons']);

function roundTo(n: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(n * factor) / factor;
}

export function serializeNumber(key: string | undefined, n: number): number | null {
  if (!Number.isFinite(n)) return null;
  if (key === undefined) return n;
  if (WHOLE_NUMBER_KEYS.has(key)) return Math.round(n);
  if (ONE_DECIMAL_KEYS.has(key)) return roundTo(n, 1);
  if (TWO_DECIMAL_KEYS.has(key)) return roundTo(n, 2);
  return n;
}

function toJson(value: unknown, key: string | undefined): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return serializeNumber(key, value);
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (Array.isArray(value)) return value.map((item) => toJson(item, undefined));
  if (typeof value === 'object') {
    const out: { [key: string]: JsonValue } = {};
    for (const [k, v] of Object.entries(value)) {
      if (v === undefined) continue;
      out[k] = toJson(v, k);
    }
    return out;
  }
  return null;
}

/**
 * JSON-ready copy of a report. Money and energy quantities are whole numbers,
 * percentages, paybacks and EUI carry one decimal, CO2 two; Infinity and NaN
 * become null. Unit prices and anything not listed keep full precision.
 */
export function serializeReport(report: AuditReportV1): JsonValue {
  return toJson(report, undefined);
}
