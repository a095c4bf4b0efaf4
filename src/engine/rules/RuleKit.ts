import type {
  FinancialResult,
  FuelType,
  ResolvedHomeProfile,
  SavingsResult,
  UsageBreakdown,
  UtilityRateSet,
} from '../schema/AuditSchemaV1';
import type {
  GatedRuleV1,
  Priority,
  Recommendation,
  RecommendationCategory,
} from '../../contracts/AuditReportV1';
import type { SavingsCalculator } from '../modules/SavingsCalculator';
import { kbtuToDollars } from '../modules/UtilityRatesModule';
import { BTU_PER_KBTU, KBTU_TO_KWH, KBTU_TO_THERM } from '../utils/units';

// ─── Types ────────────────────────────────────────────────────────────────────

/**
 * Request-scoped inputs shared by every rule. `gated` and `notes` collect
 * trace output; rules never read them back.
 */
export interface RuleContext {
  profile: ResolvedHomeProfile;
  breakdown: UsageBreakdown;
  /** Authoritative annual total, kBTU. */
  totalKbtu: number;
  rates: UtilityRateSet;
  calculator: SavingsCalculator;
  gated: GatedRuleV1[];
  notes: string[];
}

export interface AuditRule {
  category: RecommendationCategory;
  evaluate: (ctx: RuleContext) => Recommendation[];
}

export type PriorityPolicy = (paybackYears: number) => Priority;

/** Energy quantities used for the CO2 estimate. */
export interface EmissionBasis {
  kwh: number;
  therms: number;
}

export interface RecommendationDraft {
  category: RecommendationCategory;
  /** Measure slug, unique within the category. */
  measure: string;
  title: string;
  description: string;
  currentCondition: string;
  recommendedAction: string;
  costEstimate: number;
  savings: SavingsResult;
  /** Recommendations saving less than this per year are suppressed. */
  minimumAnnualDollars: number;
  priority: PriorityPolicy;
  emissions: EmissionBasis;
  rebates: string[];
  /** Replaces the payback/ROI derived from cost and savings. */
  financialOverride?: FinancialResult;
}

// ─── Constants ────────────────────────────────────────────────────────────────

const COST_LOW_FACTOR = 0.8;
const COST_HIGH_FACTOR = 1.2;

// ─── Priority policies ────────────────────────────────────────────────────────

/** High below `highBelow` years, Medium below `mediumBelow`, Low after. */
export function paybackTiers(highBelow: number, mediumBelow: number = Infinity): PriorityPolicy {
  return (payback) => {
    if (payback < highBelow) return 'High';
    if (payback < mediumBelow) return 'Medium';
    return 'Low';
  };
}

/** High below `highBelow` years, Medium otherwise. */
export function highOrMedium(highBelow: number): PriorityPolicy {
  return (payback) => (payback < highBelow ? 'High' : 'Medium');
}

// ─── Savings helpers ──────────────────────────────────────────────────────────

export function recommendationId(category: RecommendationCategory, measure: string): string {
  const slug = category.toLowerCase().replace(/[^a-z0-9]+/g, '_');
  return `rec_${slug}_${measure}`;
}

/**
 * Savings of `kbtu` of a single fuel. Electric measures report therms as 0;
 * combustion measures report both unit equivalents, as the calculator does.
 */
export function fuelSavings(
  rates: UtilityRateSet,
  kbtu: number,
  fuel: FuelType,
  lifetimeYears: number,
): SavingsResult {
  const annualKbtu = Math.max(0, kbtu);
  return {
    annualKbtu,
    annualKwh: annualKbtu * KBTU_TO_KWH,
    annualTherms: fuel === 'elec' ? 0 : annualKbtu * KBTU_TO_THERM,
    annualDollars: kbtuToDollars(rates, annualKbtu, fuel),
    lifetimeYears,
  };
}

/** Scale a result down so it never saves more than `maxKbtu`. */
export function capSavings(savings: SavingsResult, maxKbtu: number): SavingsResult {
  if (savings.annualKbtu <= maxKbtu || savings.annualKbtu <= 0) return savings;
  const scale = Math.max(0, maxKbtu) / savings.annualKbtu;
  return {
    annualKbtu: savings.annualKbtu * scale,
    annualKwh: savings.annualKwh * scale,
    annualTherms: savings.annualTherms * scale,
    annualDollars: savings.annualDollars * scale,
    lifetimeYears: savings.lifetimeYears,
  };
}

/** Emission basis for a single-fuel measure. */
export function emissionsFor(savings: SavingsResult, fuel: FuelType): EmissionBasis {
  return fuel === 'elec'
    ? { kwh: savings.annualKwh, therms: 0 }
    : { kwh: 0, therms: savings.annualTherms };
}

export function usd(n: number): string {
  return `$${Math.round(n).toLocaleString('en-US')}`;
}

// ─── Builder ──────────────────────────────────────────────────────────────────

/**
 * Apply the materiality gate and derive the financial and environmental
 * blocks. Returns null (and records the gate) when the measure saves less
 * than its category minimum.
 */
export function buildRecommendation(
  ctx: RuleContext,
  draft: RecommendationDraft,
): Recommendation | null {
  const id = recommendationId(draft.category, draft.measure);
  const { savings, costEstimate } = draft;

  if (savings.annualDollars < draft.minimumAnnualDollars) {
    ctx.gated.push({
      id,
      annualDollars: savings.annualDollars,
      minimumDollars: draft.minimumAnnualDollars,
    });
    ctx.notes.push(
      `${draft.title}: saves ${usd(savings.annualDollars)}/yr, below the ` +
        `${usd(draft.minimumAnnualDollars)}/yr threshold – not recommended.`,
    );
    return null;
  }

  const { calculator } = ctx;
  const financial =
    draft.financialOverride ?? calculator.paybackRoi(costEstimate, savings.annualDollars);
  const lifetime = calculator.lifetimeSavings(savings.annualDollars, savings.lifetimeYears);
  const co2Tons = calculator.co2Reduction(draft.emissions.kwh, draft.emissions.therms);

  return {
    id,
    category: draft.category,
    priority: draft.priority(financial.paybackYears),
    title: draft.title,
    description: draft.description,
    currentCondition: draft.currentCondition,
    recommendedAction: draft.recommendedAction,
    cost: {
      low: costEstimate * COST_LOW_FACTOR,
      mid: costEstimate,
      high: costEstimate * COST_HIGH_FACTOR,
      estimate: costEstimate,
    },
    savings: {
      annualBtu: savings.annualKbtu * BTU_PER_KBTU,
      annualKwh: savings.annualKwh,
      annualTherms: savings.annualTherms,
      annualDollars: savings.annualDollars,
      lifetimeDollars: lifetime.lifetimeDollars,
      lifetimeYears: savings.lifetimeYears,
    },
    financial: {
      paybackYears: financial.paybackYears,
      roiPercent: financial.roiPercent,
      npv: lifetime.npv,
    },
    environmental: {
      co2ReductionTons: co2Tons,
      co2ReductionLifetime: co2Tons * savings.lifetimeYears,
    },
    rebates: draft.rebates,
  };
}

/** Collect the non-null results of a rule's candidate builds. */
export function fired(...candidates: Array<Recommendation | null>): Recommendation[] {
  return candidates.filter((rec): rec is Recommendation => rec !== null);
}
