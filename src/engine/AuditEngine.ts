import type {
  HomeProfileV1,
  ResolvedHomeProfile,
  UsageBreakdown,
  UtilityRateSet,
} from './schema/AuditSchemaV1';
import type { EngineTraceV1, Recommendation } from '../contracts/AuditReportV1';
import { SavingsCalculator } from './modules/SavingsCalculator';
import { resolveUtilityRates } from './modules/UtilityRatesModule';
import { normalizeProfile } from './normalizer/ProfileNormalizer';
import type { AuditRule, RuleContext } from './rules/RuleKit';
import { evaluateEnvelopeRules } from './rules/EnvelopeRules';
import { evaluateHeatingRules } from './rules/HeatingRules';
import { evaluateCoolingRules } from './rules/CoolingRules';
import { evaluateWaterHeatingRules } from './rules/WaterHeatingRules';
import { evaluateApplianceRules, evaluateLightingRules } from './rules/ApplianceRules';
import { evaluateRenewableRules } from './rules/RenewableRules';
import { evaluateBehavioralRules, evaluateSmartHomeRules } from './rules/SmartHomeRules';

/** Evaluation order; also the tie-break order for equal paybacks. */
export const AUDIT_RULES: readonly AuditRule[] = [
  { category: 'Building Envelope', evaluate: evaluateEnvelopeRules },
  { category: 'Heating System', evaluate: evaluateHeatingRules },
  { category: 'Cooling System', evaluate: evaluateCoolingRules },
  { category: 'Water Heating', evaluate: evaluateWaterHeatingRules },
  { category: 'Appliances', evaluate: evaluateApplianceRules },
  { category: 'Lighting', evaluate: evaluateLightingRules },
  { category: 'Renewable Energy', evaluate: evaluateRenewableRules },
  { category: 'Smart Home', evaluate: evaluateSmartHomeRules },
  { category: 'Behavioral', evaluate: evaluateBehavioralRules },
];

export interface RecommendationRun {
  recommendations: Recommendation[];
  trace: EngineTraceV1;
}

/** Ascending payback; Infinity sorts last. */
export function comparePayback(a: Recommendation, b: Recommendation): number {
  const pa = a.financial.paybackYears;
  const pb = b.financial.paybackYears;
  if (pa === pb) return 0;
  if (pa === Infinity) return 1;
  if (pb === Infinity) return -1;
  return pa - pb;
}

/** Stable sort; equal paybacks keep emission order. */
export function sortByPayback(recommendations: readonly Recommendation[]): Recommendation[] {
  return [...recommendations].sort(comparePayback);
}

/**
 * Run every rule against a resolved profile.
 *
 * Each rule is isolated: one that throws is listed in `trace.skipped` and
 * the remaining rules still run.
 */
export function evaluateRules(
  profile: ResolvedHomeProfile,
  breakdown: UsageBreakdown,
  totalKbtu: number,
  rates: UtilityRateSet,
  rules: readonly AuditRule[] = AUDIT_RULES,
): RecommendationRun {
  const ctx: RuleContext = {
    profile,
    breakdown,
    totalKbtu,
    rates,
    calculator: new SavingsCalculator(rates, {
      hdd: profile.heatingDegreeDays,
      cdd: profile.coolingDegreeDays,
    }),
    gated: [],
    notes: [],
  };

  const trace: EngineTraceV1 = {
    categoriesEvaluated: [],
    fired: [],
    gated: ctx.gated,
    skipped: [],
    notes: ctx.notes,
  };

  const emitted: Recommendation[] = [];
  for (const rule of rules) {
    trace.categoriesEvaluated.push(rule.category);
    try {
      const recs = rule.evaluate(ctx);
      emitted.push(...recs);
      trace.fired.push(...recs.map((r) => r.id));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      trace.skipped.push({ category: rule.category, reason });
      ctx.notes.push(`${rule.category} rules skipped: ${reason}`);
    }
  }

  const recommendations = sortByPayback(emitted);
  ctx.notes.push(
    `${recommendations.length} recommendation(s) across ${rules.length} categories; ` +
      `${trace.gated.length} below their savings threshold.`,
  );

  return { recommendations, trace };
}

/**
 * Ranked recommendations for a home. Missing profile fields take their
 * defaults; rates are resolved from the profile's division when not given.
 */
export function generateRecommendations(
  profile: HomeProfileV1,
  breakdown: UsageBreakdown,
  totalKbtu: number,
  rates?: UtilityRateSet,
): Recommendation[] {
  const { profile: resolved } = normalizeProfile(profile);
  const rateSet = rates ?? resolveUtilityRates(resolved.division, resolved.state);
  return evaluateRules(resolved, breakdown, totalKbtu, rateSet).recommendations;
}
