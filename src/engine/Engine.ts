import type {
  AuditRequestV1,
  BenchmarkTable,
  CustomRates,
  HomeProfileV1,
  UsagePredictor,
} from './schema/AuditSchemaV1';
import type { AssumptionV1, AuditReportV1 } from '../contracts/AuditReportV1';
import { ASSUMPTION_IDS, type AssumptionId } from '../contracts/assumptions.ids';
import { CONTRACT_VERSION, ENGINE_VERSION } from '../contracts/versions';
import { ASSUMPTION_CATALOG } from './assumptions.catalog';
import { blendWithReportedUsage, normalizeProfile } from './normalizer/ProfileNormalizer';
import { resolveUtilityRates } from './modules/UtilityRatesModule';
import { evaluateRules } from './AuditEngine';
import { formatRecommendation } from './RecommendationFormatter';
import { BENCHMARK_EUI, assembleReport } from './ReportAssembler';

function assumption(id: AssumptionId): AssumptionV1 {
  return { id, ...ASSUMPTION_CATALOG[id] };
}

/**
 * Full audit for one home: normalise the profile, blend in any bill-derived
 * total, resolve rates, run the rule battery, format each recommendation and
 * assemble the report.
 *
 * Pure and synchronous. Caller-supplied benchmarks override the built-in
 * regional table entry by entry.
 */
export function runAudit(request: AuditRequestV1): AuditReportV1 {
  const normalized = normalizeProfile(request.profile);
  const { profile } = normalized;

  const { breakdown, blended } = blendWithReportedUsage(request.breakdown, profile.reportedAnnualKbtu);
  const rates = resolveUtilityRates(profile.division, profile.state, request.customRates);
  const benchmarks: BenchmarkTable = { ...BENCHMARK_EUI, ...request.benchmarks };

  const run = evaluateRules(profile, breakdown, breakdown.totalKbtu, rates);
  const recommendations = run.recommendations.map(formatRecommendation);
  const body = assembleReport(profile, breakdown, recommendations, benchmarks, rates);

  const assumptions = [...normalized.assumptions, assumption(ASSUMPTION_IDS.MODELLED_NOT_MEASURED)];
  const notes = [...normalized.notes];
  if (blended) {
    assumptions.push(assumption(ASSUMPTION_IDS.BILL_BLENDED));
    notes.push(
      `Annual total blended with utility bills: model ${Math.round(request.breakdown.totalKbtu)} kBTU, ` +
        `bills ${Math.round(profile.reportedAnnualKbtu ?? 0)} kBTU → ${Math.round(breakdown.totalKbtu)} kBTU.`,
    );
  }
  notes.push(`Rates: ${rates.region} region, $${rates.electricity}/kWh, $${rates.gas}/therm.`);

  return {
    meta: {
      engineVersion: ENGINE_VERSION,
      contractVersion: CONTRACT_VERSION,
      assumptions,
      inputCoverage: normalized.inputCoverage,
      trace: { ...run.trace, notes: [...notes, ...run.trace.notes] },
    },
    ...body,
  };
}

export interface PredictorAuditOptions {
  customRates?: CustomRates;
  benchmarks?: BenchmarkTable;
}

/** Audit a home whose end-use breakdown comes from an inference collaborator. */
export function runAuditWithPredictor(
  profile: HomeProfileV1,
  predictor: UsagePredictor,
  options: PredictorAuditOptions = {},
): AuditReportV1 {
  return runAudit({ profile, breakdown: predictor(profile), ...options });
}
