import type {
  ContractorGuidance,
  Difficulty,
  Priority,
  ProfessionalRecommendation,
  Recommendation,
  RecommendationCategory,
  RoiAnalysis,
  RoiYear,
} from '../contracts/AuditReportV1';
import { ROI_HORIZON_YEARS } from './modules/SavingsCalculator';
import { RECOMMENDATION_CATALOG as CATALOG, lookupByCategory } from './recommendation.catalog';

// ─── Constants ────────────────────────────────────────────────────────────────

const EASY_DIY_MAX_COST = 500;
const DIY_MAX_COST = 2_000;
const RECOMMENDED_PRO_MAX_COST = 10_000;

const ESTIMATED_TIME: Record<Difficulty, string> = {
  'DIY - Easy': '2-4 hours',
  'DIY to Professional': '4-8 hours',
  'Professional Installation Recommended': '1-2 days',
  'Professional Installation Required': '2-5 days',
};

const PERMIT_COST_THRESHOLD = 5_000;
const PERMIT_CATEGORIES: ReadonlySet<RecommendationCategory> = new Set([
  'Heating System',
  'Cooling System',
  'Renewable Energy',
]);
const INSPECTION_CATEGORIES: ReadonlySet<RecommendationCategory> = new Set([
  'Heating System',
  'Cooling System',
  'Water Heating',
  'Renewable Energy',
]);

const CASH_MAX_COST = 1_000;
const SHORT_TERM_MAX_COST = 5_000;

const COST_RANGE_LOW = 0.8;
const COST_RANGE_HIGH = 1.2;

// Mature trees needed to absorb one short ton of CO2 a year.
const TREES_PER_TON_CO2 = 40;

// ─── Derivations ──────────────────────────────────────────────────────────────

export function estimateDifficulty(cost: number): Difficulty {
  if (cost < EASY_DIY_MAX_COST) return 'DIY - Easy';
  if (cost < DIY_MAX_COST) return 'DIY to Professional';
  if (cost < RECOMMENDED_PRO_MAX_COST) return 'Professional Installation Recommended';
  return 'Professional Installation Required';
}

export function isDiy(difficulty: Difficulty): boolean {
  return difficulty === 'DIY - Easy' || difficulty === 'DIY to Professional';
}

export function requiresPermit(category: RecommendationCategory, cost: number): boolean {
  return cost > PERMIT_COST_THRESHOLD || PERMIT_CATEGORIES.has(category);
}

export function requiresInspection(category: RecommendationCategory): boolean {
  return INSPECTION_CATEGORIES.has(category);
}

export function financingOptions(cost: number): string[] {
  if (cost < CASH_MAX_COST) return [...CATALOG.financing.small];
  if (cost < SHORT_TERM_MAX_COST) return [...CATALOG.financing.medium];
  return [...CATALOG.financing.large];
}

function wholeDollars(n: number): string {
  return `$${n.toLocaleString('en-US', { maximumFractionDigits: 0 })}`;
}

export function contractorGuidance(
  category: RecommendationCategory,
  difficulty: Difficulty,
  cost: number,
): ContractorGuidance {
  if (isDiy(difficulty)) {
    return { contractorRequired: false, tips: [...CATALOG.diyTips] };
  }
  return {
    contractorRequired: true,
    qualifications: [...lookupByCategory(CATALOG.qualifications, category)],
    selectionTips: [...CATALOG.selectionTips],
    redFlags: [...CATALOG.redFlags],
    typicalCostRange: `${wholeDollars(cost * COST_RANGE_LOW)} - ${wholeDollars(cost * COST_RANGE_HIGH)}`,
  };
}

/**
 * Summary line, cumulative savings table over the ROI horizon and, when the
 * measure pays back at all, the break-even point.
 */
export function roiAnalysis(
  paybackYears: number,
  roiPercent: number,
  annualDollars: number,
  cost: number,
): RoiAnalysis {
  let summary: string;
  if (cost <= 0) {
    summary = `No upfront cost; saves ${wholeDollars(annualDollars)} a year from the start`;
  } else if (!Number.isFinite(paybackYears)) {
    summary = 'Savings do not recover the upfront cost';
  } else {
    summary =
      `Payback in ${paybackYears.toFixed(1)} years with ${roiPercent.toFixed(1)}% ROI ` +
      `over ${ROI_HORIZON_YEARS} years`;
  }

  const yearByYear: RoiYear[] = [];
  for (let year = 1; year <= ROI_HORIZON_YEARS; year++) {
    const cumulativeSavings = annualDollars * year;
    const netSavings = cumulativeSavings - cost;
    yearByYear.push({
      year,
      cumulativeSavings,
      netSavings,
      roi: cost > 0 ? (netSavings / cost) * 100 : 0,
    });
  }

  const analysis: RoiAnalysis = { summary, yearByYear };
  if (Number.isFinite(paybackYears) && paybackYears > 0) {
    analysis.breakEven = {
      years: paybackYears,
      months: paybackYears * 12,
      totalInvestmentAtBreakEven: cost,
    };
  }
  return analysis;
}

export function nextSteps(priority: Priority): string[] {
  const lead = priority === 'High' ? CATALOG.nextSteps.high : CATALOG.nextSteps.standard;
  return [...lead, ...CATALOG.nextSteps.common];
}

// ─── Main ─────────────────────────────────────────────────────────────────────

/**
 * Enrich a recommendation with implementation, financing, incentive and
 * code guidance. Every added field is a function of category, cost,
 * priority and the existing financial figures; unknown categories fall back
 * to the catalog defaults.
 */
export function formatRecommendation(rec: Recommendation): ProfessionalRecommendation {
  const { category } = rec;
  const cost = rec.cost.estimate;
  const difficulty = estimateDifficulty(cost);
  const maintenance = lookupByCategory(CATALOG.maintenance, category);

  return {
    ...rec,
    implementation: {
      difficulty,
      estimatedTime: ESTIMATED_TIME[difficulty],
      seasonalTiming: lookupByCategory(CATALOG.seasonalTiming, category),
      steps: [...lookupByCategory(CATALOG.implementationSteps, category)],
      contractorGuidance: contractorGuidance(category, difficulty, cost),
    },
    cost: { ...rec.cost, financingOptions: financingOptions(cost) },
    financial: {
      ...rec.financial,
      roiAnalysis: roiAnalysis(
        rec.financial.paybackYears,
        rec.financial.roiPercent,
        rec.savings.annualDollars,
        cost,
      ),
    },
    environmental: {
      ...rec.environmental,
      equivalentTreesPlanted: rec.environmental.co2ReductionTons * TREES_PER_TON_CO2,
    },
    incentives: {
      rebates: [...rec.rebates],
      taxCredits: [...lookupByCategory(CATALOG.taxCredits, category)],
      utilityPrograms: [...CATALOG.utilityPrograms],
    },
    warranty: lookupByCategory(CATALOG.warranty, category),
    maintenance: { ...maintenance },
    professionalNotes: {
      codeRequirements: lookupByCategory(CATALOG.codeRequirements, category),
      permitsRequired: requiresPermit(category, cost),
      inspectionRequired: requiresInspection(category),
      energyRating: lookupByCategory(CATALOG.energyRating, category),
    },
    nextSteps: nextSteps(rec.priority),
  };
}
