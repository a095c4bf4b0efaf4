import type {
  BenchmarkTable,
  HomeType,
  ResolvedHomeProfile,
  UsageBreakdown,
  UtilityRateSet,
} from './schema/AuditSchemaV1';
import type {
  AuditReportBodyV1,
  BenchmarkComparisonV1,
  CurrentUsageV1,
  EnergyScoreV1,
  FinancialSummaryV1,
  Grade,
  ProjectedGrade,
  HomeProfileSummaryV1,
  ProfessionalRecommendation,
  ProjectedUsageV1,
  RoadmapPhaseV1,
  RoadmapV1,
  UsageBreakdownSectionV1,
  UsageProjectionV1,
} from '../contracts/AuditReportV1';
import { kbtuToDollars } from './modules/UtilityRatesModule';
import { SavingsCalculator } from './modules/SavingsCalculator';
import { BTU_PER_KBTU, KBTU_TO_KWH, KBTU_TO_THERM, clamp } from './utils/units';

// ─── Constants ────────────────────────────────────────────────────────────────

/** Average site EUI, kBTU/sqft/yr, by census region. */
export const BENCHMARK_EUI: BenchmarkTable = {
  National: 35,
  Northeast: 42,
  Midwest: 38,
  South: 30,
  West: 25,
};
const NATIONAL_EUI = 35;

// Added to the target so a zero benchmark cannot divide by zero.
const TARGET_EUI_EPSILON = 0.1;

// score = 100 − (EUI/target − 0.5) × 50: half the target scores 100, 2.5× scores 0.
const SCORE_RATIO_OFFSET = 0.5;
const SCORE_RATIO_SLOPE = 50;

const SIMILAR_HOMES_FACTOR = 1.1;
const NET_ZERO_EUI = 15;

const APPLIANCE_SHARE_OF_BASELOAD = 0.6;
const LIGHTING_SHARE_OF_BASELOAD = 0.4;

const QUICK_WIN_MAX_PAYBACK = 1;
const SHORT_TERM_MAX_PAYBACK = 5;
const ROADMAP_ITEM_LIMIT = 5;

// Flat share of investment assumed recoverable through rebates.
const AVERAGE_REBATE_RATE = 0.15;

const MONTHS_PER_YEAR = 12;

const GRADE_BANDS: Array<{ min: number; grade: Grade; label: string }> = [
  { min: 90, grade: 'A+', label: 'Excellent - Top Performer' },
  { min: 80, grade: 'A', label: 'Excellent' },
  { min: 70, grade: 'B+', label: 'Good - Above Average' },
  { min: 60, grade: 'B', label: 'Good' },
  { min: 50, grade: 'C+', label: 'Average - Some Improvement Potential' },
  { min: 40, grade: 'C', label: 'Average - Significant Improvement Potential' },
  { min: 30, grade: 'D', label: 'Below Average - Major Improvements Needed' },
];
const FAILING_GRADE = { grade: 'F' as const, label: 'Poor - Urgent Action Required' };

const PROJECTED_GRADE_BANDS: Array<{ min: number; grade: ProjectedGrade }> = [
  { min: 90, grade: 'A+' },
  { min: 80, grade: 'A-' },
  { min: 70, grade: 'B+' },
  { min: 60, grade: 'B' },
];

export const HOME_TYPE_LABELS: Record<HomeType, string> = {
  mobile: 'Mobile Home',
  single_family_detached: 'Single Family Detached',
  single_family_attached: 'Single Family Attached',
  apartment_small: 'Apartment in 2-4 Unit Building',
  apartment_large: 'Apartment in 5+ Unit Building',
};

// ─── Scoring ──────────────────────────────────────────────────────────────────

export function targetEuiFor(rates: UtilityRateSet, benchmarks: BenchmarkTable = BENCHMARK_EUI): number {
  return benchmarks[rates.region] ?? benchmarks.National ?? NATIONAL_EUI;
}

export function euiOf(totalKbtu: number, squareFeet: number): number {
  return squareFeet > 0 ? totalKbtu / squareFeet : 0;
}

export function scoreFromEui(eui: number, targetEui: number): number {
  const ratio = eui / (targetEui + TARGET_EUI_EPSILON);
  return clamp(100 - (ratio - SCORE_RATIO_OFFSET) * SCORE_RATIO_SLOPE, 0, 100);
}

export function gradeFor(score: number): { grade: Grade; label: string } {
  return GRADE_BANDS.find((band) => score >= band.min) ?? FAILING_GRADE;
}

export function energyScore(eui: number, targetEui: number): EnergyScoreV1 {
  const score = scoreFromEui(eui, targetEui);
  const { grade, label } = gradeFor(score);
  return { overall: Math.floor(score), grade, percentile: Math.floor(score), label };
}

/**
 * CO2 of whole-home consumption. The full total is counted once as
 * electricity and once as gas, matching the kWh and therm totals reported
 * under current usage.
 */
export function wholeHomeCarbonTons(calculator: SavingsCalculator, totalKbtu: number): number {
  return calculator.co2Reduction(totalKbtu * KBTU_TO_KWH, totalKbtu * KBTU_TO_THERM);
}

/** Coarser scale used for post-upgrade projections; anything below 60 is C+. */
export function projectedGradeFor(score: number): ProjectedGrade {
  return PROJECTED_GRADE_BANDS.find((band) => score >= band.min)?.grade ?? 'C+';
}

// ─── Sections ─────────────────────────────────────────────────────────────────

export function homeProfileSummary(profile: ResolvedHomeProfile): HomeProfileSummaryV1 {
  const division = profile.division === 'default' ? 'Unknown' : profile.division;
  return {
    location: profile.state ? `${profile.state}, ${division}` : division,
    type: HOME_TYPE_LABELS[profile.homeType],
    sizeSqft: profile.squareFeet,
    yearBuilt: profile.yearBuilt,
    occupants: profile.occupants,
    climate: { hdd: profile.heatingDegreeDays, cdd: profile.coolingDegreeDays },
  };
}

export function currentUsage(
  totalKbtu: number,
  squareFeet: number,
  rates: UtilityRateSet,
  calculator: SavingsCalculator,
): CurrentUsageV1 {
  const annualCost = kbtuToDollars(rates, totalKbtu, 'blended');
  return {
    totalKbtu,
    totalKwh: totalKbtu * KBTU_TO_KWH,
    totalTherms: totalKbtu * KBTU_TO_THERM,
    annualCost,
    monthlyAvg: annualCost / MONTHS_PER_YEAR,
    eui: euiOf(totalKbtu, squareFeet),
    carbonTons: wholeHomeCarbonTons(calculator, totalKbtu),
  };
}

export function usageBreakdownSection(
  breakdown: UsageBreakdown,
  totalKbtu: number,
  rates: UtilityRateSet,
): UsageBreakdownSectionV1 {
  const { heatingKbtu, coolingKbtu, waterKbtu, baseloadKbtu } = breakdown;
  const otherKbtu = Math.max(0, totalKbtu - heatingKbtu - coolingKbtu - waterKbtu - baseloadKbtu);
  const pct = (kbtu: number): number => (totalKbtu > 0 ? (kbtu / totalKbtu) * 100 : 0);

  const line = (kbtu: number, fuel: 'gas' | 'elec' | 'blended') => ({
    kbtu,
    pct: pct(kbtu),
    cost: kbtuToDollars(rates, kbtu, fuel),
  });

  return {
    heating: line(heatingKbtu, 'gas'),
    cooling: line(coolingKbtu, 'elec'),
    waterHeating: line(waterKbtu, 'blended'),
    appliances: line(baseloadKbtu * APPLIANCE_SHARE_OF_BASELOAD, 'elec'),
    lighting: line(baseloadKbtu * LIGHTING_SHARE_OF_BASELOAD, 'elec'),
    other: line(otherKbtu, 'blended'),
  };
}

export function benchmarkComparison(
  eui: number,
  targetEui: number,
  squareFeet: number,
): BenchmarkComparisonV1 {
  const similarEui = targetEui * SIMILAR_HOMES_FACTOR;

  let percentile: number;
  let yourRank: string;
  if (eui < targetEui * 0.7) {
    percentile = 85;
    yourRank = '15th percentile';
  } else if (eui < targetEui) {
    percentile = 60;
    yourRank = '40th percentile';
  } else if (eui < similarEui) {
    percentile = 45;
    yourRank = '55th percentile';
  } else {
    percentile = 25;
    yourRank = '75th percentile';
  }

  return {
    targetEui,
    similarHomesAvgKbtu: similarEui * squareFeet,
    energyStarTargetKbtu: targetEui * squareFeet,
    netZeroTargetKbtu: NET_ZERO_EUI * squareFeet,
    yourRank,
    percentile,
    improvementPotentialPct: eui > 0 ? ((eui - targetEui) / eui) * 100 : 0,
  };
}

export function financialSummary(recs: readonly ProfessionalRecommendation[]): FinancialSummaryV1 {
  const totalInvestment = recs.reduce((sum, r) => sum + r.cost.estimate, 0);
  const totalAnnualSavings = recs.reduce((sum, r) => sum + r.savings.annualDollars, 0);
  const totalLifetimeSavings = recs.reduce((sum, r) => sum + r.savings.lifetimeDollars, 0);

  const paybacks = recs.map((r) => r.financial.paybackYears).filter(Number.isFinite);
  const averagePayback =
    paybacks.length > 0 ? paybacks.reduce((sum, p) => sum + p, 0) / paybacks.length : 0;

  const availableRebates = totalInvestment * AVERAGE_REBATE_RATE;
  return {
    totalInvestment,
    totalAnnualSavings,
    totalLifetimeSavings,
    averagePayback,
    availableRebates,
    netInvestment: totalInvestment - availableRebates,
  };
}

function projection(
  currentKbtu: number,
  savedKbtu: number,
  squareFeet: number,
  targetEui: number,
  rates: UtilityRateSet,
  calculator: SavingsCalculator,
): UsageProjectionV1 {
  const totalKbtu = Math.max(0, currentKbtu - savedKbtu);
  const eui = euiOf(totalKbtu, squareFeet);
  const score = scoreFromEui(eui, targetEui);
  return {
    totalKbtu,
    annualCost: kbtuToDollars(rates, totalKbtu, 'blended'),
    reductionPct: currentKbtu > 0 ? ((currentKbtu - totalKbtu) / currentKbtu) * 100 : 0,
    eui,
    score: Math.floor(score),
    grade: projectedGradeFor(score),
    carbonTons: wholeHomeCarbonTons(calculator, totalKbtu),
  };
}

function savedKbtu(recs: readonly ProfessionalRecommendation[]): number {
  return recs.reduce((sum, r) => sum + r.savings.annualBtu / BTU_PER_KBTU, 0);
}

export function isQuickWin(rec: ProfessionalRecommendation): boolean {
  return rec.financial.paybackYears < QUICK_WIN_MAX_PAYBACK;
}

export function projectedUsage(
  recs: readonly ProfessionalRecommendation[],
  currentKbtu: number,
  squareFeet: number,
  targetEui: number,
  rates: UtilityRateSet,
  calculator: SavingsCalculator,
): ProjectedUsageV1 {
  return {
    afterAllRecommendations: projection(
      currentKbtu, savedKbtu(recs), squareFeet, targetEui, rates, calculator,
    ),
    afterQuickWins: projection(
      currentKbtu, savedKbtu(recs.filter(isQuickWin)), squareFeet, targetEui, rates, calculator,
    ),
  };
}

function roadmapPhase(recs: readonly ProfessionalRecommendation[], timeline: string): RoadmapPhaseV1 {
  return {
    timeline,
    count: recs.length,
    cost: recs.reduce((sum, r) => sum + r.cost.estimate, 0),
    savings: recs.reduce((sum, r) => sum + r.savings.annualDollars, 0),
    items: recs.slice(0, ROADMAP_ITEM_LIMIT).map((r) => r.title),
  };
}

/** Phase by payback: under 1 year, 1 to 5 years, 5 years or never. */
export function implementationRoadmap(recs: readonly ProfessionalRecommendation[]): RoadmapV1 {
  const payback = (r: ProfessionalRecommendation) => r.financial.paybackYears;
  return {
    phase1Immediate: roadmapPhase(recs.filter(isQuickWin), '0-3 months'),
    phase2ShortTerm: roadmapPhase(
      recs.filter((r) => payback(r) >= QUICK_WIN_MAX_PAYBACK && payback(r) < SHORT_TERM_MAX_PAYBACK),
      '3-12 months',
    ),
    phase3MediumTerm: roadmapPhase(
      recs.filter((r) => payback(r) >= SHORT_TERM_MAX_PAYBACK),
      '1-3 years',
    ),
  };
}

// ─── Main ─────────────────────────────────────────────────────────────────────

/**
 * Aggregate a ranked recommendation list into the report body.
 * `breakdown.totalKbtu` is taken as the authoritative annual total.
 */
export function assembleReport(
  profile: ResolvedHomeProfile,
  breakdown: UsageBreakdown,
  recommendations: readonly ProfessionalRecommendation[],
  benchmarks: BenchmarkTable,
  rates: UtilityRateSet,
): AuditReportBodyV1 {
  const calculator = new SavingsCalculator(rates, {
    hdd: profile.heatingDegreeDays,
    cdd: profile.coolingDegreeDays,
  });
  const totalKbtu = breakdown.totalKbtu;
  const eui = euiOf(totalKbtu, profile.squareFeet);
  const targetEui = targetEuiFor(rates, benchmarks);

  return {
    homeProfile: homeProfileSummary(profile),
    rates,
    energyScore: energyScore(eui, targetEui),
    currentUsage: currentUsage(totalKbtu, profile.squareFeet, rates, calculator),
    usageBreakdown: usageBreakdownSection(breakdown, totalKbtu, rates),
    benchmarkComparison: benchmarkComparison(eui, targetEui, profile.squareFeet),
    recommendations: [...recommendations],
    financialSummary: financialSummary(recommendations),
    projectedUsage: projectedUsage(
      recommendations, totalKbtu, profile.squareFeet, targetEui, rates, calculator,
    ),
    implementationRoadmap: implementationRoadmap(recommendations),
  };
}
