import type { ENGINE_VERSION, CONTRACT_VERSION } from './versions';
import type { AssumptionId } from './assumptions.ids';
import type { UtilityRateSet } from '../engine/schema/AuditSchemaV1';

export type RecommendationCategory =
  | 'Building Envelope'
  | 'Heating System'
  | 'Cooling System'
  | 'Water Heating'
  | 'Appliances'
  | 'Lighting'
  | 'Renewable Energy'
  | 'Smart Home'
  | 'Behavioral';

export type Priority = 'Low' | 'Medium' | 'High';

export interface RecommendationCost {
  low: number;
  mid: number;
  high: number;
  estimate: number;
}

export interface RecommendationSavings {
  /** BTU, not kBTU. */
  annualBtu: number;
  annualKwh: number;
  annualTherms: number;
  annualDollars: number;
  lifetimeDollars: number;
  lifetimeYears: number;
}

export interface RecommendationFinancial {
  /** Infinity when the measure never pays back. */
  paybackYears: number;
  roiPercent: number;
  npv: number;
}

export interface RecommendationEnvironmental {
  co2ReductionTons: number;
  co2ReductionLifetime: number;
}

export interface Recommendation {
  /** Deterministic: `rec_<category_slug>_<measure>`. */
  id: string;
  category: RecommendationCategory;
  priority: Priority;
  title: string;
  description: string;
  currentCondition: string;
  recommendedAction: string;
  cost: RecommendationCost;
  savings: RecommendationSavings;
  financial: RecommendationFinancial;
  environmental: RecommendationEnvironmental;
  rebates: string[];
}

// ─── Professional presentation ────────────────────────────────────────────────

export type Difficulty =
  | 'DIY - Easy'
  | 'DIY to Professional'
  | 'Professional Installation Recommended'
  | 'Professional Installation Required';

export type ContractorGuidance =
  | {
      contractorRequired: false;
      tips: string[];
    }
  | {
      contractorRequired: true;
      qualifications: string[];
      selectionTips: string[];
      redFlags: string[];
      typicalCostRange: string;
    };

export interface RoiYear {
  year: number;
  cumulativeSavings: number;
  netSavings: number;
  roi: number;
}

export interface RoiAnalysis {
  summary: string;
  yearByYear: RoiYear[];
  breakEven?: {
    years: number;
    months: number;
    totalInvestmentAtBreakEven: number;
  };
}

export interface MaintenanceSchedule {
  monthly?: string[];
  seasonal?: string[];
  annually?: string[];
  every5Years?: string[];
}

export interface ProfessionalRecommendation extends Omit<Recommendation, 'cost' | 'financial' | 'environmental'> {
  implementation: {
    difficulty: Difficulty;
    estimatedTime: string;
    seasonalTiming: string;
    steps: string[];
    contractorGuidance: ContractorGuidance;
  };
  cost: RecommendationCost & { financingOptions: string[] };
  financial: RecommendationFinancial & { roiAnalysis: RoiAnalysis };
  environmental: RecommendationEnvironmental & { equivalentTreesPlanted: number };
  incentives: {
    rebates: string[];
    taxCredits: string[];
    utilityPrograms: string[];
  };
  warranty: string;
  maintenance: MaintenanceSchedule;
  professionalNotes: {
    codeRequirements: string;
    permitsRequired: boolean;
    inspectionRequired: boolean;
    energyRating: string;
  };
  nextSteps: string[];
}

// ─── Report ───────────────────────────────────────────────────────────────────

export interface AssumptionV1 {
  id: AssumptionId;
  title: string;
  detail: string;
  improveBy?: string;
}

export type CoverageGroup =
  | 'building_envelope'
  | 'hvac'
  | 'appliances'
  | 'water_heating'
  | 'lighting'
  | 'behavioral'
  | 'climate';

export interface InputCoverageV1 {
  providedFields: string[];
  defaultedFields: string[];
  /** Count of supplied fields per concern. */
  byGroup: Record<CoverageGroup, number>;
  /** Share of known profile fields that were supplied, 0–100. */
  coveragePct: number;
}

export interface GatedRuleV1 {
  id: string;
  annualDollars: number;
  minimumDollars: number;
}

export interface SkippedRuleV1 {
  category: RecommendationCategory;
  reason: string;
}

export interface EngineTraceV1 {
  categoriesEvaluated: RecommendationCategory[];
  fired: string[];
  gated: GatedRuleV1[];
  skipped: SkippedRuleV1[];
  notes: string[];
}

export interface ReportMetaV1 {
  engineVersion: typeof ENGINE_VERSION;
  contractVersion: typeof CONTRACT_VERSION;
  assumptions: AssumptionV1[];
  inputCoverage: InputCoverageV1;
  trace: EngineTraceV1;
}

export type Grade = 'A+' | 'A' | 'B+' | 'B' | 'C+' | 'C' | 'D' | 'F';

/** Post-upgrade grade. A coarser scale than `Grade` with C+ as its floor. */
export type ProjectedGrade = 'A+' | 'A-' | 'B+' | 'B' | 'C+';

export interface EnergyScoreV1 {
  overall: number;
  grade: Grade;
  percentile: number;
  label: string;
}

export interface HomeProfileSummaryV1 {
  location: string;
  type: string;
  sizeSqft: number;
  yearBuilt: number;
  occupants: number;
  climate: { hdd: number; cdd: number };
}

export interface CurrentUsageV1 {
  totalKbtu: number;
  totalKwh: number;
  totalTherms: number;
  annualCost: number;
  monthlyAvg: number;
  eui: number;
  carbonTons: number;
}

export interface EndUseLineV1 {
  kbtu: number;
  pct: number;
  cost: number;
}

export type EndUseKey = 'heating' | 'cooling' | 'waterHeating' | 'appliances' | 'lighting' | 'other';

export type UsageBreakdownSectionV1 = Record<EndUseKey, EndUseLineV1>;

export interface BenchmarkComparisonV1 {
  targetEui: number;
  similarHomesAvgKbtu: number;
  energyStarTargetKbtu: number;
  netZeroTargetKbtu: number;
  yourRank: string;
  percentile: number;
  improvementPotentialPct: number;
}

export interface FinancialSummaryV1 {
  totalInvestment: number;
  totalAnnualSavings: number;
  totalLifetimeSavings: number;
  /** Mean over finite-payback items only; 0 when there are none. */
  averagePayback: number;
  availableRebates: number;
  netInvestment: number;
}

export interface UsageProjectionV1 {
  totalKbtu: number;
  annualCost: number;
  reductionPct: number;
  eui: number;
  score: number;
  grade: ProjectedGrade;
  carbonTons: number;
}

export interface ProjectedUsageV1 {
  afterAllRecommendations: UsageProjectionV1;
  afterQuickWins: UsageProjectionV1;
}

export interface RoadmapPhaseV1 {
  timeline: string;
  count: number;
  cost: number;
  savings: number;
  /** Titles of the first five items in the phase. */
  items: string[];
}

export interface RoadmapV1 {
  phase1Immediate: RoadmapPhaseV1;
  phase2ShortTerm: RoadmapPhaseV1;
  phase3MediumTerm: RoadmapPhaseV1;
}

export interface AuditReportV1 {
  meta: ReportMetaV1;
  homeProfile: HomeProfileSummaryV1;
  rates: UtilityRateSet;
  energyScore: EnergyScoreV1;
  currentUsage: CurrentUsageV1;
  usageBreakdown: UsageBreakdownSectionV1;
  benchmarkComparison: BenchmarkComparisonV1;
  recommendations: ProfessionalRecommendation[];
  financialSummary: FinancialSummaryV1;
  projectedUsage: ProjectedUsageV1;
  implementationRoadmap: RoadmapV1;
}

/** Everything the assembler derives; the engine adds `meta`. */
export type AuditReportBodyV1 = Omit<AuditReportV1, 'meta'>;
