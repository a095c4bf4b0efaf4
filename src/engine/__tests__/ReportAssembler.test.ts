import { describe, it, expect } from 'vitest';
import {
  benchmarkComparison,
  currentUsage,
  energyScore,
  financialSummary,
  gradeFor,
  homeProfileSummary,
  implementationRoadmap,
  projectedGradeFor,
  projectedUsage,
  scoreFromEui,
  targetEuiFor,
  usageBreakdownSection,
  wholeHomeCarbonTons,
} from '../ReportAssembler';
import { formatRecommendation } from '../RecommendationFormatter';
import { SavingsCalculator } from '../modules/SavingsCalculator';
import { resolveUtilityRates } from '../modules/UtilityRatesModule';
import { normalizeProfile } from '../normalizer/ProfileNormalizer';
import { withPayback } from './fixtures';

const rates = resolveUtilityRates('New England');
const calculator = new SavingsCalculator(rates);

function formattedWithPayback(id: string, paybackYears: number) {
  return formatRecommendation(withPayback(id, paybackYears));
}

// ─── Scoring ──────────────────────────────────────────────────────────────────

describe('ReportAssembler – energy score', () => {
  it('scores half the target EUI at 100', () => {
    expect(scoreFromEui(17.55, 35)).toBeCloseTo(100, 6);
  });

  it('clamps to 0–100', () => {
    expect(scoreFromEui(0, 35)).toBe(100);
    expect(scoreFromEui(100, 35)).toBe(0);
  });

  it('grades a home at its regional benchmark B+', () => {
    expect(energyScore(35, 35)).toEqual({
      overall: 75,
      grade: 'B+',
      percentile: 75,
      label: 'Good - Above Average',
    });
  });

  it('grades at band boundaries', () => {
    expect(gradeFor(90).grade).toBe('A+');
    expect(gradeFor(89.9).grade).toBe('A');
    expect(gradeFor(30).grade).toBe('D');
    expect(gradeFor(29.9)).toEqual({ grade: 'F', label: 'Poor - Urgent Action Required' });
  });

  it('looks up the target EUI by region, falling back to the national figure', () => {
    expect(targetEuiFor(rates)).toBe(42);
    expect(targetEuiFor(resolveUtilityRates())).toBe(35);
    expect(targetEuiFor(resolveUtilityRates(), { National: 40 })).toBe(40);
    expect(targetEuiFor(rates, { Northeast: 50 })).toBe(50);
  });
});

// ─── Sections ─────────────────────────────────────────────────────────────────

describe('ReportAssembler – home profile summary', () => {
  it('shows Unknown for an unresolved location', () => {
    const summary = homeProfileSummary(normalizeProfile({}).profile);
    expect(summary.location).toBe('Unknown');
    expect(summary.type).toBe('Single Family Detached');
    expect(summary.sizeSqft).toBe(2000);
    expect(summary.climate).toEqual({ hdd: 5500, cdd: 800 });
  });

  it('prefixes the state when known', () => {
    const { profile } = normalizeProfile({ state: 'MA', division: 'New England' });
    expect(homeProfileSummary(profile).location).toBe('MA, New England');
    expect(homeProfileSummary(normalizeProfile({ state: 'TX' }).profile).location).toBe('TX, Unknown');
  });
});

describe('ReportAssembler – current usage', () => {
  it('prices the total at the blended rate', () => {
    const usage = currentUsage(100_000, 2000, rates, calculator);
    expect(usage.totalKwh).toBeCloseTo(29_300, 6);
    expect(usage.totalTherms).toBeCloseTo(1000, 6);
    expect(usage.annualCost).toBeCloseTo(1080 + 2578.4, 6);
    expect(usage.monthlyAvg).toBeCloseTo(3658.4 / 12, 6);
    expect(usage.eui).toBe(50);
    expect(usage.carbonTons).toBeCloseTo(18.3025, 6);
  });

  it('counts the whole total as both electricity and gas for carbon', () => {
    // 29,300 kWh × 0.85 lb + 1,000 therms × 11.7 lb = 36,605 lb
    expect(wholeHomeCarbonTons(calculator, 100_000)).toBeCloseTo(18.3025, 6);
    expect(wholeHomeCarbonTons(calculator, 0)).toBe(0);
  });

  it('reports zero EUI without floor area', () => {
    expect(currentUsage(100_000, 0, rates, calculator).eui).toBe(0);
  });
});

describe('ReportAssembler – usage breakdown', () => {
  const breakdown = {
    heatingKbtu: 50_000,
    coolingKbtu: 10_000,
    waterKbtu: 10_000,
    baseloadKbtu: 20_000,
    totalKbtu: 100_000,
  };

  it('splits baseload 60/40 between appliances and lighting', () => {
    const section = usageBreakdownSection(breakdown, 100_000, rates);
    expect(section.appliances.kbtu).toBeCloseTo(12_000, 6);
    expect(section.appliances.pct).toBeCloseTo(12, 10);
    expect(section.lighting.kbtu).toBeCloseTo(8_000, 6);
    expect(section.lighting.pct).toBeCloseTo(8, 10);
  });

  it('puts the unexplained remainder under other', () => {
    const section = usageBreakdownSection(breakdown, 100_000, rates);
    expect(section.other.kbtu).toBe(10_000);
    expect(section.heating.cost).toBeCloseTo(900, 6);
    expect(section.cooling.cost).toBeCloseTo(10_000 * 0.293 * 0.22, 6);
  });

  it('never reports a negative remainder or divides by a zero total', () => {
    const section = usageBreakdownSection(breakdown, 0, rates);
    expect(section.other.kbtu).toBe(0);
    expect(section.heating.pct).toBe(0);
  });
});

describe('ReportAssembler – benchmark comparison', () => {
  it('ranks an efficient home in the 15th percentile', () => {
    const comparison = benchmarkComparison(20, 35, 2000);
    expect(comparison.percentile).toBe(85);
    expect(comparison.yourRank).toBe('15th percentile');
    expect(comparison.similarHomesAvgKbtu).toBeCloseTo(77_000, 6);
    expect(comparison.energyStarTargetKbtu).toBe(70_000);
    expect(comparison.netZeroTargetKbtu).toBe(30_000);
    expect(comparison.improvementPotentialPct).toBe(-75);
  });

  it('bands the remaining percentiles', () => {
    expect(benchmarkComparison(30, 35, 2000).percentile).toBe(60);
    expect(benchmarkComparison(37, 35, 2000).percentile).toBe(45);
    expect(benchmarkComparison(40, 35, 2000).yourRank).toBe('75th percentile');
  });

  it('reports no improvement potential at zero EUI', () => {
    expect(benchmarkComparison(0, 35, 2000).improvementPotentialPct).toBe(0);
  });
});

// ─── Aggregates ───────────────────────────────────────────────────────────────

describe('ReportAssembler – financial summary', () => {
  it('averages only finite paybacks', () => {
    const summary = financialSummary([
      formattedWithPayback('a', 2),
      formattedWithPayback('b', 4),
      formattedWithPayback('c', Infinity),
    ]);
    expect(summary.totalInvestment).toBe(3000);
    expect(summary.totalAnnualSavings).toBe(600);
    expect(summary.totalLifetimeSavings).toBe(9000);
    expect(summary.averagePayback).toBe(3);
    expect(summary.availableRebates).toBeCloseTo(450, 6);
    expect(summary.netInvestment).toBeCloseTo(2550, 6);
  });

  it('is all zeros with no recommendations', () => {
    expect(financialSummary([])).toEqual({
      totalInvestment: 0,
      totalAnnualSavings: 0,
      totalLifetimeSavings: 0,
      averagePayback: 0,
      availableRebates: 0,
      netInvestment: 0,
    });
  });
});

describe('ReportAssembler – projections', () => {
  it('projects all measures and quick wins separately', () => {
    const recs = [formattedWithPayback('quick', 0.5), formattedWithPayback('slow', 4)];
    const projected = projectedUsage(recs, 100_000, 2000, 42, rates, calculator);
    expect(projected.afterAllRecommendations.totalKbtu).toBe(80_000);
    expect(projected.afterAllRecommendations.reductionPct).toBeCloseTo(20, 10);
    expect(projected.afterAllRecommendations.eui).toBe(40);
    expect(projected.afterQuickWins.totalKbtu).toBe(90_000);
    expect(projected.afterQuickWins.reductionPct).toBeCloseTo(10, 10);
    expect(projected.afterAllRecommendations.carbonTons).toBeCloseTo(14.642, 6);
  });

  it('grades projections on the coarser post-upgrade scale', () => {
    expect(projectedGradeFor(100)).toBe('A+');
    expect(projectedGradeFor(90)).toBe('A+');
    expect(projectedGradeFor(89.9)).toBe('A-');
    expect(projectedGradeFor(80)).toBe('A-');
    expect(projectedGradeFor(79.9)).toBe('B+');
    expect(projectedGradeFor(60)).toBe('B');
    expect(projectedGradeFor(59.9)).toBe('C+');
    expect(projectedGradeFor(0)).toBe('C+');
  });

  it('grades an 80-89 projection A- where the current scale says A', () => {
    // 30,000 kBTU saved from 100,000 over 2,000 sq ft: EUI 35 → 100 − (35 / 42.1 − 0.5) × 50 = 83.43
    const recs = [formattedWithPayback('a', 2), formattedWithPayback('b', 3), formattedWithPayback('c', 4)];
    const projected = projectedUsage(recs, 100_000, 2000, 42, rates, calculator);
    expect(projected.afterAllRecommendations.eui).toBe(35);
    expect(projected.afterAllRecommendations.score).toBe(83);
    expect(gradeFor(83.43).grade).toBe('A');
    expect(projected.afterAllRecommendations.grade).toBe('A-');
  });

  it('never projects below zero consumption', () => {
    const recs = Array.from({ length: 12 }, (_, i) => formattedWithPayback(`r${i}`, 2));
    const projected = projectedUsage(recs, 100_000, 2000, 42, rates, calculator);
    expect(projected.afterAllRecommendations.totalKbtu).toBe(0);
    expect(projected.afterAllRecommendations.reductionPct).toBe(100);
    expect(projected.afterAllRecommendations.score).toBe(100);
    expect(projected.afterAllRecommendations.grade).toBe('A+');
  });
});

describe('ReportAssembler – implementation roadmap', () => {
  it('phases measures by payback', () => {
    const roadmap = implementationRoadmap([
      formattedWithPayback('half', 0.5),
      formattedWithPayback('one', 1),
      formattedWithPayback('almost-five', 4.9),
      formattedWithPayback('five', 5),
      formattedWithPayback('never', Infinity),
    ]);
    expect(roadmap.phase1Immediate.count).toBe(1);
    expect(roadmap.phase1Immediate.timeline).toBe('0-3 months');
    expect(roadmap.phase2ShortTerm.count).toBe(2);
    expect(roadmap.phase2ShortTerm.items).toEqual(['one', 'almost-five']);
    expect(roadmap.phase3MediumTerm.count).toBe(2);
    expect(roadmap.phase3MediumTerm.cost).toBe(2000);
    expect(roadmap.phase3MediumTerm.savings).toBe(400);
  });

  it('lists at most five titles per phase', () => {
    const recs = Array.from({ length: 7 }, (_, i) => formattedWithPayback(`item-${i}`, 0.2));
    const roadmap = implementationRoadmap(recs);
    expect(roadmap.phase1Immediate.count).toBe(7);
    expect(roadmap.phase1Immediate.items).toHaveLength(5);
  });
});
