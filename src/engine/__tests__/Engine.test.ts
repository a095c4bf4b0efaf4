import { describe, it, expect } from 'vitest';
import { runAudit, runAuditWithPredictor } from '../Engine';
import type { HomeProfileV1 } from '../schema/AuditSchemaV1';
import { quietBreakdown, quietProfile } from './fixtures';

const poorAttic: HomeProfileV1 = { ...quietProfile, insulation: 'poor' };

describe('runAudit – report', () => {
  const report = runAudit({ profile: poorAttic, breakdown: quietBreakdown });

  it('stamps engine and contract versions', () => {
    expect(report.meta.engineVersion).toBe('1.0.0');
    expect(report.meta.contractVersion).toBe('1');
  });

  it('formats every fired recommendation', () => {
    expect(report.recommendations).toHaveLength(1);
    expect(report.recommendations[0].id).toBe('rec_building_envelope_attic_insulation');
    expect(report.recommendations[0].implementation.difficulty).toBe('Professional Installation Recommended');
    expect(report.meta.trace.fired).toEqual(['rec_building_envelope_attic_insulation']);
    expect(report.meta.trace.categoriesEvaluated).toHaveLength(9);
  });

  it('scores the home against its regional benchmark', () => {
    expect(report.currentUsage.eui).toBe(30);
    expect(report.benchmarkComparison.targetEui).toBe(42);
    expect(report.energyScore.overall).toBe(89);
    expect(report.energyScore.grade).toBe('A');
    expect(report.homeProfile.location).toBe('New England');
  });

  it('aggregates the financial summary and roadmap', () => {
    expect(report.financialSummary.totalInvestment).toBe(2250);
    expect(report.financialSummary.availableRebates).toBeCloseTo(337.5, 6);
    expect(report.financialSummary.netInvestment).toBeCloseTo(1912.5, 6);
    expect(report.implementationRoadmap.phase2ShortTerm.items).toEqual(['Upgrade Attic Insulation']);
    expect(report.implementationRoadmap.phase1Immediate.count).toBe(0);
  });

  it('projects consumption after the upgrade', () => {
    expect(report.projectedUsage.afterAllRecommendations.totalKbtu).toBeCloseTo(10_000, 3);
    expect(report.projectedUsage.afterQuickWins.totalKbtu).toBe(45_000);
  });
});

describe('runAudit – meta', () => {
  it('always notes that figures are modelled', () => {
    const report = runAudit({ profile: quietProfile, breakdown: quietBreakdown });
    expect(report.meta.assumptions.map((a) => a.id)).toEqual(['general.modelled_estimate']);
  });

  it('lists defaulted-field assumptions before the modelled note', () => {
    const report = runAudit({ profile: {}, breakdown: quietBreakdown });
    const ids = report.meta.assumptions.map((a) => a.id);
    expect(ids).toHaveLength(21);
    expect(ids[ids.length - 1]).toBe('general.modelled_estimate');
  });

  it('traces coverage, rates and the rule run in order', () => {
    const report = runAudit({ profile: poorAttic, breakdown: quietBreakdown });
    expect(report.meta.inputCoverage.coveragePct).toBeCloseTo((26 / 27) * 100, 6);
    expect(report.meta.trace.notes).toEqual([
      'Profile: 26 of 27 fields supplied (96% coverage); 0 defaulted.',
      'Rates: Northeast region, $0.22/kWh, $1.8/therm.',
      '1 recommendation(s) across 9 categories; 0 below their savings threshold.',
    ]);
  });
});

describe('runAudit – request options', () => {
  it('blends a bill-derived annual total', () => {
    const report = runAudit({
      profile: { ...quietProfile, reportedAnnualKbtu: 60_000 },
      breakdown: quietBreakdown,
    });
    expect(report.currentUsage.totalKbtu).toBeCloseTo(49_500, 6);
    expect(report.meta.assumptions.map((a) => a.id)).toContain('general.bill_blended');
    expect(report.meta.trace.notes[1]).toBe(
      'Annual total blended with utility bills: model 45000 kBTU, bills 60000 kBTU → 49500 kBTU.',
    );
  });

  it('applies custom rates to savings', () => {
    const report = runAudit({ profile: poorAttic, breakdown: quietBreakdown, customRates: { gas: 2 } });
    expect(report.rates.gas).toBe(2);
    expect(report.recommendations[0].savings.annualDollars).toBeCloseTo(700, 6);
  });

  it('lets caller benchmarks override the built-in table', () => {
    const report = runAudit({ profile: quietProfile, breakdown: quietBreakdown, benchmarks: { Northeast: 50 } });
    expect(report.benchmarkComparison.targetEui).toBe(50);
  });
});

describe('runAuditWithPredictor', () => {
  it('audits the breakdown the predictor returns', () => {
    const seen: HomeProfileV1[] = [];
    const report = runAuditWithPredictor(poorAttic, (profile) => {
      seen.push(profile);
      return quietBreakdown;
    });
    expect(seen).toEqual([poorAttic]);
    expect(report).toEqual(runAudit({ profile: poorAttic, breakdown: quietBreakdown }));
  });
});
