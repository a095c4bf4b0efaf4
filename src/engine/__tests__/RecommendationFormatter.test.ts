import { describe, it, expect } from 'vitest';
import {
  contractorGuidance,
  estimateDifficulty,
  financingOptions,
  formatRecommendation,
  requiresInspection,
  requiresPermit,
  roiAnalysis,
} from '../RecommendationFormatter';
import { makeRecommendation } from './fixtures';

// ─── Shared fixtures ──────────────────────────────────────────────────────────

const atticRec = makeRecommendation({
  id: 'rec_building_envelope_attic_insulation',
  category: 'Building Envelope',
  priority: 'High',
  cost: { low: 1800, mid: 2250, high: 2700, estimate: 2250 },
  savings: {
    annualBtu: 35_000_000,
    annualKwh: 10_255,
    annualTherms: 350,
    annualDollars: 630,
    lifetimeDollars: 31_500,
    lifetimeYears: 50,
  },
  financial: { paybackYears: 2250 / 630, roiPercent: 180, npv: 16_000 },
  environmental: { co2ReductionTons: 2.0475, co2ReductionLifetime: 102.375 },
  rebates: ['Utility insulation rebate'],
});

const monitorRec = makeRecommendation({
  id: 'rec_smart_home_energy_monitor',
  category: 'Smart Home',
  priority: 'Medium',
  cost: { low: 120, mid: 150, high: 180, estimate: 150 },
});

// ─── Derivations ──────────────────────────────────────────────────────────────

describe('RecommendationFormatter – difficulty and permits', () => {
  it('bands difficulty by cost', () => {
    expect(estimateDifficulty(499)).toBe('DIY - Easy');
    expect(estimateDifficulty(500)).toBe('DIY to Professional');
    expect(estimateDifficulty(1999)).toBe('DIY to Professional');
    expect(estimateDifficulty(2000)).toBe('Professional Installation Recommended');
    expect(estimateDifficulty(10_000)).toBe('Professional Installation Required');
  });

  it('requires permits for large jobs and mechanical categories', () => {
    expect(requiresPermit('Lighting', 6000)).toBe(true);
    expect(requiresPermit('Heating System', 100)).toBe(true);
    expect(requiresPermit('Lighting', 5000)).toBe(false);
  });

  it('requires inspection for mechanical, water heating and solar work', () => {
    expect(requiresInspection('Water Heating')).toBe(true);
    expect(requiresInspection('Renewable Energy')).toBe(true);
    expect(requiresInspection('Appliances')).toBe(false);
  });
});

describe('RecommendationFormatter – financing', () => {
  it('offers cash under $1,000', () => {
    expect(financingOptions(999)).toEqual(['Pay with cash or credit card']);
  });

  it('offers short-term credit under $5,000', () => {
    expect(financingOptions(4999)).toHaveLength(3);
    expect(financingOptions(4999)[1]).toBe('Personal loan');
  });

  it('offers secured and PACE financing from $5,000', () => {
    expect(financingOptions(5000)).toContain('PACE financing where available');
  });
});

describe('RecommendationFormatter – contractor guidance', () => {
  it('gives DIY tips for DIY jobs', () => {
    const guidance = contractorGuidance('Lighting', 'DIY - Easy', 90);
    expect(guidance.contractorRequired).toBe(false);
  });

  it('gives a ±20% cost range for professional jobs', () => {
    const guidance = contractorGuidance('Heating System', 'Professional Installation Recommended', 4500);
    if (!guidance.contractorRequired) throw new Error('expected contractor guidance');
    expect(guidance.typicalCostRange).toBe('$3,600 - $5,400');
    expect(guidance.qualifications).toEqual(['HVAC license', 'NATE certification', 'EPA refrigerant certification']);
  });
});

// ─── ROI analysis ─────────────────────────────────────────────────────────────

describe('RecommendationFormatter – ROI analysis', () => {
  it('summarises payback and ROI with one decimal', () => {
    const analysis = roiAnalysis(2250 / 630, 180, 630, 2250);
    expect(analysis.summary).toBe('Payback in 3.6 years with 180.0% ROI over 10 years');
    expect(analysis.yearByYear).toHaveLength(10);
    const last = analysis.yearByYear[9];
    expect(last.year).toBe(10);
    expect(last.cumulativeSavings).toBe(6300);
    expect(last.netSavings).toBe(4050);
    expect(last.roi).toBeCloseTo(180, 10);
    expect(analysis.breakEven?.years).toBeCloseTo(2250 / 630, 10);
    expect(analysis.breakEven?.months).toBeCloseTo((2250 / 630) * 12, 10);
    expect(analysis.breakEven?.totalInvestmentAtBreakEven).toBe(2250);
  });

  it('describes free measures without a break-even point', () => {
    const analysis = roiAnalysis(0, Infinity, 100, 0);
    expect(analysis.summary).toBe('No upfront cost; saves $100 a year from the start');
    expect(analysis.breakEven).toBeUndefined();
    expect(analysis.yearByYear[0].roi).toBe(0);
  });

  it('flags measures that never pay back', () => {
    const analysis = roiAnalysis(Infinity, 0, 0, 1000);
    expect(analysis.summary).toBe('Savings do not recover the upfront cost');
    expect(analysis.breakEven).toBeUndefined();
    expect(analysis.yearByYear[9].netSavings).toBe(-1000);
  });
});

// ─── Full enrichment ──────────────────────────────────────────────────────────

describe('formatRecommendation', () => {
  it('keeps the core recommendation fields', () => {
    const formatted = formatRecommendation(atticRec);
    expect(formatted.id).toBe(atticRec.id);
    expect(formatted.savings).toEqual(atticRec.savings);
    expect(formatted.cost.estimate).toBe(2250);
    expect(formatted.financial.paybackYears).toBe(atticRec.financial.paybackYears);
  });

  it('adds category-specific guidance for the building envelope', () => {
    const formatted = formatRecommendation(atticRec);
    expect(formatted.implementation.difficulty).toBe('Professional Installation Recommended');
    expect(formatted.implementation.estimatedTime).toBe('1-2 days');
    expect(formatted.implementation.steps[0]).toBe('Have an energy auditor locate the worst leaks and thin spots');
    expect(formatted.warranty).toBe('Lifetime on materials, 1–5 years on installation');
    expect(formatted.professionalNotes.permitsRequired).toBe(false);
    expect(formatted.professionalNotes.inspectionRequired).toBe(false);
    expect(formatted.cost.financingOptions).toHaveLength(3);
    expect(formatted.incentives.rebates).toEqual(['Utility insulation rebate']);
    expect(formatted.environmental.equivalentTreesPlanted).toBeCloseTo(81.9, 10);
  });

  it('leads with a prompt consultation for high-priority items', () => {
    const formatted = formatRecommendation(atticRec);
    expect(formatted.nextSteps).toHaveLength(6);
    expect(formatted.nextSteps[0]).toBe('Book a consultation within 1–2 weeks');
  });

  it('falls back to default guidance for categories without entries', () => {
    const formatted = formatRecommendation(monitorRec);
    expect(formatted.implementation.difficulty).toBe('DIY - Easy');
    expect(formatted.implementation.steps[0]).toBe('Research product options and reviews');
    expect(formatted.warranty).toBe('Varies by manufacturer and installer');
    expect(formatted.professionalNotes.codeRequirements).toBe('Must meet all applicable local building codes');
    expect(formatted.maintenance).toEqual({ annually: ['Professional inspection', 'Performance check'] });
    expect(formatted.nextSteps[0]).toBe('Research options and plan for the next 1–3 months');
  });

  it('returns fresh lists on every call', () => {
    const first = formatRecommendation(atticRec);
    first.implementation.steps.length = 0;
    first.incentives.utilityPrograms.push('extra');
    const second = formatRecommendation(atticRec);
    expect(second.implementation.steps).toHaveLength(7);
    expect(second.incentives.utilityPrograms).toHaveLength(4);
  });
});
