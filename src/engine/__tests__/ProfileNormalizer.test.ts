import { describe, it, expect } from 'vitest';
import {
  PROFILE_DEFAULTS,
  ageBandToYears,
  blendWithReportedUsage,
  normalizeProfile,
} from '../normalizer/ProfileNormalizer';
import { quietBreakdown, quietProfile } from './fixtures';

describe('normalizeProfile – defaults', () => {
  it('resolves an empty profile to the documented defaults', () => {
    const { profile } = normalizeProfile({});
    expect(profile).toEqual(PROFILE_DEFAULTS);
  });

  it('raises each shared assumption once, in field order', () => {
    const { assumptions } = normalizeProfile({});
    const ids = assumptions.map((a) => a.id);
    expect(ids).toHaveLength(20);
    expect(new Set(ids).size).toBe(ids.length);
    expect(ids[0]).toBe('building.sqft_defaulted');
    expect(ids.filter((id) => id === 'envelope.windows_defaulted')).toHaveLength(1);
  });

  it('raises no assumptions for a fully specified profile', () => {
    const { assumptions, inputCoverage } = normalizeProfile(quietProfile);
    expect(assumptions).toEqual([]);
    expect(inputCoverage.defaultedFields).toEqual([]);
  });

  it('raises the window assumption when only one window field is missing', () => {
    const { assumptions } = normalizeProfile({ windowType: 'single' });
    expect(assumptions.map((a) => a.id)).toContain('envelope.windows_defaulted');
  });
});

describe('normalizeProfile – invalid values', () => {
  it('treats zero or non-finite square footage as missing', () => {
    expect(normalizeProfile({ squareFeet: 0 }).profile.squareFeet).toBe(2000);
    expect(normalizeProfile({ squareFeet: Number.NaN }).profile.squareFeet).toBe(2000);
    expect(normalizeProfile({ squareFeet: Infinity }).profile.squareFeet).toBe(2000);
  });

  it('treats fewer than one story as missing', () => {
    expect(normalizeProfile({ stories: 0 }).profile.stories).toBe(1);
  });

  it('treats a shading factor outside 0–1 as missing', () => {
    expect(normalizeProfile({ shadingFactor: 1.5 }).profile.shadingFactor).toBe(1);
    expect(normalizeProfile({ shadingFactor: 0.4 }).profile.shadingFactor).toBe(0.4);
  });

  it('treats an empty state as absent', () => {
    expect(normalizeProfile({ state: '' }).profile.state).toBeUndefined();
  });
});

describe('normalizeProfile – coverage', () => {
  it('reports zero coverage for an empty profile', () => {
    const { inputCoverage, notes } = normalizeProfile({});
    expect(inputCoverage.providedFields).toEqual([]);
    expect(inputCoverage.defaultedFields).toHaveLength(26);
    expect(inputCoverage.coveragePct).toBe(0);
    expect(notes).toEqual(['Profile: 0 of 27 fields supplied (0% coverage); 26 defaulted.']);
  });

  it('counts supplied fields by group, with state under climate', () => {
    const { inputCoverage } = normalizeProfile({
      squareFeet: 1500,
      division: 'New England',
      state: 'MA',
    });
    expect(inputCoverage.providedFields).toEqual(['squareFeet', 'division', 'state']);
    expect(inputCoverage.byGroup.building_envelope).toBe(1);
    expect(inputCoverage.byGroup.climate).toBe(2);
    expect(inputCoverage.byGroup.hvac).toBe(0);
    expect(inputCoverage.coveragePct).toBeCloseTo((3 / 27) * 100, 6);
  });

  it('leaves only the state uncovered for the quiet fixture', () => {
    const { inputCoverage } = normalizeProfile(quietProfile);
    expect(inputCoverage.providedFields).toHaveLength(26);
    expect(inputCoverage.coveragePct).toBeCloseTo((26 / 27) * 100, 6);
  });
});

describe('ageBandToYears', () => {
  it('maps survey bands to midpoint ages', () => {
    expect(ageBandToYears('new')).toBe(2);
    expect(ageBandToYears('11_15')).toBe(13);
    expect(ageBandToYears('over_20')).toBe(25);
  });
});

describe('blendWithReportedUsage', () => {
  it('weights the modelled total 70/30 against the bills', () => {
    const result = blendWithReportedUsage({ ...quietBreakdown, totalKbtu: 100_000 }, 80_000);
    expect(result.blended).toBe(true);
    expect(result.breakdown.totalKbtu).toBeCloseTo(94_000, 6);
    expect(result.breakdown.heatingKbtu).toBe(quietBreakdown.heatingKbtu);
  });

  it('returns the breakdown unchanged without a usable reported total', () => {
    expect(blendWithReportedUsage(quietBreakdown, undefined)).toEqual({
      breakdown: quietBreakdown,
      blended: false,
    });
    expect(blendWithReportedUsage(quietBreakdown, 0).blended).toBe(false);
    expect(blendWithReportedUsage(quietBreakdown, Number.NaN).blended).toBe(false);
  });
});
