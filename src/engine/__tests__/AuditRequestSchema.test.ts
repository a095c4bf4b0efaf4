import { describe, it, expect } from 'vitest';
import { AuditRequestError, parseAuditRequest } from '../schema/AuditRequestSchema';
import { quietBreakdown, quietProfile } from './fixtures';

function captureError(input: unknown): AuditRequestError {
  try {
    parseAuditRequest(input);
  } catch (err) {
    if (err instanceof AuditRequestError) return err;
    throw err;
  }
  throw new Error('expected parseAuditRequest to throw');
}

describe('parseAuditRequest', () => {
  it('accepts an empty profile with a breakdown', () => {
    const request = parseAuditRequest({ profile: {}, breakdown: quietBreakdown });
    expect(request.profile).toEqual({});
    expect(request.breakdown).toEqual(quietBreakdown);
  });

  it('accepts a fully specified request', () => {
    const request = parseAuditRequest({
      profile: quietProfile,
      breakdown: quietBreakdown,
      customRates: { elec: 0.3 },
      benchmarks: { Northeast: 40 },
    });
    expect(request.profile).toEqual(quietProfile);
    expect(request.customRates).toEqual({ elec: 0.3 });
    expect(request.benchmarks).toEqual({ Northeast: 40 });
  });

  it('drops unknown keys', () => {
    const request = parseAuditRequest({
      profile: { squareFeet: 1500, color: 'blue' },
      breakdown: quietBreakdown,
    });
    expect(request.profile).toEqual({ squareFeet: 1500 });
  });

  it('rejects a negative breakdown value with its path', () => {
    const error = captureError({ profile: {}, breakdown: { ...quietBreakdown, heatingKbtu: -1 } });
    expect(error.name).toBe('AuditRequestError');
    expect(error.issues.map((issue) => issue.path.join('.'))).toEqual(['breakdown.heatingKbtu']);
    expect(error.message).toBe('Invalid audit request: breakdown.heatingKbtu: Must be zero or greater');
  });

  it('rejects an unknown insulation grade', () => {
    const error = captureError({ profile: { insulation: 'great' }, breakdown: quietBreakdown });
    expect(error.issues[0].path).toEqual(['profile', 'insulation']);
  });

  it('rejects a missing breakdown', () => {
    const error = captureError({ profile: {} });
    expect(error.issues[0].path).toEqual(['breakdown']);
  });

  it('rejects a shading factor above 1', () => {
    const error = captureError({ profile: { shadingFactor: 1.2 }, breakdown: quietBreakdown });
    expect(error.issues[0].path).toEqual(['profile', 'shadingFactor']);
  });

  it('is an Error subclass', () => {
    expect(captureError(null)).toBeInstanceOf(Error);
  });
});
