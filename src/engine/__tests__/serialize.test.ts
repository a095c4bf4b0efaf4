import { describe, it, expect } from 'vitest';
import { serializeNumber, serializeReport, type JsonValue } from '../serialize';
import { runAudit } from '../Engine';
import { quietBreakdown, quietProfile } from './fixtures';

function at(value: JsonValue, ...path: Array<string | number>): JsonValue {
  let current: JsonValue = value;
  for (const key of path) {
    if (typeof key === 'number') {
      if (!Array.isArray(current)) throw new Error(`not an array at ${key}`);
      current = current[key];
    } else {
      if (current === null || typeof current !== 'object' || Array.isArray(current)) {
        throw new Error(`not an object at ${key}`);
      }
      current = current[key];
    }
  }
  return current;
}

function keysOf(value: JsonValue): string[] {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    throw new Error('not an object');
  }
  return Object.keys(value);
}

describe('serializeNumber', () => {
  it('rounds money and energy to whole numbers', () => {
    expect(serializeNumber('annualDollars', 630.4)).toBe(630);
    expect(serializeNumber('annualBtu', 34_999_999.6)).toBe(35_000_000);
  });

  it('rounds percentages, paybacks and EUI to one decimal', () => {
    expect(serializeNumber('roiPercent', 179.96)).toBe(180);
    expect(serializeNumber('paybackYears', 3.5714)).toBe(3.6);
    expect(serializeNumber('eui', 29.97)).toBe(30);
  });

  it('rounds CO2 to two decimals', () => {
    expect(serializeNumber('co2ReductionTons', 2.046)).toBe(2.05);
  });

  it('keeps unit prices and unlisted keys at full precision', () => {
    expect(serializeNumber('electricity', 0.22)).toBe(0.22);
    expect(serializeNumber(undefined, 1.23456)).toBe(1.23456);
  });

  it('turns non-finite numbers into null', () => {
    expect(serializeNumber('paybackYears', Infinity)).toBeNull();
    expect(serializeNumber(undefined, Number.NaN)).toBeNull();
  });
});

describe('serializeReport', () => {
  const report = runAudit({
    profile: { ...quietProfile, winterSetpointF: 75 },
    breakdown: quietBreakdown,
  });
  const json = serializeReport(report);

  it('writes an infinite ROI as null', () => {
    expect(at(json, 'recommendations', 0, 'financial', 'roiPercent')).toBeNull();
    expect(at(json, 'recommendations', 0, 'financial', 'paybackYears')).toBe(0);
  });

  it('omits undefined fields', () => {
    expect(keysOf(at(json, 'recommendations', 0, 'financial', 'roiAnalysis'))).toEqual(['summary', 'yearByYear']);
    expect(keysOf(at(json, 'rates'))).not.toContain('state');
  });

  it('rounds nested money values', () => {
    expect(at(json, 'currentUsage', 'annualCost')).toBe(1646);
    expect(at(json, 'currentUsage', 'totalKbtu')).toBe(45_000);
  });

  it('leaves rates unrounded', () => {
    expect(at(json, 'rates', 'electricity')).toBe(0.22);
    expect(at(json, 'rates', 'gas')).toBe(1.8);
  });

  it('survives a JSON round trip unchanged', () => {
    expect(JSON.parse(JSON.stringify(json))).toEqual(json);
  });
});
