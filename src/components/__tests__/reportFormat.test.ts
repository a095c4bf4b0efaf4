import { describe, it, expect } from 'vitest';
import { formatKbtu, formatPayback, formatUsd, gradeColour, priorityBadge } from '../reportFormat';

describe('reportFormat', () => {
  it('formats whole dollars with thousands separators', () => {
    expect(formatUsd(1912.5)).toBe('$1,913');
    expect(formatUsd(0)).toBe('$0');
  });

  it('formats energy in kBTU', () => {
    expect(formatKbtu(45_000.4)).toBe('45,000 kBTU');
  });

  it('describes free and never-paying measures in words', () => {
    expect(formatPayback(0)).toBe('Immediate');
    expect(formatPayback(Infinity)).toBe('Never');
    expect(formatPayback(3.5714)).toBe('3.6 yrs');
  });

  it('colours grades from green to red', () => {
    expect(gradeColour('A+')).toBe('#276749');
    expect(gradeColour('F')).toBe('#c53030');
  });

  it('labels priorities', () => {
    expect(priorityBadge('High').label).toBe('HIGH');
    expect(priorityBadge('Low').bg).toBe('#ebf8ff');
  });
});
