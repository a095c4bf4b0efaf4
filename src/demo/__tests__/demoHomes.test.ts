import { describe, it, expect } from 'vitest';
import { DEMO_HOMES } from '../demoHomes';
import { runAudit } from '../../engine/Engine';
import { parseAuditRequest } from '../../engine/schema/AuditRequestSchema';

describe('demo homes', () => {
  it('have unique ids', () => {
    const ids = DEMO_HOMES.map(d => d.id);
    expect(new Set(ids).size).toBe(ids.length);
  });

  for (const demo of DEMO_HOMES) {
    it(`${demo.name} passes request validation and audits`, () => {
      const report = runAudit(parseAuditRequest(demo.request));
      const paybacks = report.recommendations.map(r => r.financial.paybackYears);
      expect([...paybacks].sort((a, b) => a - b)).toEqual(paybacks);
      expect(report.energyScore.overall).toBeGreaterThanOrEqual(0);
      expect(report.energyScore.overall).toBeLessThanOrEqual(100);
    });
  }

  it('finds upgrades for the leaky 1962 colonial', () => {
    const colonial = DEMO_HOMES.find(d => d.id === 'colonial-1962');
    expect(colonial).toBeDefined();
    if (!colonial) return;
    const report = runAudit(colonial.request);
    const categories = report.recommendations.map(r => r.category);
    expect(categories).toContain('Building Envelope');
    expect(report.meta.trace.notes).toContain('Rates: Northeast region, $0.22/kWh, $1.8/therm.');
  });
});
