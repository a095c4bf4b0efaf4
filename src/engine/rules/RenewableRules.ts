import type { Priority, Recommendation } from '../../contracts/AuditReportV1';
import { KBTU_TO_KWH } from '../utils/units';
import { buildRecommendation, emissionsFor, fired, type RuleContext } from './RuleKit';

const SOLAR_MIN_TOTAL_KBTU = 50_000;
// Size the array to offset 80% of total use at a nominal 1,500 kWh/kW.
const SOLAR_OFFSET_SHARE = 0.8;
const SOLAR_SIZING_KWH_PER_KW = 1_500;
const SOLAR_MAX_KW = 15;
const SOLAR_COST_PER_KW = 2_750;
const SOLAR_MIN_ANNUAL_DOLLARS = 200;

/** System size in kW, rounded to 0.1 kW and capped. */
export function solarSystemSizeKw(totalKbtu: number): number {
  const kw = (SOLAR_OFFSET_SHARE * totalKbtu * KBTU_TO_KWH) / SOLAR_SIZING_KWH_PER_KW;
  return Math.min(SOLAR_MAX_KW, Math.round(kw * 10) / 10);
}

function solarPriority(paybackYears: number): Priority {
  if (paybackYears < 8) return 'High';
  if (paybackYears <= 12) return 'Medium';
  return 'Low';
}

function solarPv(ctx: RuleContext): Recommendation | null {
  const { profile, totalKbtu, calculator } = ctx;
  if (totalKbtu <= SOLAR_MIN_TOTAL_KBTU) return null;

  const sizeKw = solarSystemSizeKw(totalKbtu);
  const savings = calculator.solarSavings(sizeKw, profile.roofOrientation, profile.shadingFactor);

  return buildRecommendation(ctx, {
    category: 'Renewable Energy',
    measure: 'solar_pv',
    title: `Install a ${sizeKw.toFixed(1)} kW Solar PV System`,
    description:
      `A ${sizeKw.toFixed(1)} kW rooftop array would generate about ` +
      `${Math.round(savings.annualKwh).toLocaleString('en-US')} kWh a year on a ` +
      `${profile.roofOrientation}-facing roof.`,
    currentCondition: 'No on-site generation',
    recommendedAction: `Install ${sizeKw.toFixed(1)} kW of rooftop solar with net metering`,
    costEstimate: sizeKw * SOLAR_COST_PER_KW,
    savings,
    minimumAnnualDollars: SOLAR_MIN_ANNUAL_DOLLARS,
    priority: solarPriority,
    emissions: emissionsFor(savings, 'elec'),
    rebates: ['Federal Residential Clean Energy Credit: 30% of installed cost', 'State and utility solar incentives vary'],
  });
}

export function evaluateRenewableRules(ctx: RuleContext): Recommendation[] {
  return fired(solarPv(ctx));
}
