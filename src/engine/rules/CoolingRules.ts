import type { Recommendation } from '../../contracts/AuditReportV1';
import { ageBandToYears } from '../normalizer/ProfileNormalizer';
import { KBTU_TO_KWH } from '../utils/units';
import { buildRecommendation, fired, paybackTiers, type RuleContext } from './RuleKit';

const AC_MIN_AGE_YEARS = 12;
const AC_MIN_COOLING_KBTU = 10_000;
const TARGET_SEER = 18;
const NEW_UNIT_SEER = 16;
const MIN_ASSUMED_SEER = 8;
const SEER_DEGRADATION_PER_YEAR = 0.5;
const AC_COST = 5_500;
const AC_MIN_ANNUAL_DOLLARS = 75;

export function estimatedSeer(ageYears: number): number {
  return Math.max(MIN_ASSUMED_SEER, NEW_UNIT_SEER - ageYears * SEER_DEGRADATION_PER_YEAR);
}

function acReplacement(ctx: RuleContext): Recommendation | null {
  const { profile, breakdown, calculator } = ctx;
  if (!profile.hasCentralAc) return null;

  const ageYears = ageBandToYears(profile.acEquipmentAge);
  if (ageYears <= AC_MIN_AGE_YEARS || breakdown.coolingKbtu <= AC_MIN_COOLING_KBTU) return null;

  const currentSeer = estimatedSeer(ageYears);
  // Electricity consumed (kWh) × SEER = heat removed (kBTU).
  const deliveredKbtu = breakdown.coolingKbtu * KBTU_TO_KWH * currentSeer;
  const savings = calculator.coolingUpgradeSavings(currentSeer, TARGET_SEER, deliveredKbtu);

  return buildRecommendation(ctx, {
    category: 'Cooling System',
    measure: 'ac_replacement',
    title: 'Upgrade to a High-Efficiency Air Conditioner',
    description:
      `Your ${ageYears}-year-old system likely performs near SEER ${currentSeer.toFixed(1)}. ` +
      `A SEER ${TARGET_SEER} unit removes the same heat with less electricity.`,
    currentCondition: `Central AC about ${ageYears} years old (~SEER ${currentSeer.toFixed(1)})`,
    recommendedAction: `Install a SEER ${TARGET_SEER}+ central AC or heat pump`,
    costEstimate: AC_COST,
    savings,
    minimumAnnualDollars: AC_MIN_ANNUAL_DOLLARS,
    priority: paybackTiers(5, 15),
    emissions: { kwh: savings.annualKwh, therms: 0 },
    rebates: ['Federal tax credit: 30% up to $600 for qualifying central AC', 'Up to $2,000 credit if a heat pump is chosen instead'],
  });
}

export function evaluateCoolingRules(ctx: RuleContext): Recommendation[] {
  return fired(acReplacement(ctx));
}
