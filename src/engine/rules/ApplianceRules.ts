import type { Recommendation } from '../../contracts/AuditReportV1';
import {
  buildRecommendation,
  emissionsFor,
  fired,
  highOrMedium,
  paybackTiers,
  type RuleContext,
} from './RuleKit';

// ─── Refrigerators ────────────────────────────────────────────────────────────

const OLD_FRIDGE_KWH = 700;
const NEW_FRIDGE_KWH = 350;
const FRIDGE_MIN_AGE_CATEGORY = 4;
const FRIDGE_MIN_BASELOAD_KBTU = 5_000;
const FRIDGE_REMOVAL_COST = 75;
const FRIDGE_REPLACEMENT_COST = 1_100;
const FRIDGE_MIN_ANNUAL_DOLLARS = 30;

// ─── Lighting ─────────────────────────────────────────────────────────────────

const LED_MIN_INCANDESCENT_CATEGORY = 2;
// 30 bulbs × 60 W → 9 W, 4 h/day.
const INCANDESCENT_KWH = 2_628;
const LED_KWH = 394;
const LED_BULB_COUNT = 30;
const LED_BULB_COST = 3;
const LED_MIN_ANNUAL_DOLLARS = 25;

function refrigerator(ctx: RuleContext): Recommendation | null {
  const { profile, breakdown, calculator } = ctx;
  const extraFridge = profile.refrigeratorCount > 1;
  const oldFridge = profile.refrigeratorAgeCategory >= FRIDGE_MIN_AGE_CATEGORY;
  if (!(extraFridge || oldFridge) || breakdown.baseloadKbtu <= FRIDGE_MIN_BASELOAD_KBTU) return null;

  const savings = calculator.applianceSavings(OLD_FRIDGE_KWH, NEW_FRIDGE_KWH, 'refrigerator');

  return buildRecommendation(ctx, {
    category: 'Appliances',
    measure: extraFridge ? 'refrigerator_removal' : 'refrigerator_replacement',
    title: extraFridge ? 'Unplug the Second Refrigerator' : 'Replace the Old Refrigerator',
    description: extraFridge
      ? 'Second refrigerators are often old, half-empty units in a garage or basement. ' +
        'Recycling one removes a constant electric load.'
      : 'Refrigerators more than ten years old use about twice the electricity of a ' +
        'current ENERGY STAR model.',
    currentCondition: extraFridge
      ? `${profile.refrigeratorCount} refrigerators in use`
      : 'Refrigerator ten or more years old',
    recommendedAction: extraFridge
      ? 'Recycle the extra refrigerator through a utility pickup program'
      : 'Replace with an ENERGY STAR certified refrigerator',
    costEstimate: extraFridge ? FRIDGE_REMOVAL_COST : FRIDGE_REPLACEMENT_COST,
    savings,
    minimumAnnualDollars: FRIDGE_MIN_ANNUAL_DOLLARS,
    priority: paybackTiers(2, 10),
    emissions: emissionsFor(savings, 'elec'),
    rebates: extraFridge
      ? ['Utility appliance recycling bounty of $25–$75']
      : ['Utility ENERGY STAR appliance rebates of $50–$100'],
  });
}

function ledConversion(ctx: RuleContext): Recommendation | null {
  const { profile, calculator } = ctx;
  if (profile.incandescentCategory < LED_MIN_INCANDESCENT_CATEGORY) return null;

  const savings = calculator.applianceSavings(INCANDESCENT_KWH, LED_KWH, 'led_lighting');

  return buildRecommendation(ctx, {
    category: 'Lighting',
    measure: 'led_conversion',
    title: 'Switch to LED Lighting',
    description:
      `Replacing about ${LED_BULB_COUNT} incandescent bulbs with LEDs cuts lighting ` +
      'electricity by roughly 85% and the bulbs last 15 years or more.',
    currentCondition: 'Many incandescent or halogen bulbs in use',
    recommendedAction: `Replace ${LED_BULB_COUNT} bulbs with ENERGY STAR LEDs`,
    costEstimate: LED_BULB_COUNT * LED_BULB_COST,
    savings,
    minimumAnnualDollars: LED_MIN_ANNUAL_DOLLARS,
    priority: highOrMedium(2),
    emissions: emissionsFor(savings, 'elec'),
    rebates: ['Many utilities offer free or discounted LED bulbs'],
  });
}

export function evaluateApplianceRules(ctx: RuleContext): Recommendation[] {
  return fired(refrigerator(ctx));
}

export function evaluateLightingRules(ctx: RuleContext): Recommendation[] {
  return fired(ledConversion(ctx));
}
