import type { Recommendation } from '../../contracts/AuditReportV1';
import { EQUIPMENT_LIFESPANS } from '../modules/SavingsCalculator';
import { ageBandToYears } from '../normalizer/ProfileNormalizer';
import {
  buildRecommendation,
  emissionsFor,
  fired,
  fuelSavings,
  highOrMedium,
  paybackTiers,
  type RuleContext,
} from './RuleKit';

// ─── Constants ────────────────────────────────────────────────────────────────

const REPLACEMENT_MIN_AGE_YEARS = 15;
const REPLACEMENT_MIN_HEATING_KBTU = 30_000;
const TARGET_AFUE = 95;
const MIN_ASSUMED_AFUE = 60;
// AFUE lost per year of service.
const AFUE_DEGRADATION_PER_YEAR = 1.5;
const FURNACE_COST = 4_500;
const BOILER_COST = 7_500;
const REPLACEMENT_MIN_ANNUAL_DOLLARS = 150;

const THERMOSTAT_FRACTION = 0.08;
const THERMOSTAT_MIN_HEATING_KBTU = 20_000;
const THERMOSTAT_COST = 250;
const THERMOSTAT_MIN_ANNUAL_DOLLARS = 50;

/** Estimated AFUE (%) of combustion equipment of a given age. */
export function estimatedAfue(ageYears: number): number {
  return Math.max(MIN_ASSUMED_AFUE, TARGET_AFUE - ageYears * AFUE_DEGRADATION_PER_YEAR);
}

function heatingReplacement(ctx: RuleContext): Recommendation | null {
  const { profile, breakdown, calculator } = ctx;
  const equipment = profile.heatingEquipment;
  if (equipment !== 'furnace' && equipment !== 'boiler') return null;

  const ageYears = ageBandToYears(profile.heatingEquipmentAge);
  if (ageYears <= REPLACEMENT_MIN_AGE_YEARS || breakdown.heatingKbtu <= REPLACEMENT_MIN_HEATING_KBTU) {
    return null;
  }

  const currentAfue = estimatedAfue(ageYears);
  // Breakdown reports fuel consumed; the calculator works on delivered heat.
  const deliveredKbtu = breakdown.heatingKbtu * (currentAfue / 100);
  const savings = calculator.hvacUpgradeSavings(
    currentAfue,
    TARGET_AFUE,
    deliveredKbtu,
    profile.heatingFuel,
    equipment,
  );

  return buildRecommendation(ctx, {
    category: 'Heating System',
    measure: `${equipment}_replacement`,
    title: `Replace ${ageYears}-Year-Old ${equipment === 'furnace' ? 'Furnace' : 'Boiler'}`,
    description:
      `A ${equipment} of this age typically runs near ${currentAfue.toFixed(0)}% AFUE. ` +
      `A condensing unit at ${TARGET_AFUE}% AFUE turns far more of each unit of fuel into heat.`,
    currentCondition: `${equipment} about ${ageYears} years old (~${currentAfue.toFixed(0)}% AFUE)`,
    recommendedAction: `Install a ${TARGET_AFUE}% AFUE condensing ${equipment}`,
    costEstimate: equipment === 'furnace' ? FURNACE_COST : BOILER_COST,
    savings,
    minimumAnnualDollars: REPLACEMENT_MIN_ANNUAL_DOLLARS,
    priority: paybackTiers(5, 15),
    emissions: emissionsFor(savings, profile.heatingFuel),
    rebates: ['Federal tax credit: 30% up to $600 for qualifying high-efficiency units', 'Utility rebates of $300–$1,000 are common'],
  });
}

function smartThermostat(ctx: RuleContext): Recommendation | null {
  const { profile, breakdown, rates } = ctx;
  if (profile.hasProgrammableThermostat || breakdown.heatingKbtu <= THERMOSTAT_MIN_HEATING_KBTU) {
    return null;
  }

  const savings = fuelSavings(
    rates,
    breakdown.heatingKbtu * THERMOSTAT_FRACTION,
    profile.heatingFuel,
    EQUIPMENT_LIFESPANS.thermostat,
  );

  return buildRecommendation(ctx, {
    category: 'Heating System',
    measure: 'smart_thermostat',
    title: 'Install a Smart Thermostat',
    description:
      'Automatic setbacks while you sleep or are away typically trim heating use by ' +
      `about ${(THERMOSTAT_FRACTION * 100).toFixed(0)}%.`,
    currentCondition: 'Manual (non-programmable) thermostat',
    recommendedAction: 'Install an ENERGY STAR certified smart thermostat',
    costEstimate: THERMOSTAT_COST,
    savings,
    minimumAnnualDollars: THERMOSTAT_MIN_ANNUAL_DOLLARS,
    priority: highOrMedium(3),
    emissions: emissionsFor(savings, profile.heatingFuel),
    rebates: ['Utility instant rebates of $50–$100'],
  });
}

export function evaluateHeatingRules(ctx: RuleContext): Recommendation[] {
  return fired(heatingReplacement(ctx), smartThermostat(ctx));
}
