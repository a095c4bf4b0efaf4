import type { Recommendation } from '../../contracts/AuditReportV1';
import {
  buildRecommendation,
  emissionsFor,
  fired,
  paybackTiers,
  type RuleContext,
} from './RuleKit';

// Energy factors
const ELECTRIC_RESISTANCE_EF = 0.9;
const HEAT_PUMP_EF = 2.5;
const GAS_STORAGE_EF = 0.6;
const TANKLESS_EF = 0.95;

const HPWH_MIN_WATER_KBTU = 10_000;
const HPWH_COST = 2_800;
const HPWH_MIN_ANNUAL_DOLLARS = 75;

const TANKLESS_MIN_WATER_KBTU = 12_000;
const TANKLESS_COST = 3_500;
const TANKLESS_MIN_ANNUAL_DOLLARS = 50;

function heatPumpWaterHeater(ctx: RuleContext): Recommendation | null {
  const { profile, breakdown, calculator } = ctx;
  if (profile.waterHeaterFuel !== 'elec' || breakdown.waterKbtu <= HPWH_MIN_WATER_KBTU) return null;

  const deliveredKbtu = breakdown.waterKbtu * ELECTRIC_RESISTANCE_EF;
  const savings = calculator.waterHeaterSavings(ELECTRIC_RESISTANCE_EF, HEAT_PUMP_EF, deliveredKbtu, 'elec');

  return buildRecommendation(ctx, {
    category: 'Water Heating',
    measure: 'heat_pump_water_heater',
    title: 'Install a Heat Pump Water Heater',
    description:
      'A heat pump water heater moves heat from the surrounding air into the tank and ' +
      'uses roughly a third of the electricity of a resistance heater.',
    currentCondition: `Electric resistance water heater (EF ${ELECTRIC_RESISTANCE_EF.toFixed(2)})`,
    recommendedAction: `Install an ENERGY STAR heat pump water heater (EF ${HEAT_PUMP_EF.toFixed(2)})`,
    costEstimate: HPWH_COST,
    savings,
    minimumAnnualDollars: HPWH_MIN_ANNUAL_DOLLARS,
    priority: paybackTiers(5, 12),
    emissions: emissionsFor(savings, 'elec'),
    rebates: ['Federal tax credit: 30% up to $2,000', 'Utility rebates of $300–$800'],
  });
}

function tanklessWaterHeater(ctx: RuleContext): Recommendation | null {
  const { profile, breakdown, calculator } = ctx;
  const fuel = profile.waterHeaterFuel;
  if ((fuel !== 'gas' && fuel !== 'propane') || breakdown.waterKbtu <= TANKLESS_MIN_WATER_KBTU) {
    return null;
  }

  const deliveredKbtu = breakdown.waterKbtu * GAS_STORAGE_EF;
  const savings = calculator.waterHeaterSavings(GAS_STORAGE_EF, TANKLESS_EF, deliveredKbtu, fuel);

  return buildRecommendation(ctx, {
    category: 'Water Heating',
    measure: 'tankless_water_heater',
    title: 'Switch to a Condensing Tankless Water Heater',
    description:
      'A tankless unit heats water only on demand, eliminating standby losses from a ' +
      'storage tank.',
    currentCondition: `${fuel === 'gas' ? 'Gas' : 'Propane'} storage water heater (EF ${GAS_STORAGE_EF.toFixed(2)})`,
    recommendedAction: `Install a condensing tankless unit (UEF ${TANKLESS_EF.toFixed(2)})`,
    costEstimate: TANKLESS_COST,
    savings,
    minimumAnnualDollars: TANKLESS_MIN_ANNUAL_DOLLARS,
    priority: paybackTiers(5, 12),
    emissions: emissionsFor(savings, fuel),
    rebates: ['Federal tax credit: 30% up to $600'],
  });
}

export function evaluateWaterHeatingRules(ctx: RuleContext): Recommendation[] {
  return fired(heatPumpWaterHeater(ctx), tanklessWaterHeater(ctx));
}
