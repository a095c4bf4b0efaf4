import type { Recommendation } from '../../contracts/AuditReportV1';
import { EQUIPMENT_LIFESPANS } from '../modules/SavingsCalculator';
import {
  buildRecommendation,
  emissionsFor,
  fired,
  fuelSavings,
  highOrMedium,
  type RuleContext,
} from './RuleKit';

// ─── Energy monitor ───────────────────────────────────────────────────────────

const MONITOR_FRACTION = 0.05;
const MONITOR_COST = 150;
const MONITOR_MIN_ANNUAL_DOLLARS = 25;

// ─── Setback ──────────────────────────────────────────────────────────────────

export const SETBACK_TARGET_F = 72;
const SETBACK_FRACTION_PER_DEGREE = 0.05;
const SETBACK_MAX_FRACTION = 0.5;
const SETBACK_MIN_ANNUAL_DOLLARS = 25;

function energyMonitor(ctx: RuleContext): Recommendation | null {
  const { profile, breakdown, rates } = ctx;
  if (profile.hasSmartMeter) return null;

  const savings = fuelSavings(
    rates,
    breakdown.baseloadKbtu * MONITOR_FRACTION,
    'elec',
    EQUIPMENT_LIFESPANS.energy_monitor,
  );

  return buildRecommendation(ctx, {
    category: 'Smart Home',
    measure: 'energy_monitor',
    title: 'Add a Whole-Home Energy Monitor',
    description:
      'Real-time, circuit-level feedback helps find always-on loads. Households with ' +
      `monitors typically cut plug and appliance use by about ${(MONITOR_FRACTION * 100).toFixed(0)}%.`,
    currentCondition: 'No smart meter or energy monitor',
    recommendedAction: 'Install a panel-mounted energy monitor',
    costEstimate: MONITOR_COST,
    savings,
    minimumAnnualDollars: MONITOR_MIN_ANNUAL_DOLLARS,
    priority: highOrMedium(2),
    emissions: emissionsFor(savings, 'elec'),
    rebates: [],
  });
}

/** Share of heating saved by lowering the setpoint to the setback target. */
export function setbackFraction(setpointF: number): number {
  const excess = Math.max(0, setpointF - SETBACK_TARGET_F);
  return Math.min(SETBACK_MAX_FRACTION, excess * SETBACK_FRACTION_PER_DEGREE);
}

function thermostatSetback(ctx: RuleContext): Recommendation | null {
  const { profile, breakdown, rates } = ctx;
  if (profile.winterSetpointF <= SETBACK_TARGET_F) return null;

  const savings = fuelSavings(
    rates,
    breakdown.heatingKbtu * setbackFraction(profile.winterSetpointF),
    profile.heatingFuel,
    EQUIPMENT_LIFESPANS.behavioral,
  );

  return buildRecommendation(ctx, {
    category: 'Behavioral',
    measure: 'thermostat_setback',
    title: `Lower the Winter Setpoint to ${SETBACK_TARGET_F}°F`,
    description:
      `Each degree above ${SETBACK_TARGET_F}°F adds about ` +
      `${(SETBACK_FRACTION_PER_DEGREE * 100).toFixed(0)}% to heating use. This costs nothing to do.`,
    currentCondition: `Winter thermostat set to ${profile.winterSetpointF}°F`,
    recommendedAction: `Set the thermostat to ${SETBACK_TARGET_F}°F or lower`,
    costEstimate: 0,
    savings,
    minimumAnnualDollars: SETBACK_MIN_ANNUAL_DOLLARS,
    priority: () => 'High',
    emissions: emissionsFor(savings, profile.heatingFuel),
    rebates: [],
    financialOverride: { paybackYears: 0, roiPercent: Infinity },
  });
}

export function evaluateSmartHomeRules(ctx: RuleContext): Recommendation[] {
  return fired(energyMonitor(ctx));
}

export function evaluateBehavioralRules(ctx: RuleContext): Recommendation[] {
  return fired(thermostatSetback(ctx));
}
