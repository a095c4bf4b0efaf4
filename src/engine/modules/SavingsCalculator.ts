import type {
  ClimateContext,
  FinancialResult,
  FuelType,
  LifetimeSavingsResult,
  Region,
  RoofOrientation,
  SavingsResult,
  UtilityRateSet,
} from '../schema/AuditSchemaV1';
import { kbtuToDollars } from './UtilityRatesModule';
import {
  BTU_PER_KBTU,
  KBTU_TO_KWH,
  KBTU_TO_THERM,
  LBS_PER_SHORT_TON,
  toEfficiencyFraction,
} from '../utils/units';

// ─── Constants ────────────────────────────────────────────────────────────────

export const DEFAULT_CLIMATE: ClimateContext = { hdd: 5500, cdd: 800 };

/** Expected service life in years, used for lifetime savings and NPV. */
export const EQUIPMENT_LIFESPANS = {
  furnace: 20,
  boiler: 25,
  heat_pump: 15,
  ac: 15,
  water_heater: 12,
  refrigerator: 15,
  dishwasher: 12,
  washer: 12,
  dryer: 12,
  windows: 25,
  insulation: 50,
  solar_pv: 25,
  air_sealing: 20,
  thermostat: 10,
  led_lighting: 15,
  energy_monitor: 10,
  behavioral: 5,
} as const;

export type EquipmentKind = keyof typeof EQUIPMENT_LIFESPANS;

export type SurfaceType = 'attic' | 'wall' | 'floor' | 'basement';

// Added to R so an uninsulated surface (R-0) still yields a finite heat loss.
const R_VALUE_FLOOR = 0.1;

// Window heat-transfer coefficients, kBTU per (U · sqft · degree-day).
const WINDOW_HEATING_COEFF = 0.024;
const WINDOW_COOLING_COEFF = 0.018;
// Share of window kWh attributed to electric cooling when pricing.
const WINDOW_COOLING_ELECTRIC_SHARE = 0.4;

/** Annual PV yield (kWh per installed kW) by rate region. */
export const SUN_HOURS: Record<Region, number> = {
  Northeast: 1200,
  Midwest: 1400,
  South: 1600,
  West: 1800,
  default: 1500,
};

export const ORIENTATION_FACTORS: Record<RoofOrientation, number> = {
  south: 1.0,
  east: 0.85,
  west: 0.85,
  north: 0.6,
};

// Inverter, wiring and soiling losses.
const PV_SYSTEM_EFFICIENCY = 0.85;

export const DEFAULT_DISCOUNT_RATE = 0.03;

/** Horizon over which ROI is reported. */
export const ROI_HORIZON_YEARS = 10;

// US grid average and natural-gas combustion, lb CO2 per unit.
const CO2_LBS_PER_KWH = 0.85;
const CO2_LBS_PER_THERM = 11.7;

// Water-heater energy factors above this value are read as percentages.
const WATER_HEATER_PERCENT_THRESHOLD = 5;

export const ZERO_SAVINGS: Readonly<SavingsResult> = Object.freeze({
  annualKbtu: 0,
  annualKwh: 0,
  annualTherms: 0,
  annualDollars: 0,
  lifetimeYears: 0,
});

function zeroSavings(): SavingsResult {
  return { ...ZERO_SAVINGS };
}

function nonNegative(result: SavingsResult): SavingsResult {
  return {
    annualKbtu: Math.max(0, result.annualKbtu),
    annualKwh: Math.max(0, result.annualKwh),
    annualTherms: Math.max(0, result.annualTherms),
    annualDollars: Math.max(0, result.annualDollars),
    lifetimeYears: result.lifetimeYears,
  };
}

// ─── Calculator ───────────────────────────────────────────────────────────────

/**
 * SavingsCalculator
 *
 * Physics-based annual savings for each upgrade measure, plus the shared
 * financial (lifetime, NPV, payback, ROI) and CO2 helpers.
 *
 * Every savings method returns non-negative quantities. A proposed upgrade
 * that is not an improvement returns a copy of ZERO_SAVINGS rather than
 * throwing.
 */
export class SavingsCalculator {
  readonly rates: UtilityRateSet;
  readonly climate: ClimateContext;

  constructor(rates: UtilityRateSet, climate: ClimateContext = DEFAULT_CLIMATE) {
    this.rates = rates;
    this.climate = climate;
  }

  /**
   * Conductive heat loss through an insulated surface, Q(R) = A × HDD / (R + 0.1).
   * `surfaceType` does not change the result; it is accepted so callers name
   * the surface they are insulating.
   */
  insulationSavings(
    currentR: number,
    newR: number,
    sqft: number,
    _surfaceType: SurfaceType = 'attic',
    fuel: FuelType = 'gas',
  ): SavingsResult {
    if (currentR >= newR) return zeroSavings();

    const heatLossOld = (sqft * this.climate.hdd) / (currentR + R_VALUE_FLOOR);
    const heatLossNew = (sqft * this.climate.hdd) / (newR + R_VALUE_FLOOR);
    const kbtu = heatLossOld - heatLossNew;

    return nonNegative({
      annualKbtu: kbtu,
      annualKwh: kbtu * KBTU_TO_KWH,
      annualTherms: kbtu * KBTU_TO_THERM,
      annualDollars: kbtuToDollars(this.rates, kbtu, fuel),
      lifetimeYears: EQUIPMENT_LIFESPANS.insulation,
    });
  }

  /**
   * Heating equipment upgrade. `heatingLoadKbtu` is the delivered load;
   * input energy is load / efficiency.
   */
  hvacUpgradeSavings(
    oldEfficiency: number,
    newEfficiency: number,
    heatingLoadKbtu: number,
    fuel: FuelType = 'gas',
    equipment?: EquipmentKind,
  ): SavingsResult {
    if (oldEfficiency >= newEfficiency || oldEfficiency <= 0) return zeroSavings();

    const oldEff = toEfficiencyFraction(oldEfficiency);
    const newEff = toEfficiencyFraction(newEfficiency);
    const kbtu = heatingLoadKbtu / oldEff - heatingLoadKbtu / newEff;
    const kind: EquipmentKind = equipment ?? (fuel === 'gas' ? 'furnace' : 'heat_pump');

    return nonNegative({
      annualKbtu: kbtu,
      annualKwh: kbtu * KBTU_TO_KWH,
      annualTherms: kbtu * KBTU_TO_THERM,
      annualDollars: kbtuToDollars(this.rates, kbtu, fuel),
      lifetimeYears: EQUIPMENT_LIFESPANS[kind],
    });
  }

  /**
   * Air-conditioner upgrade. SEER is BTU delivered per Wh consumed, so
   * load (BTU) / SEER is Wh; divided by 1000 for kWh.
   */
  coolingUpgradeSavings(oldSeer: number, newSeer: number, coolingLoadKbtu: number): SavingsResult {
    if (oldSeer >= newSeer || oldSeer <= 0) return zeroSavings();

    const loadBtu = coolingLoadKbtu * BTU_PER_KBTU;
    const oldKwh = loadBtu / oldSeer / 1000;
    const newKwh = loadBtu / newSeer / 1000;
    const kwh = oldKwh - newKwh;

    return nonNegative({
      annualKbtu: kwh / KBTU_TO_KWH,
      annualKwh: kwh,
      annualTherms: 0,
      annualDollars: kwh * this.rates.electricity,
      lifetimeYears: EQUIPMENT_LIFESPANS.ac,
    });
  }

  windowUpgradeSavings(
    oldU: number,
    newU: number,
    windowSqft: number,
    hdd: number = this.climate.hdd,
    cdd: number = this.climate.cdd,
  ): SavingsResult {
    if (oldU <= newU || oldU <= 0) return zeroSavings();

    const deltaU = oldU - newU;
    const heatingKbtu = deltaU * windowSqft * hdd * WINDOW_HEATING_COEFF;
    const coolingKbtu = deltaU * windowSqft * cdd * WINDOW_COOLING_COEFF;
    const totalKbtu = heatingKbtu + coolingKbtu;
    const kwh = totalKbtu * KBTU_TO_KWH;

    const heatingDollars = kbtuToDollars(this.rates, heatingKbtu, 'gas');
    const coolingDollars = kwh * WINDOW_COOLING_ELECTRIC_SHARE * this.rates.electricity;

    return nonNegative({
      annualKbtu: totalKbtu,
      annualKwh: kwh,
      annualTherms: heatingKbtu * KBTU_TO_THERM,
      annualDollars: heatingDollars + coolingDollars,
      lifetimeYears: EQUIPMENT_LIFESPANS.windows,
    });
  }

  /** Electric appliance swap, priced at the electricity rate. */
  applianceSavings(
    oldKwhPerYear: number,
    newKwhPerYear: number,
    equipment: EquipmentKind = 'refrigerator',
  ): SavingsResult {
    const kwh = oldKwhPerYear - newKwhPerYear;
    return nonNegative({
      annualKbtu: kwh / KBTU_TO_KWH,
      annualKwh: kwh,
      annualTherms: 0,
      annualDollars: kwh * this.rates.electricity,
      lifetimeYears: EQUIPMENT_LIFESPANS[equipment],
    });
  }

  /**
   * Water heater upgrade by energy factor. Heat-pump units rate above 1
   * (EF 2.5), so only values above 5 are read as percentages.
   */
  waterHeaterSavings(
    oldEf: number,
    newEf: number,
    waterLoadKbtu: number,
    fuel: FuelType = 'gas',
  ): SavingsResult {
    if (oldEf >= newEf || oldEf <= 0) return zeroSavings();

    const oldEff = toEfficiencyFraction(oldEf, WATER_HEATER_PERCENT_THRESHOLD);
    const newEff = toEfficiencyFraction(newEf, WATER_HEATER_PERCENT_THRESHOLD);
    const kbtu = waterLoadKbtu / oldEff - waterLoadKbtu / newEff;

    return nonNegative({
      annualKbtu: kbtu,
      annualKwh: kbtu * KBTU_TO_KWH,
      annualTherms: kbtu * KBTU_TO_THERM,
      annualDollars: kbtuToDollars(this.rates, kbtu, fuel),
      lifetimeYears: EQUIPMENT_LIFESPANS.water_heater,
    });
  }

  solarSavings(
    systemKw: number,
    orientation: RoofOrientation = 'south',
    shadingFactor = 1.0,
  ): SavingsResult {
    const sunHours = SUN_HOURS[this.rates.region];
    const orientationFactor = ORIENTATION_FACTORS[orientation] ?? 1.0;
    const kwh = systemKw * sunHours * orientationFactor * shadingFactor * PV_SYSTEM_EFFICIENCY;

    return nonNegative({
      annualKbtu: kwh / KBTU_TO_KWH,
      annualKwh: kwh,
      annualTherms: 0,
      annualDollars: kwh * this.rates.electricity,
      lifetimeYears: EQUIPMENT_LIFESPANS.solar_pv,
    });
  }

  // ─── Financial ──────────────────────────────────────────────────────────

  /**
   * Undiscounted lifetime savings and NPV over `years`.
   * `simplePaybackYears` carries the service life; payback against a cost
   * comes from paybackRoi.
   */
  lifetimeSavings(
    annualDollars: number,
    years: number,
    discountRate: number = DEFAULT_DISCOUNT_RATE,
  ): LifetimeSavingsResult {
    if (annualDollars <= 0) {
      return { lifetimeDollars: 0, npv: 0, simplePaybackYears: Infinity };
    }

    let npv = 0;
    for (let t = 1; t <= years; t++) {
      npv += annualDollars / Math.pow(1 + discountRate, t);
    }

    return {
      lifetimeDollars: annualDollars * years,
      npv,
      simplePaybackYears: years,
    };
  }

  paybackRoi(cost: number, annualSavings: number, rebates = 0): FinancialResult {
    if (annualSavings <= 0) return { paybackYears: Infinity, roiPercent: 0 };

    const netCost = cost - rebates;
    const paybackYears = netCost / annualSavings;
    const roiPercent =
      netCost > 0 ? ((annualSavings * ROI_HORIZON_YEARS - netCost) / netCost) * 100 : 0;

    return { paybackYears, roiPercent };
  }

  /** Short tons of CO2 avoided per year. */
  co2Reduction(annualKwh: number, annualTherms = 0): number {
    const lbs = annualKwh * CO2_LBS_PER_KWH + annualTherms * CO2_LBS_PER_THERM;
    return Math.max(0, lbs / LBS_PER_SHORT_TON);
  }
}
