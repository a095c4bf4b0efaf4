import type { HomeProfileV1, UsageBreakdown } from '../schema/AuditSchemaV1';
import type { Recommendation } from '../../contracts/AuditReportV1';

/**
 * A fully specified New England home on which no rule fires. Tests switch
 * individual rules on with spread overrides.
 */
export const quietProfile: HomeProfileV1 = {
  squareFeet: 1500,
  stories: 1,
  homeType: 'single_family_detached',
  yearBuilt: 2005,
  occupants: 3,
  division: 'New England',
  heatingDegreeDays: 5500,
  coolingDegreeDays: 800,
  insulation: 'well',
  draftiness: 'never',
  windowCountCategory: 2,
  windowType: 'double',
  heatingEquipment: 'furnace',
  heatingFuel: 'gas',
  heatingEquipmentAge: '6_10',
  hasProgrammableThermostat: true,
  winterSetpointF: 68,
  hasCentralAc: true,
  acEquipmentAge: '1_5',
  waterHeaterFuel: 'gas',
  refrigeratorCount: 1,
  refrigeratorAgeCategory: 2,
  incandescentCategory: 0,
  hasSmartMeter: true,
  roofOrientation: 'south',
  shadingFactor: 1,
};

export const quietBreakdown: UsageBreakdown = {
  heatingKbtu: 35_000,
  coolingKbtu: 8_000,
  waterKbtu: 10_000,
  baseloadKbtu: 4_000,
  totalKbtu: 45_000,
};

/** Minimal recommendation for aggregate and ordering tests. */
export function makeRecommendation(overrides: Partial<Recommendation> & { id: string }): Recommendation {
  return {
    category: 'Appliances',
    priority: 'Medium',
    title: overrides.id,
    description: '',
    currentCondition: '',
    recommendedAction: '',
    cost: { low: 800, mid: 1000, high: 1200, estimate: 1000 },
    savings: {
      annualBtu: 10_000_000,
      annualKwh: 2930,
      annualTherms: 0,
      annualDollars: 200,
      lifetimeDollars: 3000,
      lifetimeYears: 15,
    },
    financial: { paybackYears: 5, roiPercent: 100, npv: 2400 },
    environmental: { co2ReductionTons: 1, co2ReductionLifetime: 15 },
    rebates: [],
    ...overrides,
  };
}

export function withPayback(id: string, paybackYears: number): Recommendation {
  return makeRecommendation({ id, financial: { paybackYears, roiPercent: 0, npv: 0 } });
}
