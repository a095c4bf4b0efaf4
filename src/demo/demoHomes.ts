import type { AuditRequestV1 } from '../engine/schema/AuditSchemaV1';

export interface DemoHome {
  id: string;
  name: string;
  icon: string;
  blurb: string;
  request: AuditRequestV1;
}

// Predicted breakdowns stand in for the usage model's output.
export const DEMO_HOMES: DemoHome[] = [
  {
    id: 'colonial-1962',
    name: '1962 Colonial',
    icon: '🏚️',
    blurb: 'Two-story gas-heated home in New England with a thin attic, drafty rooms and an ageing furnace.',
    request: {
      profile: {
        squareFeet: 2200,
        stories: 2,
        homeType: 'single_family_detached',
        yearBuilt: 1962,
        occupants: 4,
        division: 'New England',
        state: 'MA',
        heatingDegreeDays: 6500,
        coolingDegreeDays: 600,
        insulation: 'poor',
        draftiness: 'most',
        windowCountCategory: 5,
        windowType: 'single',
        heatingEquipment: 'furnace',
        heatingFuel: 'gas',
        heatingEquipmentAge: 'over_20',
        hasProgrammableThermostat: false,
        winterSetpointF: 71,
        hasCentralAc: true,
        acEquipmentAge: '16_20',
        waterHeaterFuel: 'elec',
        refrigeratorCount: 2,
        refrigeratorAgeCategory: 5,
        incandescentCategory: 3,
        hasSmartMeter: false,
        roofOrientation: 'south',
        shadingFactor: 0.9,
      },
      breakdown: {
        heatingKbtu: 95000,
        coolingKbtu: 9000,
        waterKbtu: 14000,
        baseloadKbtu: 26000,
        totalKbtu: 144000,
      },
    },
  },
  {
    id: 'ranch-1995',
    name: '1995 Ranch',
    icon: '🏡',
    blurb: 'Single-story South Atlantic home with central air, an electric water heater and a few quick wins left.',
    request: {
      profile: {
        squareFeet: 1600,
        stories: 1,
        yearBuilt: 1995,
        occupants: 3,
        division: 'South Atlantic',
        state: 'GA',
        heatingDegreeDays: 2800,
        coolingDegreeDays: 1900,
        insulation: 'adequate',
        draftiness: 'some',
        windowCountCategory: 4,
        windowType: 'double',
        heatingEquipment: 'heat_pump',
        heatingFuel: 'elec',
        heatingEquipmentAge: '11_15',
        hasProgrammableThermostat: true,
        winterSetpointF: 68,
        hasCentralAc: true,
        acEquipmentAge: '11_15',
        waterHeaterFuel: 'elec',
        refrigeratorCount: 1,
        refrigeratorAgeCategory: 3,
        incandescentCategory: 1,
        hasSmartMeter: true,
        roofOrientation: 'west',
        shadingFactor: 0.8,
        reportedAnnualKbtu: 70000,
      },
      breakdown: {
        heatingKbtu: 18000,
        coolingKbtu: 22000,
        waterKbtu: 12000,
        baseloadKbtu: 16000,
        totalKbtu: 68000,
      },
    },
  },
  {
    id: 'townhouse-2012',
    name: '2012 Townhouse',
    icon: '🏘️',
    blurb: 'Recent Pacific build with good insulation. Most questions left blank, so defaults fill the gaps.',
    request: {
      profile: {
        squareFeet: 1400,
        homeType: 'single_family_attached',
        yearBuilt: 2012,
        division: 'Pacific',
        insulation: 'well',
      },
      breakdown: {
        heatingKbtu: 20000,
        coolingKbtu: 3000,
        waterKbtu: 9000,
        baseloadKbtu: 12000,
        totalKbtu: 44000,
      },
      customRates: { elec: 0.27 },
    },
  },
];
