export const ASSUMPTION_IDS = {
  // Building
  SQFT_DEFAULTED: 'building.sqft_defaulted',
  STORIES_DEFAULTED: 'building.stories_defaulted',
  YEAR_BUILT_DEFAULTED: 'building.year_built_defaulted',
  HOME_TYPE_DEFAULTED: 'building.home_type_defaulted',
  OCCUPANTS_DEFAULTED: 'building.occupants_defaulted',

  // Climate & location
  DIVISION_DEFAULTED: 'climate.division_defaulted',
  HDD_DEFAULTED: 'climate.hdd_defaulted',
  CDD_DEFAULTED: 'climate.cdd_defaulted',

  // Envelope
  INSULATION_DEFAULTED: 'envelope.insulation_defaulted',
  DRAFTINESS_DEFAULTED: 'envelope.draftiness_defaulted',
  WINDOWS_DEFAULTED: 'envelope.windows_defaulted',

  // Equipment
  HEATING_EQUIPMENT_DEFAULTED: 'hvac.heating_equipment_defaulted',
  HEATING_AGE_DEFAULTED: 'hvac.heating_age_defaulted',
  THERMOSTAT_DEFAULTED: 'hvac.thermostat_defaulted',
  COOLING_DEFAULTED: 'hvac.cooling_defaulted',
  WATER_HEATER_DEFAULTED: 'water.fuel_defaulted',
  APPLIANCES_DEFAULTED: 'appliances.refrigerator_defaulted',
  LIGHTING_DEFAULTED: 'lighting.incandescent_defaulted',
  SMART_METER_DEFAULTED: 'smart.meter_defaulted',
  SOLAR_SITING_DEFAULTED: 'solar.siting_defaulted',

  // General
  BILL_BLENDED: 'general.bill_blended',
  MODELLED_NOT_MEASURED: 'general.modelled_estimate',
} as const;

export type AssumptionId = typeof ASSUMPTION_IDS[keyof typeof ASSUMPTION_IDS];
