import type { AssumptionId } from '../contracts/assumptions.ids';

export const ASSUMPTION_CATALOG: Record<AssumptionId, {
  title: string;
  detail: string;
  improveBy?: string;
}> = {
  'building.sqft_defaulted': {
    title: 'Floor area not provided',
    detail: 'A typical 2,000 sq ft home has been assumed. Insulation, sealing and energy-intensity figures scale with this value.',
    improveBy: 'Enter the heated floor area from a listing, appraisal or floor plan.',
  },
  'building.stories_defaulted': {
    title: 'Number of stories not provided',
    detail: 'A single-story home has been assumed, so the attic area equals the floor area.',
    improveBy: 'Enter the number of above-ground stories.',
  },
  'building.year_built_defaulted': {
    title: 'Year built not provided',
    detail: 'Construction year 2000 has been assumed. Homes built before 1980 are checked for wall insulation; this one is not.',
    improveBy: 'Enter the year the home was built.',
  },
  'building.home_type_defaulted': {
    title: 'Home type not provided',
    detail: 'A single-family detached home has been assumed.',
  },
  'building.occupants_defaulted': {
    title: 'Household size not provided',
    detail: 'Two occupants have been assumed.',
    improveBy: 'Enter the number of people living in the home.',
  },
  'climate.division_defaulted': {
    title: 'Location not provided',
    detail: 'National average utility rates, solar yield and energy benchmarks are used instead of regional values.',
    improveBy: 'Enter the census division or region of the home.',
  },
  'climate.hdd_defaulted': {
    title: 'Heating degree days not provided',
    detail: 'A moderate climate of 5,500 heating degree days has been assumed for envelope heat-loss modelling.',
    improveBy: 'Provide heating degree days for the nearest weather station.',
  },
  'climate.cdd_defaulted': {
    title: 'Cooling degree days not provided',
    detail: 'A moderate climate of 800 cooling degree days has been assumed for window modelling.',
    improveBy: 'Provide cooling degree days for the nearest weather station.',
  },
  'envelope.insulation_defaulted': {
    title: 'Insulation level not provided',
    detail: 'Adequate attic insulation (about R-30) has been assumed.',
    improveBy: 'Check attic insulation depth or record an insulation grade from an inspection.',
  },
  'envelope.draftiness_defaulted': {
    title: 'Draftiness not provided',
    detail: 'The home is assumed to be drafty some of the time, which qualifies it for an air-sealing check.',
    improveBy: 'Report how often the home feels drafty, or run a blower-door test.',
  },
  'envelope.windows_defaulted': {
    title: 'Window details not provided',
    detail: 'A mid-sized count of double-pane windows has been assumed.',
    improveBy: 'Enter the number of windows and their glazing type.',
  },
  'hvac.heating_equipment_defaulted': {
    title: 'Heating system not provided',
    detail: 'A natural-gas furnace has been assumed as the main heating system.',
    improveBy: 'Enter the main heating equipment type and fuel.',
  },
  'hvac.heating_age_defaulted': {
    title: 'Heating system age not provided',
    detail: 'An equipment age of 11–15 years has been assumed, which is below the replacement threshold.',
    improveBy: 'Enter the approximate age of the heating equipment from its data plate.',
  },
  'hvac.thermostat_defaulted': {
    title: 'Thermostat details not provided',
    detail: 'A manual thermostat with a 70°F winter setpoint has been assumed.',
    improveBy: 'Record the thermostat type and typical winter setting.',
  },
  'hvac.cooling_defaulted': {
    title: 'Cooling system not provided',
    detail: 'Central air conditioning aged 6–10 years has been assumed.',
    improveBy: 'Enter whether central air is installed and its approximate age.',
  },
  'water.fuel_defaulted': {
    title: 'Water heater fuel not provided',
    detail: 'A natural-gas storage water heater has been assumed.',
    improveBy: 'Check the fuel type on the water heater label.',
  },
  'appliances.refrigerator_defaulted': {
    title: 'Refrigerator details not provided',
    detail: 'One refrigerator in the mid-age bracket has been assumed.',
    improveBy: 'Enter the number of refrigerators and the age of the oldest one.',
  },
  'lighting.incandescent_defaulted': {
    title: 'Lighting mix not provided',
    detail: 'Few incandescent bulbs have been assumed, so no LED conversion is evaluated.',
    improveBy: 'Estimate the share of incandescent or halogen bulbs still in use.',
  },
  'smart.meter_defaulted': {
    title: 'Smart meter status not provided',
    detail: 'No smart meter or energy monitor has been assumed.',
  },
  'solar.siting_defaulted': {
    title: 'Roof siting not provided',
    detail: 'A south-facing, unshaded roof has been assumed for solar yield.',
    improveBy: 'Enter the main roof orientation and an estimate of shading.',
  },
  'general.bill_blended': {
    title: 'Total blended with utility bills',
    detail: 'The predicted annual total has been blended 70/30 with the consumption reported from utility bills.',
  },
  'general.modelled_estimate': {
    title: 'Modelled estimate',
    detail: 'End-use consumption is predicted from the home profile rather than metered per end use.',
    improveBy: 'Provide twelve months of utility bills to calibrate the total.',
  },
};
