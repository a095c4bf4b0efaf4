/**
 * Shared energy-unit conversion constants.
 *
 * kBTU is the engine's canonical unit. Every module converts through these
 * constants; 0.293 and 0.01 never appear as literals elsewhere.
 */

/** kWh per kBTU (1 kWh ≈ 3.412 kBTU). */
export const KBTU_TO_KWH = 0.293;

/** Therms per kBTU (100 kBTU = 1 therm). */
export const KBTU_TO_THERM = 0.01;

/** kBTU per gallon of propane. */
export const PROPANE_KBTU_PER_GALLON = 91;

/** kBTU per gallon of heating oil. */
export const FUEL_OIL_KBTU_PER_GALLON = 138;

export const BTU_PER_KBTU = 1000;

export const LBS_PER_SHORT_TON = 2000;

/**
 * Normalise an efficiency rating to a ratio.
 * Ratings above `percentThreshold` are read as percentages (AFUE 95 → 0.95).
 * Combustion ratings use a threshold of 1; water-heater energy factors use 5,
 * since a heat-pump unit legitimately rates above 1 (EF 2.5).
 */
export function toEfficiencyFraction(rating: number, percentThreshold = 1): number {
  return rating > percentThreshold ? rating / 100 : rating;
}

/** Clamp `n` to the closed interval [min, max]. */
export function clamp(n: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, n));
}
