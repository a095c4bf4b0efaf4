import { z } from 'zod';
import type { AuditRequestV1 } from './AuditSchemaV1';

// ─── Primitives ───────────────────────────────────────────────────────────────

const FiniteNumber = z.number().refine(Number.isFinite, 'Must be a finite number');

const NonNegative = FiniteNumber.refine((n) => n >= 0, 'Must be zero or greater');

const Fuel = z.enum(['gas', 'elec', 'propane', 'fuel_oil']);

const AgeBand = z.enum(['new', '1_5', '6_10', '11_15', '16_20', 'over_20']);

// ─── Profile ──────────────────────────────────────────────────────────────────

export const HomeProfileSchema = z.object({
  squareFeet: NonNegative.optional(),
  stories: NonNegative.optional(),
  homeType: z
    .enum([
      'mobile',
      'single_family_detached',
      'single_family_attached',
      'apartment_small',
      'apartment_large',
    ])
    .optional(),
  yearBuilt: FiniteNumber.optional(),
  occupants: NonNegative.optional(),

  division: z.string().optional(),
  state: z.string().optional(),
  heatingDegreeDays: NonNegative.optional(),
  coolingDegreeDays: NonNegative.optional(),

  insulation: z.enum(['well', 'adequate', 'poor', 'none']).optional(),
  draftiness: z.enum(['never', 'some', 'most', 'always']).optional(),
  windowCountCategory: z.number().int().min(1).max(7).optional(),
  windowType: z.enum(['single', 'double', 'triple']).optional(),

  heatingEquipment: z
    .enum(['furnace', 'boiler', 'heat_pump', 'electric_baseboard', 'other', 'none'])
    .optional(),
  heatingFuel: Fuel.optional(),
  heatingEquipmentAge: AgeBand.optional(),
  hasProgrammableThermostat: z.boolean().optional(),
  winterSetpointF: FiniteNumber.optional(),

  hasCentralAc: z.boolean().optional(),
  acEquipmentAge: AgeBand.optional(),

  waterHeaterFuel: Fuel.optional(),

  refrigeratorCount: z.number().int().min(0).optional(),
  refrigeratorAgeCategory: z.number().int().min(1).max(6).optional(),
  incandescentCategory: z.number().int().min(0).max(4).optional(),

  hasSmartMeter: z.boolean().optional(),

  roofOrientation: z.enum(['south', 'east', 'west', 'north']).optional(),
  shadingFactor: z.number().min(0).max(1).optional(),

  reportedAnnualKbtu: NonNegative.optional(),
});

// ─── Breakdown & overrides ────────────────────────────────────────────────────

export const UsageBreakdownSchema = z.object({
  heatingKbtu: NonNegative,
  coolingKbtu: NonNegative,
  waterKbtu: NonNegative,
  baseloadKbtu: NonNegative,
  totalKbtu: NonNegative,
});

export const CustomRatesSchema = z.object({
  elec: NonNegative.optional(),
  gas: NonNegative.optional(),
  propane: NonNegative.optional(),
  fuelOil: NonNegative.optional(),
});

export const AuditRequestSchema = z.object({
  profile: HomeProfileSchema,
  breakdown: UsageBreakdownSchema,
  customRates: CustomRatesSchema.optional(),
  benchmarks: z.record(z.string(), NonNegative).optional(),
});

// ─── Boundary ─────────────────────────────────────────────────────────────────

export class AuditRequestError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    const summary = issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    super(`Invalid audit request: ${summary}`);
    this.name = 'AuditRequestError';
    this.issues = issues;
  }
}

/**
 * Validate untyped JSON (an HTTP body, a fixture file) into an audit request.
 * Throws AuditRequestError listing every issue; unknown keys are dropped.
 */
export function parseAuditRequest(input: unknown): AuditRequestV1 {
  const result = AuditRequestSchema.safeParse(input);
  if (!result.success) {
    throw new AuditRequestError(result.error.issues);
  }
  const request: AuditRequestV1 = result.data;
  return request;
}
