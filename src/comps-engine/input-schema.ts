// ═══════════════════════════════════════════════════════════════════════
//  Comparable Sales Engine: Input Contract
//  zod schemas for the camelCased input. Field groups are parsed out of
//  the same flat property object; unknown keys are stripped per group.
// ═══════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import {
  LOT_SHAPE, TOPOGRAPHY, DRAINAGE, SOIL_CONDITIONS, FLOOD_ZONE, ENVIRONMENTAL_STATUS,
  UTILITIES, PAVING, LANDSCAPING,
  CONSTRUCTION_QUALITY, FUNCTIONAL_UTILITY, ENERGY_CERTIFICATION, ARCHITECTURAL_APPEAL, HVAC_SYSTEM,
  BUILDING_CONDITION, BUILDING_CLASS, TENANT_IMPROVEMENTS,
  CRANE_SYSTEM, SPECIALIZED_HVAC,
  ZONING_CONFORMITY, PERMITTED_USES,
} from './scales';
import { DOCK_TYPE_WEIGHTS } from './config';
import { ValidationError, UnrecognizedValueError } from './errors';
import type { ComparableSale, SubjectProperty } from './types';

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

const isoDate = z
  .string()
  .regex(ISO_DATE_RE, 'Expected a YYYY-MM-DD date')
  .refine(s => {
    const parsed = new Date(`${s}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === s;
  }, 'Not a calendar date');

const measure = z.number().finite().nonnegative().optional();

// ── Characteristic Groups ───────────────────────────────────────────

export const LandSchema = z.object({
  lotSizeAcres:        measure,
  frontageFeet:        measure,
  lotShape:            z.enum(LOT_SHAPE).optional(),
  topography:          z.enum(TOPOGRAPHY).optional(),
  drainage:            z.enum(DRAINAGE).optional(),
  soilConditions:      z.enum(SOIL_CONDITIONS).optional(),
  floodZone:           z.enum(FLOOD_ZONE).optional(),
  environmentalStatus: z.enum(ENVIRONMENTAL_STATUS).optional(),
});

export const SiteSchema = z.object({
  utilities:        z.enum(UTILITIES).optional(),
  siteCoveragePct:  z.number().min(0).max(100).optional(),
  paving:           z.enum(PAVING).optional(),
  securityFencing:  z.boolean().optional(),
  yardStorageAcres: measure,
  landscaping:      z.enum(LANDSCAPING).optional(),
});

export const BuildingGeneralSchema = z.object({
  effectiveAgeYears:   measure,
  constructionQuality: z.enum(CONSTRUCTION_QUALITY).optional(),
  functionalUtility:   z.enum(FUNCTIONAL_UTILITY).optional(),
  energyCertification: z.enum(ENERGY_CERTIFICATION).optional(),
  architecturalAppeal: z.enum(ARCHITECTURAL_APPEAL).optional(),
  hvacSystem:          z.enum(HVAC_SYSTEM).optional(),
});

export const IndustrialSchema = z.object({
  buildingSf:          measure,
  clearHeightFeet:     measure,
  loadingDocks:        measure,
  columnSpacingFeet:   measure,
  floorLoadPsf:        measure,
  officeFinishPct:     z.number().min(0).max(100).optional(),
  bayDepthFeet:        measure,
  esfrSprinkler:       z.boolean().optional(),
  truckCourtDepthFeet: measure,
  condition:           z.enum(BUILDING_CONDITION).optional(),
});

/** Dock counts by type; when any is given they replace `loadingDocks` with dock-equivalents. */
export const LoadingDockMixSchema = z.object({
  loadingDocksDockHigh:   measure,
  loadingDocksGradeLevel: measure,
  loadingDocksDriveIn:    measure,
});

export const OfficeSchema = z.object({
  rentableAreaSf:     measure,
  buildingClass:      z.enum(BUILDING_CLASS).optional(),
  parkingSpaces:      measure,
  elevatorCount:      measure,
  ceilingHeightFeet:  measure,
  tenantImprovements: z.enum(TENANT_IMPROVEMENTS).optional(),
  onSiteAmenities:    z.boolean().optional(),
  condition:          z.enum(BUILDING_CONDITION).optional(),
});

export const SpecialFeaturesSchema = z.object({
  railSpur:              z.boolean().optional(),
  craneSystem:           z.enum(CRANE_SYSTEM).optional(),
  electricalServiceAmps: measure,
  truckScales:           z.boolean().optional(),
  specializedHvac:       z.enum(SPECIALIZED_HVAC).optional(),
  backupGeneratorKw:     measure,
});

export const ZoningLegalSchema = z.object({
  zoningConformity:    z.enum(ZONING_CONFORMITY).optional(),
  floorAreaRatio:      measure,
  permittedUses:       z.enum(PERMITTED_USES).optional(),
  easementEncumbrance: z.boolean().optional(),
  heritageDesignation: z.boolean().optional(),
});

export type LandCharacteristics            = z.infer<typeof LandSchema>;
export type SiteCharacteristics            = z.infer<typeof SiteSchema>;
export type BuildingGeneralCharacteristics = z.infer<typeof BuildingGeneralSchema>;
export type IndustrialCharacteristics      = z.infer<typeof IndustrialSchema>;
export type OfficeCharacteristics          = z.infer<typeof OfficeSchema>;
export type SpecialFeatureCharacteristics  = z.infer<typeof SpecialFeaturesSchema>;
export type ZoningLegalCharacteristics     = z.infer<typeof ZoningLegalSchema>;
export type LoadingDockMix                 = z.infer<typeof LoadingDockMixSchema>;

export type CharacteristicKey =
  | keyof LandCharacteristics
  | keyof SiteCharacteristics
  | keyof BuildingGeneralCharacteristics
  | keyof IndustrialCharacteristics
  | keyof OfficeCharacteristics
  | keyof SpecialFeatureCharacteristics
  | keyof ZoningLegalCharacteristics;

export const CHARACTERISTIC_KEYS: readonly CharacteristicKey[] = [
  ...new Set<CharacteristicKey>([
    ...LandSchema.keyof().options,
    ...SiteSchema.keyof().options,
    ...BuildingGeneralSchema.keyof().options,
    ...IndustrialSchema.keyof().options,
    ...OfficeSchema.keyof().options,
    ...SpecialFeaturesSchema.keyof().options,
    ...ZoningLegalSchema.keyof().options,
  ]),
];

export function isCharacteristicKey(key: string): key is CharacteristicKey {
  return CHARACTERISTIC_KEYS.some(k => k === key);
}

// ── Property / Transaction Fields ───────────────────────────────────

export const PROPERTY_TYPES = ['industrial', 'office', 'retail'] as const;
export const PROPERTY_RIGHTS = ['fee_simple', 'leasehold'] as const;
export const FINANCING_TYPES = ['cash', 'seller_vtb', 'conventional'] as const;

export const PropertyBaseSchema = z.object({
  address:          z.string().min(1),
  propertyType:     z.enum(PROPERTY_TYPES),
  propertyRights:   z.enum(PROPERTY_RIGHTS),
  locationScore:    z.number().min(0).max(100),
  groundRentAnnual: z.number().finite().nonnegative().optional(),
  highwayFrontage:  z.boolean().optional(),
  highVisibility:   z.boolean().optional(),
  superiorAccess:   z.boolean().optional(),
  locationSubmarket: z.string().min(1).optional(),
});

export const FinancingSchema = z.object({
  type:           z.enum(FINANCING_TYPES),
  rate:           z.number().finite().nonnegative().optional(),
  marketRate:     z.number().finite().positive().optional(),
  termYears:      z.number().finite().positive().optional(),
  loanAmount:     z.number().finite().positive().optional(),
  loanToValuePct: z.number().gt(0).max(100).optional(),
});

export const ConditionsOfSaleSchema = z.object({
  armsLength:            z.boolean(),
  motivationDiscountPct: z.number().min(0).lt(100).optional(),
});

export const TransactionSchema = z.object({
  salePrice:        z.number().finite().positive(),
  saleDate:         isoDate,
  financing:        FinancingSchema,
  conditionsOfSale: ConditionsOfSaleSchema,
});

export type PropertyBase      = z.infer<typeof PropertyBaseSchema>;
export type Financing         = z.infer<typeof FinancingSchema>;
export type ConditionsOfSale  = z.infer<typeof ConditionsOfSaleSchema>;
export type Transaction       = z.infer<typeof TransactionSchema>;
export type PropertyType      = PropertyBase['propertyType'];
export type PropertyRights    = PropertyBase['propertyRights'];

// ── Market Parameters ───────────────────────────────────────────────

export const LocationTierRatesSchema = z.object({
  poor:         z.number().finite().nonnegative(),
  belowAverage: z.number().finite().nonnegative(),
  average:      z.number().finite().nonnegative(),
  good:         z.number().finite().nonnegative(),
  premium:      z.number().finite().nonnegative(),
});

export const FeaturePremiumsSchema = z.object({
  highwayFrontage: z.number().finite().nonnegative(),
  highVisibility:  z.number().finite().nonnegative(),
  superiorAccess:  z.number().finite().nonnegative(),
});

export const MarketParametersInputSchema = z.object({
  valuationDate:          isoDate,
  appreciationRateAnnual: z.number().finite().optional(),
  capRate:                z.number().finite().optional(),
  rates:                  z.record(z.string(), z.number().finite()).optional(),
  locationTierRates:      LocationTierRatesSchema.partial().optional(),
  featurePremiums:        FeaturePremiumsSchema.partial().optional(),
  /** Premium (%) of each named submarket over the subject's submarket. */
  submarketDifferentials: z.record(z.string(), z.number().finite()).optional(),
});

export type LocationTierRates     = z.infer<typeof LocationTierRatesSchema>;
export type FeaturePremiums       = z.infer<typeof FeaturePremiumsSchema>;
export type MarketParametersInput = z.infer<typeof MarketParametersInputSchema>;

export const ValuationInputSchema = z.object({
  subjectProperty:  z.record(z.string(), z.unknown()),
  comparableSales:  z.array(z.unknown()),
  marketParameters: z.unknown(),
});

// ── zod → engine errors ─────────────────────────────────────────────

/**
 * Maps the first zod issue to the engine's taxonomy: an enum miss becomes
 * an UnrecognizedValueError carrying the scale, anything else a ValidationError.
 */
export function toEngineError(error: z.ZodError, context: string): ValidationError | UnrecognizedValueError {
  const enumIssue = error.issues.find(i => i.code === z.ZodIssueCode.invalid_enum_value);
  if (enumIssue && enumIssue.code === z.ZodIssueCode.invalid_enum_value) {
    const field = enumIssue.path.join('.');
    const options = enumIssue.options.map(String);
    return new UnrecognizedValueError(field, String(enumIssue.received), options);
  }

  const first = error.issues[0];
  const field = first && first.path.length > 0 ? first.path.join('.') : null;
  const detail = error.issues
    .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
  return new ValidationError(`${context}: ${detail}`, field);
}

export function parseWith<T extends z.ZodTypeAny>(schema: T, raw: unknown, context: string): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) throw toEngineError(result.error, context);
  return result.data;
}

// ── Property Parsing ────────────────────────────────────────────────

/** Weighted dock count, or undefined when no typed count was given. */
export function dockEquivalents(mix: LoadingDockMix): number | undefined {
  const { loadingDocksDockHigh: dockHigh, loadingDocksGradeLevel: gradeLevel, loadingDocksDriveIn: driveIn } = mix;
  if (dockHigh === undefined && gradeLevel === undefined && driveIn === undefined) return undefined;
  return (dockHigh ?? 0) * DOCK_TYPE_WEIGHTS.dockHigh
    + (gradeLevel ?? 0) * DOCK_TYPE_WEIGHTS.gradeLevel
    + (driveIn ?? 0) * DOCK_TYPE_WEIGHTS.driveIn;
}

function parseProperty(raw: unknown, context: string): SubjectProperty {
  const base = parseWith(PropertyBaseSchema, raw, context);
  const common = {
    ...base,
    land:            parseWith(LandSchema, raw, context),
    site:            parseWith(SiteSchema, raw, context),
    buildingGeneral: parseWith(BuildingGeneralSchema, raw, context),
    specialFeatures: parseWith(SpecialFeaturesSchema, raw, context),
    zoningLegal:     parseWith(ZoningLegalSchema, raw, context),
  };

  switch (base.propertyType) {
    case 'industrial': {
      const industrial = parseWith(IndustrialSchema, raw, context);
      const docks = dockEquivalents(parseWith(LoadingDockMixSchema, raw, context));
      return {
        ...common,
        propertyType: 'industrial',
        industrial: docks === undefined ? industrial : { ...industrial, loadingDocks: docks },
      };
    }
    case 'office':
      return { ...common, propertyType: 'office', office: parseWith(OfficeSchema, raw, context) };
    case 'retail':
      return { ...common, propertyType: 'retail' };
  }
}

/** Parses a camelCased subject; any failure here is fatal for the run. */
export function parseSubject(raw: unknown): SubjectProperty {
  const subject = parseProperty(raw, 'subject_property');
  if (subject.propertyRights === 'leasehold' && subject.groundRentAnnual === undefined) {
    throw new ValidationError(
      'subject_property: leasehold subject requires ground_rent_annual',
      'groundRentAnnual',
    );
  }
  return subject;
}

export function parseComparable(raw: unknown, index: number): ComparableSale {
  const context = `comparable_sales[${index}]`;
  const property = parseProperty(raw, context);
  if (property.propertyRights === 'leasehold' && property.groundRentAnnual === undefined) {
    throw new ValidationError(`${context}: leasehold comparable requires ground_rent_annual`, 'groundRentAnnual');
  }
  const transaction = parseWith(TransactionSchema, raw, context);
  return { ...property, ...transaction };
}

/** Best-effort address for exclusion reports on comparables that failed to parse. */
export function addressOf(raw: unknown): string {
  const parsed = z.object({ address: z.string() }).safeParse(raw);
  return parsed.success ? parsed.data.address : '(unknown address)';
}
