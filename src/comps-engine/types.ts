// ═══════════════════════════════════════════════════════════════════════
//  Comparable Sales Engine: Type Definitions
// ═══════════════════════════════════════════════════════════════════════

import type {
  PropertyBase,
  Transaction,
  LandCharacteristics,
  SiteCharacteristics,
  BuildingGeneralCharacteristics,
  IndustrialCharacteristics,
  OfficeCharacteristics,
  SpecialFeatureCharacteristics,
  ZoningLegalCharacteristics,
  CharacteristicKey,
  LocationTierRates,
  FeaturePremiums,
} from './input-schema';

export type {
  PropertyType,
  PropertyRights,
  Financing,
  ConditionsOfSale,
  CharacteristicKey,
  LocationTierRates,
  FeaturePremiums,
} from './input-schema';

// ── Enums ───────────────────────────────────────────────────────────

export type ValidationStatus = 'ACCEPTABLE' | 'CAUTION' | 'REJECT';

export type RecordStatus = 'applied' | 'incomplete';

export type StageCategory =
  | 'property_rights'
  | 'financing'
  | 'conditions_of_sale'
  | 'market_conditions'
  | 'location';

export type PhysicalCategory =
  | 'land'
  | 'site'
  | 'building_general'
  | 'industrial'
  | 'office'
  | 'special_features'
  | 'zoning_legal';

export type AdjustmentCategory = StageCategory | PhysicalCategory;

export type StageNumber = 1 | 2 | 3 | 4 | 5 | 6;

export type FactorSource = 'appraiser_input' | 'industry_default';

// ── Property ────────────────────────────────────────────────────────

export interface CommonGroups {
  land: LandCharacteristics;
  site: SiteCharacteristics;
  buildingGeneral: BuildingGeneralCharacteristics;
  specialFeatures: SpecialFeatureCharacteristics;
  zoningLegal: ZoningLegalCharacteristics;
}

type Base = Omit<PropertyBase, 'propertyType'> & CommonGroups;

export type IndustrialProperty = Base & { propertyType: 'industrial'; industrial: IndustrialCharacteristics };
export type OfficeProperty     = Base & { propertyType: 'office'; office: OfficeCharacteristics };
export type RetailProperty     = Base & { propertyType: 'retail' };

export type SubjectProperty = Readonly<IndustrialProperty | OfficeProperty | RetailProperty>;

export type ComparableSale = SubjectProperty & Readonly<Transaction>;

// ── Market Parameters (resolved) ────────────────────────────────────

export type PhysicalRates = Readonly<Partial<Record<CharacteristicKey, number>>>;

export interface MarketParameters {
  readonly valuationDate: string;
  readonly appreciationRateAnnual: number;
  readonly capRate: number;
  readonly rates: PhysicalRates;
  readonly locationTierRates: Readonly<LocationTierRates>;
  readonly featurePremiums: Readonly<FeaturePremiums>;
  readonly submarketDifferentials: Readonly<Partial<Record<string, number>>>;
}

// ── Adjustments ─────────────────────────────────────────────────────

export type CharacteristicValue = string | number | boolean;

/** Market-parameter key that drives an adjustment; sensitivity perturbs by this key. */
export type RateKey =
  | CharacteristicKey
  | 'capRate'
  | 'financingMarketRate'
  | 'motivationDiscountPct'
  | 'appreciationRateAnnual'
  | 'locationTierRates'
  | 'submarketDifferentials'
  | keyof FeaturePremiums;

export interface AdjustmentRecord {
  readonly stage: StageNumber;
  readonly category: AdjustmentCategory;
  readonly characteristic: string;
  readonly rateKey: RateKey;
  readonly subjectValue: CharacteristicValue | null;
  readonly comparableValue: CharacteristicValue | null;
  readonly amount: number;
  readonly explanation: string;
  readonly status: RecordStatus;
}

export interface StageResult {
  readonly stage: StageNumber;
  readonly name: string;
  readonly records: readonly AdjustmentRecord[];
  readonly priceBefore: number;
  readonly priceAfter: number;
}

// ── Validation ──────────────────────────────────────────────────────

export interface ValidationOutcome {
  readonly status: ValidationStatus;
  readonly weight: number;
  readonly recommendation: string;
  readonly warnings: readonly string[];
}

export interface ComparableResult {
  readonly index: number;
  readonly comparable: ComparableSale;
  readonly stages: readonly StageResult[];
  readonly finalAdjustedPrice: number;
  readonly grossAdjustment: number;
  readonly grossAdjustmentPct: number;
  readonly netAdjustment: number;
  readonly netAdjustmentPct: number;
  readonly validation: ValidationOutcome;
  readonly weightedValue: number;
  readonly incompleteCharacteristics: readonly string[];
}

export interface ComparableExclusion {
  readonly index: number;
  readonly address: string;
  readonly errorName: string;
  readonly reason: string;
}

// ── Reconciliation ──────────────────────────────────────────────────

export interface DescriptiveStatistics {
  readonly count: number;
  readonly mean: number;
  readonly median: number;
  readonly stdev: number;
  readonly min: number;
  readonly max: number;
  readonly q1: number;
  readonly q3: number;
  readonly range: number;
  readonly coefficientOfVariation: number;
}

export interface ValueRange {
  readonly low: number;
  readonly high: number;
  readonly spreadPct: number;
}

export interface ReconciliationResult {
  readonly included: readonly ComparableResult[];
  readonly reconciledValue: number;
  readonly valueRange: ValueRange;
  readonly totalWeight: number;
  readonly statistics: DescriptiveStatistics;
}

// ── Sensitivity ─────────────────────────────────────────────────────

export interface SensitivityScenario {
  readonly factor: number;
  readonly reconciledValue: number | null;
  readonly changePct: number | null;
}

export interface SensitivityResult {
  readonly rateKey: RateKey;
  readonly characteristic: string;
  readonly baseAmount: number;
  readonly low: SensitivityScenario;
  readonly high: SensitivityScenario;
}

// ── Run Output ──────────────────────────────────────────────────────

export interface ValuationResult {
  readonly subject: SubjectProperty;
  readonly marketParameters: MarketParameters;
  readonly comparables: readonly ComparableResult[];
  readonly exclusions: readonly ComparableExclusion[];
  readonly reconciliation: ReconciliationResult;
  readonly sensitivity?: readonly SensitivityResult[];
  readonly factorSources: Readonly<Record<string, FactorSource>>;
}
