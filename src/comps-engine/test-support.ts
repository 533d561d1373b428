// Builders shared by the *.test.ts files.

import { RateBook } from './rate-book';
import type {
  ComparableSale,
  IndustrialProperty,
  MarketParameters,
  OfficeProperty,
  RetailProperty,
  SubjectProperty,
} from './types';
import type { Transaction } from './input-schema';

const EMPTY_GROUPS = {
  land: {},
  site: {},
  buildingGeneral: {},
  specialFeatures: {},
  zoningLegal: {},
};

export function industrial(patch: Partial<IndustrialProperty> = {}): IndustrialProperty {
  return {
    address: 'Subject Industrial',
    propertyRights: 'fee_simple',
    locationScore: 85,
    ...EMPTY_GROUPS,
    industrial: {},
    ...patch,
    propertyType: 'industrial',
  };
}

export function office(patch: Partial<OfficeProperty> = {}): OfficeProperty {
  return {
    address: 'Subject Office',
    propertyRights: 'fee_simple',
    locationScore: 60,
    ...EMPTY_GROUPS,
    office: {},
    ...patch,
    propertyType: 'office',
  };
}

export function retail(patch: Partial<RetailProperty> = {}): RetailProperty {
  return {
    address: 'Subject Retail',
    propertyRights: 'fee_simple',
    locationScore: 60,
    ...EMPTY_GROUPS,
    ...patch,
    propertyType: 'retail',
  };
}

export function sale(property: SubjectProperty, tx: Partial<Transaction> = {}): ComparableSale {
  return {
    ...property,
    salePrice: 1_000_000,
    saleDate: '2025-01-15',
    financing: { type: 'cash' },
    conditionsOfSale: { armsLength: true },
    ...tx,
  };
}

export const TEST_MARKET: MarketParameters = {
  valuationDate: '2025-01-15',
  appreciationRateAnnual: 3.5,
  capRate: 7,
  rates: {
    lotSizeAcres: 250_000,
    lotShape: 2,
    topography: 3,
    siteCoveragePct: 0.25,
    paving: 40_000,
    securityFencing: 35_000,
    effectiveAgeYears: 1,
    constructionQuality: 7,
    buildingSf: 2,
    clearHeightFeet: 1.5,
    loadingDocks: 35_000,
    columnSpacingFeet: 0.075,
    esfrSprinkler: 4,
    condition: 5,
    rentableAreaSf: 3,
    onSiteAmenities: 2,
    railSpur: 7,
    craneSystem: 100_000,
    electricalServiceAmps: 15,
    easementEncumbrance: 3,
  },
  locationTierRates: { poor: 1.0, belowAverage: 0.75, average: 0.5, good: 1.0, premium: 1.5 },
  featurePremiums: { highwayFrontage: 12, highVisibility: 3, superiorAccess: 2 },
  submarketDifferentials: {},
};

export function rateBook(patch: Partial<MarketParameters> = {}): RateBook {
  return new RateBook({ ...TEST_MARKET, ...patch });
}
