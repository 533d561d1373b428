// ═══════════════════════════════════════════════════════════════════════
//  Comparable Sales Engine: Industry Defaults
//  Appraiser inputs win; anything omitted falls back to the per-type
//  defaults in data/industry-defaults.json and is tagged as such.
// ═══════════════════════════════════════════════════════════════════════

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import {
  LocationTierRatesSchema,
  FeaturePremiumsSchema,
  isCharacteristicKey,
  type CharacteristicKey,
  type MarketParametersInput,
  type PropertyType,
} from './input-schema';
import { ConfigurationError } from './errors';
import type { FactorSource, MarketParameters, LocationTierRates, FeaturePremiums } from './types';

const DEFAULTS_URL = new URL('../../data/industry-defaults.json', import.meta.url);

const TypeDefaultsSchema = z.object({
  appreciationRateAnnual: z.number().finite(),
  capRate:                z.number().positive(),
  locationTierRates:      LocationTierRatesSchema,
  featurePremiums:        FeaturePremiumsSchema,
  rates:                  z.record(z.string(), z.number().finite()),
});

const IndustryDefaultsSchema = z.object({
  industrial: TypeDefaultsSchema,
  office:     TypeDefaultsSchema,
  retail:     TypeDefaultsSchema,
});

export type IndustryDefaults = z.infer<typeof IndustryDefaultsSchema>;

let cached: IndustryDefaults | null = null;

export function loadIndustryDefaults(): IndustryDefaults {
  if (cached) return cached;
  const raw: unknown = JSON.parse(readFileSync(DEFAULTS_URL, 'utf8'));
  const parsed = IndustryDefaultsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid industry defaults file: ${parsed.error.message}`);
  }
  cached = parsed.data;
  return cached;
}

// ── Resolution ──────────────────────────────────────────────────────

export interface ResolvedMarket {
  params: MarketParameters;
  factorSources: Record<string, FactorSource>;
}

export function resolveMarketParameters(
  input: MarketParametersInput,
  propertyType: PropertyType,
  defaults: IndustryDefaults = loadIndustryDefaults(),
): ResolvedMarket {
  const base = defaults[propertyType];
  const factorSources: Record<string, FactorSource> = {};

  function pick(key: string, given: number | undefined, fallback: number): number {
    factorSources[key] = given === undefined ? 'industry_default' : 'appraiser_input';
    return given ?? fallback;
  }

  const appreciationRateAnnual = pick('appreciationRateAnnual', input.appreciationRateAnnual, base.appreciationRateAnnual);
  if (appreciationRateAnnual <= -100) {
    throw new ConfigurationError(
      `appreciation_rate_annual must be greater than -100 (got ${appreciationRateAnnual})`,
    );
  }
  const capRate = pick('capRate', input.capRate, base.capRate);
  if (capRate <= 0) {
    throw new ConfigurationError(`cap_rate must be greater than 0 (got ${capRate})`);
  }

  const tierInput = input.locationTierRates ?? {};
  const locationTierRates: LocationTierRates = {
    poor:         pick('locationTierRates.poor', tierInput.poor, base.locationTierRates.poor),
    belowAverage: pick('locationTierRates.belowAverage', tierInput.belowAverage, base.locationTierRates.belowAverage),
    average:      pick('locationTierRates.average', tierInput.average, base.locationTierRates.average),
    good:         pick('locationTierRates.good', tierInput.good, base.locationTierRates.good),
    premium:      pick('locationTierRates.premium', tierInput.premium, base.locationTierRates.premium),
  };

  const premiumInput = input.featurePremiums ?? {};
  const featurePremiums: FeaturePremiums = {
    highwayFrontage: pick('featurePremiums.highwayFrontage', premiumInput.highwayFrontage, base.featurePremiums.highwayFrontage),
    highVisibility:  pick('featurePremiums.highVisibility', premiumInput.highVisibility, base.featurePremiums.highVisibility),
    superiorAccess:  pick('featurePremiums.superiorAccess', premiumInput.superiorAccess, base.featurePremiums.superiorAccess),
  };

  const rates: Partial<Record<CharacteristicKey, number>> = {};
  for (const [key, value] of Object.entries(base.rates)) {
    if (!isCharacteristicKey(key)) {
      throw new ConfigurationError(`Industry defaults name an unknown characteristic "${key}"`);
    }
    rates[key] = value;
    factorSources[`rates.${key}`] = 'industry_default';
  }
  for (const [key, value] of Object.entries(input.rates ?? {})) {
    if (!isCharacteristicKey(key)) {
      throw new ConfigurationError(`Unknown rate key "${key}" in market_parameters.rates`);
    }
    rates[key] = value;
    factorSources[`rates.${key}`] = 'appraiser_input';
  }

  // No industry default exists for submarkets; only disclosed when supplied
  if (input.submarketDifferentials !== undefined) factorSources.submarketDifferentials = 'appraiser_input';

  return {
    params: {
      valuationDate: input.valuationDate,
      appreciationRateAnnual,
      capRate,
      rates,
      locationTierRates,
      featurePremiums,
      submarketDifferentials: input.submarketDifferentials ?? {},
    },
    factorSources,
  };
}
