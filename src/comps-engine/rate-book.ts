// ── Rate Book ───────────────────────────────────────────────────────
//
// Every stage reads its rates through a RateBook so that a sensitivity
// run can scale exactly one rate key and leave the rest untouched.

import { ConfigurationError } from './errors';
import type {
  CharacteristicKey,
  FeaturePremiums,
  LocationTierRates,
  MarketParameters,
  RateKey,
} from './types';

export interface RatePerturbation {
  rateKey: RateKey;
  factor: number;
}

export class RateBook {
  constructor(
    readonly market: MarketParameters,
    readonly perturbation: RatePerturbation | null = null,
  ) {}

  withPerturbation(perturbation: RatePerturbation): RateBook {
    return new RateBook(this.market, perturbation);
  }

  private scale(key: RateKey, value: number): number {
    return this.perturbation?.rateKey === key ? value * this.perturbation.factor : value;
  }

  get valuationDate(): string {
    return this.market.valuationDate;
  }

  capRate(): number {
    return this.scale('capRate', this.market.capRate);
  }

  appreciationRateAnnual(): number {
    return this.scale('appreciationRateAnnual', this.market.appreciationRateAnnual);
  }

  /** Market rate quoted on the comparable's own financing terms. */
  financingMarketRate(quoted: number): number {
    return this.scale('financingMarketRate', quoted);
  }

  motivationDiscountPct(quoted: number): number {
    return this.scale('motivationDiscountPct', quoted);
  }

  locationTierRate(tier: keyof LocationTierRates): number {
    return this.scale('locationTierRates', this.market.locationTierRates[tier]);
  }

  /** Premium of `submarket` over the subject's submarket; undefined when none is configured. */
  submarketDifferential(submarket: string): number | undefined {
    const pct = this.market.submarketDifferentials[submarket];
    return pct === undefined ? undefined : this.scale('submarketDifferentials', pct);
  }

  featurePremium(feature: keyof FeaturePremiums): number {
    return this.scale(feature, this.market.featurePremiums[feature]);
  }

  physical(key: CharacteristicKey): number {
    const rate = this.market.rates[key];
    if (rate === undefined) {
      throw new ConfigurationError(`No adjustment rate configured for "${key}"`);
    }
    return this.scale(key, rate);
  }
}
