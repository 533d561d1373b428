import { describe, expect, it } from 'vitest';

import { ConfigurationError } from './errors';
import { rateBook } from './test-support';

describe('RateBook', () => {
  it('scales only the perturbed key', () => {
    const book = rateBook().withPerturbation({ rateKey: 'buildingSf', factor: 1.1 });

    expect(book.physical('buildingSf')).toBeCloseTo(2.2, 10);
    expect(book.physical('loadingDocks')).toBe(35_000);
    expect(book.capRate()).toBe(7);
  });

  it('scales every location tier together', () => {
    const book = rateBook().withPerturbation({ rateKey: 'locationTierRates', factor: 0.9 });
    expect(book.locationTierRate('premium')).toBeCloseTo(1.35, 10);
    expect(book.locationTierRate('average')).toBeCloseTo(0.45, 10);
  });

  it('scales quoted comparable-level rates', () => {
    const book = rateBook().withPerturbation({ rateKey: 'financingMarketRate', factor: 1.1 });
    expect(book.financingMarketRate(6)).toBeCloseTo(6.6, 10);
    expect(book.motivationDiscountPct(10)).toBe(10);
  });

  it('throws when a characteristic has no rate', () => {
    expect(() => rateBook().physical('truckScales')).toThrow(ConfigurationError);
  });
});
