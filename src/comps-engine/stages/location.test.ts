import { describe, expect, it } from 'vitest';

import { industrial, rateBook, sale } from '../test-support';
import { adjustLocation, integrateTierPct, tierFor } from './location';

describe('tierFor', () => {
  it('maps scores onto half-open tiers with premium closed at 100', () => {
    expect(tierFor(0).key).toBe('poor');
    expect(tierFor(29.9).key).toBe('poor');
    expect(tierFor(30).key).toBe('belowAverage');
    expect(tierFor(69.99).key).toBe('average');
    expect(tierFor(85).key).toBe('premium');
    expect(tierFor(100).key).toBe('premium');
  });
});

describe('integrateTierPct', () => {
  const rates = rateBook();

  it('charges each tier only for its share of the interval', () => {
    // 15 pts Good @1.0 + 5 pts Premium @1.5
    expect(integrateTierPct(70, 90, rates)).toBeCloseTo(22.5, 10);
    // 5 pts Poor @1.0 + 5 pts Below-Average @0.75
    expect(integrateTierPct(25, 35, rates)).toBeCloseTo(8.75, 10);
  });

  it('is signed by direction and continuous across the whole scale', () => {
    expect(integrateTierPct(90, 70, rates)).toBeCloseTo(-22.5, 10);
    expect(integrateTierPct(0, 100, rates)).toBeCloseTo(92.5, 10);
    expect(integrateTierPct(60, 60, rates)).toBe(0);
  });
});

describe('adjustLocation', () => {
  it('discounts a comparable in a better location', () => {
    const comparable = sale(industrial({ locationScore: 90 }));
    const result = adjustLocation(1_000_000, { subject: industrial({ locationScore: 85 }), comparable, rates: rateBook() });

    expect(result.records).toHaveLength(1);
    expect(result.records[0].amount).toBeCloseTo(-75_000, 6);
  });

  it('adds one record per differing location feature', () => {
    const subject = industrial({ locationScore: 70, highwayFrontage: true });
    const comparable = sale(industrial({ locationScore: 70, highVisibility: true }));
    const result = adjustLocation(1_000_000, { subject, comparable, rates: rateBook() });

    expect(result.records.map(r => [r.rateKey, r.amount])).toEqual([
      ['locationTierRates', 0],
      ['highwayFrontage', 120_000],
      ['highVisibility', -30_000],
    ]);
    expect(result.priceAfter).toBe(1_090_000);
  });

  it('takes the comparable submarket premium off first', () => {
    const subject = industrial({ locationScore: 70, locationSubmarket: 'North' });
    const comparable = sale(industrial({ locationScore: 70, locationSubmarket: 'Airport' }));
    const rates = rateBook({ submarketDifferentials: { Airport: 8 } });
    const result = adjustLocation(1_000_000, { subject, comparable, rates });

    expect(result.records.map(r => [r.rateKey, r.amount, r.status])).toEqual([
      ['submarketDifferentials', -80_000, 'applied'],
      ['locationTierRates', 0, 'applied'],
    ]);
    expect(result.records[0].explanation).toBe('Submarket Airport vs North: -8% = -$80,000');
    expect(result.priceAfter).toBe(920_000);
  });

  it('records an unpriced submarket difference as incomplete', () => {
    const subject = industrial({ locationSubmarket: 'North' });
    const comparable = sale(industrial({ locationSubmarket: 'Harbour' }));
    const [record] = adjustLocation(1_000_000, { subject, comparable, rates: rateBook() }).records;

    expect(record.status).toBe('incomplete');
    expect(record.amount).toBe(0);
    expect(record.explanation).toBe('Submarket: no differential configured for Harbour vs North; adjustment skipped');
  });

  it('skips the submarket step when either side has none or they match', () => {
    const rates = rateBook({ submarketDifferentials: { North: 5 } });
    const same = adjustLocation(1_000_000, {
      subject: industrial({ locationSubmarket: 'North' }),
      comparable: sale(industrial({ locationSubmarket: 'North' })),
      rates,
    });
    const missing = adjustLocation(1_000_000, {
      subject: industrial(),
      comparable: sale(industrial({ locationSubmarket: 'North' })),
      rates,
    });

    expect(same.records.map(r => r.rateKey)).toEqual(['locationTierRates']);
    expect(missing.records.map(r => r.rateKey)).toEqual(['locationTierRates']);
  });

  it('scales the submarket differential under perturbation', () => {
    const rates = rateBook({ submarketDifferentials: { Airport: 8 } })
      .withPerturbation({ rateKey: 'submarketDifferentials', factor: 1.1 });
    expect(rates.submarketDifferential('Airport')).toBeCloseTo(8.8, 10);
    expect(rates.submarketDifferential('Harbour')).toBeUndefined();
  });

  it('scales all tier rates together under a locationTierRates perturbation', () => {
    const rates = rateBook().withPerturbation({ rateKey: 'locationTierRates', factor: 1.1 });
    expect(integrateTierPct(70, 90, rates)).toBeCloseTo(24.75, 10);
  });
});
