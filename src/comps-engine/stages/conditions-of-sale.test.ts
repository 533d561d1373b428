import { describe, expect, it } from 'vitest';

import { industrial, rateBook, sale } from '../test-support';
import { adjustConditionsOfSale } from './conditions-of-sale';

describe('adjustConditionsOfSale', () => {
  it('adds back a motivation discount on a non-arm\'s-length sale', () => {
    const comparable = sale(industrial(), { conditionsOfSale: { armsLength: false, motivationDiscountPct: 4 } });
    const result = adjustConditionsOfSale(1_000_000, { subject: industrial(), comparable, rates: rateBook() });

    expect(result.records[0].amount).toBe(40_000);
    expect(result.priceAfter).toBe(1_040_000);
  });

  it('applies the discount to the incoming running price', () => {
    const comparable = sale(industrial(), { conditionsOfSale: { armsLength: false, motivationDiscountPct: 10 } });
    const result = adjustConditionsOfSale(1_500_000, { subject: industrial(), comparable, rates: rateBook() });
    expect(result.records[0].amount).toBe(150_000);
  });

  it('flags a non-arm\'s-length sale with no quantified discount without adjusting', () => {
    const comparable = sale(industrial(), { conditionsOfSale: { armsLength: false } });
    const result = adjustConditionsOfSale(1_000_000, { subject: industrial(), comparable, rates: rateBook() });

    expect(result.records[0].amount).toBe(0);
    expect(result.records[0].comparableValue).toBe('non_arms_length');
    expect(result.records[0].explanation).toBe(
      "Flagged non-arm's-length with no quantified motivation discount; no adjustment applied",
    );
  });

  it('leaves an arm\'s-length sale unadjusted', () => {
    const result = adjustConditionsOfSale(1_000_000, { subject: industrial(), comparable: sale(industrial()), rates: rateBook() });
    expect(result.records[0].amount).toBe(0);
  });
});
