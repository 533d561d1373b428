import { describe, expect, it } from 'vitest';

import { ValidationError } from './errors';
import { evaluateComparable } from './evaluator';
import { industrial, office, rateBook, sale } from './test-support';

describe('evaluateComparable', () => {
  it('runs all six stages and carries the price forward', () => {
    const comparable = sale(industrial({ locationScore: 90 }), { saleDate: '2025-01-15' });
    const result = evaluateComparable(industrial(), comparable, 0, rateBook());

    expect(result.stages.map(s => s.priceBefore)).toEqual([
      1_000_000, 1_000_000, 1_000_000, 1_000_000, 1_000_000, 925_000,
    ]);
    expect(result.finalAdjustedPrice).toBe(925_000);
    expect(result.netAdjustmentPct).toBeCloseTo(-7.5, 10);
  });

  it('refuses to classify a comparable whose adjustments are not finite', () => {
    // (1 - 1.5)^years has no real value for a fractional year count
    const rates = rateBook({ appreciationRateAnnual: -150 });
    const comparable = sale(industrial(), { saleDate: '2024-01-15' });

    expect(() => evaluateComparable(industrial(), comparable, 0, rates)).toThrow(ValidationError);
    expect(() => evaluateComparable(industrial(), comparable, 0, rates)).toThrow('non-finite result');
  });

  it('rejects a comparable of another property type', () => {
    expect(() => evaluateComparable(industrial(), sale(office()), 0, rateBook())).toThrow(
      'Comparable is office but the subject is industrial',
    );
  });
});
