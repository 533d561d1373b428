import { describe, expect, it } from 'vitest';

import { InsufficientDataError } from './errors';
import { reconcile } from './reconciler';
import { industrial, sale } from './test-support';
import type { ComparableResult, ValidationStatus } from './types';

function result(index: number, price: number, status: ValidationStatus, weight: number): ComparableResult {
  return {
    index,
    comparable: sale(industrial({ address: `Comp ${index}` })),
    stages: [],
    finalAdjustedPrice: price,
    grossAdjustment: 0,
    grossAdjustmentPct: 0,
    netAdjustment: 0,
    netAdjustmentPct: 0,
    validation: { status, weight, recommendation: '', warnings: [] },
    weightedValue: price * weight,
    incompleteCharacteristics: [],
  };
}

const results = [
  result(0, 100, 'ACCEPTABLE', 2.0),
  result(1, 110, 'ACCEPTABLE', 1.5),
  result(2, 130, 'CAUTION', 0.5),
  result(3, 500, 'REJECT', 0),
];

describe('reconcile', () => {
  it('takes the weighted mean of the included set', () => {
    const rec = reconcile(results);

    expect(rec.included.map(r => r.index)).toEqual([0, 1, 2]);
    expect(rec.totalWeight).toBe(4);
    // (200 + 165 + 65) / 4
    expect(rec.reconciledValue).toBe(107.5);
  });

  it('keeps rejected comparables out of the range and statistics', () => {
    const rec = reconcile(results);

    expect(rec.valueRange).toEqual({ low: 100, high: 130, spreadPct: 30 });
    expect(rec.statistics.count).toBe(3);
    expect(rec.statistics.max).toBe(130);
    expect(rec.statistics.median).toBe(110);
  });

  it('is deterministic for the same input', () => {
    expect(reconcile(results)).toEqual(reconcile(results));
    expect(reconcile(results).reconciledValue).toBe(reconcile([...results]).reconciledValue);
  });

  it('fails when every comparable is rejected', () => {
    expect(() => reconcile([result(0, 100, 'REJECT', 0)])).toThrow(InsufficientDataError);
  });
});
