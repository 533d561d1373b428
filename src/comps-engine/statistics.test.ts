import { describe, expect, it } from 'vitest';

import { quantile, stdev, summarize } from './statistics';

describe('quantile', () => {
  it('interpolates linearly between order statistics', () => {
    const sorted = [1, 2, 3, 4];
    expect(quantile(sorted, 0.25)).toBe(1.75);
    expect(quantile(sorted, 0.5)).toBe(2.5);
    expect(quantile(sorted, 0.75)).toBe(3.25);
    expect(quantile([10, 20, 30], 0.5)).toBe(20);
  });
});

describe('descriptive statistics', () => {
  it('summarizes an unsorted sample', () => {
    const stats = summarize([4, 1, 3, 2]);

    expect(stats.count).toBe(4);
    expect(stats.mean).toBe(2.5);
    expect(stats.median).toBe(2.5);
    expect(stats.min).toBe(1);
    expect(stats.max).toBe(4);
    expect(stats.range).toBe(3);
    expect(stats.q1).toBe(1.75);
    expect(stats.q3).toBe(3.25);
    expect(stats.stdev).toBeCloseTo(1.118033988749895, 12);
    expect(stats.coefficientOfVariation).toBeCloseTo(44.72135954999579, 10);
  });

  it('uses the population standard deviation', () => {
    expect(stdev([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
  });

  it('handles a single value', () => {
    expect(summarize([5])).toMatchObject({ count: 1, stdev: 0, q1: 5, q3: 5, median: 5, range: 0 });
  });
});
