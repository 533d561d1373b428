// ── Descriptive Statistics ──────────────────────────────────────────

import type { DescriptiveStatistics } from './types';

/** Quantile by linear interpolation between order statistics. */
export function quantile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) throw new Error('quantile of an empty sample');
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) throw new Error('mean of an empty sample');
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Population standard deviation. */
export function stdev(values: readonly number[]): number {
  const m = mean(values);
  return Math.sqrt(values.reduce((sum, v) => sum + (v - m) ** 2, 0) / values.length);
}

export function summarize(values: readonly number[]): DescriptiveStatistics {
  const sorted = [...values].sort((a, b) => a - b);
  const m = mean(sorted);
  const sd = stdev(sorted);
  const min = sorted[0];
  const max = sorted[sorted.length - 1];
  return {
    count: sorted.length,
    mean: m,
    median: quantile(sorted, 0.5),
    stdev: sd,
    min,
    max,
    q1: quantile(sorted, 0.25),
    q3: quantile(sorted, 0.75),
    range: max - min,
    coefficientOfVariation: m === 0 ? 0 : sd / m * 100,
  };
}
