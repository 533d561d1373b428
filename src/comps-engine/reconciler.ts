// ═══════════════════════════════════════════════════════════════════════
//  Comparable Sales Engine: Reconciler
//  Weighted mean of the included set (weight > 0). Range and statistics
//  are over the included set only.
// ═══════════════════════════════════════════════════════════════════════

import { InsufficientDataError } from './errors';
import { summarize } from './statistics';
import type { ComparableResult, ReconciliationResult } from './types';

export function reconcile(results: readonly ComparableResult[]): ReconciliationResult {
  const included = results.filter(r => r.validation.weight > 0);
  if (included.length === 0) {
    throw new InsufficientDataError(results.length);
  }

  const totalWeight = included.reduce((sum, r) => sum + r.validation.weight, 0);
  const weightedSum = included.reduce((sum, r) => sum + r.weightedValue, 0);
  const prices = included.map(r => r.finalAdjustedPrice);
  const statistics = summarize(prices);

  return {
    included,
    reconciledValue: weightedSum / totalWeight,
    valueRange: {
      low: statistics.min,
      high: statistics.max,
      spreadPct: (statistics.max - statistics.min) / statistics.min * 100,
    },
    totalWeight,
    statistics,
  };
}
