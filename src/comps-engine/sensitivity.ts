// ═══════════════════════════════════════════════════════════════════════
//  Comparable Sales Engine: Sensitivity Analyzer
//  Reruns the full pipeline with one material rate scaled ±10%.
// ═══════════════════════════════════════════════════════════════════════

import { SENSITIVITY } from './config';
import type { RateBook } from './rate-book';
import type { ComparableResult, RateKey, SensitivityResult, SensitivityScenario } from './types';

export interface MaterialRate {
  rateKey: RateKey;
  characteristic: string;
  /** Largest-magnitude amount this rate key produced on any comparable. */
  baseAmount: number;
}

/** Distinct rate keys behind records whose |amount| exceeds the materiality share of their sale price. */
export function findMaterialRates(results: readonly ComparableResult[]): MaterialRate[] {
  const byKey = new Map<RateKey, MaterialRate>();

  for (const result of results) {
    const threshold = result.comparable.salePrice * SENSITIVITY.MATERIALITY_PCT / 100;
    for (const stage of result.stages) {
      for (const rec of stage.records) {
        if (Math.abs(rec.amount) <= threshold) continue;
        const seen = byKey.get(rec.rateKey);
        if (!seen || Math.abs(rec.amount) > Math.abs(seen.baseAmount)) {
          byKey.set(rec.rateKey, { rateKey: rec.rateKey, characteristic: rec.characteristic, baseAmount: rec.amount });
        }
      }
    }
  }

  return [...byKey.values()];
}

/** Reconciled value for a perturbed rate book, or null when nothing survives to reconcile. */
export type Rerun = (rates: RateBook) => number | null;

function scenario(factor: number, value: number | null, baseline: number): SensitivityScenario {
  return {
    factor,
    reconciledValue: value,
    changePct: value === null ? null : (value - baseline) / baseline * 100,
  };
}

export function analyzeSensitivity(
  results: readonly ComparableResult[],
  baseline: number,
  rates: RateBook,
  rerun: Rerun,
): SensitivityResult[] {
  return findMaterialRates(results).map(material => {
    const low = rerun(rates.withPerturbation({ rateKey: material.rateKey, factor: SENSITIVITY.LOW_FACTOR }));
    const high = rerun(rates.withPerturbation({ rateKey: material.rateKey, factor: SENSITIVITY.HIGH_FACTOR }));
    return {
      rateKey: material.rateKey,
      characteristic: material.characteristic,
      baseAmount: material.baseAmount,
      low: scenario(SENSITIVITY.LOW_FACTOR, low, baseline),
      high: scenario(SENSITIVITY.HIGH_FACTOR, high, baseline),
    };
  });
}
