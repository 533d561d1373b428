// ── Shared Stage Plumbing ───────────────────────────────────────────

import type { RateBook } from '../rate-book';
import type {
  AdjustmentRecord,
  ComparableSale,
  StageNumber,
  StageResult,
  SubjectProperty,
} from '../types';

export interface StageContext {
  subject: SubjectProperty;
  comparable: ComparableSale;
  rates: RateBook;
}

/** A stage takes the running price and returns its records plus the next price. */
export type StageProcessor = (price: number, ctx: StageContext) => StageResult;

export function buildStageResult(
  stage: StageNumber,
  name: string,
  records: readonly AdjustmentRecord[],
  priceBefore: number,
): StageResult {
  const total = records.reduce((sum, r) => sum + r.amount, 0);
  return { stage, name, records, priceBefore, priceAfter: priceBefore + total };
}

// ── Formatting for explanations ─────────────────────────────────────

export const money = (n: number) =>
  (n < 0 ? '-$' : '$') + Math.abs(n).toLocaleString('en-US', { maximumFractionDigits: 0 });

export const signedMoney = (n: number) => (n > 0 ? '+' : '') + money(n);

export const num = (n: number, digits = 2) =>
  n.toLocaleString('en-US', { maximumFractionDigits: digits });
