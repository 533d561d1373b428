// ═══════════════════════════════════════════════════════════════════════
//  Comparable Sales Engine: Comparable Evaluator
//  Runs the six stages in order, each on the previous stage's price.
// ═══════════════════════════════════════════════════════════════════════

import { ValidationError } from './errors';
import type { RateBook } from './rate-book';
import { adjustPropertyRights } from './stages/property-rights';
import { adjustFinancing } from './stages/financing';
import { adjustConditionsOfSale } from './stages/conditions-of-sale';
import { adjustMarketConditions } from './stages/market-conditions';
import { adjustLocation } from './stages/location';
import { adjustPhysicalCharacteristics } from './stages/physical-characteristics';
import type { StageContext, StageProcessor } from './stages/stage';
import { classifyAdjustments } from './validator';
import type { ComparableResult, ComparableSale, StageResult, SubjectProperty } from './types';

export const STAGE_PIPELINE: readonly StageProcessor[] = [
  adjustPropertyRights,
  adjustFinancing,
  adjustConditionsOfSale,
  adjustMarketConditions,
  adjustLocation,
  adjustPhysicalCharacteristics,
];

export function evaluateComparable(
  subject: SubjectProperty,
  comparable: ComparableSale,
  index: number,
  rates: RateBook,
): ComparableResult {
  if (comparable.propertyType !== subject.propertyType) {
    throw new ValidationError(
      `Comparable is ${comparable.propertyType} but the subject is ${subject.propertyType}`,
      'propertyType',
    );
  }

  const ctx: StageContext = { subject, comparable, rates };
  const stages: StageResult[] = [];
  let price = comparable.salePrice;
  for (const stage of STAGE_PIPELINE) {
    const result = stage(price, ctx);
    stages.push(result);
    price = result.priceAfter;
  }

  const records = stages.flatMap(s => s.records);
  const grossAdjustment = records.reduce((sum, r) => sum + Math.abs(r.amount), 0);
  const netAdjustment = records.reduce((sum, r) => sum + r.amount, 0);
  const grossAdjustmentPct = grossAdjustment / comparable.salePrice * 100;
  const netAdjustmentPct = netAdjustment / comparable.salePrice * 100;
  if (!Number.isFinite(price) || !Number.isFinite(grossAdjustmentPct) || !Number.isFinite(netAdjustmentPct)) {
    throw new ValidationError(
      `Adjustments produced a non-finite result (final ${price}, gross ${grossAdjustmentPct}%, net ${netAdjustmentPct}%)`,
      null,
    );
  }
  const validation = classifyAdjustments(grossAdjustmentPct, netAdjustmentPct);

  return {
    index,
    comparable,
    stages,
    finalAdjustedPrice: price,
    grossAdjustment,
    grossAdjustmentPct,
    netAdjustment,
    netAdjustmentPct,
    validation,
    weightedValue: price * validation.weight,
    incompleteCharacteristics: records.filter(r => r.status === 'incomplete').map(r => r.characteristic),
  };
}
