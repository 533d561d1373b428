// ═══════════════════════════════════════════════════════════════════════
//  Stage 5: Location
//  Submarket differential, then the tiered location-score adjustment
//  integrated piecewise across tier boundaries, then flat premiums for
//  differing location features.
//  All percentages apply to the Stage 5 input price.
// ═══════════════════════════════════════════════════════════════════════

import { LOCATION_FEATURES, LOCATION_TIERS } from '../config';
import { ValuationMath } from '../formulas';
import type { RateBook } from '../rate-book';
import type { AdjustmentRecord, SubjectProperty } from '../types';
import { buildStageResult, num, signedMoney, type StageProcessor } from './stage';

export type LocationTier = (typeof LOCATION_TIERS)[number];

export function tierFor(score: number): LocationTier {
  const found = LOCATION_TIERS.find(t => score >= t.lower && score < t.upper);
  return found ?? LOCATION_TIERS[LOCATION_TIERS.length - 1];
}

/**
 * Signed percentage for moving from `from` to `to` on the location scale.
 * Each tier's rate covers only the part of the interval inside that tier.
 */
export function integrateTierPct(from: number, to: number, rates: RateBook): number {
  if (from === to) return 0;
  const lo = Math.min(from, to);
  const hi = Math.max(from, to);

  let pct = 0;
  for (const tier of LOCATION_TIERS) {
    const overlap = Math.min(hi, tier.upper) - Math.max(lo, tier.lower);
    if (overlap > 0) pct += overlap * rates.locationTierRate(tier.key);
  }
  return to > from ? pct : -pct;
}

function hasFeature(p: SubjectProperty, key: (typeof LOCATION_FEATURES)[number]['key']): boolean {
  return p[key] ?? false;
}

function submarketRecord(
  price: number,
  subject: SubjectProperty,
  comparable: SubjectProperty,
  rates: RateBook,
): AdjustmentRecord | null {
  const s = subject.locationSubmarket;
  const c = comparable.locationSubmarket;
  if (s === undefined || c === undefined || s === c) return null;

  const base = {
    stage: 5,
    category: 'location',
    characteristic: 'Submarket',
    rateKey: 'submarketDifferentials',
    subjectValue: s,
    comparableValue: c,
  } as const;

  const differential = rates.submarketDifferential(c);
  if (differential === undefined) {
    return {
      ...base,
      amount: 0,
      explanation: `Submarket: no differential configured for ${c} vs ${s}; adjustment skipped`,
      status: 'incomplete',
    };
  }

  // The differential is the comparable submarket's premium, so it comes off
  const pct = -differential;
  const amount = ValuationMath.pctOf(price, pct);
  return {
    ...base,
    amount,
    explanation: `Submarket ${c} vs ${s}: ${pct > 0 ? '+' : ''}${num(pct)}% = ${signedMoney(amount)}`,
    status: 'applied',
  };
}

export const adjustLocation: StageProcessor = (price, { subject, comparable, rates }) => {
  const records: AdjustmentRecord[] = [];

  const submarket = submarketRecord(price, subject, comparable, rates);
  if (submarket) records.push(submarket);

  // Positive when the subject sits higher on the scale than the comparable
  const tierPct = integrateTierPct(comparable.locationScore, subject.locationScore, rates);
  const tierAmount = ValuationMath.pctOf(price, tierPct);
  const subjectTier = tierFor(subject.locationScore);
  const compTier = tierFor(comparable.locationScore);

  records.push({
    stage: 5,
    category: 'location',
    characteristic: 'Location score',
    rateKey: 'locationTierRates',
    subjectValue: subject.locationScore,
    comparableValue: comparable.locationScore,
    amount: tierAmount,
    explanation: tierPct === 0
      ? `Equal location scores (${num(subject.locationScore)}); no adjustment`
      : `Score ${num(subject.locationScore)} (${subjectTier.label}) vs ${num(comparable.locationScore)} ` +
        `(${compTier.label}): ${tierPct > 0 ? '+' : ''}${num(tierPct, 3)}% = ${signedMoney(tierAmount)}`,
    status: 'applied',
  });

  for (const feature of LOCATION_FEATURES) {
    const s = hasFeature(subject, feature.key);
    const c = hasFeature(comparable, feature.key);
    if (s === c) continue;

    const premium = rates.featurePremium(feature.key);
    const pct = s ? premium : -premium;
    const amount = ValuationMath.pctOf(price, pct);
    records.push({
      stage: 5,
      category: 'location',
      characteristic: feature.label,
      rateKey: feature.key,
      subjectValue: s,
      comparableValue: c,
      amount,
      explanation: s
        ? `${feature.label}: subject has, comparable lacks: +${num(premium)}% = ${signedMoney(amount)}`
        : `${feature.label}: comparable has, subject lacks: -${num(premium)}% = ${signedMoney(amount)}`,
      status: 'applied',
    });
  }

  return buildStageResult(5, 'Location', records, price);
};
