// ═══════════════════════════════════════════════════════════════════════
//  Stage 3: Conditions of Sale
//  A motivation discount depressed the observed price, so the add-back
//  is always positive.
// ═══════════════════════════════════════════════════════════════════════

import { ValuationMath } from '../formulas';
import { buildStageResult, num, signedMoney, type StageProcessor } from './stage';

export const adjustConditionsOfSale: StageProcessor = (price, { comparable, rates }) => {
  const { armsLength, motivationDiscountPct } = comparable.conditionsOfSale;
  const base = {
    stage: 3,
    category: 'conditions_of_sale',
    characteristic: 'Conditions of sale',
    rateKey: 'motivationDiscountPct',
    subjectValue: 'arms_length',
    comparableValue: armsLength ? 'arms_length' : 'non_arms_length',
    status: 'applied',
  } as const;

  if (armsLength) {
    return buildStageResult(3, 'Conditions of Sale',
      [{ ...base, amount: 0, explanation: "Arm's-length transaction; no adjustment" }], price);
  }

  if (motivationDiscountPct === undefined) {
    return buildStageResult(3, 'Conditions of Sale', [{
      ...base,
      amount: 0,
      explanation: "Flagged non-arm's-length with no quantified motivation discount; no adjustment applied",
    }], price);
  }

  const pct = rates.motivationDiscountPct(motivationDiscountPct);
  const amount = ValuationMath.pctOf(price, pct);
  return buildStageResult(3, 'Conditions of Sale', [{
    ...base,
    amount,
    explanation: `Non-arm's-length motivation discount added back: ${num(pct)}% of price = ${signedMoney(amount)}`,
  }], price);
};
