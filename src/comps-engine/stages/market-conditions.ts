// ═══════════════════════════════════════════════════════════════════════
//  Stage 4: Market Conditions / Time
//  Compound appreciation from sale date to valuation date.
// ═══════════════════════════════════════════════════════════════════════

import { ValuationMath } from '../formulas';
import { ValidationError } from '../errors';
import { buildStageResult, num, signedMoney, type StageProcessor } from './stage';

export const adjustMarketConditions: StageProcessor = (price, { comparable, rates }) => {
  const days = ValuationMath.daysBetween(comparable.saleDate, rates.valuationDate);
  if (days < 0) {
    throw new ValidationError(
      `Sale date ${comparable.saleDate} is after the valuation date ${rates.valuationDate}`,
      'saleDate',
    );
  }

  const rate = rates.appreciationRateAnnual();
  const years = ValuationMath.yearsBetween(comparable.saleDate, rates.valuationDate);
  const adjusted = ValuationMath.compoundGrowth(price, rate, years);
  const amount = adjusted - price;

  return buildStageResult(4, 'Market Conditions', [{
    stage: 4,
    category: 'market_conditions',
    characteristic: 'Market conditions (time)',
    rateKey: 'appreciationRateAnnual',
    subjectValue: rates.valuationDate,
    comparableValue: comparable.saleDate,
    amount,
    explanation:
      `${days} days (${num(years, 3)} yrs) at ${num(rate)}%/yr compounded: ` +
      `×${num(adjusted / price, 4)} = ${signedMoney(amount)}`,
    status: 'applied',
  }], price);
};
