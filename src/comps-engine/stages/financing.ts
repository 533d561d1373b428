// ═══════════════════════════════════════════════════════════════════════
//  Stage 2: Financing
//  Cash-equivalent normalization of below-market seller take-back loans.
// ═══════════════════════════════════════════════════════════════════════

import { ValuationMath } from '../formulas';
import { ValidationError } from '../errors';
import { buildStageResult, money, num, signedMoney, type StageProcessor } from './stage';

export const adjustFinancing: StageProcessor = (price, { comparable, rates }) => {
  const financing = comparable.financing;
  const base = {
    stage: 2,
    category: 'financing',
    characteristic: 'Financing terms',
    rateKey: 'financingMarketRate',
    subjectValue: 'cash_equivalent',
    comparableValue: financing.type,
    status: 'applied',
  } as const;

  if (financing.type !== 'seller_vtb') {
    const explanation = financing.type === 'cash'
      ? 'Cash sale; no financing adjustment'
      : 'Conventional financing at market terms; no financing adjustment';
    return buildStageResult(2, 'Financing', [{ ...base, amount: 0, explanation }], price);
  }

  const { rate, marketRate, termYears, loanAmount, loanToValuePct } = financing;
  const missing: string[] = [];
  if (rate === undefined) missing.push('rate');
  if (marketRate === undefined) missing.push('market_rate');
  if (termYears === undefined) missing.push('term_years');
  if (loanAmount === undefined && loanToValuePct === undefined) missing.push('loan_amount or loan_to_value_pct');
  if (missing.length > 0 || rate === undefined || marketRate === undefined || termYears === undefined) {
    throw new ValidationError(`Seller take-back financing is missing ${missing.join(', ')}`, 'financing');
  }

  // LTV sizing is against the price coming out of Stage 1
  let loan: number;
  if (loanAmount !== undefined) {
    loan = loanAmount;
  } else if (loanToValuePct !== undefined) {
    loan = ValuationMath.pctOf(price, loanToValuePct);
  } else {
    throw new ValidationError('Seller take-back financing is missing loan_amount or loan_to_value_pct', 'financing');
  }
  const market = rates.financingMarketRate(marketRate);

  if (rate >= market) {
    const explanation = `Contract rate ${num(rate)}% at or above market ${num(market)}%; no financing adjustment`;
    return buildStageResult(2, 'Financing', [{ ...base, amount: 0, explanation }], price);
  }

  const factor = ValuationMath.annuityFactor(market, termYears);
  const benefit = loan * ((market - rate) / 100) * factor;
  const amount = -benefit;
  const explanation =
    `Below-market VTB: ${money(loan)} × (${num(market)}% − ${num(rate)}%) × ` +
    `annuity factor ${num(factor, 4)} (${num(termYears)} yrs) = ${signedMoney(amount)}`;

  return buildStageResult(2, 'Financing', [{ ...base, amount, explanation }], price);
};
