// ═══════════════════════════════════════════════════════════════════════
//  Stage 1: Property Rights
//  Converts a leasehold comparable to a fee-simple-equivalent basis by
//  capitalizing ground rent at the cap rate (and the reverse for a
//  leasehold subject).
// ═══════════════════════════════════════════════════════════════════════

import { ValuationMath } from '../formulas';
import { ConfigurationError, ValidationError } from '../errors';
import type { AdjustmentRecord } from '../types';
import { buildStageResult, money, signedMoney, type StageProcessor } from './stage';

export const adjustPropertyRights: StageProcessor = (price, { subject, comparable, rates }) => {
  const base = {
    stage: 1,
    category: 'property_rights',
    characteristic: 'Property rights',
    rateKey: 'capRate',
    subjectValue: subject.propertyRights,
    comparableValue: comparable.propertyRights,
    status: 'applied',
  } as const;

  if (subject.propertyRights === comparable.propertyRights) {
    const record: AdjustmentRecord = {
      ...base,
      amount: 0,
      explanation: `Both ${subject.propertyRights}; no property rights adjustment`,
    };
    return buildStageResult(1, 'Property Rights', [record], price);
  }

  const capRate = rates.capRate();
  if (capRate <= 0) {
    throw new ConfigurationError(`cap_rate must be greater than 0 (got ${capRate})`);
  }

  let amount: number;
  let explanation: string;

  if (comparable.propertyRights === 'leasehold') {
    const rent = comparable.groundRentAnnual;
    if (rent === undefined) {
      throw new ValidationError(
        'Leasehold comparable requires ground_rent_annual to convert to fee simple',
        'groundRentAnnual',
      );
    }
    amount = ValuationMath.capitalize(rent, capRate);
    explanation =
      `Leasehold converted to fee simple: ${money(rent)}/yr ÷ ${capRate}% = ${signedMoney(amount)}`;
  } else {
    const rent = subject.groundRentAnnual;
    if (rent === undefined) {
      throw new ValidationError(
        'Leasehold subject requires ground_rent_annual to compare against fee simple sales',
        'groundRentAnnual',
      );
    }
    amount = -ValuationMath.capitalize(rent, capRate);
    explanation =
      `Fee simple comparable reduced to the subject's leasehold interest: ` +
      `${money(rent)}/yr ÷ ${capRate}% = ${signedMoney(amount)}`;
  }

  return buildStageResult(1, 'Property Rights', [{ ...base, amount, explanation }], price);
};
