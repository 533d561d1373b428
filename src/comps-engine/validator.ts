// ═══════════════════════════════════════════════════════════════════════
//  Comparable Sales Engine: Validator
//  Gross/net adjustment percentages → status and reconciliation weight.
// ═══════════════════════════════════════════════════════════════════════

import { VALIDATION, WEIGHTS } from './config';
import type { ValidationOutcome } from './types';

const p1 = (n: number) => n.toFixed(1);

export function classifyAdjustments(grossPct: number, netPct: number): ValidationOutcome {
  const warnings: string[] = [];
  if (grossPct > VALIDATION.GROSS_WARNING_PCT) {
    warnings.push(`Gross adjustment ${p1(grossPct)}% exceeds the ${VALIDATION.GROSS_WARNING_PCT}% guideline`);
  }
  if (Math.abs(netPct) > VALIDATION.NET_WARNING_PCT) {
    warnings.push(`Net adjustment ${p1(netPct)}% exceeds ±${VALIDATION.NET_WARNING_PCT}%`);
  }

  if (grossPct >= VALIDATION.REJECT_GROSS_PCT) {
    return {
      status: 'REJECT',
      weight: WEIGHTS.REJECT,
      recommendation:
        `Gross adjustment ${p1(grossPct)}% reaches the ${VALIDATION.REJECT_GROSS_PCT}% limit; ` +
        `the sale is not truly comparable and carries no weight`,
      warnings,
    };
  }

  if (grossPct > VALIDATION.CAUTION_GROSS_PCT) {
    return {
      status: 'CAUTION',
      weight: WEIGHTS.CAUTION,
      recommendation:
        `Gross adjustment ${p1(grossPct)}% is in the caution range ` +
        `(${VALIDATION.CAUTION_GROSS_PCT}-${VALIDATION.REJECT_GROSS_PCT}%); weighted at half`,
      warnings,
    };
  }

  const absNet = Math.abs(netPct);
  if (absNet < VALIDATION.NET_TIGHT_PCT) {
    return {
      status: 'ACCEPTABLE',
      weight: WEIGHTS.TIGHT,
      recommendation: `Net adjustment ${p1(netPct)}% is within ±${VALIDATION.NET_TIGHT_PCT}%; strongest support`,
      warnings,
    };
  }
  if (absNet <= VALIDATION.NET_MODERATE_PCT) {
    return {
      status: 'ACCEPTABLE',
      weight: WEIGHTS.MODERATE,
      recommendation: `Net adjustment ${p1(netPct)}% is within ±${VALIDATION.NET_MODERATE_PCT}%; good support`,
      warnings,
    };
  }
  return {
    status: 'ACCEPTABLE',
    weight: WEIGHTS.WIDE,
    recommendation: `Net adjustment ${p1(netPct)}% exceeds ±${VALIDATION.NET_MODERATE_PCT}%; weighted normally`,
    warnings,
  };
}
