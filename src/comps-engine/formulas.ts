// ═══════════════════════════════════════════════════════════════════════
//  Comparable Sales Engine: Core Formulas
// ═══════════════════════════════════════════════════════════════════════

import { DAYS_PER_YEAR, MS_PER_DAY } from './config';

export const ValuationMath = {
  /** Capital value of an annual income stream at `capRatePct`. */
  capitalize(annualIncome: number, capRatePct: number): number {
    return annualIncome / (capRatePct / 100);
  },

  /** PV of 1 per year for `years` annual periods at `ratePct`. */
  annuityFactor(ratePct: number, years: number): number {
    const r = ratePct / 100;
    if (r === 0) return years;
    return (1 - Math.pow(1 + r, -years)) / r;
  },

  /** Compound growth only; a simple-interest shortcut is wrong here. */
  compoundGrowth(price: number, annualRatePct: number, years: number): number {
    return price * Math.pow(1 + annualRatePct / 100, years);
  },

  parseIsoDate(date: string): number {
    return Date.parse(`${date}T00:00:00Z`);
  },

  daysBetween(from: string, to: string): number {
    const ms = ValuationMath.parseIsoDate(to) - ValuationMath.parseIsoDate(from);
    return Math.round(ms / MS_PER_DAY);
  },

  yearsBetween(from: string, to: string): number {
    return ValuationMath.daysBetween(from, to) / DAYS_PER_YEAR;
  },

  pctOf(price: number, pct: number): number {
    return price * pct / 100;
  },

  round2(n: number): number {
    return Math.round(n * 100) / 100;
  },
};
