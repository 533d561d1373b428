import { describe, expect, it } from 'vitest';

import { ValuationMath } from './formulas';

describe('ValuationMath', () => {
  it('compounds annual appreciation over fractional years', () => {
    const adjusted = ValuationMath.compoundGrowth(1_000_000, 3.5, 1.5);

    expect(Math.abs(adjusted - 1_052_956.73)).toBeLessThan(1);
    // simple interest would give 1,052,500
    expect(Math.abs(adjusted - 1_052_500)).toBeGreaterThan(400);
  });

  it('measures sale-to-valuation time in days / 365.25', () => {
    expect(ValuationMath.daysBetween('2024-03-15', '2025-01-15')).toBe(306);
    expect(ValuationMath.yearsBetween('2024-03-15', '2025-01-15')).toBeCloseTo(306 / 365.25, 12);
    expect(ValuationMath.daysBetween('2023-07-15', '2025-01-15')).toBe(550);
  });

  it('grows an 18-month-old sale by the compounded factor', () => {
    const years = ValuationMath.yearsBetween('2023-07-15', '2025-01-15');
    expect(ValuationMath.compoundGrowth(1_000_000, 3.5, years)).toBeCloseTo(1_053_167.5, 0);
  });

  it('computes the annual annuity factor', () => {
    expect(ValuationMath.annuityFactor(10, 2)).toBeCloseTo(1.7355371900826, 10);
    expect(ValuationMath.annuityFactor(0, 5)).toBe(5);
  });

  it('capitalizes income at a percentage cap rate', () => {
    expect(ValuationMath.capitalize(35_000, 7)).toBeCloseTo(500_000, 6);
  });
});
