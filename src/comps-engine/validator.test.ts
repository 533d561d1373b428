import { describe, expect, it } from 'vitest';

import { classifyAdjustments } from './validator';

describe('classifyAdjustments', () => {
  it('rejects at exactly 40% gross', () => {
    const outcome = classifyAdjustments(40.0, 0);
    expect(outcome.status).toBe('REJECT');
    expect(outcome.weight).toBe(0);
    expect(outcome.recommendation).toBe(
      'Gross adjustment 40.0% reaches the 40% limit; the sale is not truly comparable and carries no weight',
    );
  });

  it('cautions just under 40% gross', () => {
    expect(classifyAdjustments(39.99, 0)).toMatchObject({ status: 'CAUTION', weight: 0.5 });
    expect(classifyAdjustments(30.01, 2)).toMatchObject({ status: 'CAUTION', weight: 0.5 });
  });

  it('weights acceptable comparables by net adjustment', () => {
    expect(classifyAdjustments(24.99, 4.99)).toMatchObject({ status: 'ACCEPTABLE', weight: 2.0 });
    expect(classifyAdjustments(30.0, 5.0)).toMatchObject({ status: 'ACCEPTABLE', weight: 1.5 });
    expect(classifyAdjustments(20, -10)).toMatchObject({ status: 'ACCEPTABLE', weight: 1.5 });
    expect(classifyAdjustments(20, 10.01)).toMatchObject({ status: 'ACCEPTABLE', weight: 1.0 });
  });

  it('uses the magnitude of a negative net adjustment', () => {
    expect(classifyAdjustments(12, -4.5).weight).toBe(2.0);
    expect(classifyAdjustments(12, -7).weight).toBe(1.5);
  });

  it('reports guideline warnings without changing the weight', () => {
    const outcome = classifyAdjustments(26, 16);
    expect(outcome.weight).toBe(1.0);
    expect(outcome.warnings).toEqual([
      'Gross adjustment 26.0% exceeds the 25% guideline',
      'Net adjustment 16.0% exceeds ±15%',
    ]);
    expect(classifyAdjustments(24.99, 4.99).warnings).toEqual([]);
  });
});
