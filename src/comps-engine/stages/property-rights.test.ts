import { describe, expect, it } from 'vitest';

import { ConfigurationError, ValidationError } from '../errors';
import { industrial, rateBook, sale } from '../test-support';
import { adjustPropertyRights } from './property-rights';

describe('adjustPropertyRights', () => {
  it('records a zero adjustment when rights match', () => {
    const subject = industrial();
    const result = adjustPropertyRights(1_000_000, { subject, comparable: sale(industrial()), rates: rateBook() });

    expect(result.stage).toBe(1);
    expect(result.records).toHaveLength(1);
    expect(result.records[0].amount).toBe(0);
    expect(result.priceAfter).toBe(1_000_000);
  });

  it('capitalizes a leasehold comparable ground rent at the cap rate', () => {
    const comparable = sale(industrial({ propertyRights: 'leasehold', groundRentAnnual: 35_000 }));
    const result = adjustPropertyRights(1_000_000, { subject: industrial(), comparable, rates: rateBook() });

    expect(result.records[0].amount).toBeCloseTo(500_000, 4);
    expect(result.records[0].rateKey).toBe('capRate');
    expect(result.priceAfter).toBeCloseTo(1_500_000, 4);
  });

  it('deducts the subject ground rent when only the subject is leasehold', () => {
    const subject = industrial({ propertyRights: 'leasehold', groundRentAnnual: 14_000 });
    const result = adjustPropertyRights(1_000_000, { subject, comparable: sale(industrial()), rates: rateBook() });

    expect(result.records[0].amount).toBeCloseTo(-200_000, 4);
  });

  it('rejects a leasehold comparable without ground rent', () => {
    const comparable = sale(industrial({ propertyRights: 'leasehold' }));
    expect(() => adjustPropertyRights(1_000_000, { subject: industrial(), comparable, rates: rateBook() }))
      .toThrow(ValidationError);
  });

  it('refuses a zero cap rate', () => {
    const comparable = sale(industrial({ propertyRights: 'leasehold', groundRentAnnual: 35_000 }));
    expect(() => adjustPropertyRights(1_000_000, { subject: industrial(), comparable, rates: rateBook({ capRate: 0 }) }))
      .toThrow(ConfigurationError);
  });
});
