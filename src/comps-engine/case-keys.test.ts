import { describe, expect, it } from 'vitest';

import { toCamelKeys, toSnakeKeys } from './case-keys';

describe('toCamelKeys', () => {
  it('converts nested object and array keys', () => {
    const input = {
      subject_property: { location_score: 85, lot_size_acres: 5 },
      comparable_sales: [{ conditions_of_sale: { arms_length: true } }],
    };

    expect(toCamelKeys(input)).toEqual({
      subjectProperty: { locationScore: 85, lotSizeAcres: 5 },
      comparableSales: [{ conditionsOfSale: { armsLength: true } }],
    });
  });

  it('drops null values so they read as absent', () => {
    expect(toCamelKeys({ ground_rent_annual: null, address: 'A' })).toEqual({ address: 'A' });
  });
});

describe('toSnakeKeys', () => {
  it('converts camelCase keys and leaves values alone', () => {
    expect(toSnakeKeys({ finalAdjustedPrice: 1, factorSources: { 'rates.buildingSf': 'industry_default' } }))
      .toEqual({ final_adjusted_price: 1, factor_sources: { 'rates.building_sf': 'industry_default' } });
  });

  it('converts string values of the named identifier fields', () => {
    const records = [{ rateKey: 'locationTierRates', explanation: 'keepThis' }, { rateKey: 'capRate' }];
    expect(toSnakeKeys({ records }, new Set(['rateKey']))).toEqual({
      records: [{ rate_key: 'location_tier_rates', explanation: 'keepThis' }, { rate_key: 'cap_rate' }],
    });
  });
});
