import { describe, expect, it } from 'vitest';

import { industrial, office, rateBook, retail, sale } from '../test-support';
import { adjustPhysicalCharacteristics, buildingAreaOf, categoriesFor } from './physical-characteristics';

describe('categoriesFor', () => {
  it('adds the industrial or office table by property type', () => {
    expect(categoriesFor('industrial').map(c => c.category)).toEqual([
      'land', 'site', 'building_general', 'industrial', 'special_features', 'zoning_legal',
    ]);
    expect(categoriesFor('office').map(c => c.category)).toEqual([
      'land', 'site', 'building_general', 'office', 'special_features', 'zoning_legal',
    ]);
    expect(categoriesFor('retail').map(c => c.category)).toEqual([
      'land', 'site', 'building_general', 'special_features', 'zoning_legal',
    ]);
  });

  it('covers 49 distinct rules across the seven tables', () => {
    const count = (t: 'industrial' | 'office' | 'retail') =>
      categoriesFor(t).reduce((n, c) => n + c.rules.length, 0);
    expect(count('industrial')).toBe(41);
    expect(count('office')).toBe(39);
    expect(count('retail')).toBe(31);
    expect(count('industrial') + count('office') - count('retail')).toBe(49);
  });
});

describe('buildingAreaOf', () => {
  it('reads building SF for industrial and rentable area for office', () => {
    expect(buildingAreaOf(industrial({ industrial: { buildingSf: 48_000 } }))).toBe(48_000);
    expect(buildingAreaOf(office({ office: { rentableAreaSf: 20_000 } }))).toBe(20_000);
    expect(buildingAreaOf(retail())).toBeUndefined();
  });
});

describe('adjustPhysicalCharacteristics', () => {
  it('applies differing characteristics and flags everything missing', () => {
    const subject = industrial({ industrial: { buildingSf: 50_000, loadingDocks: 10 } });
    const comparable = sale(industrial({ industrial: { buildingSf: 48_000, loadingDocks: 13 } }));
    const result = adjustPhysicalCharacteristics(1_000_000, { subject, comparable, rates: rateBook() });

    const applied = result.records.filter(r => r.status === 'applied');
    expect(applied.map(r => [r.rateKey, r.amount])).toEqual([
      ['buildingSf', 4_000],
      ['loadingDocks', -105_000],
    ]);
    expect(result.records.filter(r => r.status === 'incomplete')).toHaveLength(39);
    expect(result.priceAfter).toBe(899_000);
  });

  it('never runs office rules for an industrial subject', () => {
    const subject = industrial();
    const result = adjustPhysicalCharacteristics(1_000_000, { subject, comparable: sale(industrial()), rates: rateBook() });
    expect(result.records.some(r => r.category === 'office')).toBe(false);
    expect(result.records.filter(r => r.category === 'industrial')).toHaveLength(10);
  });

  it('uses the office table for office properties', () => {
    const subject = office({ office: { buildingClass: 'class_a', onSiteAmenities: true } });
    const comparable = sale(office({ office: { buildingClass: 'class_b', onSiteAmenities: true } }));
    const rates = rateBook({ rates: { buildingClass: 8, onSiteAmenities: 2 } });
    const result = adjustPhysicalCharacteristics(2_000_000, { subject, comparable, rates });

    const applied = result.records.filter(r => r.status === 'applied');
    expect(applied).toHaveLength(1);
    expect(applied[0].category).toBe('office');
    expect(applied[0].amount).toBe(160_000);
  });
});
