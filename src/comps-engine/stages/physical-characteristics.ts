// ═══════════════════════════════════════════════════════════════════════
//  Stage 6: Physical Characteristics
//  Land, Site, Building, Special Features and Zoning always run;
//  Industrial or Office runs by property type.
// ═══════════════════════════════════════════════════════════════════════

import { LAND } from '../categories/land';
import { SITE } from '../categories/site';
import { BUILDING_GENERAL } from '../categories/building-general';
import { INDUSTRIAL } from '../categories/industrial';
import { OFFICE } from '../categories/office';
import { SPECIAL_FEATURES } from '../categories/special-features';
import { ZONING_LEGAL } from '../categories/zoning-legal';
import { evaluateCategory, type CategoryModule } from '../categories/rules';
import type { PropertyType, SubjectProperty } from '../types';
import { buildStageResult, type StageProcessor } from './stage';

export function categoriesFor(propertyType: PropertyType): readonly CategoryModule[] {
  switch (propertyType) {
    case 'industrial':
      return [LAND, SITE, BUILDING_GENERAL, INDUSTRIAL, SPECIAL_FEATURES, ZONING_LEGAL];
    case 'office':
      return [LAND, SITE, BUILDING_GENERAL, OFFICE, SPECIAL_FEATURES, ZONING_LEGAL];
    case 'retail':
      return [LAND, SITE, BUILDING_GENERAL, SPECIAL_FEATURES, ZONING_LEGAL];
  }
}

export function buildingAreaOf(property: SubjectProperty): number | undefined {
  switch (property.propertyType) {
    case 'industrial':
      return property.industrial.buildingSf;
    case 'office':
      return property.office.rentableAreaSf;
    case 'retail':
      return undefined;
  }
}

export const adjustPhysicalCharacteristics: StageProcessor = (price, { subject, comparable, rates }) => {
  const ctx = { price, buildingSf: buildingAreaOf(comparable), rates };
  const records = categoriesFor(subject.propertyType)
    .flatMap(categoryModule => evaluateCategory(categoryModule, subject, comparable, ctx));
  return buildStageResult(6, 'Physical Characteristics', records, price);
};
