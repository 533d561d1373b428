// ── Office Building (8) ─────────────────────────────────────────────

import { BUILDING_CLASS, BUILDING_CONDITION, TENANT_IMPROVEMENTS } from '../scales';
import type { OfficeCharacteristics } from '../input-schema';
import type { CategoryModule, RuleSpec } from './rules';

export const OFFICE_RULES: readonly RuleSpec<keyof OfficeCharacteristics>[] = [
  { field: 'rentableAreaSf', label: 'Rentable area', kind: 'continuous', basis: 'unit', unit: '/SF', higherIsBetter: true },
  { field: 'buildingClass', label: 'Building class', kind: 'ordinal', basis: 'price_pct', scale: BUILDING_CLASS },
  { field: 'parkingSpaces', label: 'Parking', kind: 'continuous', basis: 'unit', unit: '/space', higherIsBetter: true },
  { field: 'elevatorCount', label: 'Elevators', kind: 'continuous', basis: 'unit', unit: '/elevator', higherIsBetter: true },
  {
    field: 'ceilingHeightFeet',
    label: 'Ceiling height',
    kind: 'continuous',
    basis: 'building_sf',
    unit: '/ft/SF',
    higherIsBetter: true,
  },
  {
    field: 'tenantImprovements',
    label: 'Tenant improvements',
    kind: 'ordinal',
    basis: 'price_pct',
    scale: TENANT_IMPROVEMENTS,
  },
  { field: 'onSiteAmenities', label: 'On-site amenities', kind: 'boolean', basis: 'price_pct', beneficial: true },
  { field: 'condition', label: 'Building condition', kind: 'ordinal', basis: 'price_pct', scale: BUILDING_CONDITION },
];

export const OFFICE: CategoryModule = {
  category: 'office',
  rules: OFFICE_RULES,
  groupOf: p => (p.propertyType === 'office' ? p.office : undefined),
};
