// ── Special Features (6) ────────────────────────────────────────────

import { CRANE_SYSTEM, SPECIALIZED_HVAC } from '../scales';
import type { SpecialFeatureCharacteristics } from '../input-schema';
import type { CategoryModule, RuleSpec } from './rules';

export const SPECIAL_FEATURE_RULES: readonly RuleSpec<keyof SpecialFeatureCharacteristics>[] = [
  { field: 'railSpur', label: 'Rail spur', kind: 'boolean', basis: 'price_pct', beneficial: true },
  { field: 'craneSystem', label: 'Crane system', kind: 'ordinal', basis: 'lump_sum', scale: CRANE_SYSTEM },
  {
    field: 'electricalServiceAmps',
    label: 'Electrical service',
    kind: 'continuous',
    basis: 'unit',
    unit: '/amp',
    higherIsBetter: true,
    materialDifference: 200,
  },
  { field: 'truckScales', label: 'Truck scales', kind: 'boolean', basis: 'lump_sum', beneficial: true },
  { field: 'specializedHvac', label: 'Specialized HVAC', kind: 'ordinal', basis: 'lump_sum', scale: SPECIALIZED_HVAC },
  {
    field: 'backupGeneratorKw',
    label: 'Backup generator',
    kind: 'continuous',
    basis: 'unit',
    unit: '/kW',
    higherIsBetter: true,
  },
];

export const SPECIAL_FEATURES: CategoryModule = {
  category: 'special_features',
  rules: SPECIAL_FEATURE_RULES,
  groupOf: p => p.specialFeatures,
};
