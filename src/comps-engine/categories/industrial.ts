// ═══════════════════════════════════════════════════════════════════════
//  Industrial Building (10)
//  Per-SF rules scale by the comparable's building area.
// ═══════════════════════════════════════════════════════════════════════

import { BUILDING_CONDITION } from '../scales';
import type { IndustrialCharacteristics } from '../input-schema';
import type { CategoryModule, RuleSpec } from './rules';

export const INDUSTRIAL_RULES: readonly RuleSpec<keyof IndustrialCharacteristics>[] = [
  { field: 'buildingSf', label: 'Building size', kind: 'continuous', basis: 'unit', unit: '/SF', higherIsBetter: true },
  {
    field: 'clearHeightFeet',
    label: 'Clear height',
    kind: 'continuous',
    basis: 'building_sf',
    unit: '/ft/SF',
    higherIsBetter: true,
  },
  { field: 'loadingDocks', label: 'Loading docks', kind: 'continuous', basis: 'unit', unit: '/dock', higherIsBetter: true },
  {
    field: 'columnSpacingFeet',
    label: 'Column spacing',
    kind: 'continuous',
    basis: 'building_sf',
    unit: '/ft/SF',
    higherIsBetter: true,
    materialDifference: 10,
  },
  {
    field: 'floorLoadPsf',
    label: 'Floor load',
    kind: 'continuous',
    basis: 'building_sf',
    unit: '/psf/SF',
    higherIsBetter: true,
    materialDifference: 100,
  },
  {
    field: 'officeFinishPct',
    label: 'Office finish',
    kind: 'continuous',
    basis: 'building_sf',
    unit: '/point/SF',
    higherIsBetter: true,
  },
  {
    field: 'bayDepthFeet',
    label: 'Bay depth',
    kind: 'continuous',
    basis: 'building_sf',
    unit: '/ft/SF',
    higherIsBetter: true,
    materialDifference: 20,
  },
  { field: 'esfrSprinkler', label: 'ESFR sprinkler', kind: 'boolean', basis: 'building_sf', beneficial: true },
  {
    field: 'truckCourtDepthFeet',
    label: 'Truck court depth',
    kind: 'continuous',
    basis: 'building_sf',
    unit: '/ft/SF',
    higherIsBetter: true,
    materialDifference: 20,
  },
  { field: 'condition', label: 'Building condition', kind: 'ordinal', basis: 'price_pct', scale: BUILDING_CONDITION },
];

export const INDUSTRIAL: CategoryModule = {
  category: 'industrial',
  rules: INDUSTRIAL_RULES,
  groupOf: p => (p.propertyType === 'industrial' ? p.industrial : undefined),
};
