// ── Land (8) ────────────────────────────────────────────────────────

import {
  LOT_SHAPE, TOPOGRAPHY, DRAINAGE, SOIL_CONDITIONS, FLOOD_ZONE, ENVIRONMENTAL_STATUS,
} from '../scales';
import type { LandCharacteristics } from '../input-schema';
import type { CategoryModule, RuleSpec } from './rules';

export const LAND_RULES: readonly RuleSpec<keyof LandCharacteristics>[] = [
  { field: 'lotSizeAcres', label: 'Lot size', kind: 'continuous', basis: 'unit', unit: '/acre', higherIsBetter: true },
  { field: 'frontageFeet', label: 'Frontage', kind: 'continuous', basis: 'unit', unit: '/ft', higherIsBetter: true },
  { field: 'lotShape', label: 'Lot shape', kind: 'ordinal', basis: 'price_pct', scale: LOT_SHAPE },
  { field: 'topography', label: 'Topography', kind: 'ordinal', basis: 'price_pct', scale: TOPOGRAPHY },
  { field: 'drainage', label: 'Drainage', kind: 'ordinal', basis: 'price_pct', scale: DRAINAGE },
  { field: 'soilConditions', label: 'Soil conditions', kind: 'ordinal', basis: 'price_pct', scale: SOIL_CONDITIONS },
  { field: 'floodZone', label: 'Flood zone', kind: 'ordinal', basis: 'price_pct', scale: FLOOD_ZONE },
  {
    field: 'environmentalStatus',
    label: 'Environmental status',
    kind: 'ordinal',
    basis: 'price_pct',
    scale: ENVIRONMENTAL_STATUS,
  },
];

export const LAND: CategoryModule = {
  category: 'land',
  rules: LAND_RULES,
  groupOf: p => p.land,
};
