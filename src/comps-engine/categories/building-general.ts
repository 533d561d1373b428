// ── Building, all property types (6) ────────────────────────────────

import {
  CONSTRUCTION_QUALITY, FUNCTIONAL_UTILITY, ENERGY_CERTIFICATION, ARCHITECTURAL_APPEAL, HVAC_SYSTEM,
} from '../scales';
import type { BuildingGeneralCharacteristics } from '../input-schema';
import type { CategoryModule, RuleSpec } from './rules';

export const BUILDING_GENERAL_RULES: readonly RuleSpec<keyof BuildingGeneralCharacteristics>[] = [
  {
    field: 'effectiveAgeYears',
    label: 'Effective age',
    kind: 'continuous',
    basis: 'price_pct',
    unit: '/year',
    higherIsBetter: false,
  },
  {
    field: 'constructionQuality',
    label: 'Construction quality',
    kind: 'ordinal',
    basis: 'price_pct',
    scale: CONSTRUCTION_QUALITY,
  },
  { field: 'functionalUtility', label: 'Functional utility', kind: 'ordinal', basis: 'price_pct', scale: FUNCTIONAL_UTILITY },
  {
    field: 'energyCertification',
    label: 'Energy certification',
    kind: 'ordinal',
    basis: 'price_pct',
    scale: ENERGY_CERTIFICATION,
  },
  {
    field: 'architecturalAppeal',
    label: 'Architectural appeal',
    kind: 'ordinal',
    basis: 'price_pct',
    scale: ARCHITECTURAL_APPEAL,
  },
  { field: 'hvacSystem', label: 'HVAC system', kind: 'ordinal', basis: 'price_pct', scale: HVAC_SYSTEM },
];

export const BUILDING_GENERAL: CategoryModule = {
  category: 'building_general',
  rules: BUILDING_GENERAL_RULES,
  groupOf: p => p.buildingGeneral,
};
