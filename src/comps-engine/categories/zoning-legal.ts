// ── Zoning & Legal (5) ──────────────────────────────────────────────

import { ZONING_CONFORMITY, PERMITTED_USES } from '../scales';
import type { ZoningLegalCharacteristics } from '../input-schema';
import type { CategoryModule, RuleSpec } from './rules';

export const ZONING_LEGAL_RULES: readonly RuleSpec<keyof ZoningLegalCharacteristics>[] = [
  { field: 'zoningConformity', label: 'Zoning conformity', kind: 'ordinal', basis: 'price_pct', scale: ZONING_CONFORMITY },
  {
    field: 'floorAreaRatio',
    label: 'Floor area ratio',
    kind: 'continuous',
    basis: 'price_pct',
    unit: '/1.0 FAR',
    higherIsBetter: true,
  },
  { field: 'permittedUses', label: 'Permitted uses', kind: 'ordinal', basis: 'price_pct', scale: PERMITTED_USES },
  // Encumbrances: the property that carries one is the inferior one
  { field: 'easementEncumbrance', label: 'Easement encumbrance', kind: 'boolean', basis: 'price_pct', beneficial: false },
  { field: 'heritageDesignation', label: 'Heritage designation', kind: 'boolean', basis: 'price_pct', beneficial: false },
];

export const ZONING_LEGAL: CategoryModule = {
  category: 'zoning_legal',
  rules: ZONING_LEGAL_RULES,
  groupOf: p => p.zoningLegal,
};
