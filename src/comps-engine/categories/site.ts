// ── Site Improvements (6) ───────────────────────────────────────────

import { UTILITIES, PAVING, LANDSCAPING } from '../scales';
import type { SiteCharacteristics } from '../input-schema';
import type { CategoryModule, RuleSpec } from './rules';

export const SITE_RULES: readonly RuleSpec<keyof SiteCharacteristics>[] = [
  { field: 'utilities', label: 'Utilities', kind: 'ordinal', basis: 'price_pct', scale: UTILITIES },
  // Lower coverage leaves more usable yard
  {
    field: 'siteCoveragePct',
    label: 'Site coverage',
    kind: 'continuous',
    basis: 'price_pct',
    unit: '/point',
    higherIsBetter: false,
  },
  { field: 'paving', label: 'Paving', kind: 'ordinal', basis: 'lump_sum', scale: PAVING },
  { field: 'securityFencing', label: 'Security fencing', kind: 'boolean', basis: 'lump_sum', beneficial: true },
  {
    field: 'yardStorageAcres',
    label: 'Yard storage',
    kind: 'continuous',
    basis: 'unit',
    unit: '/acre',
    higherIsBetter: true,
  },
  { field: 'landscaping', label: 'Landscaping', kind: 'ordinal', basis: 'price_pct', scale: LANDSCAPING },
];

export const SITE: CategoryModule = {
  category: 'site',
  rules: SITE_RULES,
  groupOf: p => p.site,
};
