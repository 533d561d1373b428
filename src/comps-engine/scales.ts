// ═══════════════════════════════════════════════════════════════════════
//  Comparable Sales Engine: Ordinal Scales
//  Every scale is ordered worst → best. Level index drives the adjustment.
// ═══════════════════════════════════════════════════════════════════════

// ── Land ────────────────────────────────────────────────────────────

export const LOT_SHAPE = ['severely_irregular', 'irregular', 'slightly_irregular', 'regular'] as const;
export const TOPOGRAPHY = ['severely_sloped', 'moderately_sloped', 'gently_sloped', 'level'] as const;
export const DRAINAGE = ['poor', 'fair', 'good', 'excellent'] as const;
export const SOIL_CONDITIONS = ['poor', 'fair', 'good', 'excellent'] as const;
export const FLOOD_ZONE = ['floodway', 'zone_a', 'zone_x_shaded', 'none'] as const;
export const ENVIRONMENTAL_STATUS = [
  'severe_contamination',
  'moderate_contamination',
  'minor_contamination',
  'clean',
] as const;

// ── Site ────────────────────────────────────────────────────────────

export const UTILITIES = ['none', 'well_septic', 'partial_municipal', 'full_municipal'] as const;
export const PAVING = ['none', 'gravel', 'asphalt', 'concrete'] as const;
export const LANDSCAPING = ['none', 'basic', 'good', 'extensive'] as const;

// ── Building (all types) ────────────────────────────────────────────

export const CONSTRUCTION_QUALITY = ['economy', 'standard', 'good', 'superior'] as const;
export const FUNCTIONAL_UTILITY = [
  'severe_obsolescence',
  'moderate_obsolescence',
  'minor_obsolescence',
  'adequate',
  'superior',
] as const;
export const ENERGY_CERTIFICATION = [
  'none',
  'energy_star',
  'leed_certified',
  'leed_silver',
  'leed_gold',
  'leed_platinum',
] as const;
export const ARCHITECTURAL_APPEAL = ['dated', 'average', 'attractive', 'exceptional'] as const;
export const HVAC_SYSTEM = ['none', 'basic', 'modern_standard', 'high_efficiency', 'geothermal'] as const;

// ── Industrial / Office ─────────────────────────────────────────────

export const BUILDING_CONDITION = ['poor', 'fair', 'average', 'good', 'excellent'] as const;
export const BUILDING_CLASS = ['class_c', 'class_b', 'class_a'] as const;
export const TENANT_IMPROVEMENTS = ['shell', 'basic', 'standard', 'premium'] as const;

// ── Special Features ────────────────────────────────────────────────

export const CRANE_SYSTEM = [
  'none',
  'jib_crane',
  'bridge_crane_10ton',
  'bridge_crane_20ton',
  'gantry_crane',
] as const;
export const SPECIALIZED_HVAC = [
  'none',
  'temperature_controlled',
  'humidity_controlled',
  'cleanroom_class_100k',
  'cleanroom_class_10k',
] as const;

// ── Zoning / Legal ──────────────────────────────────────────────────

export const ZONING_CONFORMITY = ['non_conforming', 'legal_non_conforming', 'conforming'] as const;
export const PERMITTED_USES = ['restricted', 'standard', 'broad'] as const;

/** Zero-based position of `value` on `scale`, or -1 when it is not a level of that scale. */
export function levelOf(scale: readonly string[], value: string): number {
  return scale.indexOf(value);
}
