// ═══════════════════════════════════════════════════════════════════════
//  Comparable Sales Engine: Configuration
//  Thresholds, tier boundaries, weights and sensitivity factors.
// ═══════════════════════════════════════════════════════════════════════

// ── Comparable Count ────────────────────────────────────────────────

export const MIN_COMPARABLES = 3;
export const MAX_RECOMMENDED_COMPARABLES = 6;

// ── Time Adjustment ─────────────────────────────────────────────────

export const DAYS_PER_YEAR = 365.25;
export const MS_PER_DAY    = 86_400_000;

// ── Validation Thresholds (percent of sale price) ───────────────────

export const VALIDATION = {
  REJECT_GROSS_PCT:  40.0,   // gross >= this → REJECT
  CAUTION_GROSS_PCT: 30.0,   // gross >  this → CAUTION

  NET_TIGHT_PCT:     5.0,    // |net| <  this → weight 2.0
  NET_MODERATE_PCT:  10.0,   // |net| <= this → weight 1.5

  // Reported only, never change the weight
  GROSS_WARNING_PCT: 25.0,
  NET_WARNING_PCT:   15.0,
} as const;

export const WEIGHTS = {
  REJECT:  0.0,
  CAUTION: 0.5,
  TIGHT:   2.0,
  MODERATE: 1.5,
  WIDE:    1.0,
} as const;

// ── Location Tiers ──────────────────────────────────────────────────
//  [lower, upper) in score points; premium closes at 100.

export const LOCATION_SCORE_MIN = 0;
export const LOCATION_SCORE_MAX = 100;

export const LOCATION_TIERS = [
  { key: 'poor',         label: 'Poor',          lower: 0,  upper: 30 },
  { key: 'belowAverage', label: 'Below Average', lower: 30, upper: 50 },
  { key: 'average',      label: 'Average',       lower: 50, upper: 70 },
  { key: 'good',         label: 'Good',          lower: 70, upper: 85 },
  { key: 'premium',      label: 'Premium',       lower: 85, upper: 100 },
] as const;

export const LOCATION_FEATURES = [
  { key: 'highwayFrontage', label: 'Highway frontage' },
  { key: 'highVisibility',  label: 'High visibility' },
  { key: 'superiorAccess',  label: 'Superior access' },
] as const;

// ── Loading Docks ───────────────────────────────────────────────────
//  Dock-equivalents per dock by type, relative to the per-dock rate.

export const DOCK_TYPE_WEIGHTS = {
  dockHigh:   0.7,
  gradeLevel: 0.4,
  driveIn:    1.4,
} as const;

// ── Sensitivity ─────────────────────────────────────────────────────

export const SENSITIVITY = {
  MATERIALITY_PCT: 5.0,       // |amount| > 5% of the comparable's sale price
  LOW_FACTOR:      0.9,
  HIGH_FACTOR:     1.1,
} as const;
