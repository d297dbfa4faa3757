/**
 * Ballast Constants
 * Fixed-point and treasury defaults
 */

// ============================================
// FIXED-POINT ARITHMETIC
// ============================================
export const FIXED_POINT = {
  // All ratios and shares are bigint integers scaled by 1e18
  decimals: 18,
  scale: 10n ** 18n,
} as const;

// ============================================
// TREASURY DEFAULTS
// ============================================
export const TREASURY_DEFAULTS = {
  // 0.000001 reserve units per managed unit, expressed at 1e18 scale
  backingRatio: 1_000_000_000_000n,

  // payoutPercent must stay strictly below this bound
  payoutPercentCeiling: 100,

  // Bounded in-memory history sizes
  eventHistoryLimit: 1000,
  invariantHistoryLimit: 1000,

  invariantChecksEnabled: true,
} as const;
