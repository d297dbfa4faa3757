/**
 * Treasury Service Configuration
 */

import { z } from "zod";
import { envSchema, TREASURY_DEFAULTS, type EnvConfig } from "@ballast/shared";

// ============================================
// TREASURY CONFIG SCHEMA
// ============================================

const treasuryConfigSchema = z.object({
  // Reserve value per managed unit at 1e18 scale
  backingRatio: z.bigint().positive(),

  // Bounded histories
  eventHistoryLimit: z.number().int().positive(),
  invariantHistoryLimit: z.number().int().positive(),

  // Post-operation solvency checks
  invariantChecks: z.boolean(),
});

export type TreasuryConfig = z.infer<typeof treasuryConfigSchema>;

export const DEFAULT_TREASURY_CONFIG: TreasuryConfig = {
  backingRatio: TREASURY_DEFAULTS.backingRatio,
  eventHistoryLimit: TREASURY_DEFAULTS.eventHistoryLimit,
  invariantHistoryLimit: TREASURY_DEFAULTS.invariantHistoryLimit,
  invariantChecks: TREASURY_DEFAULTS.invariantChecksEnabled,
};

// ============================================
// LOAD CONFIGURATION
// ============================================

export function loadTreasuryConfig(
  source: Record<string, string | undefined> = process.env
): TreasuryConfig {
  const env: EnvConfig = envSchema.parse(source);

  const config: TreasuryConfig = {
    backingRatio: env.TREASURY_BACKING_RATIO ?? DEFAULT_TREASURY_CONFIG.backingRatio,
    eventHistoryLimit: env.TREASURY_EVENT_HISTORY_LIMIT ?? DEFAULT_TREASURY_CONFIG.eventHistoryLimit,
    invariantHistoryLimit: DEFAULT_TREASURY_CONFIG.invariantHistoryLimit,
    invariantChecks: env.TREASURY_INVARIANT_CHECKS ?? DEFAULT_TREASURY_CONFIG.invariantChecks,
  };

  return treasuryConfigSchema.parse(config);
}

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveTreasuryConfig(overrides: Partial<TreasuryConfig> = {}): TreasuryConfig {
  return treasuryConfigSchema.parse({ ...DEFAULT_TREASURY_CONFIG, ...overrides });
}
