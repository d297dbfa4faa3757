/**
 * Ballast Zod Schemas
 * Validation schemas for configuration and treasury inputs
 */

import { z } from "zod";
import { envFlagSchema } from "./common.js";

// ============================================
// RE-EXPORT ALL SCHEMAS
// ============================================

export * from "./common.js";

// ============================================
// ENVIRONMENT SCHEMAS
// ============================================

export const envSchema = z.object({
  // Treasury
  TREASURY_BACKING_RATIO: z
    .string()
    .regex(/^\d+$/, "Backing ratio must be a positive integer at 1e18 scale")
    .transform((v) => BigInt(v))
    .refine((v) => v > 0n, "Backing ratio must be greater than zero")
    .optional(),
  TREASURY_EVENT_HISTORY_LIMIT: z
    .string()
    .regex(/^\d+$/, "Event history limit must be a whole number")
    .transform(Number)
    .optional(),
  TREASURY_INVARIANT_CHECKS: envFlagSchema.optional(),

  // Logging
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  LOG_FORMAT: z.enum(["json", "pretty"]).default("json"),

  // Node
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
});

export type EnvConfig = z.infer<typeof envSchema>;
