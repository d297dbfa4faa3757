/**
 * @ballast/shared
 * Shared logger, schemas and constants for Ballast
 */

// Export schemas (includes envSchema and input primitives)
export * from "./schemas/index.js";

// Export constants (includes FIXED_POINT, TREASURY_DEFAULTS)
export * from "./constants/index.js";

// Export logger
export {
  logger,
  createServiceLogger,
  treasuryLogger,
  logLedgerMovement,
  audit,
} from "./logger/index.js";
export type { AuditLogEntry } from "./logger/index.js";
