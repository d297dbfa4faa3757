/**
 * Ledger Module Exports
 */

export * from "./types.js";
export * from "./in-memory-asset-ledger.js";
export * from "./in-memory-managed-token.js";
