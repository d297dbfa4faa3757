/**
 * Treasury Module Exports
 *
 * Provides the reserve-backed treasury with:
 * - Excess-reserve accounting and asset valuation
 * - Minting gated by approved minters and backing
 * - Proportional burn-and-redeem across the basket
 * - Post-operation backing invariant checks
 */

// Types
export * from "./types.js";

// Invariant checker
export * from "./invariant-checker.js";

// Main treasury
export * from "./treasury.js";
