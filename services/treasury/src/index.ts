/**
 * @ballast/treasury
 * Reserve-backed treasury accounting engine
 */

export * from "./errors.js";
export * from "./config.js";
export * from "./math/fixed-point.js";
export * from "./runtime/index.js";
export * from "./ledger/index.js";
export * from "./auth/authorization-registry.js";
export * from "./accounting/reserve-accounting.js";
export * from "./mint/mint-controller.js";
export * from "./redemption/redemption-engine.js";
export * from "./treasury/index.js";
export * from "./scenario/scenario.js";
