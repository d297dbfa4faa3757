/**
 * Common Schema Primitives
 * Shared types used across all schemas
 */

import { z } from "zod";
import { getAddress, type Address } from "viem";

// ============================================
// PRIMITIVE SCHEMAS
// ============================================

/** Account or asset address, normalized to its checksummed form */
export const addressSchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{40}$/, "Invalid address")
  .transform((value): Address => getAddress(value));

/**
 * Token amount in base units
 * Ledger math is integer-only, so amounts are always bigint
 */
export const amountSchema = z.bigint().nonnegative("Amount must not be negative");

/** BigInt accepted from bigint, decimal string or safe integer input */
export const bigIntSchema = z.union([
  z.bigint(),
  z.string().regex(/^-?\d+$/, "Must be an integer string").transform((val) => BigInt(val)),
  z.number().int().transform((val) => BigInt(val)),
]);

/** Whole-number percentage, 0 or more */
export const percentSchema = z.number().int().nonnegative();

/** Token decimals as reported by an asset ledger */
export const decimalsSchema = z.number().int().min(0).max(77);

/** Boolean flag read from an environment variable */
export const envFlagSchema = z.enum(["true", "false"]).transform((v) => v === "true");
