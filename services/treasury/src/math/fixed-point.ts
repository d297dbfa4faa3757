/**
 * Fixed-point helpers
 *
 * Values are bigint integers scaled by SCALE (1e18). Every division
 * truncates toward zero; rounding loss always stays with the treasury.
 */

import { FIXED_POINT } from "@ballast/shared";
import { DivideByZeroError, InvalidArgumentError } from "../errors.js";

export const SCALE: bigint = FIXED_POINT.scale;

/**
 * a * b / denominator, truncating
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint, context = "mulDiv"): bigint {
  if (denominator === 0n) {
    throw new DivideByZeroError(context);
  }
  return (a * b) / denominator;
}

/**
 * 10^exponent as bigint
 */
export function pow10(exponent: number): bigint {
  if (!Number.isInteger(exponent) || exponent < 0) {
    throw new InvalidArgumentError("exponent", `expected a non-negative integer, got ${exponent}`);
  }
  return 10n ** BigInt(exponent);
}

/**
 * Fraction numerator/denominator at SCALE precision
 */
export function toFixed(numerator: bigint, denominator: bigint, context = "toFixed"): bigint {
  return mulDiv(SCALE, numerator, denominator, context);
}

/**
 * amount * fixed / SCALE
 */
export function applyFixed(amount: bigint, fixed: bigint): bigint {
  return mulDiv(amount, fixed, SCALE);
}

/**
 * amount * percent / 100
 */
export function applyPercent(amount: bigint, percent: number): bigint {
  return mulDiv(amount, BigInt(percent), 100n);
}

/**
 * Rescale an amount between decimal precisions
 */
export function rescale(amount: bigint, fromDecimals: number, toDecimals: number): bigint {
  return mulDiv(amount, pow10(toDecimals), pow10(fromDecimals));
}

export function maxZero(value: bigint): bigint {
  return value > 0n ? value : 0n;
}
