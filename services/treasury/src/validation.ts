/**
 * Input validation for treasury entry points
 */

import { addressSchema, amountSchema } from "@ballast/shared";
import type { Address } from "viem";
import type { z } from "zod";
import { InvalidArgumentError } from "./errors.js";

function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  field: string
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(field, result.error.issues.map((i) => i.message).join("; "));
  }
  return result.data;
}

export function parseAddress(value: string, field = "address"): Address {
  return parseOrThrow(addressSchema, value, field);
}

export function parseAmount(value: bigint, field = "amount"): bigint {
  return parseOrThrow(amountSchema, value, field);
}
