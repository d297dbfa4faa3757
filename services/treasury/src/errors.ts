/**
 * Treasury Errors
 *
 * Every failure aborts the whole call; the journal restores state before
 * the error reaches the caller.
 */

import type { Address } from "viem";

export type TreasuryErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_PERCENTAGE"
  | "INSUFFICIENT_BACKING"
  | "REDEMPTION_INACTIVE"
  | "DIVIDE_BY_ZERO"
  | "INSUFFICIENT_TOKEN_BALANCE"
  | "INSUFFICIENT_BALANCE"
  | "REENTRANT_CALL"
  | "INVALID_ARGUMENT"
  | "BACKING_INVARIANT_VIOLATION";

export type Role = "owner" | "minter" | "sender";

export class TreasuryError extends Error {
  constructor(
    message: string,
    public readonly code: TreasuryErrorCode
  ) {
    super(message);
    this.name = "TreasuryError";
  }
}

export class UnauthorizedError extends TreasuryError {
  constructor(
    public readonly caller: Address,
    public readonly requiredRole: Role
  ) {
    super(`${caller} does not hold the ${requiredRole} role`, "UNAUTHORIZED");
    this.name = "UnauthorizedError";
  }
}

export class InvalidPercentageError extends TreasuryError {
  constructor(public readonly percent: number) {
    super(`Payout percent must be an integer in [0, 100), got ${percent}`, "INVALID_PERCENTAGE");
    this.name = "InvalidPercentageError";
  }
}

export class InsufficientBackingError extends TreasuryError {
  constructor(
    public readonly requested: bigint,
    public readonly excessReserves: bigint
  ) {
    super(
      `Mint of ${requested} exceeds excess reserves of ${excessReserves}`,
      "INSUFFICIENT_BACKING"
    );
    this.name = "InsufficientBackingError";
  }
}

export class RedemptionInactiveError extends TreasuryError {
  constructor() {
    super("Redemption has not been activated", "REDEMPTION_INACTIVE");
    this.name = "RedemptionInactiveError";
  }
}

export class DivideByZeroError extends TreasuryError {
  constructor(public readonly context: string) {
    super(`Division by zero: ${context}`, "DIVIDE_BY_ZERO");
    this.name = "DivideByZeroError";
  }
}

export class InsufficientTokenBalanceError extends TreasuryError {
  constructor(
    public readonly asset: Address,
    public readonly holder: Address,
    public readonly requested: bigint,
    public readonly balance: bigint,
    public readonly allowance: bigint
  ) {
    super(
      `Cannot burn ${requested} of ${asset} from ${holder}: balance=${balance}, allowance=${allowance}`,
      "INSUFFICIENT_TOKEN_BALANCE"
    );
    this.name = "InsufficientTokenBalanceError";
  }
}

export class InsufficientBalanceError extends TreasuryError {
  constructor(
    public readonly asset: Address,
    public readonly holder: Address,
    public readonly requested: bigint,
    public readonly available: bigint
  ) {
    super(
      `Cannot transfer ${requested} of ${asset} from ${holder}: available=${available}`,
      "INSUFFICIENT_BALANCE"
    );
    this.name = "InsufficientBalanceError";
  }
}

export class ReentrantCallError extends TreasuryError {
  constructor(
    public readonly operation: string,
    public readonly inFlight: string
  ) {
    super(`${operation} was called while ${inFlight} is still in flight`, "REENTRANT_CALL");
    this.name = "ReentrantCallError";
  }
}

export class InvalidArgumentError extends TreasuryError {
  constructor(
    public readonly field: string,
    reason: string
  ) {
    super(`Invalid ${field}: ${reason}`, "INVALID_ARGUMENT");
    this.name = "InvalidArgumentError";
  }
}

export class BackingInvariantViolationError extends TreasuryError {
  constructor(
    message: string,
    public readonly expected: bigint,
    public readonly actual: bigint
  ) {
    super(message, "BACKING_INVARIANT_VIOLATION");
    this.name = "BackingInvariantViolationError";
  }
}
