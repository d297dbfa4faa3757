/**
 * Backing Invariant Checker
 *
 * Post-operation solvency checks:
 * - a mint grows supply by exactly the minted amount
 * - supply after a non-empty mint stays within reserve value
 * - each redemption payout lowers the treasury balance by exactly that payout
 *
 * A failed check throws inside the atomic call, so the journal undoes it.
 */

import { treasuryLogger as logger } from "@ballast/shared";
import { BackingInvariantViolationError } from "../errors.js";
import type {
  InvariantCheckResult,
  InvariantCheckType,
  InvariantStatistics,
} from "./types.js";

const invariantLogger = logger.child({ component: "invariant-checker" });

export interface InvariantCheckerOptions {
  enabled: boolean;
  maxHistorySize: number;
}

export interface MintObservation {
  amount: bigint;
  supplyBefore: bigint;
  supplyAfter: bigint;
  reserveValue: bigint;
}

export interface PayoutObservation {
  payout: bigint;
  balanceBefore: bigint;
  balanceAfter: bigint;
}

// ============================================
// INVARIANT CHECKER
// ============================================

export class InvariantChecker {
  private readonly enabled: boolean;
  private readonly maxHistorySize: number;
  private readonly checkHistory: InvariantCheckResult[] = [];

  private totalChecks = 0;
  private passedChecks = 0;
  private failedChecks = 0;

  constructor(options: InvariantCheckerOptions) {
    this.enabled = options.enabled;
    this.maxHistorySize = options.maxHistorySize;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Check expected against actual.
   * "exact" requires equality, "ceiling" requires actual <= expected.
   */
  check(
    checkType: InvariantCheckType,
    expected: bigint,
    actual: bigint,
    mode: "exact" | "ceiling",
    operationId?: string
  ): InvariantCheckResult {
    this.totalChecks++;

    const passed = mode === "exact" ? actual === expected : actual <= expected;
    const result: InvariantCheckResult = {
      passed,
      checkType,
      expected,
      actual,
      discrepancy: actual - expected,
      operationId,
      timestamp: Date.now(),
    };

    if (passed) {
      this.passedChecks++;
    } else {
      this.failedChecks++;
      result.errorMessage = `Invariant ${checkType} violated: expected ${mode === "exact" ? "" : "<= "}${expected}, got ${actual}`;

      invariantLogger.error({
        checkType,
        operationId,
        expected: expected.toString(),
        actual: actual.toString(),
      }, "Invariant check FAILED");
    }

    this.addToHistory(result);
    return result;
  }

  enforce(
    checkType: InvariantCheckType,
    expected: bigint,
    actual: bigint,
    mode: "exact" | "ceiling",
    operationId?: string
  ): void {
    if (!this.enabled) return;

    const result = this.check(checkType, expected, actual, mode, operationId);
    if (!result.passed) {
      throw new BackingInvariantViolationError(
        result.errorMessage || "Invariant violation",
        expected,
        actual
      );
    }
  }

  verifyMint(observation: MintObservation, operationId?: string): void {
    this.enforce(
      "mint_supply_delta",
      observation.amount,
      observation.supplyAfter - observation.supplyBefore,
      "exact",
      operationId
    );

    if (observation.amount > 0n) {
      this.enforce("mint_backing", observation.reserveValue, observation.supplyAfter, "ceiling", operationId);
    }
  }

  verifyPayout(observation: PayoutObservation, operationId?: string): void {
    this.enforce(
      "payout_delta",
      observation.payout,
      observation.balanceBefore - observation.balanceAfter,
      "exact",
      operationId
    );
  }

  getStatistics(): InvariantStatistics {
    const successRate = this.totalChecks > 0
      ? this.passedChecks / this.totalChecks
      : 1;

    // Each failure costs ten points
    const healthScore = Math.max(0, 100 - this.failedChecks * 10);

    return {
      totalChecks: this.totalChecks,
      passedChecks: this.passedChecks,
      failedChecks: this.failedChecks,
      successRate,
      healthScore,
    };
  }

  getHistory(limit = 100): InvariantCheckResult[] {
    return this.checkHistory.slice(-limit);
  }

  getFailedChecks(limit = 50): InvariantCheckResult[] {
    return this.checkHistory
      .filter((c) => !c.passed)
      .slice(-limit);
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  private addToHistory(result: InvariantCheckResult): void {
    this.checkHistory.push(result);

    if (this.checkHistory.length > this.maxHistorySize) {
      this.checkHistory.splice(0, this.checkHistory.length - this.maxHistorySize);
    }
  }
}

export function createInvariantChecker(options: InvariantCheckerOptions): InvariantChecker {
  return new InvariantChecker(options);
}
