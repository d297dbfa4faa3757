import { describe, it, expect, beforeEach } from "vitest";
import { BackingInvariantViolationError } from "../errors.js";
import { InvariantChecker, createInvariantChecker } from "../treasury/invariant-checker.js";

describe("InvariantChecker", () => {
  let checker: InvariantChecker;

  beforeEach(() => {
    checker = createInvariantChecker({ enabled: true, maxHistorySize: 3 });
  });

  describe("check", () => {
    it("should pass an exact match", () => {
      const result = checker.check("payout_delta", 50n, 50n, "exact", "op-1");

      expect(result).toMatchObject({
        passed: true,
        checkType: "payout_delta",
        expected: 50n,
        actual: 50n,
        discrepancy: 0n,
        operationId: "op-1",
      });
      expect(result.errorMessage).toBeUndefined();
    });

    it("should pass a ceiling check at or under the bound", () => {
      expect(checker.check("mint_backing", 10n, 10n, "ceiling").passed).toBe(true);
      expect(checker.check("mint_backing", 10n, 9n, "ceiling").passed).toBe(true);
    });

    it("should describe a failed ceiling check", () => {
      const result = checker.check("mint_backing", 10n, 11n, "ceiling");

      expect(result.passed).toBe(false);
      expect(result.discrepancy).toBe(1n);
      expect(result.errorMessage).toBe("Invariant mint_backing violated: expected <= 10, got 11");
    });

    it("should describe a failed exact check", () => {
      const result = checker.check("mint_supply_delta", 10n, 20n, "exact");

      expect(result.errorMessage).toBe("Invariant mint_supply_delta violated: expected 10, got 20");
    });
  });

  describe("enforce", () => {
    it("should throw BackingInvariantViolationError on failure", () => {
      try {
        checker.enforce("payout_delta", 50n, 51n, "exact");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(BackingInvariantViolationError);
        expect(error).toMatchObject({
          code: "BACKING_INVARIANT_VIOLATION",
          expected: 50n,
          actual: 51n,
          message: "Invariant payout_delta violated: expected 50, got 51",
        });
      }
    });

    it("should neither check nor throw when disabled", () => {
      const disabled = new InvariantChecker({ enabled: false, maxHistorySize: 3 });

      disabled.enforce("payout_delta", 50n, 51n, "exact");

      expect(disabled.isEnabled()).toBe(false);
      expect(disabled.getStatistics().totalChecks).toBe(0);
      expect(disabled.getHistory()).toEqual([]);
    });
  });

  describe("verifyMint", () => {
    it("should run both checks for a non-empty mint", () => {
      checker.verifyMint({ amount: 5n, supplyBefore: 10n, supplyAfter: 15n, reserveValue: 15n });

      expect(checker.getHistory().map((c) => c.checkType)).toEqual(["mint_supply_delta", "mint_backing"]);
    });

    it("should skip the backing check for a zero mint", () => {
      checker.verifyMint({ amount: 0n, supplyBefore: 20n, supplyAfter: 20n, reserveValue: 10n });

      expect(checker.getHistory().map((c) => c.checkType)).toEqual(["mint_supply_delta"]);
    });

    it("should reject supply above reserve value", () => {
      expect(() =>
        checker.verifyMint({ amount: 5n, supplyBefore: 10n, supplyAfter: 15n, reserveValue: 14n })
      ).toThrow(BackingInvariantViolationError);
    });
  });

  describe("verifyPayout", () => {
    it("should accept a balance drop equal to the payout", () => {
      checker.verifyPayout({ payout: 617n, balanceBefore: 12_345n, balanceAfter: 11_728n });

      expect(checker.getStatistics().passedChecks).toBe(1);
    });
  });

  describe("statistics and history", () => {
    it("should count failures against the health score", () => {
      checker.check("payout_delta", 1n, 1n, "exact");
      checker.check("payout_delta", 1n, 2n, "exact");
      checker.check("payout_delta", 1n, 3n, "exact");
      checker.check("payout_delta", 1n, 1n, "exact");

      expect(checker.getStatistics()).toEqual({
        totalChecks: 4,
        passedChecks: 2,
        failedChecks: 2,
        successRate: 0.5,
        healthScore: 80,
      });
    });

    it("should bound history and filter failures", () => {
      checker.check("payout_delta", 1n, 2n, "exact", "a");
      checker.check("payout_delta", 1n, 1n, "exact", "b");
      checker.check("payout_delta", 1n, 3n, "exact", "c");
      checker.check("payout_delta", 1n, 1n, "exact", "d");

      expect(checker.getHistory().map((c) => c.operationId)).toEqual(["b", "c", "d"]);
      expect(checker.getHistory(1).map((c) => c.operationId)).toEqual(["d"]);
      expect(checker.getFailedChecks().map((c) => c.operationId)).toEqual(["c"]);
    });

    it("should report a perfect score before any check", () => {
      expect(checker.getStatistics()).toEqual({
        totalChecks: 0,
        passedChecks: 0,
        failedChecks: 0,
        successRate: 1,
        healthScore: 100,
      });
    });
  });
});
