import { describe, it, expect } from "vitest";
import {
  FIXED_POINT,
  TREASURY_DEFAULTS,
} from "../constants/index.js";

describe("Constants", () => {
  describe("FIXED_POINT", () => {
    it("should use an 18-decimal scale", () => {
      expect(FIXED_POINT.decimals).toBe(18);
      expect(FIXED_POINT.scale).toBe(1_000_000_000_000_000_000n);
    });
  });

  describe("TREASURY_DEFAULTS", () => {
    it("should back one managed unit with 0.000001 reserve units", () => {
      // 1 whole reserve unit mints 1e6 whole managed units
      expect((FIXED_POINT.scale * FIXED_POINT.scale) / TREASURY_DEFAULTS.backingRatio).toBe(10n ** 24n);
    });

    it("should cap payout percent below 100", () => {
      expect(TREASURY_DEFAULTS.payoutPercentCeiling).toBe(100);
    });
  });
});
