/**
 * Scenario Runner Tests
 */

import { describe, it, expect } from "vitest";
import { readFileSync } from "fs";
import { ZodError } from "zod";
import { runScenario, scenarioSchema, type ScenarioInput } from "../scenario/scenario.js";
import {
  ALICE,
  ASSET_X_ADDRESS,
  MANAGED_ADDRESS,
  MINTER,
  OWNER,
  RESERVE_ADDRESS,
  TREASURY,
} from "./fixtures.js";

function loadFixture(name: string): unknown {
  return JSON.parse(readFileSync(new URL(`../../fixtures/${name}`, import.meta.url), "utf-8"));
}

function minimalScenario(steps: ScenarioInput["steps"]): ScenarioInput {
  return {
    name: "minimal",
    treasury: TREASURY,
    owner: OWNER,
    reserve: { symbol: "RSV", address: RESERVE_ADDRESS },
    managed: { symbol: "BLST", address: MANAGED_ADDRESS },
    assets: [{ symbol: "XAS", address: ASSET_X_ADDRESS }],
    steps,
  };
}

describe("runScenario", () => {
  it("should replay the basic redemption fixture", () => {
    const result = runScenario(loadFixture("basic-redemption.json"));

    expect(result.outcomes.map((o) => (o.ok ? "ok" : o.errorCode))).toEqual([
      "ok",
      "ok",
      "UNAUTHORIZED",
      "ok",
      "REDEMPTION_INACTIVE",
      "INVALID_PERCENTAGE",
      "ok",
      "ok",
      "ok",
      "ok",
      "ok",
    ]);

    expect(result.state.managedToken.totalSupply).toBe(9_000n);
    expect(result.state.excessReserves).toBe(10n ** 24n - 9_000n);
    expect(result.state.redemption).toEqual({ active: true, payoutPercent: 50 });

    expect(result.balances.BLST[ALICE]).toBe(9_000n);
    expect(result.balances.XAS[ALICE]).toBe(617n);
    expect(result.balances.YAS[ALICE]).toBe(49n);
    expect(result.balances.XAS[TREASURY]).toBe(11_000n);
    expect(result.balances.YAS[TREASURY]).toBe(950n);
    expect(result.balances.XAS[OWNER]).toBe(728n);

    expect(result.events.map((e) => e.name)).toEqual([
      "minter:added",
      "tokens:minted",
      "basket:replaced",
      "redemption:activated",
      "tokens:redeemed",
      "sender:added",
      "treasury:transferred",
    ]);
  });

  it("should record an unknown basket symbol as a failed step", () => {
    const result = runScenario(minimalScenario([
      { action: "setBasket", caller: OWNER, assets: ["XAS", "NOPE"] },
      { action: "addMinter", caller: OWNER, account: MINTER },
    ]));

    expect(result.outcomes).toEqual([
      {
        index: 0,
        action: "setBasket",
        ok: false,
        errorCode: "INVALID_ARGUMENT",
        errorMessage: "Invalid asset: unknown symbol NOPE",
      },
      { index: 1, action: "addMinter", ok: true },
    ]);
    expect(result.state.basket).toEqual([]);
  });

  it("should apply the scenario backing ratio over the base config", () => {
    const result = runScenario(
      { ...minimalScenario([]), backingRatio: "2000000000000" },
      { eventHistoryLimit: 10 }
    );

    expect(result.state.backingRatio).toBe(2_000_000_000_000n);
  });

  it("should reject a basket asset reusing the reserve symbol", () => {
    const input = {
      ...minimalScenario([]),
      assets: [{ symbol: "RSV", address: ASSET_X_ADDRESS }],
    };

    const parsed = scenarioSchema.safeParse(input);
    expect(parsed.success).toBe(false);
    expect(parsed.error?.issues).toEqual([
      expect.objectContaining({ message: "Duplicate asset symbol RSV", path: ["assets", 0, "symbol"] }),
    ]);
    expect(() => runScenario(input)).toThrow(ZodError);
  });

  it("should reject a managed token sharing the reserve symbol", () => {
    const input = { ...minimalScenario([]), managed: { symbol: "RSV", address: MANAGED_ADDRESS } };

    expect(() => runScenario(input)).toThrow("Duplicate asset symbol RSV");
  });

  it("should reject a malformed scenario", () => {
    expect(() => runScenario({ name: "broken", steps: [] })).toThrow(ZodError);
    expect(() =>
      runScenario(minimalScenario([{ action: "mint", caller: OWNER, to: ALICE, amount: "1.5" }]))
    ).toThrow(ZodError);
  });
});
