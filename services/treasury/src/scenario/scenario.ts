/**
 * Scenario Runner
 *
 * Replays a scripted sequence of treasury calls against in-memory ledgers.
 * A failing step is recorded with its error code and the run continues,
 * since every call is atomic and leaves state as it was.
 */

import { z } from "zod";
import type { Address } from "viem";
import { addressSchema, bigIntSchema, decimalsSchema, treasuryLogger as logger } from "@ballast/shared";
import { createStateJournal } from "../runtime/state-journal.js";
import { InMemoryAssetLedger } from "../ledger/in-memory-asset-ledger.js";
import { InMemoryManagedToken } from "../ledger/in-memory-managed-token.js";
import { InvalidArgumentError, TreasuryError } from "../errors.js";
import type { TreasuryConfig } from "../config.js";
import { createTreasury, type Treasury } from "../treasury/treasury.js";
import type { TreasuryEventRecord, TreasuryState } from "../treasury/types.js";

const scenarioLogger = logger.child({ component: "scenario" });

// ============================================
// SCENARIO SCHEMA
// ============================================

const assetSpecSchema = z.object({
  symbol: z.string().min(1),
  address: addressSchema,
  decimals: decimalsSchema.default(18),
});

const balanceSchema = z.object({
  asset: z.string().min(1),
  holder: addressSchema,
  amount: bigIntSchema,
});

const stepSchema = z.discriminatedUnion("action", [
  z.object({ action: z.literal("mint"), caller: z.string(), to: z.string(), amount: bigIntSchema }),
  z.object({ action: z.literal("approve"), holder: z.string(), amount: bigIntSchema }),
  z.object({ action: z.literal("redeem"), caller: z.string(), amount: bigIntSchema }),
  z.object({ action: z.literal("transfer"), caller: z.string(), asset: z.string(), to: z.string(), amount: bigIntSchema }),
  z.object({ action: z.literal("activateRedemption"), caller: z.string(), percent: z.number() }),
  z.object({ action: z.literal("setBasket"), caller: z.string(), assets: z.array(z.string()) }),
  z.object({ action: z.literal("addMinter"), caller: z.string(), account: z.string() }),
  z.object({ action: z.literal("removeMinter"), caller: z.string(), account: z.string() }),
  z.object({ action: z.literal("addSender"), caller: z.string(), account: z.string() }),
  z.object({ action: z.literal("removeSender"), caller: z.string(), account: z.string() }),
  z.object({ action: z.literal("updateReserve"), caller: z.string(), asset: z.string() }),
  z.object({ action: z.literal("transferOwnership"), caller: z.string(), newOwner: z.string() }),
]);

export const scenarioSchema = z.object({
  name: z.string().min(1),
  treasury: addressSchema,
  owner: addressSchema,
  backingRatio: bigIntSchema.optional(),
  reserve: assetSpecSchema,
  managed: assetSpecSchema,
  assets: z.array(assetSpecSchema).default([]),
  balances: z.array(balanceSchema).default([]),
  steps: z.array(stepSchema),
}).superRefine((scenario, ctx) => {
  const entries: Array<[string, (string | number)[]]> = [
    [scenario.reserve.symbol, ["reserve", "symbol"]],
    [scenario.managed.symbol, ["managed", "symbol"]],
    ...scenario.assets.map((a, i): [string, (string | number)[]] => [a.symbol, ["assets", i, "symbol"]]),
  ];
  const seen = new Set<string>();
  for (const [symbol, path] of entries) {
    if (seen.has(symbol)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate asset symbol ${symbol}`, path });
    }
    seen.add(symbol);
  }
});

export type Scenario = z.infer<typeof scenarioSchema>;
export type ScenarioInput = z.input<typeof scenarioSchema>;
export type ScenarioStep = z.infer<typeof stepSchema>;

// ============================================
// RESULTS
// ============================================

export interface StepOutcome {
  index: number;
  action: ScenarioStep["action"];
  ok: boolean;
  errorCode?: string;
  errorMessage?: string;
}

export interface ScenarioResult {
  name: string;
  outcomes: StepOutcome[];
  state: TreasuryState;
  events: TreasuryEventRecord[];
  balances: Record<string, Record<string, bigint>>;
}

// ============================================
// RUNNER
// ============================================

export function parseScenario(input: unknown): Scenario {
  return scenarioSchema.parse(input);
}

export function runScenario(input: unknown, config: Partial<TreasuryConfig> = {}): ScenarioResult {
  const scenario = parseScenario(input);
  const journal = createStateJournal();

  const reserve = new InMemoryAssetLedger({ ...scenario.reserve, journal });
  const managed = new InMemoryManagedToken({ ...scenario.managed, reserveAsset: reserve, journal });
  const assets = new Map<string, InMemoryAssetLedger>([
    [reserve.symbol, reserve],
    [managed.symbol, managed],
  ]);
  for (const spec of scenario.assets) {
    assets.set(spec.symbol, new InMemoryAssetLedger({ ...spec, journal }));
  }

  const lookup = (symbol: string): InMemoryAssetLedger => {
    const asset = assets.get(symbol);
    if (!asset) {
      throw new InvalidArgumentError("asset", `unknown symbol ${symbol}`);
    }
    return asset;
  };

  for (const balance of scenario.balances) {
    const asset = lookup(balance.asset);
    if (asset === managed) {
      managed.mint(balance.holder, balance.amount);
    } else {
      asset.issue(balance.holder, balance.amount);
    }
  }

  const treasury = createTreasury({
    address: scenario.treasury,
    owner: scenario.owner,
    managedToken: managed,
    journal,
    config: scenario.backingRatio === undefined ? config : { ...config, backingRatio: scenario.backingRatio },
  });

  scenarioLogger.info({ name: scenario.name, steps: scenario.steps.length }, "Running scenario");

  const outcomes = scenario.steps.map((step, index): StepOutcome => {
    try {
      applyStep(treasury, managed, lookup, step);
      return { index, action: step.action, ok: true };
    } catch (error) {
      if (!(error instanceof TreasuryError)) {
        throw error;
      }
      scenarioLogger.debug({ index, action: step.action, code: error.code }, "Scenario step failed");
      return { index, action: step.action, ok: false, errorCode: error.code, errorMessage: error.message };
    }
  });

  const holders = new Set<Address>([scenario.treasury, scenario.owner, ...scenario.balances.map((b) => b.holder)]);
  for (const step of scenario.steps) {
    for (const value of Object.values(step)) {
      const account = addressSchema.safeParse(value);
      if (account.success) holders.add(account.data);
    }
  }
  const balances: Record<string, Record<string, bigint>> = {};
  for (const [symbol, asset] of assets) {
    balances[symbol] = {};
    for (const holder of holders) {
      balances[symbol][holder] = asset.balanceOf(holder);
    }
  }

  return {
    name: scenario.name,
    outcomes,
    state: treasury.getState(),
    events: treasury.getRecentEvents(),
    balances,
  };
}

function applyStep(
  treasury: Treasury,
  managed: InMemoryManagedToken,
  lookup: (symbol: string) => InMemoryAssetLedger,
  step: ScenarioStep
): void {
  switch (step.action) {
    case "mint":
      treasury.mint(step.caller, step.to, step.amount);
      return;
    case "approve":
      managed.approve(step.holder, treasury.address, step.amount);
      return;
    case "redeem":
      treasury.burnAndRedeem(step.caller, step.amount);
      return;
    case "transfer":
      treasury.transferFromTreasury(step.caller, lookup(step.asset), step.to, step.amount);
      return;
    case "activateRedemption":
      treasury.setRedemptionActive(step.caller, step.percent);
      return;
    case "setBasket":
      treasury.setRedeemableTokens(step.caller, step.assets.map(lookup));
      return;
    case "addMinter":
      treasury.addApprovedMinter(step.caller, step.account);
      return;
    case "removeMinter":
      treasury.removeApprovedMinter(step.caller, step.account);
      return;
    case "addSender":
      treasury.addApprovedSender(step.caller, step.account);
      return;
    case "removeSender":
      treasury.removeApprovedSender(step.caller, step.account);
      return;
    case "updateReserve":
      treasury.updateReserveAsset(step.caller, lookup(step.asset));
      return;
    case "transferOwnership":
      treasury.transferOwnership(step.caller, step.newOwner);
      return;
  }
}
