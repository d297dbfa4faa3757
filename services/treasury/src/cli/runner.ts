/**
 * CLI Runner
 *
 * Replays a scenario fixture against an in-memory treasury.
 * Usage: npm run scenario -w @ballast/treasury -- --fixture basic-redemption.json
 */

import "dotenv/config";
import { treasuryLogger as logger } from "@ballast/shared";
import { formatUnits } from "viem";
import fs from "fs/promises";
import path from "path";
import { fileURLToPath } from "url";
import { loadTreasuryConfig } from "../config.js";
import { runScenario, type ScenarioResult } from "../scenario/scenario.js";

// ============================================
// CLI ARGUMENTS
// ============================================

interface CliArgs {
  fixture?: string;
  events?: boolean;
}

function parseArgs(): CliArgs {
  const args: CliArgs = {};
  const argv = process.argv.slice(2);

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--fixture" || arg === "-f") {
      args.fixture = argv[++i];
    } else if (arg === "--events" || arg === "-e") {
      args.events = true;
    } else if (arg === "--help" || arg === "-h") {
      printHelp();
      process.exit(0);
    }
  }

  return args;
}

function printHelp(): void {
  console.log(`
Ballast Treasury Scenario Runner

Usage:
  npm run scenario -w @ballast/treasury -- [options]

Options:
  -f, --fixture <path>    Scenario file (JSON)
  -e, --events            Print the event log
  -h, --help              Show this help message

Examples:
  npm run scenario -w @ballast/treasury -- --fixture basic-redemption.json
  npm run scenario -w @ballast/treasury -- --fixture fixtures/basic-redemption.json --events
`);
}

// ============================================
// FIXTURE LOADING
// ============================================

const fixtureDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../fixtures");

async function loadFixture(fixturePath: string): Promise<unknown> {
  const searchPaths = [
    path.resolve(process.cwd(), fixturePath),
    path.join(fixtureDir, fixturePath),
  ];

  for (const searchPath of searchPaths) {
    const content = await fs.readFile(searchPath, "utf-8").catch((error: NodeJS.ErrnoException) => {
      if (error.code === "ENOENT") return null;
      throw error;
    });
    if (content !== null) {
      logger.info({ path: searchPath }, "Loaded fixture file");
      return JSON.parse(content);
    }
  }

  throw new Error(`Fixture not found: ${fixturePath}`);
}

// ============================================
// OUTPUT FORMATTING
// ============================================

function formatResult(result: ScenarioResult, showEvents: boolean): void {
  const { state } = result;

  console.log("\n" + "=".repeat(80));
  console.log(`  SCENARIO: ${result.name}`);
  console.log("=".repeat(80) + "\n");

  console.log("STEPS:");
  for (const outcome of result.outcomes) {
    const status = outcome.ok ? "ok  " : "FAIL";
    const detail = outcome.ok ? "" : ` ${outcome.errorCode}: ${outcome.errorMessage}`;
    console.log(`  [${status}] ${String(outcome.index).padStart(3)} ${outcome.action}${detail}`);
  }

  const decimals = state.managedToken.decimals;
  console.log("\nTREASURY:");
  console.log(`  Owner:            ${state.owner}`);
  console.log(`  Managed supply:   ${formatUnits(state.managedToken.totalSupply, decimals)} ${state.managedToken.symbol}`);
  console.log(`  Reserve balance:  ${state.reserve.balance} ${state.reserve.symbol} base units`);
  console.log(`  Reserve value:    ${formatUnits(state.reserve.value, decimals)} ${state.managedToken.symbol}`);
  console.log(`  Excess reserves:  ${formatUnits(state.excessReserves, decimals)} ${state.managedToken.symbol}`);
  console.log(`  Redemption:       ${state.redemption.active ? `active at ${state.redemption.payoutPercent}%` : "inactive"}`);
  console.log(`  Basket:           ${state.basket.length} entries`);
  console.log(`  Invariant health: ${state.invariants.healthScore}`);

  console.log("\nBALANCES:");
  for (const [symbol, holders] of Object.entries(result.balances)) {
    for (const [holder, amount] of Object.entries(holders)) {
      if (amount > 0n) {
        console.log(`  ${symbol.padEnd(8)} ${holder} ${amount}`);
      }
    }
  }

  if (showEvents) {
    console.log("\nEVENTS:");
    for (const event of result.events) {
      console.log(`  ${event.name.padEnd(22)} by ${event.actor}`);
    }
  }

  console.log("\n" + "=".repeat(80) + "\n");
}

// ============================================
// MAIN
// ============================================

async function main(): Promise<void> {
  const args = parseArgs();

  if (!args.fixture) {
    console.error("Error: --fixture is required\n");
    printHelp();
    process.exit(1);
  }

  const config = loadTreasuryConfig();
  logger.info({ backingRatio: config.backingRatio.toString() }, "Configuration loaded");

  const scenario = await loadFixture(args.fixture);
  const result = runScenario(scenario, config);

  formatResult(result, args.events ?? false);

  process.exit(result.outcomes.every((o) => o.ok) ? 0 : 2);
}

main().catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
