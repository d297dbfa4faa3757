/**
 * Shared test setup: a treasury wired to in-memory ledgers
 */

import { createStateJournal, type StateJournal } from "../runtime/state-journal.js";
import { InMemoryAssetLedger } from "../ledger/in-memory-asset-ledger.js";
import {
  InMemoryManagedToken,
  type InMemoryManagedTokenOptions,
} from "../ledger/in-memory-managed-token.js";
import { createTreasury, type Treasury } from "../treasury/treasury.js";
import type { TreasuryConfig } from "../config.js";

export const TREASURY = "0x7000000000000000000000000000000000000007";
export const OWNER = "0x1000000000000000000000000000000000000001";
export const MINTER = "0x2000000000000000000000000000000000000002";
export const SENDER = "0x3000000000000000000000000000000000000003";
export const ALICE = "0x4000000000000000000000000000000000000004";
export const BOB = "0x5000000000000000000000000000000000000005";
export const STRANGER = "0x6000000000000000000000000000000000000006";

export const RESERVE_ADDRESS = "0x9100000000000000000000000000000000000091";
export const MANAGED_ADDRESS = "0x9200000000000000000000000000000000000092";
export const ASSET_X_ADDRESS = "0x9300000000000000000000000000000000000093";
export const ASSET_Y_ADDRESS = "0x9400000000000000000000000000000000000094";
export const ALT_RESERVE_ADDRESS = "0x9500000000000000000000000000000000000095";

export const ONE = 10n ** 18n;

export interface TestTreasury {
  journal: StateJournal;
  reserve: InMemoryAssetLedger;
  token: InMemoryManagedToken;
  assetX: InMemoryAssetLedger;
  assetY: InMemoryAssetLedger;
  treasury: Treasury;
}

export function createTestTreasury(
  config: Partial<TreasuryConfig> = {},
  createToken: (options: InMemoryManagedTokenOptions) => InMemoryManagedToken =
    (options) => new InMemoryManagedToken(options)
): TestTreasury {
  const journal = createStateJournal();
  const reserve = new InMemoryAssetLedger({ address: RESERVE_ADDRESS, symbol: "RSV", decimals: 18, journal });
  const token = createToken({
    address: MANAGED_ADDRESS,
    symbol: "BLST",
    decimals: 18,
    reserveAsset: reserve,
    journal,
  });
  const assetX = new InMemoryAssetLedger({ address: ASSET_X_ADDRESS, symbol: "XAS", decimals: 18, journal });
  const assetY = new InMemoryAssetLedger({ address: ASSET_Y_ADDRESS, symbol: "YAS", decimals: 6, journal });

  const treasury = createTreasury({
    address: TREASURY,
    owner: OWNER,
    managedToken: token,
    journal,
    config,
  });

  return { journal, reserve, token, assetX, assetY, treasury };
}

/**
 * Treasury holding one whole reserve unit, with MINTER approved
 */
export function createFundedTreasury(config: Partial<TreasuryConfig> = {}): TestTreasury {
  const setup = createTestTreasury(config);
  setup.reserve.issue(TREASURY, ONE);
  setup.treasury.addApprovedMinter(OWNER, MINTER);
  return setup;
}
