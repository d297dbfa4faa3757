/**
 * Asset Ledger Types
 *
 * Capability interfaces for the assets a treasury reads and moves.
 * Plain assets (reserve, basket) expose balances and transfers; the
 * managed token adds mint and burn-from.
 */

import type { Address } from "viem";
import type { Journaled } from "../runtime/state-journal.js";

// ============================================
// PLAIN ASSET
// ============================================

/**
 * Every ledger takes part in rollback: the treasury enrols each one it
 * touches with its journal before the call runs.
 */
export interface AssetLedger extends Journaled {
  readonly address: Address;
  readonly symbol: string;

  decimals(): number;
  totalSupply(): bigint;
  balanceOf(holder: Address): bigint;

  /**
   * Move amount from one holder to another.
   * Throws InsufficientBalanceError when the sender is short.
   */
  transfer(from: Address, to: Address, amount: bigint): void;
}

// ============================================
// MANAGED TOKEN
// ============================================

export interface ManagedTokenLedger extends AssetLedger {
  mint(to: Address, amount: bigint): void;

  /**
   * Burn amount from holder on behalf of spender. Throws
   * InsufficientTokenBalanceError when balance or allowance is short.
   */
  burnFrom(spender: Address, holder: Address, amount: bigint): void;

  /**
   * The reserve asset this token was paired with at deployment
   */
  reserveAsset(): AssetLedger;
}

// ============================================
// TRANSFER HOOKS
// ============================================

export interface TransferNotice {
  asset: Address;
  from: Address;
  to: Address;
  amount: bigint;
}

/**
 * Runs after balances move, inside the same call. Models assets that
 * hand control to the recipient during a transfer.
 */
export type TransferHook = (notice: TransferNotice) => void;
