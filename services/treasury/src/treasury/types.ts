/**
 * Treasury Types
 *
 * Types for the reserve-backed treasury:
 * - Redemption state and basket payouts
 * - Mint receipts
 * - Backing invariant checks
 * - Event records
 * - Treasury state snapshot
 */

import type { Address } from "viem";
import type { AssetLedger, ManagedTokenLedger } from "../ledger/types.js";
import type { StateJournal } from "../runtime/state-journal.js";
import type { TreasuryConfig } from "../config.js";

// ============================================
// REDEMPTION
// ============================================

export interface RedemptionState {
  active: boolean;
  /** Integer in [0, 100) */
  payoutPercent: number;
}

export interface RedemptionPayout {
  asset: Address;
  symbol: string;
  /** Treasury balance read at this entry's turn */
  balanceBefore: bigint;
  /** balanceBefore * share / SCALE */
  proportional: bigint;
  /** proportional * payoutPercent / 100, the amount transferred */
  payout: bigint;
}

export interface RedemptionReceipt {
  redeemer: Address;
  amount: bigint;
  totalSupplyBefore: bigint;
  /** SCALE * amount / totalSupplyBefore */
  share: bigint;
  payoutPercent: number;
  payouts: RedemptionPayout[];
}

// ============================================
// MINTING
// ============================================

export interface MintReceipt {
  to: Address;
  amount: bigint;
  excessBefore: bigint;
  totalSupplyAfter: bigint;
}

// ============================================
// INVARIANT CHECKS
// ============================================

export type InvariantCheckType =
  | "mint_supply_delta"   // supply grew by exactly the minted amount
  | "mint_backing"        // supply after a mint stays within reserve value
  | "payout_delta";       // treasury balance fell by exactly the payout

export interface InvariantCheckResult {
  passed: boolean;
  checkType: InvariantCheckType;
  expected: bigint;
  actual: bigint;
  discrepancy: bigint;
  operationId?: string;
  timestamp: number;
  errorMessage?: string;
}

export interface InvariantStatistics {
  totalChecks: number;
  passedChecks: number;
  failedChecks: number;
  successRate: number;
  healthScore: number;
}

// ============================================
// EVENTS
// ============================================

export interface TreasuryEventPayloads {
  "redemption:activated": { payoutPercent: number };
  "basket:replaced": { assets: Address[] };
  "minter:added": { account: Address };
  "minter:removed": { account: Address };
  "sender:added": { account: Address };
  "sender:removed": { account: Address };
  "reserve:updated": { previous: Address; current: Address };
  "owner:transferred": { previous: Address; current: Address };
  "tokens:minted": { to: Address; amount: bigint; excessBefore: bigint };
  "tokens:redeemed": { amount: bigint; share: bigint; payouts: RedemptionPayout[] };
  "treasury:transferred": { asset: Address; to: Address; amount: bigint };
}

export type TreasuryEventName = keyof TreasuryEventPayloads;

export interface TreasuryEventRecord<N extends TreasuryEventName = TreasuryEventName> {
  id: string;
  name: N;
  actor: Address;
  payload: TreasuryEventPayloads[N];
  createdAt: number;
}

export type TreasuryEvents = {
  [N in TreasuryEventName]: (record: TreasuryEventRecord<N>) => void;
};

// ============================================
// CONSTRUCTION
// ============================================

export interface TreasuryOptions {
  /** Account that holds the treasury's balances on every ledger */
  address: string;
  /** Initial owner, normally the deployer */
  owner: string;
  managedToken: ManagedTokenLedger;
  /** Defaults to the managed token's paired reserve asset */
  reserveAsset?: AssetLedger;
  journal: StateJournal;
  config?: Partial<TreasuryConfig>;
}

// ============================================
// TREASURY STATE
// ============================================

export interface TreasuryState {
  address: Address;
  owner: Address;

  managedToken: {
    address: Address;
    symbol: string;
    decimals: number;
    totalSupply: bigint;
  };

  reserve: {
    address: Address;
    symbol: string;
    balance: bigint;
    value: bigint;
  };

  backingRatio: bigint;
  excessReserves: bigint;

  redemption: RedemptionState;
  basket: Address[];

  minters: Address[];
  senders: Address[];

  invariants: InvariantStatistics;
  eventCount: number;
}
