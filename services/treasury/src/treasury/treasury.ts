/**
 * Treasury
 *
 * Single authorization-checked entry surface over:
 * - reserve accounting (excess reserves, asset valuation)
 * - minting against the excess-reserve ceiling
 * - proportional burn-and-redeem across the basket
 * - privileged transfers by approved senders
 * - owner administration of roles, basket, reserve and redemption
 *
 * Every mutating call runs under the reentrancy guard and as one atomic
 * unit of the state journal. Events are published only after the unit
 * commits.
 */

import { EventEmitter } from "eventemitter3";
import * as crypto from "crypto";
import {
  audit,
  percentSchema,
  treasuryLogger as logger,
  TREASURY_DEFAULTS,
} from "@ballast/shared";
import type { Address } from "viem";
import { ReserveAccounting } from "../accounting/reserve-accounting.js";
import { AuthorizationRegistry, type MemberRole } from "../auth/authorization-registry.js";
import { resolveTreasuryConfig, type TreasuryConfig } from "../config.js";
import { InvalidPercentageError } from "../errors.js";
import type { AssetLedger, ManagedTokenLedger } from "../ledger/types.js";
import { MintController } from "../mint/mint-controller.js";
import { RedemptionEngine, type RedemptionQuote } from "../redemption/redemption-engine.js";
import { ReentrancyGuard } from "../runtime/reentrancy-guard.js";
import type { Journaled, Rollback, StateJournal } from "../runtime/state-journal.js";
import { parseAddress, parseAmount } from "../validation.js";
import { InvariantChecker, createInvariantChecker } from "./invariant-checker.js";
import type {
  InvariantCheckResult,
  InvariantStatistics,
  MintReceipt,
  RedemptionReceipt,
  RedemptionState,
  TreasuryEventName,
  TreasuryEventPayloads,
  TreasuryEventRecord,
  TreasuryEvents,
  TreasuryOptions,
  TreasuryState,
} from "./types.js";

const treasuryLogger = logger.child({ component: "treasury" });

interface TreasurySettings {
  reserveAsset: AssetLedger;
  redemption: RedemptionState;
  basket: AssetLedger[];
}

// ============================================
// TREASURY
// ============================================

export class Treasury extends EventEmitter<TreasuryEvents> implements Journaled {
  readonly address: Address;
  readonly managedToken: ManagedTokenLedger;

  private readonly config: TreasuryConfig;
  private readonly journal: StateJournal;
  private readonly guard = new ReentrancyGuard();

  // Components
  private readonly registry: AuthorizationRegistry;
  private readonly accounting: ReserveAccounting;
  private readonly invariantChecker: InvariantChecker;
  private readonly mintController: MintController;
  private readonly redemptionEngine: RedemptionEngine;

  // State
  private settings: TreasurySettings;
  private readonly events: TreasuryEventRecord[] = [];

  constructor(options: TreasuryOptions) {
    super();
    this.address = parseAddress(options.address, "treasury address");
    this.managedToken = options.managedToken;
    this.config = resolveTreasuryConfig(options.config);
    this.journal = options.journal;

    this.settings = {
      reserveAsset: options.reserveAsset ?? options.managedToken.reserveAsset(),
      redemption: { active: false, payoutPercent: 0 },
      basket: [],
    };

    this.registry = new AuthorizationRegistry(parseAddress(options.owner, "owner"));
    this.accounting = new ReserveAccounting({
      treasury: this.address,
      managedToken: this.managedToken,
      backingRatio: this.config.backingRatio,
      reserveAsset: () => this.settings.reserveAsset,
    });
    this.invariantChecker = createInvariantChecker({
      enabled: this.config.invariantChecks,
      maxHistorySize: this.config.invariantHistoryLimit,
    });
    this.mintController = new MintController(
      this.managedToken,
      this.accounting,
      this.registry,
      this.invariantChecker
    );
    this.redemptionEngine = new RedemptionEngine(
      this.address,
      this.managedToken,
      {
        state: () => this.settings.redemption,
        basket: () => this.settings.basket,
      },
      this.invariantChecker
    );

    this.enrol(this.managedToken, this.settings.reserveAsset);
    this.journal.register(this);

    treasuryLogger.info({
      address: this.address,
      owner: this.registry.getOwner(),
      managedToken: this.managedToken.address,
      reserveAsset: this.settings.reserveAsset.address,
      backingRatio: this.config.backingRatio.toString(),
    }, "Treasury initialized");
  }

  // ============================================
  // MINTING
  // ============================================

  mint(caller: string, to: string, amount: bigint): MintReceipt {
    const actor = parseAddress(caller, "caller");
    const recipient = parseAddress(to, "recipient");
    parseAmount(amount);
    const operationId = crypto.randomUUID();

    const receipt = this.execute("mint", () =>
      this.mintController.mint(actor, recipient, amount, operationId)
    );

    this.notify("tokens:minted", () => this.emit("tokens:minted", this.record(operationId, "tokens:minted", actor, {
      to: recipient,
      amount,
      excessBefore: receipt.excessBefore,
    })));
    return receipt;
  }

  // ============================================
  // REDEMPTION
  // ============================================

  burnAndRedeem(caller: string, amount: bigint): RedemptionReceipt {
    const redeemer = parseAddress(caller, "caller");
    parseAmount(amount);
    const operationId = crypto.randomUUID();

    const receipt = this.execute("burnAndRedeem", () =>
      this.redemptionEngine.burnAndRedeem(redeemer, amount, operationId)
    );

    this.notify("tokens:redeemed", () => this.emit("tokens:redeemed", this.record(operationId, "tokens:redeemed", redeemer, {
      amount,
      share: receipt.share,
      payouts: receipt.payouts,
    })));
    return receipt;
  }

  previewRedeem(amount: bigint): RedemptionQuote {
    return this.redemptionEngine.preview(parseAmount(amount));
  }

  // ============================================
  // PRIVILEGED TRANSFER
  // ============================================

  /**
   * Move treasury holdings out. Gated only by the approved-sender set.
   */
  transferFromTreasury(caller: string, asset: AssetLedger, to: string, amount: bigint): void {
    const actor = parseAddress(caller, "caller");
    const recipient = parseAddress(to, "recipient");
    parseAmount(amount);
    const operationId = crypto.randomUUID();
    this.enrol(asset);

    this.execute("transferFromTreasury", () => {
      this.registry.requireRole("sender", actor);
      asset.transfer(this.address, recipient, amount);
    });

    treasuryLogger.info({
      caller: actor,
      asset: asset.symbol,
      to: recipient,
      amount: amount.toString(),
    }, "Treasury transfer executed");

    this.notify("treasury:transferred", () => this.emit("treasury:transferred", this.record(operationId, "treasury:transferred", actor, {
      asset: asset.address,
      to: recipient,
      amount,
    })));
  }

  // ============================================
  // ADMINISTRATION
  // ============================================

  /**
   * Enable redemption at the given payout percent. There is no way to
   * switch redemption off again, only to change the percent.
   */
  setRedemptionActive(caller: string, percent: number): void {
    const actor = parseAddress(caller, "caller");
    const operationId = crypto.randomUUID();

    this.execute("setRedemptionActive", () => {
      this.registry.requireOwner(actor);
      if (!percentSchema.safeParse(percent).success || percent >= TREASURY_DEFAULTS.payoutPercentCeiling) {
        throw new InvalidPercentageError(percent);
      }
      this.settings.redemption = { active: true, payoutPercent: percent };
    });

    this.notify("redemption:activated", () => this.emit("redemption:activated", this.recordAdmin(operationId, "redemption:activated", actor, {
      payoutPercent: percent,
    })));
  }

  /**
   * Replace the basket wholesale. Order and duplicates are kept as given.
   */
  setRedeemableTokens(caller: string, assets: readonly AssetLedger[]): void {
    const actor = parseAddress(caller, "caller");
    const operationId = crypto.randomUUID();
    this.enrol(...assets);

    this.execute("setRedeemableTokens", () => {
      this.registry.requireOwner(actor);
      this.settings.basket = [...assets];
    });

    this.notify("basket:replaced", () => this.emit("basket:replaced", this.recordAdmin(operationId, "basket:replaced", actor, {
      assets: assets.map((asset) => asset.address),
    })));
  }

  addApprovedMinter(caller: string, account: string): void {
    const { actor, member, operationId } = this.updateMembership("addApprovedMinter", "minter", true, caller, account);
    this.notify("minter:added", () => this.emit("minter:added", this.recordAdmin(operationId, "minter:added", actor, { account: member })));
  }

  removeApprovedMinter(caller: string, account: string): void {
    const { actor, member, operationId } = this.updateMembership("removeApprovedMinter", "minter", false, caller, account);
    this.notify("minter:removed", () => this.emit("minter:removed", this.recordAdmin(operationId, "minter:removed", actor, { account: member })));
  }

  addApprovedSender(caller: string, account: string): void {
    const { actor, member, operationId } = this.updateMembership("addApprovedSender", "sender", true, caller, account);
    this.notify("sender:added", () => this.emit("sender:added", this.recordAdmin(operationId, "sender:added", actor, { account: member })));
  }

  removeApprovedSender(caller: string, account: string): void {
    const { actor, member, operationId } = this.updateMembership("removeApprovedSender", "sender", false, caller, account);
    this.notify("sender:removed", () => this.emit("sender:removed", this.recordAdmin(operationId, "sender:removed", actor, { account: member })));
  }

  /**
   * Repoint the reserve asset. Balances held in the old reserve are not
   * moved; that is an operator task.
   */
  updateReserveAsset(caller: string, asset: AssetLedger): void {
    const actor = parseAddress(caller, "caller");
    const operationId = crypto.randomUUID();
    this.enrol(asset);

    const previous = this.execute("updateReserveAsset", () => {
      this.registry.requireOwner(actor);
      const current = this.settings.reserveAsset;
      this.settings.reserveAsset = asset;
      return current;
    });

    this.notify("reserve:updated", () => this.emit("reserve:updated", this.recordAdmin(operationId, "reserve:updated", actor, {
      previous: previous.address,
      current: asset.address,
    })));
  }

  transferOwnership(caller: string, newOwner: string): void {
    const actor = parseAddress(caller, "caller");
    const next = parseAddress(newOwner, "new owner");
    const operationId = crypto.randomUUID();

    const previous = this.execute("transferOwnership", () => {
      this.registry.requireOwner(actor);
      return this.registry.transferOwnership(next);
    });

    this.notify("owner:transferred", () => this.emit("owner:transferred", this.recordAdmin(operationId, "owner:transferred", actor, {
      previous,
      current: next,
    })));
  }

  // ============================================
  // QUERIES
  // ============================================

  excessReserves(): bigint {
    return this.accounting.excessReserves();
  }

  reserveValue(): bigint {
    return this.accounting.reserveValue();
  }

  valueOfToken(asset: AssetLedger, amount: bigint): bigint {
    return this.accounting.valueOfToken(asset, parseAmount(amount));
  }

  getOwner(): Address {
    return this.registry.getOwner();
  }

  isApprovedMinter(account: string): boolean {
    return this.registry.hasRole("minter", parseAddress(account, "account"));
  }

  isApprovedSender(account: string): boolean {
    return this.registry.hasRole("sender", parseAddress(account, "account"));
  }

  getReserveAsset(): AssetLedger {
    return this.settings.reserveAsset;
  }

  getRedeemableTokens(): AssetLedger[] {
    return [...this.settings.basket];
  }

  getRedemptionState(): RedemptionState {
    return { ...this.settings.redemption };
  }

  getState(): TreasuryState {
    const reserve = this.settings.reserveAsset;
    const roles = this.registry.snapshot();

    return {
      address: this.address,
      owner: roles.owner,
      managedToken: {
        address: this.managedToken.address,
        symbol: this.managedToken.symbol,
        decimals: this.managedToken.decimals(),
        totalSupply: this.managedToken.totalSupply(),
      },
      reserve: {
        address: reserve.address,
        symbol: reserve.symbol,
        balance: this.accounting.reserveBalance(),
        value: this.accounting.reserveValue(),
      },
      backingRatio: this.accounting.getBackingRatio(),
      excessReserves: this.accounting.excessReserves(),
      redemption: this.getRedemptionState(),
      basket: this.settings.basket.map((asset) => asset.address),
      minters: roles.minters,
      senders: roles.senders,
      invariants: this.invariantChecker.getStatistics(),
      eventCount: this.events.length,
    };
  }

  getRecentEvents(limit = 100): TreasuryEventRecord[] {
    return this.events.slice(-limit);
  }

  getInvariantStatistics(): InvariantStatistics {
    return this.invariantChecker.getStatistics();
  }

  getInvariantHistory(limit = 100): InvariantCheckResult[] {
    return this.invariantChecker.getHistory(limit);
  }

  /**
   * True while a mutating call is in flight
   */
  isBusy(): boolean {
    return this.guard.isLocked();
  }

  checkpoint(): Rollback {
    const restoreRoles = this.registry.checkpoint();
    const saved: TreasurySettings = {
      reserveAsset: this.settings.reserveAsset,
      redemption: { ...this.settings.redemption },
      basket: [...this.settings.basket],
    };
    return () => {
      restoreRoles();
      this.settings = saved;
    };
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  /**
   * Ledgers join the journal before any call that may move their balances
   */
  private enrol(...assets: readonly AssetLedger[]): void {
    for (const asset of assets) {
      this.journal.register(asset);
    }
  }

  /**
   * Publish after commit. A failing listener is logged; the committed
   * result still reaches the caller.
   */
  private notify(event: TreasuryEventName, publish: () => void): void {
    try {
      publish();
    } catch (error) {
      treasuryLogger.error({
        event,
        error: error instanceof Error ? error.message : String(error),
      }, "Event listener failed");
    }
  }

  private execute<T>(operation: string, fn: () => T): T {
    return this.guard.run(operation, () => this.journal.atomically(operation, fn));
  }

  private updateMembership(
    operation: string,
    role: MemberRole,
    grant: boolean,
    caller: string,
    account: string
  ): { actor: Address; member: Address; operationId: string } {
    const actor = parseAddress(caller, "caller");
    const member = parseAddress(account, "account");
    const operationId = crypto.randomUUID();

    this.execute(operation, () => {
      this.registry.requireOwner(actor);
      if (grant) {
        this.registry.grant(role, member);
      } else {
        this.registry.revoke(role, member);
      }
    });

    return { actor, member, operationId };
  }

  private record<N extends TreasuryEventName>(
    id: string,
    name: N,
    actor: Address,
    payload: TreasuryEventPayloads[N]
  ): TreasuryEventRecord<N> {
    const record: TreasuryEventRecord<N> = {
      id,
      name,
      actor,
      payload,
      createdAt: Date.now(),
    };

    this.events.push(record);
    if (this.events.length > this.config.eventHistoryLimit) {
      this.events.splice(0, this.events.length - this.config.eventHistoryLimit);
    }

    return record;
  }

  private recordAdmin<N extends TreasuryEventName>(
    id: string,
    name: N,
    actor: Address,
    payload: TreasuryEventPayloads[N]
  ): TreasuryEventRecord<N> {
    audit({
      action: name,
      entityType: "treasury",
      entityId: this.address,
      actor,
      details: { payload },
    });
    return this.record(id, name, actor, payload);
  }
}

/**
 * Factory function
 */
export function createTreasury(options: TreasuryOptions): Treasury {
  return new Treasury(options);
}
