/**
 * In-Memory Asset Ledger
 *
 * Journaled balance table implementing AssetLedger. Used to simulate
 * reserve and basket assets off-chain and in tests.
 */

import { decimalsSchema, logLedgerMovement } from "@ballast/shared";
import type { Address } from "viem";
import { InsufficientBalanceError, InvalidArgumentError } from "../errors.js";
import type { Rollback, StateJournal } from "../runtime/state-journal.js";
import { parseAddress, parseAmount } from "../validation.js";
import type { AssetLedger, TransferHook } from "./types.js";

export interface InMemoryAssetLedgerOptions {
  address: string;
  symbol: string;
  decimals?: number;
  journal?: StateJournal;
}

export class InMemoryAssetLedger implements AssetLedger {
  readonly address: Address;
  readonly symbol: string;

  private readonly tokenDecimals: number;
  private balances = new Map<Address, bigint>();
  private supply = 0n;
  private transferHook?: TransferHook;

  constructor(options: InMemoryAssetLedgerOptions) {
    this.address = parseAddress(options.address, "asset address");
    this.symbol = options.symbol;

    const decimals = decimalsSchema.safeParse(options.decimals ?? 18);
    if (!decimals.success) {
      throw new InvalidArgumentError("decimals", `unsupported value ${options.decimals}`);
    }
    this.tokenDecimals = decimals.data;

    options.journal?.register(this);
  }

  decimals(): number {
    return this.tokenDecimals;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  balanceOf(holder: Address): bigint {
    return this.balances.get(holder) ?? 0n;
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    parseAmount(amount);
    const available = this.balanceOf(from);
    if (available < amount) {
      throw new InsufficientBalanceError(this.address, from, amount, available);
    }

    this.balances.set(from, available - amount);
    this.balances.set(to, this.balanceOf(to) + amount);

    logLedgerMovement("debug", "transfer", {
      asset: this.symbol,
      from,
      to,
      amount: amount.toString(),
    });

    this.transferHook?.({ asset: this.address, from, to, amount });
  }

  /**
   * Credit newly created units to a holder, for seeding simulations
   */
  issue(to: string, amount: bigint): void {
    this.increase(parseAddress(to, "recipient"), parseAmount(amount));
  }

  setTransferHook(hook: TransferHook | undefined): void {
    this.transferHook = hook;
  }

  checkpoint(): Rollback {
    const balances = new Map(this.balances);
    const supply = this.supply;
    return () => {
      this.balances = balances;
      this.supply = supply;
    };
  }

  protected increase(holder: Address, amount: bigint): void {
    this.balances.set(holder, this.balanceOf(holder) + amount);
    this.supply += amount;
  }

  protected decrease(holder: Address, amount: bigint): void {
    this.balances.set(holder, this.balanceOf(holder) - amount);
    this.supply -= amount;
  }
}

export function createInMemoryAssetLedger(options: InMemoryAssetLedgerOptions): InMemoryAssetLedger {
  return new InMemoryAssetLedger(options);
}
