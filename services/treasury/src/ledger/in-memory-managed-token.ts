/**
 * In-Memory Managed Token
 *
 * Journaled managed-token ledger with allowances, mint and burn-from.
 */

import { logLedgerMovement } from "@ballast/shared";
import type { Address } from "viem";
import { InsufficientTokenBalanceError } from "../errors.js";
import type { Rollback } from "../runtime/state-journal.js";
import { parseAddress, parseAmount } from "../validation.js";
import {
  InMemoryAssetLedger,
  type InMemoryAssetLedgerOptions,
} from "./in-memory-asset-ledger.js";
import type { AssetLedger, ManagedTokenLedger } from "./types.js";

export interface InMemoryManagedTokenOptions extends InMemoryAssetLedgerOptions {
  reserveAsset: AssetLedger;
}

export class InMemoryManagedToken extends InMemoryAssetLedger implements ManagedTokenLedger {
  private readonly pairedReserve: AssetLedger;
  private allowances = new Map<Address, Map<Address, bigint>>();

  constructor(options: InMemoryManagedTokenOptions) {
    super(options);
    this.pairedReserve = options.reserveAsset;
  }

  reserveAsset(): AssetLedger {
    return this.pairedReserve;
  }

  mint(to: Address, amount: bigint): void {
    this.increase(to, parseAmount(amount));

    logLedgerMovement("debug", "mint", {
      asset: this.symbol,
      to,
      amount: amount.toString(),
    });
  }

  /**
   * Holder lets spender burn up to amount
   */
  approve(holder: string, spender: string, amount: bigint): void {
    const owner = parseAddress(holder, "holder");
    const approved = parseAddress(spender, "spender");
    const granted = this.allowances.get(owner) ?? new Map<Address, bigint>();
    granted.set(approved, parseAmount(amount));
    this.allowances.set(owner, granted);
  }

  allowance(holder: Address, spender: Address): bigint {
    return this.allowances.get(holder)?.get(spender) ?? 0n;
  }

  burnFrom(spender: Address, holder: Address, amount: bigint): void {
    parseAmount(amount);
    const balance = this.balanceOf(holder);
    const allowance = this.allowance(holder, spender);

    if (balance < amount || allowance < amount) {
      throw new InsufficientTokenBalanceError(this.address, holder, amount, balance, allowance);
    }

    this.allowances.get(holder)?.set(spender, allowance - amount);
    this.decrease(holder, amount);

    logLedgerMovement("debug", "burn", {
      asset: this.symbol,
      from: holder,
      amount: amount.toString(),
    });
  }

  override checkpoint(): Rollback {
    const restoreBalances = super.checkpoint();
    const allowances = new Map(
      Array.from(this.allowances, ([holder, granted]) => [holder, new Map(granted)] as const)
    );
    return () => {
      restoreBalances();
      this.allowances = allowances;
    };
  }
}

export function createInMemoryManagedToken(options: InMemoryManagedTokenOptions): InMemoryManagedToken {
  return new InMemoryManagedToken(options);
}
