/**
 * Redemption Engine
 *
 * Burns managed tokens and pays out a proportional slice of every basket
 * asset, throttled by the payout percent:
 *
 *   share        = SCALE * amount / totalSupplyBefore
 *   proportional = balance * share / SCALE
 *   payout       = proportional * payoutPercent / 100
 *
 * Basket entries are paid in list order and each balance is read at its
 * own turn, so an asset listed twice pays a slice of what the first entry
 * left behind. Truncation losses stay in the treasury.
 */

import { treasuryLogger as logger } from "@ballast/shared";
import type { Address } from "viem";
import { DivideByZeroError, RedemptionInactiveError } from "../errors.js";
import type { AssetLedger, ManagedTokenLedger } from "../ledger/types.js";
import { applyFixed, applyPercent, toFixed } from "../math/fixed-point.js";
import type { InvariantChecker } from "../treasury/invariant-checker.js";
import type {
  RedemptionPayout,
  RedemptionReceipt,
  RedemptionState,
} from "../treasury/types.js";

const redemptionLogger = logger.child({ component: "redemption-engine" });

export interface RedemptionContext {
  state(): RedemptionState;
  basket(): readonly AssetLedger[];
}

export type RedemptionQuote = Omit<RedemptionReceipt, "redeemer">;

interface RedemptionTerms {
  totalSupplyBefore: bigint;
  share: bigint;
  payoutPercent: number;
}

export function computePayout(
  asset: AssetLedger,
  balanceBefore: bigint,
  share: bigint,
  payoutPercent: number
): RedemptionPayout {
  const proportional = applyFixed(balanceBefore, share);
  return {
    asset: asset.address,
    symbol: asset.symbol,
    balanceBefore,
    proportional,
    payout: applyPercent(proportional, payoutPercent),
  };
}

export class RedemptionEngine {
  constructor(
    private readonly treasury: Address,
    private readonly managedToken: ManagedTokenLedger,
    private readonly context: RedemptionContext,
    private readonly invariantChecker: InvariantChecker
  ) {}

  /**
   * What burnAndRedeem(amount) would pay right now, without moving funds
   */
  preview(amount: bigint): RedemptionQuote {
    const terms = this.resolveTerms(amount);

    // Mirror the fresh-read rule for assets listed more than once
    const paidSoFar = new Map<Address, bigint>();
    const payouts = this.context.basket().map((asset) => {
      const paid = paidSoFar.get(asset.address) ?? 0n;
      const result = computePayout(asset, asset.balanceOf(this.treasury) - paid, terms.share, terms.payoutPercent);
      paidSoFar.set(asset.address, paid + result.payout);
      return result;
    });

    return { amount, ...terms, payouts };
  }

  burnAndRedeem(redeemer: Address, amount: bigint, operationId?: string): RedemptionReceipt {
    const terms = this.resolveTerms(amount);
    const basket = [...this.context.basket()];

    this.managedToken.burnFrom(this.treasury, redeemer, amount);

    const payouts: RedemptionPayout[] = [];
    for (const asset of basket) {
      const balanceBefore = asset.balanceOf(this.treasury);
      const result = computePayout(asset, balanceBefore, terms.share, terms.payoutPercent);

      asset.transfer(this.treasury, redeemer, result.payout);

      this.invariantChecker.verifyPayout({
        payout: result.payout,
        balanceBefore,
        balanceAfter: asset.balanceOf(this.treasury),
      }, operationId);

      payouts.push(result);
    }

    redemptionLogger.info({
      redeemer,
      amount: amount.toString(),
      share: terms.share.toString(),
      payoutPercent: terms.payoutPercent,
      payouts: payouts.map((p) => ({ asset: p.symbol, payout: p.payout.toString() })),
    }, "Redemption completed");

    return { redeemer, amount, ...terms, payouts };
  }

  private resolveTerms(amount: bigint): RedemptionTerms {
    const state = this.context.state();
    if (!state.active) {
      throw new RedemptionInactiveError();
    }

    const totalSupplyBefore = this.managedToken.totalSupply();
    if (totalSupplyBefore === 0n) {
      throw new DivideByZeroError("redemption share against zero managed supply");
    }

    return {
      totalSupplyBefore,
      share: toFixed(amount, totalSupplyBefore, "redemption share"),
      payoutPercent: state.payoutPercent,
    };
  }
}
