/**
 * Reserve Accounting
 *
 * Pure queries over current ledger state. Nothing is cached: reserve
 * balance and managed supply can both move between calls.
 *
 *   reserveValue   = reserveBalance * SCALE / backingRatio
 *   excessReserves = max(0, reserveValue - managedSupply)
 */

import type { Address } from "viem";
import type { AssetLedger, ManagedTokenLedger } from "../ledger/types.js";
import { SCALE, maxZero, mulDiv, rescale } from "../math/fixed-point.js";

export interface ReserveAccountingOptions {
  treasury: Address;
  managedToken: ManagedTokenLedger;
  backingRatio: bigint;
  /** Current reserve pointer; it may be repointed between calls */
  reserveAsset: () => AssetLedger;
}

export class ReserveAccounting {
  private readonly treasury: Address;
  private readonly managedToken: ManagedTokenLedger;
  private readonly backingRatio: bigint;
  private readonly reserveAsset: () => AssetLedger;

  constructor(options: ReserveAccountingOptions) {
    this.treasury = options.treasury;
    this.managedToken = options.managedToken;
    this.backingRatio = options.backingRatio;
    this.reserveAsset = options.reserveAsset;
  }

  getBackingRatio(): bigint {
    return this.backingRatio;
  }

  reserveBalance(): bigint {
    return this.reserveAsset().balanceOf(this.treasury);
  }

  /**
   * Reserve holdings expressed in managed-token base units
   */
  reserveValue(): bigint {
    return mulDiv(this.reserveBalance(), SCALE, this.backingRatio, "reserve value over backing ratio");
  }

  excessReserves(): bigint {
    return maxZero(this.reserveValue() - this.managedToken.totalSupply());
  }

  /**
   * Convert a raw amount of asset into managed-token decimals
   */
  valueOfToken(asset: AssetLedger, amount: bigint): bigint {
    return rescale(amount, asset.decimals(), this.managedToken.decimals());
  }
}
