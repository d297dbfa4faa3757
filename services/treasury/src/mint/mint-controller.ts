/**
 * Mint Controller
 *
 * Gates managed-token minting on the approved-minter set and on the
 * excess-reserve ceiling, recomputed per request. There is no
 * reservation: each mint lowers the ceiling seen by the next one.
 */

import { treasuryLogger as logger } from "@ballast/shared";
import { formatUnits, type Address } from "viem";
import type { ReserveAccounting } from "../accounting/reserve-accounting.js";
import type { AuthorizationRegistry } from "../auth/authorization-registry.js";
import { InsufficientBackingError } from "../errors.js";
import type { ManagedTokenLedger } from "../ledger/types.js";
import type { InvariantChecker } from "../treasury/invariant-checker.js";
import type { MintReceipt } from "../treasury/types.js";

const mintLogger = logger.child({ component: "mint-controller" });

export class MintController {
  constructor(
    private readonly managedToken: ManagedTokenLedger,
    private readonly accounting: ReserveAccounting,
    private readonly registry: AuthorizationRegistry,
    private readonly invariantChecker: InvariantChecker
  ) {}

  mint(caller: Address, to: Address, amount: bigint, operationId?: string): MintReceipt {
    this.registry.requireRole("minter", caller);

    const excessBefore = this.accounting.excessReserves();
    if (amount > excessBefore) {
      throw new InsufficientBackingError(amount, excessBefore);
    }

    const supplyBefore = this.managedToken.totalSupply();
    this.managedToken.mint(to, amount);
    const supplyAfter = this.managedToken.totalSupply();

    this.invariantChecker.verifyMint({
      amount,
      supplyBefore,
      supplyAfter,
      reserveValue: this.accounting.reserveValue(),
    }, operationId);

    mintLogger.info({
      caller,
      to,
      amount: amount.toString(),
      excessBefore: excessBefore.toString(),
      totalSupply: supplyAfter.toString(),
    }, `Minted ${formatUnits(amount, this.managedToken.decimals())} ${this.managedToken.symbol}`);

    return {
      to,
      amount,
      excessBefore,
      totalSupplyAfter: supplyAfter,
    };
  }
}
