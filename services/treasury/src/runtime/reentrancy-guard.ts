/**
 * Reentrancy Guard
 *
 * One mutating call in flight per treasury instance. A ledger callback
 * that re-enters the treasury mid-call is rejected, which aborts the
 * outer call as well.
 */

import { ReentrantCallError } from "../errors.js";

export class ReentrancyGuard {
  private inFlight: string | undefined;

  run<T>(operation: string, fn: () => T): T {
    if (this.inFlight !== undefined) {
      throw new ReentrantCallError(operation, this.inFlight);
    }

    this.inFlight = operation;
    try {
      return fn();
    } finally {
      this.inFlight = undefined;
    }
  }

  isLocked(): boolean {
    return this.inFlight !== undefined;
  }

  current(): string | undefined {
    return this.inFlight;
  }
}
