/**
 * State Journal
 *
 * Execution substrate for treasury calls. Each call runs as one atomic
 * unit: every registered participant is checkpointed first, and if the
 * call throws, participants are restored newest-first before the error
 * is rethrown. Nested calls take their own checkpoints.
 */

import { treasuryLogger as logger } from "@ballast/shared";

const journalLogger = logger.child({ component: "state-journal" });

/**
 * Restores a participant to the state captured by checkpoint()
 */
export type Rollback = () => void;

/**
 * Anything whose state must roll back with a failed call.
 * Only participants registered before a call starts are restored.
 */
export interface Journaled {
  checkpoint(): Rollback;
}

export class StateJournal {
  private readonly participants = new Set<Journaled>();
  private depth = 0;
  private committed = 0;
  private rolledBack = 0;

  register(participant: Journaled): void {
    this.participants.add(participant);
  }

  unregister(participant: Journaled): void {
    this.participants.delete(participant);
  }

  isRegistered(participant: Journaled): boolean {
    return this.participants.has(participant);
  }

  /**
   * Run fn as a single all-or-nothing unit
   */
  atomically<T>(operation: string, fn: () => T): T {
    const rollbacks = Array.from(this.participants, (p) => p.checkpoint());
    this.depth++;

    try {
      const result = fn();
      this.committed++;
      return result;
    } catch (error) {
      for (let i = rollbacks.length - 1; i >= 0; i--) {
        rollbacks[i]();
      }
      this.rolledBack++;

      journalLogger.warn({
        operation,
        depth: this.depth,
        error: error instanceof Error ? error.name : String(error),
        reason: error instanceof Error ? error.message : undefined,
      }, "Operation rolled back");

      throw error;
    } finally {
      this.depth--;
    }
  }

  /**
   * True while any atomic unit is executing
   */
  inTransaction(): boolean {
    return this.depth > 0;
  }

  getStatistics(): { participants: number; committed: number; rolledBack: number } {
    return {
      participants: this.participants.size,
      committed: this.committed,
      rolledBack: this.rolledBack,
    };
  }
}

export function createStateJournal(): StateJournal {
  return new StateJournal();
}
