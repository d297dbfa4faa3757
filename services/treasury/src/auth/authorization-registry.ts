/**
 * Authorization Registry
 *
 * Owner plus two independent membership sets (minters, senders).
 * Grants and revokes are idempotent; callers emit the events.
 */

import { treasuryLogger as logger } from "@ballast/shared";
import type { Address } from "viem";
import { UnauthorizedError } from "../errors.js";
import type { Journaled, Rollback } from "../runtime/state-journal.js";

const registryLogger = logger.child({ component: "authorization-registry" });

export type MemberRole = "minter" | "sender";

export interface AuthorizationSnapshot {
  owner: Address;
  minters: Address[];
  senders: Address[];
}

export class AuthorizationRegistry implements Journaled {
  private owner: Address;
  private members: Record<MemberRole, Set<Address>> = {
    minter: new Set(),
    sender: new Set(),
  };

  constructor(owner: Address) {
    this.owner = owner;
    registryLogger.debug({ owner }, "AuthorizationRegistry initialized");
  }

  getOwner(): Address {
    return this.owner;
  }

  isOwner(account: Address): boolean {
    return account === this.owner;
  }

  hasRole(role: MemberRole, account: Address): boolean {
    return this.members[role].has(account);
  }

  requireOwner(caller: Address): void {
    if (!this.isOwner(caller)) {
      throw new UnauthorizedError(caller, "owner");
    }
  }

  requireRole(role: MemberRole, caller: Address): void {
    if (!this.hasRole(role, caller)) {
      throw new UnauthorizedError(caller, role);
    }
  }

  /**
   * Returns false when the account already held the role
   */
  grant(role: MemberRole, account: Address): boolean {
    const members = this.members[role];
    if (members.has(account)) return false;
    members.add(account);
    return true;
  }

  /**
   * Returns false when the account did not hold the role
   */
  revoke(role: MemberRole, account: Address): boolean {
    return this.members[role].delete(account);
  }

  transferOwnership(newOwner: Address): Address {
    const previous = this.owner;
    this.owner = newOwner;
    return previous;
  }

  list(role: MemberRole): Address[] {
    return Array.from(this.members[role]);
  }

  snapshot(): AuthorizationSnapshot {
    return {
      owner: this.owner,
      minters: this.list("minter"),
      senders: this.list("sender"),
    };
  }

  checkpoint(): Rollback {
    const owner = this.owner;
    const minters = new Set(this.members.minter);
    const senders = new Set(this.members.sender);
    return () => {
      this.owner = owner;
      this.members = { minter: minters, sender: senders };
    };
  }
}
