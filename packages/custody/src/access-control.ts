/**
 * @custodia/custody — Access control.
 *
 * One owner per engine, an owner-managed member set, and the two guards
 * every privileged operation starts with. Changes are journaled, so a
 * membership change made inside an operation that later fails is undone
 * with it.
 */

import type { Principal } from "@custodia/types";
import { isNullPrincipal } from "@custodia/types";
import type { Journal } from "@custodia/ledger";
import { CustodyError } from "./errors.js";

export type AccessChange =
  | {
      readonly type: "membership";
      readonly actor: Principal;
      readonly member: Principal;
      readonly change: "added" | "removed";
    }
  | {
      readonly type: "ownership";
      readonly actor: Principal;
      readonly from: Principal;
      readonly to: Principal;
    };

export type AccessListener = (change: AccessChange) => void;

export interface AccessSnapshot {
  readonly owner: Principal;
  readonly members: readonly Principal[];
}

export class AccessControl {
  private _owner: Principal;
  private readonly _members = new Set<Principal>();
  private readonly _journal: Journal;
  private readonly _listener: AccessListener | undefined;

  constructor(
    state: AccessSnapshot,
    journal: Journal,
    listener?: AccessListener,
  ) {
    if (isNullPrincipal(state.owner)) {
      throw new CustodyError("INVALID_INPUT", "Owner must not be the null principal");
    }
    this._owner = state.owner;
    for (const member of state.members) {
      if (isNullPrincipal(member)) {
        throw new CustodyError("INVALID_INPUT", "Members must not be the null principal");
      }
      this._members.add(member);
    }
    this._journal = journal;
    this._listener = listener;
  }

  // ─── Queries ────────────────────────────────────────────────────────

  get owner(): Principal {
    return this._owner;
  }

  isOwner(principal: Principal): boolean {
    return principal === this._owner;
  }

  /** Explicit membership only; the owner is privileged without it. */
  isMember(principal: Principal): boolean {
    return this._members.has(principal);
  }

  members(): readonly Principal[] {
    return [...this._members].sort();
  }

  snapshot(): AccessSnapshot {
    return { owner: this._owner, members: this.members() };
  }

  // ─── Guards ─────────────────────────────────────────────────────────

  requireOwner(caller: Principal): void {
    if (!this.isOwner(caller)) {
      throw new CustodyError("UNAUTHORIZED", `${caller} is not the owner`);
    }
  }

  requireMember(caller: Principal): void {
    if (!this.isOwner(caller) && !this.isMember(caller)) {
      throw new CustodyError("UNAUTHORIZED", `${caller} is not a member`);
    }
  }

  // ─── Mutations ──────────────────────────────────────────────────────

  addMember(caller: Principal, member: Principal): void {
    this.requireOwner(caller);
    if (isNullPrincipal(member)) {
      throw new CustodyError("INVALID_INPUT", "Cannot add the null principal as a member");
    }
    if (this._members.has(member)) {
      throw new CustodyError("INVALID_STATE", `${member} is already a member`);
    }

    this._members.add(member);
    this._journal.record(() => {
      this._members.delete(member);
    });
    this._listener?.({ type: "membership", actor: caller, member, change: "added" });
  }

  removeMember(caller: Principal, member: Principal): void {
    this.requireOwner(caller);
    if (!this._members.has(member)) {
      throw new CustodyError("INVALID_STATE", `${member} is not a member`);
    }

    this._members.delete(member);
    this._journal.record(() => {
      this._members.add(member);
    });
    this._listener?.({ type: "membership", actor: caller, member, change: "removed" });
  }

  transferOwnership(caller: Principal, to: Principal): void {
    this.requireOwner(caller);
    if (isNullPrincipal(to)) {
      throw new CustodyError("INVALID_INPUT", "Cannot transfer ownership to the null principal");
    }
    if (to === this._owner) {
      throw new CustodyError("INVALID_INPUT", `${to} already owns this ledger`);
    }

    const from = this._owner;
    this._owner = to;
    this._journal.record(() => {
      this._owner = from;
    });
    this._listener?.({ type: "ownership", actor: caller, from, to });
  }
}
