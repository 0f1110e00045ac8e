/**
 * Shared Treasury — one pooled balance that anyone can fund and members
 * can spend.
 */

import type { HistoryEntry, Principal, TreasuryRecord } from "@custodia/types";
import { CustodyError } from "@custodia/custody";
import type { CallContext, CustodyEngine } from "@custodia/custody";

export const DEFAULT_POOL_KEY = "treasury";

export class SharedTreasury {
  private constructor(
    readonly engine: CustodyEngine,
    readonly poolKey: string,
  ) {}

  /**
   * Attach to the pool under `poolKey`, creating it on behalf of the
   * owner when it does not exist yet.
   */
  static open(engine: CustodyEngine, ctx: CallContext, poolKey: string = DEFAULT_POOL_KEY): SharedTreasury {
    if (engine.get(poolKey) === undefined) {
      engine.create(
        ctx,
        {
          key: poolKey,
          kind: "treasury",
          value: 0n,
          beneficiary: engine.access.owner,
          payload: "",
          totalDeposited: 0n,
          totalWithdrawn: 0n,
        },
        { guard: "owner" },
      );
    } else {
      engine.requireKind(poolKey, "treasury");
    }
    return new SharedTreasury(engine, poolKey);
  }

  deposit(ctx: CallContext): TreasuryRecord {
    this.engine.deposit(ctx, this.poolKey);
    return this.pool();
  }

  /** Pay `amount` out of the pool, to the caller unless `recipient` is given. */
  withdraw(ctx: CallContext, amount: bigint, recipient?: Principal): TreasuryRecord {
    this.engine.withdraw(ctx, this.poolKey, amount, recipient);
    return this.pool();
  }

  balance(): bigint {
    return this.pool().value;
  }

  pool(): TreasuryRecord {
    return this.engine.requireKind(this.poolKey, "treasury");
  }

  isMember(principal: Principal): boolean {
    return this.engine.access.isOwner(principal) || this.engine.access.isMember(principal);
  }

  addMember(ctx: CallContext, member: Principal): void {
    this.engine.addMember(ctx, member);
  }

  removeMember(ctx: CallContext, member: Principal): void {
    this.engine.removeMember(ctx, member);
  }

  /** The last `n` pool movements, most recent first. */
  recentHistory(n: number): readonly HistoryEntry[] {
    if (!Number.isSafeInteger(n) || n < 0) {
      throw new CustodyError("INVALID_INPUT", `Expected a non-negative integer, got ${String(n)}`);
    }
    const entries = this.engine.historyOf(this.poolKey);
    return entries.slice(Math.max(0, entries.length - n)).reverse();
  }
}
