/**
 * @custodia/custody — Value-transfer substrate.
 *
 * The engine never moves value itself. Payouts go through a ValueTransfer,
 * which reports failure as a value instead of throwing, and which must be
 * able to undo a settled transfer when the operation that made it rolls
 * back.
 *
 * `InMemoryValueTransfer` is the in-process substrate: funded accounts, a
 * single custody account, recipient hooks that run during `send` (the
 * re-entry point) and forced failures.
 */

import type { Principal } from "@custodia/types";
import { CustodyError } from "./errors.js";
import type { CallContext } from "./identity.js";

// =============================================================================
// Interface
// =============================================================================

export interface TransferRequest {
  /** Record the payout is made from */
  readonly key: string;
  readonly to: Principal;
  readonly amount: bigint;
  readonly reason: string;
}

export interface TransferReceipt {
  readonly id: string;
  readonly to: Principal;
  readonly amount: bigint;
}

export type TransferOutcome =
  | { readonly ok: true; readonly receipt: TransferReceipt }
  | { readonly ok: false; readonly reason: string };

export interface ValueTransfer {
  /** Move `amount` out of custody. Never throws for a refused transfer. */
  send(request: TransferRequest): TransferOutcome;

  /** Undo a settled transfer. Reverting twice has no further effect. */
  revert(receipt: TransferReceipt): void;

  /** Value currently held in custody, as the substrate sees it. */
  balance(): bigint;
}

/**
 * Runs when a transfer reaches its recipient. Throwing rejects the
 * transfer; everything the hook did through the substrate is undone.
 */
export type RecipientHook = (request: TransferRequest) => void;

// =============================================================================
// In-memory substrate
// =============================================================================

type Effect = () => void;

interface ReceiptEntry {
  readonly receipt: TransferReceipt;
  /** Substrate effects made by the recipient hook while it ran */
  readonly nested: readonly Effect[];
  reverted: boolean;
}

export class InMemoryValueTransfer implements ValueTransfer {
  private readonly _accounts = new Map<Principal, bigint>();
  private readonly _hooks = new Map<Principal, RecipientHook>();
  private readonly _failing = new Map<Principal, string>();
  private readonly _receipts = new Map<string, ReceiptEntry>();
  private readonly _frames: Effect[][] = [];
  private _custody = 0n;
  private _failNext: string | undefined;
  private _nextId = 1;

  // ─── Accounts ───────────────────────────────────────────────────────

  fund(principal: Principal, amount: bigint): void {
    if (amount <= 0n) {
      throw new RangeError(`Funding amount must be positive, got ${amount.toString()}`);
    }
    this._credit(principal, amount);
  }

  balanceOf(principal: Principal): bigint {
    return this._accounts.get(principal) ?? 0n;
  }

  balance(): bigint {
    return this._custody;
  }

  /**
   * Call into the engine with value attached. The value moves from the
   * caller's account into custody before `fn` runs and is returned if
   * `fn` throws.
   */
  invoke<T>(ctx: CallContext, fn: () => T): T {
    if (ctx.value === 0n) {
      return fn();
    }

    const available = this.balanceOf(ctx.caller);
    if (available < ctx.value) {
      throw new CustodyError(
        "INVALID_INPUT",
        `${ctx.caller} cannot attach ${ctx.value.toString()}: balance is ${available.toString()}`,
      );
    }

    this._credit(ctx.caller, -ctx.value);
    this._custody += ctx.value;

    let refunded = false;
    const refund: Effect = () => {
      if (refunded) return;
      refunded = true;
      this._custody -= ctx.value;
      this._credit(ctx.caller, ctx.value);
    };
    this._recordEffect(refund);

    try {
      return fn();
    } catch (error) {
      refund();
      throw error;
    }
  }

  // ─── Transfers ──────────────────────────────────────────────────────

  send(request: TransferRequest): TransferOutcome {
    if (request.amount <= 0n) {
      return { ok: false, reason: `Transfer amount must be positive, got ${request.amount.toString()}` };
    }

    const forced = this._failNext ?? this._failing.get(request.to);
    this._failNext = undefined;
    if (forced !== undefined) {
      return { ok: false, reason: forced };
    }

    if (this._custody < request.amount) {
      return {
        ok: false,
        reason: `Custody holds ${this._custody.toString()}, cannot send ${request.amount.toString()}`,
      };
    }

    this._custody -= request.amount;
    this._credit(request.to, request.amount);

    const nested: Effect[] = [];
    const hook = this._hooks.get(request.to);
    if (hook !== undefined) {
      this._frames.push(nested);
      try {
        hook(request);
      } catch (error) {
        unwind(nested);
        this._credit(request.to, -request.amount);
        this._custody += request.amount;
        return { ok: false, reason: `Recipient rejected transfer: ${errorMessage(error)}` };
      } finally {
        this._frames.pop();
      }
    }

    const receipt: TransferReceipt = {
      id: `transfer-${String(this._nextId++)}`,
      to: request.to,
      amount: request.amount,
    };
    this._receipts.set(receipt.id, { receipt, nested, reverted: false });
    this._recordEffect(() => {
      this.revert(receipt);
    });

    return { ok: true, receipt };
  }

  revert(receipt: TransferReceipt): void {
    const entry = this._receipts.get(receipt.id);
    if (entry === undefined) {
      throw new RangeError(`Unknown transfer receipt "${receipt.id}"`);
    }
    if (entry.reverted) {
      return;
    }
    entry.reverted = true;
    unwind(entry.nested);
    this._credit(receipt.to, -receipt.amount);
    this._custody += receipt.amount;
  }

  /** Settled transfers that have not been reverted, oldest first. */
  transfers(): readonly TransferReceipt[] {
    return [...this._receipts.values()]
      .filter((entry) => !entry.reverted)
      .map((entry) => entry.receipt);
  }

  // ─── Recipient hooks & failures ─────────────────────────────────────

  onReceive(principal: Principal, hook: RecipientHook): void {
    this._hooks.set(principal, hook);
  }

  clearHook(principal: Principal): void {
    this._hooks.delete(principal);
  }

  /** Refuse the next transfer, whoever it is for. */
  failNextTransfer(reason = "Transfer refused"): void {
    this._failNext = reason;
  }

  /** Refuse every transfer to `principal` until cleared. */
  failTransfersTo(principal: Principal, reason = "Recipient unreachable"): void {
    this._failing.set(principal, reason);
  }

  clearFailures(): void {
    this._failing.clear();
    this._failNext = undefined;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _credit(principal: Principal, amount: bigint): void {
    this._accounts.set(principal, this.balanceOf(principal) + amount);
  }

  private _recordEffect(effect: Effect): void {
    this._frames[this._frames.length - 1]?.push(effect);
  }
}

function unwind(effects: readonly Effect[]): void {
  for (let i = effects.length - 1; i >= 0; i--) {
    effects[i]?.();
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
