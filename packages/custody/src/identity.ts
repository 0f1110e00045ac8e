/**
 * @custodia/custody — Identity context.
 *
 * Every operation runs on behalf of exactly one caller, optionally with
 * value attached. The engine trusts the host to authenticate the caller.
 */

import type { Principal } from "@custodia/types";
import { isNullPrincipal } from "@custodia/types";
import { CustodyError } from "./errors.js";

export interface CallContext {
  readonly caller: Principal;
  /** Value attached to the call, in the smallest unit */
  readonly value: bigint;
}

export function call(caller: Principal, value: bigint = 0n): CallContext {
  return { caller, value };
}

/**
 * Reject malformed contexts before anything else looks at them.
 */
export function assertContext(ctx: CallContext): void {
  if (isNullPrincipal(ctx.caller)) {
    throw new CustodyError("UNAUTHORIZED", "Caller must not be the null principal");
  }
  if (ctx.value < 0n) {
    throw new CustodyError("INVALID_INPUT", `Attached value must be non-negative, got ${ctx.value.toString()}`);
  }
}

/** Non-payable operations reject attached value. */
export function requireNoValue(ctx: CallContext, operation: string): void {
  if (ctx.value !== 0n) {
    throw new CustodyError(
      "INVALID_INPUT",
      `${operation} does not accept value (attached ${ctx.value.toString()})`,
    );
  }
}

/** Payable operations that take an exact amount. */
export function requireExactValue(ctx: CallContext, expected: bigint, operation: string): void {
  if (ctx.value !== expected) {
    throw new CustodyError(
      "INVALID_INPUT",
      `${operation} requires exactly ${expected.toString()} attached, got ${ctx.value.toString()}`,
    );
  }
}
