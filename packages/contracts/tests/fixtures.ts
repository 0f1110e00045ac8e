/**
 * Shared setup for façade tests.
 */

import type { Principal } from "@custodia/types";
import {
  CustodyEngine,
  CustodyError,
  InMemoryValueTransfer,
  ManualClock,
  call,
} from "@custodia/custody";
import type { CallContext, CustodyErrorCode } from "@custodia/custody";

export const OWNER = "owner";
export const START = 1_000;
export const FUNDS = 1_000n;

export interface Harness {
  readonly clock: ManualClock;
  readonly transfer: InMemoryValueTransfer;
  readonly engine: CustodyEngine;
  pay<T>(caller: Principal, value: bigint, fn: (ctx: CallContext) => T): T;
}

export function setup(members: readonly Principal[] = []): Harness {
  const clock = new ManualClock(START);
  const transfer = new InMemoryValueTransfer();
  for (const principal of [OWNER, "alice", "bob", "carol", "dave"]) {
    transfer.fund(principal, FUNDS);
  }
  const engine = new CustodyEngine({
    name: "contracts-test",
    owner: OWNER,
    members,
    transfer,
    clock,
  });
  return {
    clock,
    transfer,
    engine,
    pay: (caller, value, fn) => {
      const ctx = call(caller, value);
      return transfer.invoke(ctx, () => fn(ctx));
    },
  };
}

export function codeOf(fn: () => unknown): CustodyErrorCode | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof CustodyError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}
