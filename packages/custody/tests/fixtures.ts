/**
 * Shared setup for engine tests.
 */

import type { Principal } from "@custodia/types";
import { CustodyEngine } from "../src/engine.js";
import type { CustodyEngineOptions, RecordDraft } from "../src/engine.js";
import { ManualClock } from "../src/clock.js";
import { CustodyError } from "../src/errors.js";
import type { CustodyErrorCode } from "../src/errors.js";
import { call } from "../src/identity.js";
import type { CallContext } from "../src/identity.js";
import { InMemoryValueTransfer } from "../src/value-transfer.js";

export const OWNER = "owner";
export const START = 1_000;

export interface Harness {
  readonly clock: ManualClock;
  readonly transfer: InMemoryValueTransfer;
  readonly engine: CustodyEngine;
  /** Call the engine with value attached, through the substrate. */
  pay<T>(caller: Principal, value: bigint, fn: (ctx: CallContext) => T): T;
}

export function setup(
  funded: readonly Principal[] = ["alice", "bob", "carol"],
  options: Partial<Omit<CustodyEngineOptions, "transfer" | "clock">> = {},
): Harness {
  const clock = new ManualClock(START);
  const transfer = new InMemoryValueTransfer();
  for (const principal of funded) {
    transfer.fund(principal, 1_000n);
  }
  const engine = new CustodyEngine({
    name: "test-ledger",
    owner: OWNER,
    ...options,
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

/** The CustodyError code `fn` throws, or undefined if it returns. */
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

// ─── Drafts ───────────────────────────────────────────────────────────

export function warrantyDraft(key: string, beneficiary: Principal): RecordDraft {
  return { key, kind: "warranty", value: 0n, beneficiary, payload: "", transferCount: 0 };
}

export function giftCardDraft(key: string, beneficiary: Principal, value: bigint): RecordDraft {
  return {
    key,
    kind: "gift-card",
    value,
    beneficiary,
    payload: "",
    designated: true,
    message: "",
  };
}

export function poolDraft(key: string): RecordDraft {
  return {
    key,
    kind: "treasury",
    value: 0n,
    beneficiary: OWNER,
    payload: "",
    totalDeposited: 0n,
    totalWithdrawn: 0n,
  };
}

export function eventDraft(key: string, organizer: Principal, deposit: bigint): RecordDraft {
  return {
    key,
    kind: "event",
    value: 0n,
    beneficiary: organizer,
    payload: "",
    name: key,
    deposit,
    capacity: 10,
    attendeeCount: 0,
  };
}

export function rsvpDraft(key: string, attendee: Principal, deposit: bigint, eventId = "party"): RecordDraft {
  return {
    key,
    kind: "rsvp",
    value: deposit,
    beneficiary: attendee,
    payload: "",
    eventId,
    hasCheckedIn: false,
  };
}
