/**
 * Tests for CustodyEngine.
 *
 * Verifies:
 * - Create: guards, key uniqueness, attached value, draft validation
 * - Transitions: transfer, void, redeem, cancel, expire, check-in
 * - Pools: deposit and partial withdrawal
 * - Time bounds at expiresAt - 1 vs expiresAt
 * - Membership and ownership changes
 * - Reads: inspect projection, pages, history
 * - Snapshot / restore
 */

import { describe, it, expect } from "vitest";
import { pino } from "pino";
import { CustodyEngine } from "../src/engine.js";
import { call } from "../src/identity.js";
import {
  OWNER,
  START,
  codeOf,
  eventDraft,
  giftCardDraft,
  poolDraft,
  rsvpDraft,
  setup,
  warrantyDraft,
} from "./fixtures.js";

// =============================================================================
// Create
// =============================================================================

describe("create", () => {
  it("owner creates a warranty with an expiry", () => {
    const { engine } = setup();
    const record = engine.create(call(OWNER), warrantyDraft("K1", "bob"), {
      guard: "owner",
      duration: 365,
    });

    expect(record).toMatchObject({
      key: "K1",
      status: "active",
      beneficiary: "bob",
      depositor: OWNER,
      createdAt: START,
      expiresAt: START + 365,
    });
    expect(engine.recentHistory(1)).toEqual([
      {
        sequence: 1,
        key: "K1",
        kind: "warranty",
        action: "created",
        actor: OWNER,
        counterparty: "bob",
        amount: 0n,
        reason: "",
        timestamp: START,
      },
    ]);
    expect(engine.events.readAll().map((e) => e.event.type)).toEqual(["record.created"]);
  });

  it("leaves no trace when the caller lacks the privilege", () => {
    const { engine } = setup();

    expect(
      codeOf(() => engine.create(call("alice"), warrantyDraft("K1", "bob"), { guard: "owner" })),
    ).toBe("UNAUTHORIZED");
    expect(engine.get("K1")).toBeUndefined();
    expect(engine.recentHistory(10)).toEqual([]);
    expect(engine.events.globalPosition()).toBe(0);
  });

  it("admits members to member-gated creation", () => {
    const { engine } = setup();
    engine.addMember(call(OWNER), "alice");

    engine.create(call("alice"), warrantyDraft("K1", "bob"), { guard: "member" });
    expect(engine.get("K1")?.depositor).toBe("alice");
    expect(
      codeOf(() => engine.create(call("carol"), warrantyDraft("K2", "bob"), { guard: "member" })),
    ).toBe("UNAUTHORIZED");
  });

  it("never reuses a key, even after a terminal status", () => {
    const { engine } = setup();
    engine.create(call(OWNER), warrantyDraft("K1", "bob"), { guard: "owner" });
    engine.void(call(OWNER), "K1", "recall");

    expect(
      codeOf(() => engine.create(call(OWNER), warrantyDraft("K1", "carol"), { guard: "owner" })),
    ).toBe("ALREADY_EXISTS");
    expect(engine.get("K1")?.beneficiary).toBe("bob");
  });

  it("requires the attached value to match the record value", () => {
    const { engine, transfer, pay } = setup();

    expect(
      codeOf(() =>
        pay("alice", 40n, (ctx) =>
          engine.create(ctx, giftCardDraft("c1", "bob", 50n), { guard: "open" }),
        ),
      ),
    ).toBe("INVALID_INPUT");
    expect(
      codeOf(() =>
        pay("alice", 1n, (ctx) =>
          engine.create(ctx, warrantyDraft("K1", "bob"), { guard: "open" }),
        ),
      ),
    ).toBe("INVALID_INPUT");
    expect(transfer.balanceOf("alice")).toBe(1_000n);
  });

  it("rejects malformed drafts before writing", () => {
    const { engine } = setup();
    const owner = call(OWNER);

    expect(codeOf(() => engine.create(owner, warrantyDraft("K1", "  "), { guard: "owner" }))).toBe("INVALID_INPUT");
    expect(codeOf(() => engine.create(owner, warrantyDraft("", "bob"), { guard: "owner" }))).toBe("INVALID_INPUT");
    expect(
      codeOf(() => engine.create(owner, warrantyDraft("K1", "bob"), { guard: "owner", duration: 0 })),
    ).toBe("INVALID_INPUT");
    expect(
      codeOf(() =>
        engine.create(owner, warrantyDraft("K1", "bob"), {
          guard: "owner",
          duration: 10,
          expiresAt: START + 10,
        }),
      ),
    ).toBe("INVALID_INPUT");
    expect(engine.get("K1")).toBeUndefined();
  });

  it("credits custody for a funded record", () => {
    const { engine, pay } = setup();
    pay("alice", 50n, (ctx) => engine.create(ctx, giftCardDraft("c1", "bob", 50n), { guard: "open" }));

    expect(engine.reconcile()).toEqual({
      custodied: 50n,
      recordTotal: 50n,
      substrate: 50n,
      balanced: true,
    });
  });
});

// =============================================================================
// Transfer
// =============================================================================

describe("transfer", () => {
  it("moves a warranty to a new beneficiary", () => {
    const { engine } = setup();
    engine.create(call(OWNER), warrantyDraft("K1", "bob"), { guard: "owner", duration: 365 });

    const moved = engine.transfer(call("bob"), "K1", "carol");

    expect(moved).toMatchObject({ status: "transferred", beneficiary: "carol", transferCount: 1 });
    expect(engine.historyOf("K1").map((e) => e.action)).toEqual(["created", "transferred"]);
  });

  it("only the current beneficiary may transfer", () => {
    const { engine } = setup();
    engine.create(call(OWNER), warrantyDraft("K1", "bob"), { guard: "owner" });

    expect(codeOf(() => engine.transfer(call("alice"), "K1", "carol"))).toBe("UNAUTHORIZED");
    expect(codeOf(() => engine.transfer(call(OWNER), "K1", "carol"))).toBe("UNAUTHORIZED");
    expect(codeOf(() => engine.transfer(call("bob"), "K9", "carol"))).toBe("NOT_FOUND");
  });

  it("succeeds one second before expiry and fails at expiry", () => {
    const { engine, clock } = setup();
    engine.create(call(OWNER), warrantyDraft("A", "bob"), { guard: "owner", duration: 10 });
    engine.create(call(OWNER), warrantyDraft("B", "bob"), { guard: "owner", duration: 10 });

    clock.set(START + 9);
    expect(engine.transfer(call("bob"), "A", "carol").status).toBe("transferred");

    clock.set(START + 10);
    expect(codeOf(() => engine.transfer(call("bob"), "B", "carol"))).toBe("EXPIRED");
    expect(engine.get("B")?.status).toBe("active");
  });

  it("refuses terminal records and attached value", () => {
    const { engine, transfer, pay } = setup();
    engine.create(call(OWNER), warrantyDraft("K1", "bob"), { guard: "owner" });

    expect(codeOf(() => pay("bob", 5n, (ctx) => engine.transfer(ctx, "K1", "carol")))).toBe("INVALID_INPUT");
    expect(transfer.balanceOf("bob")).toBe(1_000n);

    engine.void(call(OWNER), "K1", "recall");
    expect(codeOf(() => engine.transfer(call("bob"), "K1", "carol"))).toBe("INVALID_STATE");
  });
});

// =============================================================================
// Void
// =============================================================================

describe("void", () => {
  it("is owner-only by default", () => {
    const { engine } = setup();
    engine.create(call(OWNER), warrantyDraft("K1", "bob"), { guard: "owner" });

    expect(codeOf(() => engine.void(call("bob"), "K1", "mine"))).toBe("UNAUTHORIZED");
    expect(engine.void(call(OWNER), "K1", "tamper").status).toBe("voided");
    expect(engine.inspect("K1")?.statusText).toBe("Voided: tamper");
  });

  it("keeps custodied value, pays nothing and ignores expiry", () => {
    const { engine, transfer, clock, pay } = setup();
    pay("alice", 100n, (ctx) =>
      engine.create(ctx, giftCardDraft("c1", "bob", 100n), { guard: "open", duration: 10 }),
    );

    clock.set(START + 500);
    engine.void(call(OWNER), "c1", "fraud");

    expect(engine.inspect("c1")).toMatchObject({ status: "voided", valid: false, value: 100n });
    expect(transfer.transfers()).toEqual([]);
    expect(engine.reconcile().balanced).toBe(true);
  });

  it("admits the depositor when asked to", () => {
    const { engine, pay } = setup();
    pay("alice", 10n, (ctx) => engine.create(ctx, giftCardDraft("c1", "bob", 10n), { guard: "open" }));

    expect(codeOf(() => engine.void(call("bob"), "c1", "", "depositor"))).toBe("UNAUTHORIZED");
    expect(engine.void(call("alice"), "c1", "", "depositor").status).toBe("voided");
  });
});

// =============================================================================
// Redeem / cancel / expire / check-in
// =============================================================================

describe("redeem", () => {
  it("pays the beneficiary exactly once", () => {
    const { engine, transfer, pay } = setup();
    pay("alice", 100n, (ctx) => engine.create(ctx, giftCardDraft("c1", "bob", 100n), { guard: "open" }));

    const redeemed = engine.redeem(call("bob"), "c1", { guard: "beneficiary" });

    expect(redeemed).toMatchObject({ status: "redeemed", value: 0n, redeemedBy: "bob" });
    expect(transfer.balanceOf("bob")).toBe(1_100n);
    expect(codeOf(() => engine.redeem(call("bob"), "c1", { guard: "beneficiary" }))).toBe("INVALID_STATE");
    expect(transfer.transfers()).toHaveLength(1);
    expect(engine.reconcile()).toEqual({ custodied: 0n, recordTotal: 0n, substrate: 0n, balanced: true });
  });

  it("refuses after expiry", () => {
    const { engine, transfer, clock, pay } = setup();
    pay("alice", 100n, (ctx) =>
      engine.create(ctx, giftCardDraft("c1", "bob", 100n), { guard: "open", duration: 10 }),
    );
    clock.set(START + 10);

    expect(codeOf(() => engine.redeem(call("bob"), "c1", { guard: "beneficiary" }))).toBe("EXPIRED");
    expect(transfer.balanceOf("bob")).toBe(1_000n);
  });

  it("forwards an exact attached price to the recipient", () => {
    const { engine, transfer, pay } = setup();
    engine.create(call(OWNER), warrantyDraft("K1", "bob"), { guard: "owner" });

    expect(
      codeOf(() =>
        pay("carol", 20n, (ctx) =>
          engine.redeem(ctx, "K1", { guard: "open", price: 30n, recipient: OWNER }),
        ),
      ),
    ).toBe("INVALID_INPUT");

    pay("carol", 30n, (ctx) => engine.redeem(ctx, "K1", { guard: "open", price: 30n, recipient: OWNER }));

    expect(transfer.balanceOf(OWNER)).toBe(30n);
    expect(transfer.balanceOf("carol")).toBe(970n);
    expect(engine.recentHistory(1)[0]).toMatchObject({
      action: "redeemed",
      actor: "carol",
      counterparty: OWNER,
      amount: 30n,
    });
  });
});

describe("cancel", () => {
  it("refunds the depositor only", () => {
    const { engine, transfer, pay } = setup();
    pay("alice", 100n, (ctx) => engine.create(ctx, giftCardDraft("c1", "bob", 100n), { guard: "open" }));

    expect(codeOf(() => engine.cancel(call("bob"), "c1"))).toBe("UNAUTHORIZED");
    expect(engine.cancel(call("alice"), "c1").status).toBe("cancelled");
    expect(transfer.balanceOf("alice")).toBe(1_000n);
  });

  it("is expiry-gated unless explicitly allowed", () => {
    const { engine, clock, pay } = setup();
    pay("alice", 100n, (ctx) =>
      engine.create(ctx, giftCardDraft("c1", "bob", 100n), { guard: "open", duration: 10 }),
    );
    clock.set(START + 10);

    expect(codeOf(() => engine.cancel(call("alice"), "c1"))).toBe("EXPIRED");
    expect(engine.cancel(call("alice"), "c1", { allowExpired: true }).status).toBe("cancelled");
  });
});

describe("expire", () => {
  it("refuses records that have not expired", () => {
    const { engine, pay } = setup();
    pay("alice", 100n, (ctx) =>
      engine.create(ctx, giftCardDraft("c1", "bob", 100n), { guard: "open", duration: 10 }),
    );
    engine.create(call(OWNER), warrantyDraft("K1", "bob"), { guard: "owner" });

    expect(codeOf(() => engine.expire(call("carol"), "c1"))).toBe("INVALID_STATE");
    expect(codeOf(() => engine.expire(call("carol"), "K1"))).toBe("INVALID_STATE");
  });

  it("lets anyone settle an expired record, refunding the depositor", () => {
    const { engine, transfer, clock, pay } = setup();
    pay("alice", 100n, (ctx) =>
      engine.create(ctx, giftCardDraft("c1", "bob", 100n), { guard: "open", duration: 10 }),
    );
    clock.set(START + 10);

    expect(engine.expire(call("carol"), "c1")).toMatchObject({ status: "expired", value: 0n });
    expect(transfer.balanceOf("alice")).toBe(1_000n);
    expect(engine.recentHistory(1)[0]).toMatchObject({
      action: "expired",
      actor: "carol",
      counterparty: "alice",
      amount: 100n,
    });
  });
});

describe("checkIn", () => {
  /** "org" organizes "party"; "rival" organizes "gala". */
  function withEvents() {
    const harness = setup(["alice", "bob", "carol", "mallory"]);
    const { engine } = harness;
    engine.addMember(call(OWNER), "org");
    engine.addMember(call(OWNER), "rival");
    engine.create(call("org"), eventDraft("party", "org", 25n), { guard: "member" });
    engine.create(call("rival"), eventDraft("gala", "rival", 25n), { guard: "member" });
    return harness;
  }

  it("refunds the deposit once, to the attendee", () => {
    const { engine, transfer, pay } = withEvents();
    pay("alice", 25n, (ctx) => engine.create(ctx, rsvpDraft("party/alice", "alice", 25n), { guard: "open" }));

    expect(codeOf(() => engine.checkIn(call("bob"), "party/alice"))).toBe("UNAUTHORIZED");

    const checked = engine.checkIn(call("org"), "party/alice");
    expect(checked).toMatchObject({ status: "redeemed", hasCheckedIn: true, value: 0n });
    expect(transfer.balanceOf("alice")).toBe(1_000n);
    expect(codeOf(() => engine.checkIn(call("org"), "party/alice"))).toBe("INVALID_STATE");
    expect(engine.recentHistory(1)[0]?.action).toBe("checked_in");
  });

  it("takes the organizer from the event record, not the caller", () => {
    const { engine, transfer, pay } = withEvents();
    pay("bob", 25n, (ctx) => engine.create(ctx, rsvpDraft("party/bob", "bob", 25n), { guard: "open" }));
    const position = engine.events.globalPosition();

    expect(codeOf(() => engine.checkIn(call("mallory"), "party/bob"))).toBe("UNAUTHORIZED");
    expect(codeOf(() => engine.checkIn(call("rival"), "party/bob"))).toBe("UNAUTHORIZED");
    expect(engine.get("party/bob")).toMatchObject({ status: "active", hasCheckedIn: false, value: 25n });
    expect(transfer.balanceOf("bob")).toBe(975n);
    expect(engine.events.globalPosition()).toBe(position);
  });

  it("rejects an RSVP whose event does not exist", () => {
    const { engine, pay } = withEvents();
    pay("carol", 25n, (ctx) =>
      engine.create(ctx, rsvpDraft("ghost/carol", "carol", 25n, "ghost"), { guard: "open" }),
    );

    expect(codeOf(() => engine.checkIn(call(OWNER), "ghost/carol"))).toBe("NOT_FOUND");
  });

  it("accepts the owner and ignores expiry", () => {
    const { engine, clock, pay } = withEvents();
    pay("bob", 25n, (ctx) =>
      engine.create(ctx, rsvpDraft("party/bob", "bob", 25n), { guard: "open", duration: 5 }),
    );
    clock.set(START + 100);

    expect(engine.checkIn(call(OWNER), "party/bob").hasCheckedIn).toBe(true);
  });
});

// =============================================================================
// Pools
// =============================================================================

describe("deposit / withdraw", () => {
  it("tracks partial withdrawals by members", () => {
    const { engine, transfer, pay } = setup();
    engine.create(call(OWNER), poolDraft("pool"), { guard: "owner" });

    pay("alice", 60n, (ctx) => engine.deposit(ctx, "pool"));
    expect(codeOf(() => engine.deposit(call("alice"), "pool"))).toBe("INVALID_INPUT");
    expect(codeOf(() => engine.withdraw(call("alice"), "pool", 10n))).toBe("UNAUTHORIZED");

    engine.addMember(call(OWNER), "bob");
    const after = engine.withdraw(call("bob"), "pool", 25n);

    expect(after).toMatchObject({ value: 35n, totalDeposited: 60n, totalWithdrawn: 25n, status: "active" });
    expect(transfer.balanceOf("bob")).toBe(1_025n);
    expect(codeOf(() => engine.withdraw(call("bob"), "pool", 100n))).toBe("INVALID_INPUT");
    expect(engine.reconcile().balanced).toBe(true);
  });

  it("only pools accept deposits", () => {
    const { engine, pay } = setup();
    engine.create(call(OWNER), warrantyDraft("K1", "bob"), { guard: "owner" });

    expect(codeOf(() => pay("alice", 5n, (ctx) => engine.deposit(ctx, "K1")))).toBe("NOT_FOUND");
  });
});

// =============================================================================
// Membership
// =============================================================================

describe("membership", () => {
  it("emits membership events on their own stream", () => {
    const { engine } = setup();
    engine.addMember(call(OWNER), "alice");
    engine.removeMember(call(OWNER), "alice");

    expect(engine.events.read("access:alice").map((e) => e.event.payload["reason"])).toEqual([
      "added",
      "removed",
    ]);
    expect(codeOf(() => engine.removeMember(call(OWNER), "alice"))).toBe("INVALID_STATE");
    expect(codeOf(() => engine.addMember(call("alice"), "bob"))).toBe("UNAUTHORIZED");
  });

  it("rolls membership back with its operation", () => {
    const { engine } = setup();

    expect(() =>
      engine.run(call(OWNER), "batch", () => {
        engine.addMember(call(OWNER), "alice");
        throw new Error("abort");
      }),
    ).toThrow("abort");
    expect(engine.access.isMember("alice")).toBe(false);
    expect(engine.events.globalPosition()).toBe(0);
  });

  it("hands privileges to the new owner", () => {
    const { engine } = setup();
    engine.create(call(OWNER), warrantyDraft("K1", "bob"), { guard: "owner" });
    engine.transferOwnership(call(OWNER), "dana");

    expect(codeOf(() => engine.void(call(OWNER), "K1", ""))).toBe("UNAUTHORIZED");
    expect(engine.void(call("dana"), "K1", "").status).toBe("voided");
    expect(codeOf(() => engine.transferOwnership(call("dana"), " "))).toBe("INVALID_INPUT");
  });
});

// =============================================================================
// Reads
// =============================================================================

describe("reads", () => {
  it("inspect returns undefined for unknown keys", () => {
    expect(setup().engine.inspect("nope")).toBeUndefined();
  });

  it("inspect projects expiry before it is written", () => {
    const { engine, clock } = setup();
    engine.create(call(OWNER), warrantyDraft("K1", "bob"), { guard: "owner", duration: 10 });
    clock.set(START + 10);

    expect(engine.inspect("K1")).toEqual({
      key: "K1",
      kind: "warranty",
      valid: false,
      status: "expired",
      statusText: "Expired",
      beneficiary: "bob",
      value: 0n,
      expiresAt: START + 10,
      payload: "",
    });
    expect(engine.get("K1")?.status).toBe("active");
  });

  it("pages records in insertion order", () => {
    const { engine } = setup();
    for (const key of ["a", "b", "c"]) {
      engine.create(call(OWNER), warrantyDraft(key, "bob"), { guard: "owner" });
    }

    const first = engine.list({ limit: 2 });
    expect(first.data.map((r) => r.key)).toEqual(["a", "b"]);
    expect(first.pagination.hasMore).toBe(true);

    const second = engine.list({ limit: 2, cursor: first.pagination.cursor ?? undefined });
    expect(second.data.map((r) => r.key)).toEqual(["c"]);
    expect(second.pagination).toEqual({ cursor: null, hasMore: false });

    expect([...engine.iterate((r) => r.key !== "b")].map((r) => r.key)).toEqual(["a", "c"]);
  });

  it("clamps page sizes and rejects bad cursors", () => {
    const { engine } = setup([], { pageSize: 2, pageMax: 2 });
    for (const key of ["a", "b", "c"]) {
      engine.create(call(OWNER), warrantyDraft(key, "bob"), { guard: "owner" });
    }

    expect(engine.list({ limit: 100 }).data).toHaveLength(2);
    expect(codeOf(() => engine.list({ cursor: "garbage" }))).toBe("INVALID_INPUT");
    expect(codeOf(() => engine.historyPage({ limit: 0 }))).toBe("INVALID_INPUT");
    expect(codeOf(() => engine.recentHistory(-1))).toBe("INVALID_INPUT");
  });

  it("walks history lazily", () => {
    const { engine } = setup();
    for (const key of ["a", "b", "c"]) {
      engine.create(call(OWNER), warrantyDraft(key, "bob"), { guard: "owner" });
    }

    expect([...engine.iterateHistory(1)].map((e) => e.sequence)).toEqual([1, 2, 3]);
    expect(engine.recentHistory(2).map((e) => e.key)).toEqual(["c", "b"]);
    expect(engine.historyPage({ limit: 2 }).data.map((e) => e.sequence)).toEqual([1, 2]);
  });

  it("reads a record's committed events", () => {
    const { engine } = setup();
    engine.create(call(OWNER), warrantyDraft("K1", "bob"), { guard: "owner" });
    engine.transfer(call("bob"), "K1", "carol");

    expect(engine.eventsOf("K1").map((e) => e.event.type)).toEqual([
      "record.created",
      "record.transferred",
    ]);
    expect(engine.eventsOf("unknown")).toEqual([]);
    expect(engine.events.verifyIntegrity().valid).toBe(true);
  });
});

// =============================================================================
// Snapshot
// =============================================================================

describe("snapshot / restore", () => {
  it("restores records, history and access", () => {
    const { engine, transfer, clock, pay } = setup();
    engine.addMember(call(OWNER), "carol");
    pay("alice", 100n, (ctx) => engine.create(ctx, giftCardDraft("c1", "bob", 100n), { guard: "open" }));
    engine.create(call(OWNER), warrantyDraft("K1", "bob"), { guard: "owner" });
    engine.void(call(OWNER), "K1", "tamper");

    const restored = CustodyEngine.restore(engine.snapshot(), {
      name: "test-ledger",
      owner: "someone-else",
      transfer,
      clock,
    });

    expect(restored.inspect("c1")).toEqual(engine.inspect("c1"));
    expect(restored.inspect("K1")?.statusText).toBe("Voided: tamper");
    expect(restored.recentHistory(10)).toEqual(engine.recentHistory(10));
    expect(restored.access.owner).toBe(OWNER);
    expect(restored.access.isMember("carol")).toBe(true);
    expect(restored.reconcile().balanced).toBe(true);
  });

  it("rejects foreign or inconsistent snapshots", () => {
    const { engine, transfer, pay } = setup();
    pay("alice", 100n, (ctx) => engine.create(ctx, giftCardDraft("c1", "bob", 100n), { guard: "open" }));
    const snapshot = engine.snapshot();

    expect(
      codeOf(() => CustodyEngine.restore(snapshot, { name: "other", owner: OWNER, transfer })),
    ).toBe("INVALID_INPUT");
    expect(
      codeOf(() =>
        CustodyEngine.restore(
          { ...snapshot, store: { ...snapshot.store, custodied: 1n } },
          { name: "test-ledger", owner: OWNER, transfer },
        ),
      ),
    ).toBe("INVALID_INPUT");
  });

  it("refuses to snapshot mid-operation", () => {
    const { engine } = setup();
    expect(codeOf(() => engine.run(call(OWNER), "peek", () => engine.snapshot()))).toBe("INVALID_STATE");
  });
});

// =============================================================================
// Construction
// =============================================================================

describe("construction", () => {
  it("validates name and page sizes", () => {
    const { transfer } = setup();
    expect(codeOf(() => new CustodyEngine({ name: " ", owner: OWNER, transfer }))).toBe("INVALID_INPUT");
    expect(
      codeOf(() => new CustodyEngine({ name: "x", owner: OWNER, transfer, pageSize: 10, pageMax: 5 })),
    ).toBe("INVALID_INPUT");
    expect(codeOf(() => new CustodyEngine({ name: "x", owner: "", transfer }))).toBe("INVALID_INPUT");
  });

  it("logs through the supplied logger", () => {
    const lines: string[] = [];
    const logger = pino({ level: "warn" }, { write: (line: string) => lines.push(line) });
    const { engine } = setup(["alice"], { logger });

    codeOf(() => engine.create(call("alice"), warrantyDraft("K1", "bob"), { guard: "owner" }));

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0] ?? "{}");
    expect(entry).toMatchObject({
      ledger: "test-ledger",
      operation: "create",
      code: "UNAUTHORIZED",
      msg: "Operation rolled back",
    });
  });
});

// =============================================================================
// Monetary lifecycle
// =============================================================================

describe("monetary K1", () => {
  it("transfers, refuses a late redeem, and keeps its value when voided", () => {
    const { engine, clock, transfer, pay } = setup();
    pay("alice", 100n, (ctx) =>
      engine.create(ctx, giftCardDraft("K1", "bob", 100n), { guard: "open", duration: 365 }),
    );

    engine.transfer(call("bob"), "K1", "carol");
    expect(engine.historyOf("K1").filter((e) => e.action === "transferred")).toHaveLength(1);

    clock.set(START + 365);
    expect(codeOf(() => engine.redeem(call("carol"), "K1", { guard: "beneficiary" }))).toBe("EXPIRED");

    engine.void(call(OWNER), "K1", "tamper");
    expect(engine.inspect("K1")).toMatchObject({ status: "voided", statusText: "Voided", value: 100n });
    expect(transfer.balanceOf("carol")).toBe(1_000n);
  });
});
