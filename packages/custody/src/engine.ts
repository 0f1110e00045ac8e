/**
 * CustodyEngine — the generic custody & conditional release engine.
 *
 * Composes:
 * - AccessControl (owner + member guards)
 * - LedgerStore (records, history, custody total)
 * - RecordLifecycle (transition rules)
 * - Disbursement (payouts through the ValueTransfer substrate)
 * - TransactionCoordinator + InMemoryEventStore (atomic commit, events)
 *
 * Every public mutation follows the same order: privilege guards that need
 * no lookup, attached-value check, lookup, record-level guards, status and
 * expiry checks, effects, then payout. Any throw rolls the whole operation
 * back.
 */

import type {
  CustodyRecord,
  HistoryAction,
  HistoryEntry,
  Principal,
  RecordKind,
  RecordKindMap,
  RecordView,
} from "@custodia/types";
import { isCustodyRecord, isNullPrincipal, isRecordOfKind } from "@custodia/types";
import { Journal, LedgerError, LedgerStore } from "@custodia/ledger";
import type {
  CustodyBalance,
  LedgerStoreSnapshot,
  PaginatedResponse,
  PaginationQuery,
} from "@custodia/ledger";
import {
  CUSTODY_EVENTS,
  InMemoryEventStore,
  createCustodyCatalog,
} from "@custodia/event-store";
import type {
  CustodyEventType,
  EventHandler,
  EventStore,
  StoredEvent,
  Subscription,
} from "@custodia/event-store";
import type { Logger } from "pino";
import { AccessControl } from "./access-control.js";
import type { AccessChange, AccessSnapshot } from "./access-control.js";
import { SystemClock, toIsoTimestamp } from "./clock.js";
import type { Clock } from "./clock.js";
import { Disbursement } from "./disbursement.js";
import { CustodyError } from "./errors.js";
import { assertContext, requireExactValue, requireNoValue } from "./identity.js";
import type { CallContext } from "./identity.js";
import {
  applyTransition,
  assertLive,
  assertNotExpired,
  isExpired,
  toView,
} from "./lifecycle.js";
import { silentLogger } from "./logger.js";
import { TransactionCoordinator, streamIdFor } from "./transaction.js";
import type { ValueTransfer } from "./value-transfer.js";

// =============================================================================
// Types
// =============================================================================

export const DEFAULT_PAGE_SIZE = 50;
export const DEFAULT_PAGE_MAX = 500;

export interface CustodyEngineOptions {
  /** Ledger name; stamped on events and log lines */
  readonly name: string;
  readonly owner: Principal;
  readonly members?: readonly Principal[] | undefined;
  readonly transfer: ValueTransfer;
  readonly clock?: Clock | undefined;
  readonly logger?: Logger | undefined;
  /** Page size used when a page request names no limit */
  readonly pageSize?: number | undefined;
  /** Upper bound on any requested page size */
  readonly pageMax?: number | undefined;
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** A record as supplied to `create`; the engine fills in the rest. */
export type RecordDraft = DistributiveOmit<
  CustodyRecord,
  "status" | "depositor" | "createdAt" | "updatedAt" | "expiresAt"
>;

export type CreateGuard = "owner" | "member" | "open";

export interface CreateOptions {
  readonly guard: CreateGuard;
  /** Seconds from now until expiry */
  readonly duration?: number | undefined;
  /** Absolute expiry; mutually exclusive with `duration` */
  readonly expiresAt?: number | undefined;
}

/** `depositor` also admits the owner. */
export type VoidGuard = "owner" | "depositor";

export interface RedeemOptions {
  readonly guard: "beneficiary" | "open";
  /** Who receives the payout. Default: the caller */
  readonly recipient?: Principal | undefined;
  /** Exact value the caller must attach, paid out with the record's value */
  readonly price?: bigint | undefined;
  readonly note?: string | undefined;
}

export interface CancelOptions {
  /** Allow cancelling past `expiresAt` (e.g. after the parent was voided) */
  readonly allowExpired?: boolean | undefined;
}

export interface PageRequest {
  readonly cursor?: string | undefined;
  readonly limit?: number | undefined;
}

export interface EngineReconciliation extends CustodyBalance {
  /** Custody balance reported by the value-transfer substrate */
  readonly substrate: bigint;
}

export interface EngineSnapshot {
  readonly version: 1;
  readonly name: string;
  readonly access: AccessSnapshot;
  readonly store: LedgerStoreSnapshot<CustodyRecord>;
}

/** Read side of the engine's event log. */
export type EventLog = Pick<
  EventStore,
  "read" | "readAll" | "streamVersion" | "globalPosition" | "verifyIntegrity"
>;

// =============================================================================
// Engine
// =============================================================================

export class CustodyEngine {
  readonly name: string;
  readonly clock: Clock;
  readonly access: AccessControl;
  private readonly _store: LedgerStore<CustodyRecord>;
  private readonly _events: InMemoryEventStore;
  private readonly _tx: TransactionCoordinator;
  private readonly _disbursement: Disbursement;
  private readonly _transfer: ValueTransfer;
  private readonly _log: Logger;
  private readonly _pageSize: number;
  private readonly _pageMax: number;

  constructor(options: CustodyEngineOptions, snapshot?: EngineSnapshot) {
    if (options.name.trim() === "") {
      throw new CustodyError("INVALID_INPUT", "Engine name must be non-empty");
    }
    this._pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this._pageMax = options.pageMax ?? DEFAULT_PAGE_MAX;
    if (
      !Number.isInteger(this._pageSize) ||
      !Number.isInteger(this._pageMax) ||
      this._pageSize < 1 ||
      this._pageSize > this._pageMax
    ) {
      throw new CustodyError(
        "INVALID_INPUT",
        `Page size must be an integer in [1, pageMax], got ${String(this._pageSize)} (max ${String(this._pageMax)})`,
      );
    }

    this.name = options.name;
    this.clock = options.clock ?? new SystemClock();
    this._transfer = options.transfer;
    this._log = (options.logger ?? silentLogger()).child({ ledger: options.name });

    const journal = new Journal();
    this._store = snapshot === undefined
      ? new LedgerStore<CustodyRecord>(journal)
      : restoreStore(snapshot.store, journal);

    this._events = new InMemoryEventStore({
      now: () => toIsoTimestamp(this.clock.now()),
      onHandlerError: (error, stored) => {
        this._log.error(
          { err: error, eventType: stored.event.type, position: stored.globalPosition },
          "Event subscriber failed",
        );
      },
    });

    this._tx = new TransactionCoordinator({
      source: options.name,
      journal,
      events: this._events,
      catalog: createCustodyCatalog(),
      log: this._log,
    });

    this.access = new AccessControl(
      snapshot?.access ?? { owner: options.owner, members: options.members ?? [] },
      journal,
      (change) => {
        this._onAccessChange(change);
      },
    );

    this._disbursement = new Disbursement(this._store, this._transfer, this._log);
  }

  /**
   * Rebuild an engine from a snapshot. Records, history and custody total
   * are re-checked; the event log starts empty.
   */
  static restore(snapshot: EngineSnapshot, options: CustodyEngineOptions): CustodyEngine {
    if (snapshot.version !== 1) {
      throw new CustodyError("INVALID_INPUT", `Unsupported snapshot version ${String(snapshot.version)}`);
    }
    if (snapshot.name !== options.name) {
      throw new CustodyError(
        "INVALID_INPUT",
        `Snapshot belongs to "${snapshot.name}", not "${options.name}"`,
      );
    }
    return new CustodyEngine(options, snapshot);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Operation boundary
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Run `fn` as one atomic operation on behalf of `ctx.caller`. Façades use
   * this to compose several engine calls into a single commit.
   */
  run<T>(ctx: CallContext, operation: string, fn: () => T): T {
    assertContext(ctx);
    return this._tx.run(ctx.caller, operation, fn);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Record transitions
  // ───────────────────────────────────────────────────────────────────────

  create(ctx: CallContext, draft: RecordDraft, options: CreateOptions): CustodyRecord {
    return this.run(ctx, "create", () => {
      this._guard(ctx.caller, options.guard);
      if (draft.value < 0n) {
        throw new CustodyError("INVALID_INPUT", `Value must be non-negative, got ${draft.value.toString()}`, draft.key);
      }
      requireExactValue(ctx, draft.value, `create ${draft.kind}`);
      if (draft.key === "") {
        throw new CustodyError("INVALID_INPUT", "Record key must be non-empty");
      }
      if (isNullPrincipal(draft.beneficiary)) {
        throw new CustodyError("INVALID_INPUT", "Beneficiary must not be the null principal", draft.key);
      }

      const now = this.clock.now();
      const expiresAt = resolveExpiry(options, now, draft.key);

      if (this._store.has(draft.key)) {
        throw new CustodyError("ALREADY_EXISTS", `Key "${draft.key}" is already assigned`, draft.key);
      }

      const record: CustodyRecord = {
        ...draft,
        status: "active",
        depositor: ctx.caller,
        createdAt: now,
        updatedAt: now,
        expiresAt,
      };

      this._store.put(record.key, record);
      if (record.value > 0n) {
        this._store.credit(record.value);
      }
      this._history(record, "created", ctx.caller, record.beneficiary, record.value, "", now);
      this._emit(CUSTODY_EVENTS.RECORD_CREATED, ctx.caller, record, [ctx.caller, record.beneficiary], record.value, "", now);
      return record;
    });
  }

  /** Current beneficiary hands the record to someone else. */
  transfer(ctx: CallContext, key: string, to: Principal): CustodyRecord {
    return this.run(ctx, "transfer", () => {
      requireNoValue(ctx, "transfer");
      const now = this.clock.now();
      const record = this.require(key);
      requireBeneficiary(ctx.caller, record);
      assertLive(record);
      assertNotExpired(record, now);
      if (isNullPrincipal(to)) {
        throw new CustodyError("INVALID_INPUT", "Cannot transfer to the null principal", key);
      }
      if (to === record.beneficiary) {
        throw new CustodyError("INVALID_INPUT", `${to} is already the beneficiary`, key);
      }

      const next = applyTransition(record, { to: "transferred", beneficiary: to }, now);
      this._store.put(key, next);
      this._history(next, "transferred", ctx.caller, to, 0n, "", now);
      this._emit(CUSTODY_EVENTS.RECORD_TRANSFERRED, ctx.caller, next, [record.beneficiary, to], 0n, "", now);
      return next;
    });
  }

  /**
   * Privileged, irreversible, never expiry-gated. Pays nothing out: any
   * custodied value stays on the record.
   */
  void(ctx: CallContext, key: string, reason: string, guard: VoidGuard = "owner"): CustodyRecord {
    return this.run(ctx, "void", () => {
      if (guard === "owner") {
        this.access.requireOwner(ctx.caller);
      }
      requireNoValue(ctx, "void");
      const now = this.clock.now();
      const record = this.require(key);
      if (guard === "depositor" && ctx.caller !== record.depositor && !this.access.isOwner(ctx.caller)) {
        throw new CustodyError("UNAUTHORIZED", `${ctx.caller} may not void "${key}"`, key);
      }
      assertLive(record);

      const next = applyTransition(record, { to: "voided", reason }, now);
      this._store.put(key, next);
      this._history(next, "voided", ctx.caller, record.beneficiary, 0n, reason, now);
      this._emit(CUSTODY_EVENTS.RECORD_VOIDED, ctx.caller, next, [ctx.caller], 0n, reason, now);
      return next;
    });
  }

  /**
   * Redeem a live record, paying its value (plus any attached price) to
   * the recipient.
   */
  redeem(ctx: CallContext, key: string, options: RedeemOptions): CustodyRecord {
    return this.run(ctx, "redeem", () => {
      const price = options.price ?? 0n;
      if (price < 0n) {
        throw new CustodyError("INVALID_INPUT", `Price must be non-negative, got ${price.toString()}`, key);
      }
      requireExactValue(ctx, price, "redeem");
      const now = this.clock.now();
      const record = this.require(key);
      if (options.guard === "beneficiary") {
        requireBeneficiary(ctx.caller, record);
      }
      assertLive(record);
      assertNotExpired(record, now);

      const recipient = options.recipient ?? ctx.caller;
      if (isNullPrincipal(recipient)) {
        throw new CustodyError("INVALID_INPUT", "Payout recipient must not be the null principal", key);
      }

      if (price > 0n) {
        this._store.credit(price);
      }
      const amount = record.value + price;
      const note = options.note ?? "";
      const next = applyTransition(record, { to: "redeemed", by: ctx.caller, note }, now);
      this._store.put(key, next);
      this._emit(CUSTODY_EVENTS.RECORD_REDEEMED, ctx.caller, next, [ctx.caller, recipient], amount, note, now);
      this._settle(next, "redeemed", ctx.caller, recipient, amount, note, now);
      return next;
    });
  }

  /** Depositor withdraws a live record and is refunded its value. */
  cancel(ctx: CallContext, key: string, options: CancelOptions = {}): CustodyRecord {
    return this.run(ctx, "cancel", () => {
      requireNoValue(ctx, "cancel");
      const now = this.clock.now();
      const record = this.require(key);
      if (ctx.caller !== record.depositor) {
        throw new CustodyError("UNAUTHORIZED", `${ctx.caller} is not the depositor of "${key}"`, key);
      }
      assertLive(record);
      if (options.allowExpired !== true) {
        assertNotExpired(record, now);
      }

      const next = applyTransition(record, { to: "cancelled" }, now);
      this._store.put(key, next);
      this._emit(CUSTODY_EVENTS.RECORD_CANCELLED, ctx.caller, next, [ctx.caller], record.value, "", now);
      this._settle(next, "cancelled", ctx.caller, record.depositor, record.value, "", now);
      return next;
    });
  }

  /**
   * Write the expiry of a live record whose time bound has passed and
   * refund its value to the depositor. Anyone may call it.
   */
  expire(ctx: CallContext, key: string): CustodyRecord {
    return this.run(ctx, "expire", () => {
      requireNoValue(ctx, "expire");
      const now = this.clock.now();
      const record = this.require(key);
      assertLive(record);
      if (!isExpired(record, now)) {
        throw new CustodyError("INVALID_STATE", `Record "${key}" has not expired`, key);
      }

      const next = applyTransition(record, { to: "expired" }, now);
      this._store.put(key, next);
      this._emit(CUSTODY_EVENTS.RECORD_EXPIRED, ctx.caller, next, [ctx.caller, record.depositor], record.value, "", now);
      this._settle(next, "expired", ctx.caller, record.depositor, record.value, "", now);
      return next;
    });
  }

  /**
   * The organizer of the RSVP's event (or the owner) checks an attendee
   * in, refunding the deposit. Not time-bounded.
   */
  checkIn(ctx: CallContext, key: string): CustodyRecord {
    return this.run(ctx, "checkIn", () => {
      requireNoValue(ctx, "checkIn");
      const now = this.clock.now();
      const rsvp = this.requireKind(key, "rsvp");
      const event = this.requireKind(rsvp.eventId, "event");
      if (ctx.caller !== event.depositor && !this.access.isOwner(ctx.caller)) {
        throw new CustodyError("UNAUTHORIZED", `${ctx.caller} does not organize "${event.key}"`, key);
      }
      if (rsvp.hasCheckedIn) {
        throw new CustodyError("INVALID_STATE", `${rsvp.beneficiary} is already checked in`, key);
      }
      assertLive(rsvp);

      const next = applyTransition(rsvp, { to: "redeemed", by: ctx.caller, note: "" }, now);
      this._store.put(key, next);
      this._emit(CUSTODY_EVENTS.ATTENDEE_CHECKED_IN, ctx.caller, next, [ctx.caller, rsvp.beneficiary], rsvp.value, "", now);
      this._settle(next, "checked_in", ctx.caller, rsvp.beneficiary, rsvp.value, "", now);
      return next;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Pooled records
  // ───────────────────────────────────────────────────────────────────────

  /** Add the attached value to a pool. Open to anyone. */
  deposit(ctx: CallContext, key: string): CustodyRecord {
    return this.run(ctx, "deposit", () => {
      if (ctx.value <= 0n) {
        throw new CustodyError("INVALID_INPUT", "Deposit requires a positive attached value", key);
      }
      const now = this.clock.now();
      const pool = this.requireKind(key, "treasury");
      assertLive(pool);

      const next = {
        ...pool,
        value: pool.value + ctx.value,
        totalDeposited: pool.totalDeposited + ctx.value,
        updatedAt: now,
      };
      this._store.put(key, next);
      this._store.credit(ctx.value);
      this._history(next, "deposited", ctx.caller, pool.beneficiary, ctx.value, "", now);
      this._emit(CUSTODY_EVENTS.FUNDS_DEPOSITED, ctx.caller, next, [ctx.caller], ctx.value, "", now);
      return next;
    });
  }

  /** Members (or the owner) pay part of a pool out. */
  withdraw(ctx: CallContext, key: string, amount: bigint, recipient?: Principal): CustodyRecord {
    return this.run(ctx, "withdraw", () => {
      this.access.requireMember(ctx.caller);
      requireNoValue(ctx, "withdraw");
      if (amount <= 0n) {
        throw new CustodyError("INVALID_INPUT", `Withdrawal must be positive, got ${amount.toString()}`, key);
      }
      const to = recipient ?? ctx.caller;
      if (isNullPrincipal(to)) {
        throw new CustodyError("INVALID_INPUT", "Payout recipient must not be the null principal", key);
      }
      const now = this.clock.now();
      const pool = this.requireKind(key, "treasury");
      assertLive(pool);
      if (amount > pool.value) {
        throw new CustodyError(
          "INVALID_INPUT",
          `Cannot withdraw ${amount.toString()}: pool holds ${pool.value.toString()}`,
          key,
        );
      }

      const next = {
        ...pool,
        value: pool.value - amount,
        totalWithdrawn: pool.totalWithdrawn + amount,
        updatedAt: now,
      };
      this._store.put(key, next);
      this._emit(CUSTODY_EVENTS.FUNDS_WITHDRAWN, ctx.caller, next, [ctx.caller, to], amount, "", now);
      this._settle(next, "withdrawn", ctx.caller, to, amount, "", now);
      return next;
    });
  }

  /**
   * Update bookkeeping fields (counters, notes) of a record from inside a
   * running operation. Status, value and principals cannot change here.
   */
  amend(key: string, update: (record: CustodyRecord) => CustodyRecord): CustodyRecord {
    if (!this._tx.active) {
      throw new CustodyError("INVALID_STATE", "amend() must run inside an operation", key);
    }
    const before = this.require(key);
    const after = update(before);
    if (
      after.key !== before.key ||
      after.kind !== before.kind ||
      after.status !== before.status ||
      after.value !== before.value ||
      after.beneficiary !== before.beneficiary ||
      after.depositor !== before.depositor
    ) {
      throw new CustodyError("INVALID_STATE", `amend() may not change the custody fields of "${key}"`, key);
    }
    this._store.put(key, after);
    return after;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Membership
  // ───────────────────────────────────────────────────────────────────────

  addMember(ctx: CallContext, member: Principal): void {
    this.run(ctx, "addMember", () => {
      this.access.requireOwner(ctx.caller);
      requireNoValue(ctx, "addMember");
      this.access.addMember(ctx.caller, member);
    });
  }

  removeMember(ctx: CallContext, member: Principal): void {
    this.run(ctx, "removeMember", () => {
      this.access.requireOwner(ctx.caller);
      requireNoValue(ctx, "removeMember");
      this.access.removeMember(ctx.caller, member);
    });
  }

  transferOwnership(ctx: CallContext, to: Principal): void {
    this.run(ctx, "transferOwnership", () => {
      this.access.requireOwner(ctx.caller);
      requireNoValue(ctx, "transferOwnership");
      this.access.transferOwnership(ctx.caller, to);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────

  /** `undefined` means the key was never assigned. */
  get(key: string): CustodyRecord | undefined {
    return this._store.get(key);
  }

  require(key: string): CustodyRecord {
    const record = this._store.get(key);
    if (record === undefined) {
      throw new CustodyError("NOT_FOUND", `No record under key "${key}"`, key);
    }
    return record;
  }

  requireKind<K extends RecordKind>(key: string, kind: K): RecordKindMap[K] {
    const record = this.require(key);
    if (!isRecordOfKind(record, kind)) {
      throw new CustodyError("NOT_FOUND", `No ${kind} under key "${key}"`, key);
    }
    return record;
  }

  inspect(key: string): RecordView | undefined {
    const record = this._store.get(key);
    return record === undefined ? undefined : toView(record, this.clock.now());
  }

  list(request: PageRequest = {}, filter?: (record: CustodyRecord) => boolean): PaginatedResponse<CustodyRecord> {
    const query = this._query(request);
    return pageOrInvalid(() => this._store.list(query, filter));
  }

  iterate(filter?: (record: CustodyRecord) => boolean): Iterable<CustodyRecord> {
    return this._store.iterate(this._pageSize, filter);
  }

  recentHistory(n: number): readonly HistoryEntry[] {
    return pageOrInvalid(() => this._store.history.recent(n));
  }

  historyPage(request: PageRequest = {}): PaginatedResponse<HistoryEntry> {
    const query = this._query(request);
    return pageOrInvalid(() => this._store.history.page(query));
  }

  iterateHistory(pageSize: number = this._pageSize): Iterable<HistoryEntry> {
    return this._store.history.iterate(Math.min(pageSize, this._pageMax));
  }

  historyOf(key: string): readonly HistoryEntry[] {
    return this._store.history.forKey(key);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Events
  // ───────────────────────────────────────────────────────────────────────

  get events(): EventLog {
    return this._events;
  }

  /** Committed events for one record, oldest first. */
  eventsOf(key: string): readonly StoredEvent[] {
    const record = this._store.get(key);
    return record === undefined ? [] : this._events.read(streamIdFor(record.kind, key));
  }

  /** Called once per committed event, after it is stored. */
  subscribe(handler: EventHandler): Subscription {
    return this._events.subscribeAll(handler);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Accounting & persistence
  // ───────────────────────────────────────────────────────────────────────

  reconcile(): EngineReconciliation {
    const balance = this._store.reconcile();
    const substrate = this._transfer.balance();
    return {
      ...balance,
      substrate,
      balanced: balance.balanced && substrate === balance.custodied,
    };
  }

  snapshot(): EngineSnapshot {
    if (this._tx.active) {
      throw new CustodyError("INVALID_STATE", "Cannot snapshot while an operation is running");
    }
    return {
      version: 1,
      name: this.name,
      access: this.access.snapshot(),
      store: this._store.snapshot(),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private _guard(caller: Principal, guard: CreateGuard): void {
    if (guard === "owner") {
      this.access.requireOwner(caller);
    } else if (guard === "member") {
      this.access.requireMember(caller);
    }
  }

  private _query(request: PageRequest): PaginationQuery {
    return {
      cursor: request.cursor,
      limit: Math.min(request.limit ?? this._pageSize, this._pageMax),
    };
  }

  private _history(
    record: CustodyRecord,
    action: HistoryAction,
    actor: Principal,
    counterparty: Principal,
    amount: bigint,
    reason: string,
    now: number,
  ): void {
    this._store.history.append({
      key: record.key,
      kind: record.kind,
      action,
      actor,
      counterparty,
      amount,
      reason,
      timestamp: now,
    });
  }

  /** History entry for the transition, with a payout when value moves. */
  private _settle(
    record: CustodyRecord,
    action: HistoryAction,
    actor: Principal,
    recipient: Principal,
    amount: bigint,
    reason: string,
    now: number,
  ): void {
    if (amount === 0n) {
      this._history(record, action, actor, recipient, 0n, reason, now);
      return;
    }
    this._disbursement.payout({
      key: record.key,
      kind: record.kind,
      action,
      actor,
      counterparty: recipient,
      amount,
      reason,
      timestamp: now,
    });
  }

  private _emit(
    type: CustodyEventType,
    actor: Principal,
    record: CustodyRecord,
    principals: readonly Principal[],
    amount: bigint,
    reason: string,
    now: number,
  ): void {
    this._tx.emit(type, actor, {
      key: record.key,
      subject: record.kind,
      principals,
      amount: amount.toString(),
      reason,
      timestamp: now,
    });
  }

  private _onAccessChange(change: AccessChange): void {
    const now = this.clock.now();
    if (change.type === "membership") {
      this._tx.emit(CUSTODY_EVENTS.MEMBERSHIP_CHANGED, change.actor, {
        key: change.member,
        subject: "access",
        principals: [change.actor, change.member],
        amount: "0",
        reason: change.change,
        timestamp: now,
      });
      return;
    }
    this._tx.emit(CUSTODY_EVENTS.OWNERSHIP_TRANSFERRED, change.actor, {
      key: change.to,
      subject: "access",
      principals: [change.from, change.to],
      amount: "0",
      reason: "",
      timestamp: now,
    });
  }
}

// =============================================================================
// Helpers
// =============================================================================

function requireBeneficiary(caller: Principal, record: CustodyRecord): void {
  if (caller !== record.beneficiary) {
    throw new CustodyError(
      "UNAUTHORIZED",
      `${caller} is not the beneficiary of "${record.key}"`,
      record.key,
    );
  }
}

function resolveExpiry(options: CreateOptions, now: number, key: string): number | undefined {
  if (options.duration !== undefined && options.expiresAt !== undefined) {
    throw new CustodyError("INVALID_INPUT", "Give either a duration or an expiry, not both", key);
  }
  if (options.duration !== undefined) {
    if (!Number.isSafeInteger(options.duration) || options.duration <= 0) {
      throw new CustodyError(
        "INVALID_INPUT",
        `Duration must be a positive integer, got ${String(options.duration)}`,
        key,
      );
    }
    return now + options.duration;
  }
  if (options.expiresAt !== undefined) {
    if (!Number.isSafeInteger(options.expiresAt) || options.expiresAt <= now) {
      throw new CustodyError(
        "INVALID_INPUT",
        `Expiry must be an integer after ${String(now)}, got ${String(options.expiresAt)}`,
        key,
      );
    }
    return options.expiresAt;
  }
  return undefined;
}

/** Ledger pagination errors surface as invalid input. */
function pageOrInvalid<T>(read: () => T): T {
  try {
    return read();
  } catch (error) {
    if (
      error instanceof LedgerError &&
      (error.code === "INVALID_CURSOR" || error.code === "INVALID_LIMIT")
    ) {
      throw new CustodyError("INVALID_INPUT", error.message);
    }
    throw error;
  }
}

function restoreStore(
  snapshot: LedgerStoreSnapshot<CustodyRecord>,
  journal: Journal,
): LedgerStore<CustodyRecord> {
  for (const record of snapshot.records) {
    if (!isCustodyRecord(record)) {
      throw new CustodyError("INVALID_INPUT", "Snapshot contains a malformed record");
    }
  }
  try {
    return LedgerStore.fromSnapshot(snapshot, journal);
  } catch (error) {
    if (error instanceof LedgerError) {
      throw new CustodyError("INVALID_INPUT", `Snapshot rejected: ${error.message}`);
    }
    throw error;
  }
}
