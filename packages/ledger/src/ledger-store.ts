/**
 * @custodia/ledger — Core LedgerStore class.
 *
 * Keyed record map plus an append-only history log and the running custody
 * total. Records are never deleted; `put` is insert-or-overwrite and is only
 * called by the engine's transition logic.
 *
 * API surface:
 * - get() / has() / put() — keyed record access
 * - list() / iterate() — cursor pages in insertion order
 * - history — append-only audit trail
 * - credit() / debit() / reconcile() — custody accounting
 * - savepoint() / rollbackTo() / release() — atomic operations
 * - snapshot() / fromSnapshot() — persistence
 */

import { HistoryLog } from "./history-log.js";
import { Journal } from "./journal.js";
import { iteratePages, paginate } from "./pagination.js";
import type { PaginatedResponse, PaginationQuery } from "./pagination.js";
import type { CustodyBalance, KeyedRecord, LedgerStoreSnapshot } from "./types.js";
import { LedgerError } from "./types.js";

interface Slot<R> {
  readonly position: number;
  readonly record: R;
}

export class LedgerStore<R extends KeyedRecord> {
  readonly journal: Journal;
  readonly history: HistoryLog;
  private readonly _slots = new Map<string, Slot<R>>();
  private readonly _order: string[] = [];
  private _custodied = 0n;

  constructor(journal: Journal = new Journal()) {
    this.journal = journal;
    this.history = new HistoryLog(journal);
  }

  // ─── Keyed Access ────────────────────────────────────────────────────

  /**
   * Look up a record. `undefined` means the key was never assigned.
   */
  get(key: string): R | undefined {
    return this._slots.get(key)?.record;
  }

  has(key: string): boolean {
    return this._slots.has(key);
  }

  /**
   * Insert or overwrite the record under `key`.
   */
  put(key: string, record: R): void {
    if (record.key !== key) {
      throw new LedgerError(
        "KEY_MISMATCH",
        `Record key "${record.key}" does not match slot "${key}"`,
      );
    }

    const previous = this._slots.get(key);
    if (previous !== undefined) {
      this._slots.set(key, { position: previous.position, record });
      this._journal(() => {
        this._slots.set(key, previous);
      });
      return;
    }

    this._order.push(key);
    this._slots.set(key, { position: this._order.length, record });
    this._journal(() => {
      this._slots.delete(key);
      this._order.pop();
    });
  }

  get size(): number {
    return this._order.length;
  }

  // ─── Listing ─────────────────────────────────────────────────────────

  /**
   * One page of records in insertion order, optionally filtered.
   */
  list(query: PaginationQuery, filter?: (record: R) => boolean): PaginatedResponse<R> {
    const slots: Slot<R>[] = [];
    for (const key of this._order) {
      const slot = this._slots.get(key);
      if (slot !== undefined && (filter === undefined || filter(slot.record))) {
        slots.push(slot);
      }
    }

    const page = paginate(slots, query, (s) => s.position, "position");
    return {
      data: page.data.map((s) => s.record),
      pagination: page.pagination,
    };
  }

  /**
   * Lazily walk matching records, `pageSize` at a time.
   */
  iterate(pageSize: number, filter?: (record: R) => boolean): Iterable<R> {
    return iteratePages((query) => this.list(query, filter), pageSize);
  }

  // ─── Custody Accounting ──────────────────────────────────────────────

  /** Total value currently held on behalf of records. */
  get custodied(): bigint {
    return this._custodied;
  }

  credit(amount: bigint): void {
    this._assertPositive(amount);
    this._custodied += amount;
    this._journal(() => {
      this._custodied -= amount;
    });
  }

  debit(amount: bigint): void {
    this._assertPositive(amount);
    if (amount > this._custodied) {
      throw new LedgerError(
        "INSUFFICIENT_CUSTODY",
        `Cannot debit ${amount.toString()}: only ${this._custodied.toString()} in custody`,
      );
    }
    this._custodied -= amount;
    this._journal(() => {
      this._custodied += amount;
    });
  }

  /**
   * Compare the running custody total with the sum of record values.
   */
  reconcile(): CustodyBalance {
    let recordTotal = 0n;
    for (const slot of this._slots.values()) {
      recordTotal += slot.record.value;
    }
    return {
      custodied: this._custodied,
      recordTotal,
      balanced: recordTotal === this._custodied,
    };
  }

  // ─── Atomicity ───────────────────────────────────────────────────────

  savepoint(): number {
    return this.journal.savepoint();
  }

  rollbackTo(savepoint: number): void {
    this.journal.rollbackTo(savepoint);
  }

  release(savepoint: number): void {
    this.journal.release(savepoint);
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): LedgerStoreSnapshot<R> {
    const records: R[] = [];
    for (const key of this._order) {
      const slot = this._slots.get(key);
      if (slot !== undefined) {
        records.push(slot.record);
      }
    }
    return {
      version: 1,
      records,
      history: this.history.toArray(),
      custodied: this._custodied,
    };
  }

  /**
   * Restore a store from a snapshot, re-checking its invariants.
   */
  static fromSnapshot<R extends KeyedRecord>(
    snapshot: LedgerStoreSnapshot<R>,
    journal: Journal = new Journal(),
  ): LedgerStore<R> {
    const store = new LedgerStore<R>(journal);

    for (const record of snapshot.records) {
      if (store.has(record.key)) {
        throw new LedgerError("SNAPSHOT_MISMATCH", `Duplicate record key "${record.key}" in snapshot`);
      }
      store.put(record.key, record);
    }

    snapshot.history.forEach((entry, index) => {
      if (entry.sequence !== index + 1) {
        throw new LedgerError(
          "SNAPSHOT_MISMATCH",
          `History sequence gap: expected ${String(index + 1)}, got ${String(entry.sequence)}`,
        );
      }
      const { sequence: _sequence, ...draft } = entry;
      store.history.append(draft);
    });

    if (snapshot.custodied > 0n) {
      store.credit(snapshot.custodied);
    }

    const balance = store.reconcile();
    if (!balance.balanced) {
      throw new LedgerError(
        "SNAPSHOT_MISMATCH",
        `Snapshot custody ${balance.custodied.toString()} does not match record total ${balance.recordTotal.toString()}`,
      );
    }

    return store;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _journal(undo: () => void): void {
    this.journal.record(undo);
  }

  private _assertPositive(amount: bigint): void {
    if (amount <= 0n) {
      throw new LedgerError("INVALID_AMOUNT", `Amount must be positive, got ${amount.toString()}`);
    }
  }
}
