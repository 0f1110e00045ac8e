/**
 * @custodia/ledger — Internal types for the ledger store.
 *
 * Rules:
 * - All types are readonly
 * - History entries are immutable once appended
 * - Fail-closed: invalid writes throw, never silently succeed
 */

import type { HistoryEntry } from "@custodia/types";

// ─── Stored Records ──────────────────────────────────────────────────────

/**
 * The minimum shape the store needs: a stable key and the custodied value
 * used for reconciliation.
 */
export interface KeyedRecord {
  readonly key: string;
  readonly value: bigint;
}

/** A history entry before the store assigns its sequence number. */
export type HistoryDraft = Omit<HistoryEntry, "sequence">;

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger store operations. */
export type LedgerErrorCode =
  | "KEY_MISMATCH"
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_CUSTODY"
  | "INVALID_CURSOR"
  | "INVALID_LIMIT"
  | "INVALID_SAVEPOINT"
  | "SNAPSHOT_MISMATCH";

/**
 * Structured error from the ledger store.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Reconciliation ──────────────────────────────────────────────────────

/**
 * Custody total as tracked by credits/debits versus the sum of record values.
 */
export interface CustodyBalance {
  readonly custodied: bigint;
  readonly recordTotal: bigint;
  readonly balanced: boolean;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the entire store.
 * Used for persistence and rehydration.
 */
export interface LedgerStoreSnapshot<R extends KeyedRecord> {
  readonly version: 1;
  /** Records in insertion order */
  readonly records: readonly R[];
  readonly history: readonly HistoryEntry[];
  readonly custodied: bigint;
}
