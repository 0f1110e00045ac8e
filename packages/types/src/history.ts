/**
 * History Types
 *
 * The append-only audit trail kept by the ledger store. Entries are never
 * edited and are ordered by insertion (`sequence`).
 */

import type { Principal } from "./principal.js";
import type { RecordKind } from "./record.js";

export type HistoryAction =
  | "created"
  | "transferred"
  | "voided"
  | "redeemed"
  | "cancelled"
  | "expired"
  | "checked_in"
  | "deposited"
  | "withdrawn";

export interface HistoryEntry {
  /** 1-based insertion position */
  readonly sequence: number;
  readonly key: string;
  readonly kind: RecordKind;
  readonly action: HistoryAction;
  readonly actor: Principal;
  readonly counterparty: Principal;
  readonly amount: bigint;
  readonly reason: string;
  readonly timestamp: number;
}
