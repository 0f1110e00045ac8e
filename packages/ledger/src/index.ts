/**
 * @custodia/ledger — Keyed custody store with an append-only history.
 *
 * A pure TypeScript store with zero runtime dependencies:
 * - Records are looked up by opaque key and never deleted
 * - History entries are immutable once appended
 * - Every mutation is journaled so an operation commits or rolls back whole
 * - The running custody total reconciles against the sum of record values
 * - Listings are cursor pages or lazy iterables, never unbounded arrays
 */

// Core store
export { LedgerStore } from "./ledger-store.js";
export { HistoryLog } from "./history-log.js";
export { Journal } from "./journal.js";
export type { UndoAction } from "./journal.js";

// Pagination
export {
  encodeCursor,
  decodeCursor,
  resolveCursor,
  paginate,
  iteratePages,
} from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Types
export type {
  KeyedRecord,
  HistoryDraft,
  LedgerErrorCode,
  CustodyBalance,
  LedgerStoreSnapshot,
} from "./types.js";

export { LedgerError } from "./types.js";
