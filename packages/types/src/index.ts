/**
 * @custodia/types — Shared domain types for the custody stack.
 *
 * These types are used across all Custodia packages:
 * - Principals
 * - Custody records and their read-only projection
 * - Append-only history entries
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Principal
export type { Principal } from "./principal.js";
export { NULL_PRINCIPAL, isNullPrincipal } from "./principal.js";

// Records
export type {
  RecordKind,
  RecordStatus,
  RecordBase,
  WarrantyRecord,
  RegistryItemRecord,
  GiftCardRecord,
  EventRecord,
  RsvpRecord,
  TreasuryRecord,
  CustodyRecord,
  RecordKindMap,
  RecordView,
} from "./record.js";

// History
export type { HistoryEntry, HistoryAction } from "./history.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
} from "./event.js";

// Runtime type guards
export {
  isRecordKind,
  isRecordStatus,
  isLiveStatus,
  isCustodyRecord,
  isRecordOfKind,
  isHistoryAction,
  isHistoryEntry,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
