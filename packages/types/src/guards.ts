/**
 * Runtime Type Guards
 *
 * Narrowing functions for custody domain types.
 * These enable safe runtime validation at system boundaries
 * (restored snapshots, event payloads, external integrations).
 */

import type {
  CustodyRecord,
  RecordKind,
  RecordKindMap,
  RecordStatus,
} from "./record.js";
import type { HistoryEntry, HistoryAction } from "./history.js";
import type { DomainEvent, EventMetadata } from "./event.js";

// =============================================================================
// Record guards
// =============================================================================

const RECORD_KINDS = new Set<string>([
  "warranty", "registry-item", "gift-card", "event", "rsvp", "treasury",
]);

const RECORD_STATUSES = new Set<string>([
  "active", "transferred", "voided", "redeemed", "expired", "cancelled",
]);

const LIVE_STATUSES = new Set<RecordStatus>(["active", "transferred"]);

export function isRecordKind(value: unknown): value is RecordKind {
  return typeof value === "string" && RECORD_KINDS.has(value);
}

export function isRecordStatus(value: unknown): value is RecordStatus {
  return typeof value === "string" && RECORD_STATUSES.has(value);
}

/** Live records may still transition; all other statuses are terminal. */
export function isLiveStatus(status: RecordStatus): boolean {
  return LIVE_STATUSES.has(status);
}

export function isCustodyRecord(value: unknown): value is CustodyRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.key === "string" &&
    v.key.length > 0 &&
    isRecordKind(v.kind) &&
    isRecordStatus(v.status) &&
    typeof v.value === "bigint" &&
    v.value >= 0n &&
    typeof v.beneficiary === "string" &&
    typeof v.depositor === "string" &&
    typeof v.createdAt === "number" &&
    typeof v.updatedAt === "number" &&
    (v.expiresAt === undefined || typeof v.expiresAt === "number") &&
    typeof v.payload === "string"
  );
}

/**
 * Narrow a record to the variant for `kind`.
 */
export function isRecordOfKind<K extends RecordKind>(
  record: CustodyRecord,
  kind: K,
): record is RecordKindMap[K] {
  return record.kind === kind;
}

// =============================================================================
// History guards
// =============================================================================

const HISTORY_ACTIONS = new Set<string>([
  "created", "transferred", "voided", "redeemed", "cancelled", "expired",
  "checked_in", "deposited", "withdrawn",
]);

export function isHistoryAction(value: unknown): value is HistoryAction {
  return typeof value === "string" && HISTORY_ACTIONS.has(value);
}

export function isHistoryEntry(value: unknown): value is HistoryEntry {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.sequence === "number" &&
    Number.isInteger(v.sequence) &&
    v.sequence > 0 &&
    typeof v.key === "string" &&
    isRecordKind(v.kind) &&
    isHistoryAction(v.action) &&
    typeof v.actor === "string" &&
    typeof v.counterparty === "string" &&
    typeof v.amount === "bigint" &&
    typeof v.reason === "string" &&
    typeof v.timestamp === "number"
  );
}

// =============================================================================
// Event guards
// =============================================================================

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    v.source.length > 0
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
