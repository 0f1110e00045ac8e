/**
 * @custodia/custody — Record lifecycle.
 *
 *   Nonexistent ─create─▶ active ─transfer─▶ transferred ─transfer─▶ …
 *                           │                     │
 *                           └──────────┬──────────┘
 *                                      ▼
 *                 voided | redeemed | cancelled | expired   (terminal)
 *
 * Expiry is lazy: a live record past `expiresAt` reads as expired and
 * refuses beneficiary operations, but nothing is written until `expire`
 * settles it.
 *
 * Pure functions over records; the engine decides who may call them.
 */

import type {
  CustodyRecord,
  Principal,
  RecordStatus,
  RecordView,
} from "@custodia/types";
import { isLiveStatus } from "@custodia/types";
import { CustodyError } from "./errors.js";

export type Transition =
  | { readonly to: "transferred"; readonly beneficiary: Principal }
  | { readonly to: "voided"; readonly reason: string }
  | { readonly to: "redeemed"; readonly by: Principal; readonly note: string }
  | { readonly to: "cancelled" }
  | { readonly to: "expired" };

const STATUS_LABELS: Readonly<Record<RecordStatus, string>> = {
  active: "Active",
  transferred: "Transferred",
  voided: "Voided",
  redeemed: "Redeemed",
  expired: "Expired",
  cancelled: "Cancelled",
};

// =============================================================================
// Time bounds
// =============================================================================

/** `expiresAt` is exclusive: a record is expired from that second on. */
export function isExpired(record: CustodyRecord, now: number): boolean {
  return record.expiresAt !== undefined && now >= record.expiresAt;
}

/**
 * Status as of `now`. Differs from the stored status only for a live
 * record whose expiry has not been written yet.
 */
export function effectiveStatus(record: CustodyRecord, now: number): RecordStatus {
  return isLiveStatus(record.status) && isExpired(record, now) ? "expired" : record.status;
}

// =============================================================================
// Projection
// =============================================================================

function voidReasonOf(record: CustodyRecord): string | undefined {
  switch (record.kind) {
    case "warranty":
    case "registry-item":
    case "event":
      return record.voidReason;
    default:
      return undefined;
  }
}

export function statusText(record: CustodyRecord, now: number): string {
  const status = effectiveStatus(record, now);
  const reason = status === "voided" ? voidReasonOf(record) : undefined;
  return reason !== undefined && reason !== ""
    ? `${STATUS_LABELS[status]}: ${reason}`
    : STATUS_LABELS[status];
}

export function toView(record: CustodyRecord, now: number): RecordView {
  const status = effectiveStatus(record, now);
  return {
    key: record.key,
    kind: record.kind,
    valid: isLiveStatus(status),
    status,
    statusText: statusText(record, now),
    beneficiary: record.beneficiary,
    value: record.value,
    expiresAt: record.expiresAt,
    payload: record.payload,
  };
}

// =============================================================================
// Preconditions
// =============================================================================

export function assertLive(record: CustodyRecord): void {
  if (!isLiveStatus(record.status)) {
    throw new CustodyError(
      "INVALID_STATE",
      `Record "${record.key}" is ${record.status}`,
      record.key,
    );
  }
}

export function assertNotExpired(record: CustodyRecord, now: number): void {
  if (isExpired(record, now)) {
    throw new CustodyError(
      "EXPIRED",
      `Record "${record.key}" expired at ${String(record.expiresAt)}`,
      record.key,
    );
  }
}

// =============================================================================
// Transitions
// =============================================================================

/**
 * Apply a transition to a live record. Payout transitions zero the value;
 * the caller disburses what the record held before.
 */
export function applyTransition(
  record: CustodyRecord,
  transition: Transition,
  now: number,
): CustodyRecord {
  assertLive(record);

  switch (transition.to) {
    case "transferred": {
      const moved = {
        ...record,
        status: "transferred" as const,
        beneficiary: transition.beneficiary,
        updatedAt: now,
      };
      return moved.kind === "warranty"
        ? { ...moved, transferCount: moved.transferCount + 1 }
        : moved;
    }

    case "voided": {
      const voided = { ...record, status: "voided" as const, updatedAt: now };
      switch (voided.kind) {
        case "warranty":
        case "registry-item":
        case "event":
          return { ...voided, voidReason: transition.reason };
        default:
          return voided;
      }
    }

    case "redeemed": {
      const redeemed = { ...record, status: "redeemed" as const, value: 0n, updatedAt: now };
      switch (redeemed.kind) {
        case "warranty":
          return { ...redeemed, claim: transition.note };
        case "registry-item":
          return { ...redeemed, purchasedBy: transition.by };
        case "gift-card":
          return { ...redeemed, redeemedBy: transition.by };
        case "rsvp":
          return { ...redeemed, hasCheckedIn: true };
        default:
          return redeemed;
      }
    }

    case "cancelled":
      return { ...record, status: "cancelled", value: 0n, updatedAt: now };

    case "expired":
      return { ...record, status: "expired", value: 0n, updatedAt: now };
  }
}
