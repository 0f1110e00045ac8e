/**
 * @custodia/event-store — Custody domain event definitions.
 *
 * Naming convention: `<entity>.<action>`
 *
 * Every custody event carries the same payload shape so observers can
 * index them uniformly: the record (or member) key, the principals
 * involved, the amount moved as a decimal string, a reason and the
 * ledger clock time.
 */

import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Event Types
// =============================================================================

export const CUSTODY_EVENTS = {
  RECORD_CREATED: "record.created",
  RECORD_TRANSFERRED: "record.transferred",
  RECORD_VOIDED: "record.voided",
  RECORD_REDEEMED: "record.redeemed",
  RECORD_CANCELLED: "record.cancelled",
  RECORD_EXPIRED: "record.expired",
  ATTENDEE_CHECKED_IN: "attendee.checked_in",
  MEMBERSHIP_CHANGED: "access.membership.changed",
  OWNERSHIP_TRANSFERRED: "access.ownership.transferred",
  FUNDS_DEPOSITED: "funds.deposited",
  FUNDS_WITHDRAWN: "funds.withdrawn",
} as const;

export type CustodyEventType = (typeof CUSTODY_EVENTS)[keyof typeof CUSTODY_EVENTS];

// =============================================================================
// Payload
// =============================================================================

export interface CustodyEventPayload {
  readonly key: string;
  /** Record kind, or "access" for membership and ownership events */
  readonly subject: string;
  readonly principals: readonly string[];
  /** Smallest-unit amount as a decimal string */
  readonly amount: string;
  readonly reason: string;
  /** Ledger clock, integer seconds */
  readonly timestamp: number;
}

// =============================================================================
// Validation helpers
// =============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isCustodyEventPayload(value: unknown): value is CustodyEventPayload {
  return (
    isObject(value) &&
    typeof value.key === "string" &&
    value.key.length > 0 &&
    typeof value.subject === "string" &&
    Array.isArray(value.principals) &&
    value.principals.every((p) => typeof p === "string") &&
    typeof value.amount === "string" &&
    /^\d+$/.test(value.amount) &&
    typeof value.reason === "string" &&
    typeof value.timestamp === "number" &&
    Number.isInteger(value.timestamp)
  );
}

/** Payouts, deposits and withdrawals must move a positive amount. */
function movesFunds(value: unknown): boolean {
  return isCustodyEventPayload(value) && BigInt(value.amount) > 0n;
}

function isMembershipChange(value: unknown): boolean {
  return (
    isCustodyEventPayload(value) &&
    value.subject === "access" &&
    (value.reason === "added" || value.reason === "removed")
  );
}

// =============================================================================
// Schemas
// =============================================================================

const RECORD_SCHEMAS: readonly EventSchema[] = [
  {
    type: CUSTODY_EVENTS.RECORD_CREATED,
    version: 1,
    description: "A record entered custody",
    validate: isCustodyEventPayload,
  },
  {
    type: CUSTODY_EVENTS.RECORD_TRANSFERRED,
    version: 1,
    description: "A record's beneficiary changed",
    validate: isCustodyEventPayload,
  },
  {
    type: CUSTODY_EVENTS.RECORD_VOIDED,
    version: 1,
    description: "A record was voided by a privileged principal",
    validate: isCustodyEventPayload,
  },
  {
    type: CUSTODY_EVENTS.RECORD_REDEEMED,
    version: 1,
    description: "A record was redeemed, paying out any custodied value",
    validate: isCustodyEventPayload,
  },
  {
    type: CUSTODY_EVENTS.RECORD_CANCELLED,
    version: 1,
    description: "A record was cancelled by its depositor and refunded",
    validate: isCustodyEventPayload,
  },
  {
    type: CUSTODY_EVENTS.RECORD_EXPIRED,
    version: 1,
    description: "An expired record was settled",
    validate: isCustodyEventPayload,
  },
  {
    type: CUSTODY_EVENTS.ATTENDEE_CHECKED_IN,
    version: 1,
    description: "An attendee was checked in and their deposit refunded",
    validate: movesFunds,
  },
];

const ACCESS_SCHEMAS: readonly EventSchema[] = [
  {
    type: CUSTODY_EVENTS.MEMBERSHIP_CHANGED,
    version: 1,
    description: "A principal was added to or removed from the member set",
    validate: isMembershipChange,
  },
  {
    type: CUSTODY_EVENTS.OWNERSHIP_TRANSFERRED,
    version: 1,
    description: "Ledger ownership moved to a new principal",
    validate: isCustodyEventPayload,
  },
];

const FUNDS_SCHEMAS: readonly EventSchema[] = [
  {
    type: CUSTODY_EVENTS.FUNDS_DEPOSITED,
    version: 1,
    description: "Value was deposited into a pooled record",
    validate: movesFunds,
  },
  {
    type: CUSTODY_EVENTS.FUNDS_WITHDRAWN,
    version: 1,
    description: "Value was withdrawn from a pooled record",
    validate: movesFunds,
  },
];

// =============================================================================
// Factory
// =============================================================================

/**
 * Create an EventCatalog with every custody event registered at version 1.
 */
export function createCustodyCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of [...RECORD_SCHEMAS, ...ACCESS_SCHEMAS, ...FUNDS_SCHEMAS]) {
    catalog.register(schema);
  }
  return catalog;
}
