/**
 * Record Types
 *
 * A record is the unit of custody. Every variant shares RecordBase and is
 * discriminated by `kind`.
 *
 * Rules:
 * - All types are readonly
 * - Keys are assigned once and never reused, even after a terminal status
 * - Amounts are bigint in the smallest unit (no floating point)
 * - Timestamps are integer seconds supplied by the engine's Clock
 */

import type { Principal } from "./principal.js";

// =============================================================================
// Kinds & statuses
// =============================================================================

export type RecordKind =
  | "warranty"
  | "registry-item"
  | "gift-card"
  | "event"
  | "rsvp"
  | "treasury";

/**
 * Lifecycle status.
 *
 * `active` and `transferred` are live; everything else is terminal.
 */
export type RecordStatus =
  | "active"
  | "transferred"
  | "voided"
  | "redeemed"
  | "expired"
  | "cancelled";

// =============================================================================
// Base shape
// =============================================================================

export interface RecordBase<K extends RecordKind = RecordKind> {
  /** Opaque unique key (serial number, item id, commitment hash, ...) */
  readonly key: string;

  readonly kind: K;

  readonly status: RecordStatus;

  /** Custodied funds. Zero for non-monetary records. */
  readonly value: bigint;

  /** Principal entitled to act on or receive payout from the record */
  readonly beneficiary: Principal;

  /** Principal who created or funded the record */
  readonly depositor: Principal;

  readonly createdAt: number;

  readonly updatedAt: number;

  /** Exclusive upper time bound: the record is expired at `expiresAt` */
  readonly expiresAt?: number | undefined;

  /** Free-form descriptive data, never interpreted */
  readonly payload: string;
}

// =============================================================================
// Variants
// =============================================================================

export interface WarrantyRecord extends RecordBase<"warranty"> {
  readonly transferCount: number;
  readonly voidReason?: string | undefined;
  readonly claim?: string | undefined;
}

export interface RegistryItemRecord extends RecordBase<"registry-item"> {
  readonly name: string;
  readonly price: bigint;
  readonly purchasedBy?: Principal | undefined;
  readonly voidReason?: string | undefined;
}

/**
 * A hash-locked gift card. The key is the SHA-256 commitment of the
 * redemption secret.
 */
export interface GiftCardRecord extends RecordBase<"gift-card"> {
  /** True when `beneficiary` may claim without the secret */
  readonly designated: boolean;
  readonly message: string;
  readonly redeemedBy?: Principal | undefined;
}

/** An RSVP-able event. Deposits are held by the attendees' rsvp records. */
export interface EventRecord extends RecordBase<"event"> {
  readonly name: string;
  readonly deposit: bigint;
  readonly capacity: number;
  readonly attendeeCount: number;
  readonly voidReason?: string | undefined;
}

export interface RsvpRecord extends RecordBase<"rsvp"> {
  readonly eventId: string;
  readonly hasCheckedIn: boolean;
}

/** The pooled balance of a shared treasury. */
export interface TreasuryRecord extends RecordBase<"treasury"> {
  readonly totalDeposited: bigint;
  readonly totalWithdrawn: bigint;
}

export type CustodyRecord =
  | WarrantyRecord
  | RegistryItemRecord
  | GiftCardRecord
  | EventRecord
  | RsvpRecord
  | TreasuryRecord;

/** Lookup from kind to its record variant. */
export interface RecordKindMap {
  readonly warranty: WarrantyRecord;
  readonly "registry-item": RegistryItemRecord;
  readonly "gift-card": GiftCardRecord;
  readonly event: EventRecord;
  readonly rsvp: RsvpRecord;
  readonly treasury: TreasuryRecord;
}

// =============================================================================
// Read-only projection
// =============================================================================

/**
 * What `inspect` returns. `status` is the effective status at read time,
 * so a live record past its `expiresAt` reads as `expired` before any
 * expire transition has been written.
 */
export interface RecordView {
  readonly key: string;
  readonly kind: RecordKind;
  readonly valid: boolean;
  readonly status: RecordStatus;
  readonly statusText: string;
  readonly beneficiary: Principal;
  readonly value: bigint;
  readonly expiresAt?: number | undefined;
  readonly payload: string;
}
