/**
 * @custodia/event-store — Core types.
 *
 * Rules:
 * - Events are immutable once appended
 * - Stream versions are contiguous from 1
 * - Global positions are contiguous from 1
 * - Every event is hash-linked to its global predecessor
 */

import type { DomainEvent } from "@custodia/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * A DomainEvent as persisted, with its place in its stream (usually
 * `subject:key`) and in the global log.
 */
export interface StoredEvent {
  readonly event: DomainEvent;
  readonly streamId: string;

  /** 1-based position within the stream */
  readonly version: number;

  /** 1-based position across all streams */
  readonly globalPosition: number;

  /** Store time, not domain time */
  readonly appendedAt: string;

  /** SHA-256 of this event's canonical content plus `previousHash` */
  readonly hash: string;

  /** Hash of the preceding event, or GENESIS_HASH */
  readonly previousHash: string;
}

/** The part of a StoredEvent covered by its hash. */
export type HashableEvent = Omit<StoredEvent, "hash" | "previousHash">;

// =============================================================================
// Subscription
// =============================================================================

/** Called synchronously for each appended event. */
export type EventHandler = (event: StoredEvent) => void;

/**
 * Receives errors thrown by subscribers. The event is already stored when
 * this runs.
 */
export type HandlerErrorSink = (error: unknown, event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Event Store Interface
// =============================================================================

export interface EventStore {
  /** Append events to a stream; returns them as stored. */
  append(streamId: string, events: readonly DomainEvent[]): readonly StoredEvent[];

  /** Events of one stream, oldest first. Empty if the stream doesn't exist. */
  read(streamId: string): readonly StoredEvent[];

  /** Every event in global order. */
  readAll(): readonly StoredEvent[];

  subscribeAll(handler: EventHandler): Subscription;

  /** Version of the last event in the stream, or 0 */
  streamVersion(streamId: string): number;

  /** Position of the last event, or 0 if the store is empty */
  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode = "INVALID_STREAM_ID" | "EMPTY_APPEND";

export class EventStoreError extends Error {
  public readonly code: EventStoreErrorCode;
  public readonly streamId: string | undefined;

  constructor(code: EventStoreErrorCode, message: string, streamId?: string) {
    super(message);
    this.name = "EventStoreError";
    this.code = code;
    this.streamId = streamId;
  }
}
