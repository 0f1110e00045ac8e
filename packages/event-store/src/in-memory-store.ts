/**
 * @custodia/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Durability of the ledger is the host's
 * concern; this store keeps the audit trail for the life of the process.
 *
 * Subscribers run synchronously, after the events are stored.
 */

import type { DomainEvent } from "@custodia/types";
import type {
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  HandlerErrorSink,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Store-level timestamp source. Default: wall clock ISO 8601 */
  readonly now?: () => string;

  /** Where subscriber errors go. Default: rethrow */
  readonly onHandlerError?: HandlerErrorSink;
}

const rethrow: HandlerErrorSink = (error) => {
  throw error;
};

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _subscribers = new Set<EventHandler>();
  private readonly _now: () => string;
  private readonly _onHandlerError: HandlerErrorSink;

  /** Hash of the last appended event (for chain linking) */
  private _lastHash: string = GENESIS_HASH;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._now = options.now ?? (() => new Date().toISOString());
    this._onHandlerError = options.onHandlerError ?? rethrow;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): readonly StoredEvent[] {
    this._validateStreamId(streamId);
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    let stream = this._streams.get(streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(streamId, stream);
    }

    const appendedAt = this._now();
    const stored: StoredEvent[] = [];
    for (const event of events) {
      const base = {
        event,
        streamId,
        version: stream.length + 1,
        globalPosition: this._globalLog.length + 1,
        appendedAt,
      };
      const previousHash = this._lastHash;
      const hash = computeEventHash(base, previousHash);
      const record: StoredEvent = Object.freeze({ ...base, hash, previousHash });

      this._lastHash = hash;
      stream.push(record);
      this._globalLog.push(record);
      stored.push(record);
    }

    this._dispatch(stored);
    return stored;
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string): readonly StoredEvent[] {
    this._validateStreamId(streamId);
    return [...(this._streams.get(streamId) ?? [])];
  }

  readAll(): readonly StoredEvent[] {
    return [...this._globalLog];
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribeAll(handler: EventHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _dispatch(events: readonly StoredEvent[]): void {
    for (const handler of [...this._subscribers]) {
      for (const event of events) {
        try {
          handler(event);
        } catch (error) {
          this._onHandlerError(error, event);
        }
      }
    }
  }
}
