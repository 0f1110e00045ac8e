/**
 * @custodia/custody — Transaction coordinator.
 *
 * Every engine operation runs inside `run`. The outermost call opens the
 * atomicity boundary; calls made while it is open (re-entry through a
 * payout) nest as savepoints on the same journal. Store writes, membership
 * changes, staged events and settled transfers are all journaled, so a
 * throw anywhere undoes the whole operation.
 *
 * Events are validated against the catalog when staged and reach the event
 * store only when the outermost operation commits.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, Principal } from "@custodia/types";
import type { Journal } from "@custodia/ledger";
import type {
  CustodyEventPayload,
  CustodyEventType,
  EventCatalog,
  EventStore,
} from "@custodia/event-store";
import type { Logger } from "pino";
import { CustodyError, isCustodyError } from "./errors.js";
import { toIsoTimestamp } from "./clock.js";

export interface TransactionCoordinatorOptions {
  /** Ledger name, stamped on every event as `metadata.source` */
  readonly source: string;
  readonly journal: Journal;
  readonly events: EventStore;
  readonly catalog: EventCatalog;
  readonly log: Logger;
}

interface StagedEvent {
  readonly streamId: string;
  readonly event: DomainEvent;
}

/** Stream holding the events for one record or one access subject. */
export function streamIdFor(subject: string, key: string): string {
  return `${subject}:${key}`;
}

export class TransactionCoordinator {
  private readonly _source: string;
  private readonly _journal: Journal;
  private readonly _events: EventStore;
  private readonly _catalog: EventCatalog;
  private readonly _log: Logger;
  private _staged: StagedEvent[] = [];
  private _correlationId: string | undefined;

  constructor(options: TransactionCoordinatorOptions) {
    this._source = options.source;
    this._journal = options.journal;
    this._events = options.events;
    this._catalog = options.catalog;
    this._log = options.log;
  }

  /** True while an operation is running. */
  get active(): boolean {
    return this._journal.depth > 0;
  }

  run<T>(actor: Principal, operation: string, fn: () => T): T {
    const outermost = !this.active;
    if (outermost) {
      this._staged = [];
      this._correlationId = randomUUID();
    }

    const savepoint = this._journal.savepoint();
    let result: T;
    try {
      result = fn();
    } catch (error) {
      this._journal.rollbackTo(savepoint);
      if (outermost) {
        this._staged = [];
        this._correlationId = undefined;
        this._log.warn(
          {
            operation,
            actor,
            code: isCustodyError(error) ? error.code : undefined,
            err: error,
          },
          "Operation rolled back",
        );
      }
      throw error;
    }

    this._journal.release(savepoint);
    if (outermost) {
      this._commit(operation, actor);
    }
    return result;
  }

  /**
   * Stage an event for the running operation.
   */
  emit(type: CustodyEventType, actor: Principal, payload: CustodyEventPayload): void {
    if (!this.active) {
      throw new CustodyError("INVALID_STATE", `Cannot emit ${type} outside an operation`, payload.key);
    }
    if (!this._catalog.validate(type, payload)) {
      throw new CustodyError("INVALID_STATE", `Malformed ${type} payload for "${payload.key}"`, payload.key);
    }

    const event: DomainEvent = {
      type,
      metadata: {
        eventId: randomUUID(),
        timestamp: toIsoTimestamp(payload.timestamp),
        actor,
        correlationId: this._correlationId ?? randomUUID(),
        source: this._source,
      },
      payload: { ...payload, principals: [...payload.principals] },
    };

    this._staged.push({ streamId: streamIdFor(payload.subject, payload.key), event });
    this._journal.record(() => {
      this._staged.pop();
    });
  }

  private _commit(operation: string, actor: Principal): void {
    const staged = this._staged;
    const correlationId = this._correlationId;
    this._staged = [];
    this._correlationId = undefined;

    for (const { streamId, event } of staged) {
      this._events.append(streamId, [event]);
    }

    this._log.debug(
      { operation, actor, correlationId, events: staged.length },
      "Operation committed",
    );
  }
}
