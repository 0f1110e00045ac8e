/**
 * Event Escrow — RSVP deposits held until the attendee shows up.
 *
 * Rules:
 * - Members set up events with a fixed deposit, a capacity and an RSVP
 *   deadline
 * - Attending costs exactly the deposit, until the deadline or capacity
 *   is reached
 * - The organizer checks an attendee in, refunding the deposit once
 * - Attendees may cancel for a refund before the deadline, or at any time
 *   after the event is cancelled
 *
 * Each RSVP is its own record under `rsvpKey(eventId, attendee)`, so an
 * attendee's deposit is custodied and refunded independently.
 */

import type { EventRecord, Principal, RecordView, RsvpRecord } from "@custodia/types";
import type { PaginatedResponse } from "@custodia/ledger";
import { CustodyError, assertLive, assertNotExpired, isExpired } from "@custodia/custody";
import type { CallContext, CustodyEngine, PageRequest } from "@custodia/custody";
import { pageOfKind, recordOfKind } from "./pages.js";

export interface CreateEvent {
  readonly eventId: string;
  readonly name: string;
  readonly deposit: bigint;
  readonly capacity: number;
  /** Seconds until RSVPs close */
  readonly duration: number;
  readonly payload?: string | undefined;
}

/** RSVP keys are JSON pairs; event IDs may not start with "[". */
export function rsvpKey(eventId: string, attendee: Principal): string {
  return JSON.stringify([eventId, attendee]);
}

export class EventEscrow {
  constructor(readonly engine: CustodyEngine) {}

  createEvent(ctx: CallContext, event: CreateEvent): EventRecord {
    return this.engine.run(ctx, "createEvent", () => {
      this.engine.access.requireMember(ctx.caller);
      if (event.eventId.startsWith("[")) {
        throw new CustodyError("INVALID_INPUT", 'Event ID must not start with "["', event.eventId);
      }
      if (event.name.trim() === "") {
        throw new CustodyError("INVALID_INPUT", "Event name must be non-empty", event.eventId);
      }
      if (event.deposit <= 0n) {
        throw new CustodyError("INVALID_INPUT", `Deposit must be positive, got ${event.deposit.toString()}`, event.eventId);
      }
      if (!Number.isSafeInteger(event.capacity) || event.capacity <= 0) {
        throw new CustodyError("INVALID_INPUT", `Capacity must be a positive integer, got ${String(event.capacity)}`, event.eventId);
      }
      this.engine.create(
        ctx,
        {
          key: event.eventId,
          kind: "event",
          value: 0n,
          beneficiary: ctx.caller,
          payload: event.payload ?? "",
          name: event.name,
          deposit: event.deposit,
          capacity: event.capacity,
          attendeeCount: 0,
        },
        { guard: "member", duration: event.duration },
      );
      return this.engine.requireKind(event.eventId, "event");
    });
  }

  /** Reserve a place; the attached value must equal the event's deposit. */
  rsvp(ctx: CallContext, eventId: string): RsvpRecord {
    return this.engine.run(ctx, "rsvp", () => {
      const event = this.engine.requireKind(eventId, "event");
      assertLive(event);
      assertNotExpired(event, this.engine.clock.now());
      if (ctx.value !== event.deposit) {
        throw new CustodyError(
          "INVALID_INPUT",
          `RSVP requires exactly ${event.deposit.toString()} attached, got ${ctx.value.toString()}`,
          eventId,
        );
      }
      const key = rsvpKey(eventId, ctx.caller);
      if (this.engine.get(key) !== undefined) {
        throw new CustodyError("ALREADY_EXISTS", `${ctx.caller} has already responded to "${eventId}"`, key);
      }
      if (event.attendeeCount >= event.capacity) {
        throw new CustodyError("CAPACITY_EXCEEDED", `"${eventId}" is full (${String(event.capacity)})`, eventId);
      }

      this.engine.create(
        ctx,
        {
          key,
          kind: "rsvp",
          value: event.deposit,
          beneficiary: ctx.caller,
          payload: "",
          eventId,
          hasCheckedIn: false,
        },
        { guard: "open" },
      );
      this._adjustAttendance(eventId, 1);
      return this.engine.requireKind(key, "rsvp");
    });
  }

  /** Give up a place and take the deposit back. */
  cancelRsvp(ctx: CallContext, eventId: string): RsvpRecord {
    return this.engine.run(ctx, "cancelRsvp", () => {
      const event = this.engine.requireKind(eventId, "event");
      const key = rsvpKey(eventId, ctx.caller);
      this._requireRsvp(key, eventId);
      if (event.status !== "voided" && isExpired(event, this.engine.clock.now())) {
        throw new CustodyError("EXPIRED", `RSVPs for "${eventId}" have closed`, eventId);
      }
      this.engine.cancel(ctx, key);
      this._adjustAttendance(eventId, -1);
      return this.engine.requireKind(key, "rsvp");
    });
  }

  /** The organizer (or owner) checks `attendee` in and refunds the deposit. */
  checkIn(ctx: CallContext, eventId: string, attendee: Principal): RsvpRecord {
    return this.engine.run(ctx, "checkIn", () => {
      this.engine.requireKind(eventId, "event");
      const key = rsvpKey(eventId, attendee);
      this._requireRsvp(key, eventId);
      this.engine.checkIn(ctx, key);
      return this.engine.requireKind(key, "rsvp");
    });
  }

  /** Call the event off. Attendees then cancel for their refunds. */
  cancelEvent(ctx: CallContext, eventId: string, reason: string): EventRecord {
    return this.engine.run(ctx, "cancelEvent", () => {
      this.engine.requireKind(eventId, "event");
      this.engine.void(ctx, eventId, reason, "depositor");
      return this.engine.requireKind(eventId, "event");
    });
  }

  get(eventId: string): EventRecord | undefined {
    return recordOfKind(this.engine.get(eventId), "event");
  }

  rsvpOf(eventId: string, attendee: Principal): RsvpRecord | undefined {
    return recordOfKind(this.engine.get(rsvpKey(eventId, attendee)), "rsvp");
  }

  inspect(eventId: string): RecordView | undefined {
    return this.get(eventId) === undefined ? undefined : this.engine.inspect(eventId);
  }

  /** Current attendees (checked in or not), in RSVP order. */
  listAttendees(eventId: string, request: PageRequest = {}): PaginatedResponse<RsvpRecord> {
    const page = this.engine.list(
      request,
      (r) => r.kind === "rsvp" && r.eventId === eventId && r.status !== "cancelled",
    );
    return pageOfKind(page, "rsvp");
  }

  private _requireRsvp(key: string, eventId: string): RsvpRecord {
    const rsvp = recordOfKind(this.engine.get(key), "rsvp");
    if (rsvp === undefined) {
      throw new CustodyError("INVALID_STATE", `No RSVP under ${key}`, key);
    }
    if (rsvp.eventId !== eventId) {
      throw new CustodyError("INVALID_STATE", `RSVP ${key} belongs to "${rsvp.eventId}"`, key);
    }
    return rsvp;
  }

  private _adjustAttendance(eventId: string, delta: number): void {
    this.engine.amend(eventId, (record) =>
      record.kind === "event"
        ? { ...record, attendeeCount: record.attendeeCount + delta }
        : record,
    );
  }
}
