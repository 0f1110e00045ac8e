/**
 * @custodia/custody — Clock.
 *
 * Time is integer seconds. Expiry and duration checks read the clock once
 * per operation.
 */

export interface Clock {
  now(): number;
}

/** Wall clock, truncated to whole seconds. */
export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * A clock that only moves when told to.
 */
export class ManualClock implements Clock {
  private _now: number;

  constructor(start = 0) {
    ManualClock._assertTime(start);
    this._now = start;
  }

  now(): number {
    return this._now;
  }

  set(time: number): void {
    ManualClock._assertTime(time);
    if (time < this._now) {
      throw new RangeError(`Clock cannot move backwards (${String(this._now)} -> ${String(time)})`);
    }
    this._now = time;
  }

  advance(seconds: number): void {
    this.set(this._now + seconds);
  }

  private static _assertTime(time: number): void {
    if (!Number.isSafeInteger(time) || time < 0) {
      throw new RangeError(`Clock time must be a non-negative integer, got ${String(time)}`);
    }
  }
}

/** ISO 8601 rendering of a clock reading, for event metadata. */
export function toIsoTimestamp(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}
