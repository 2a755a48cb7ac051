/**
 * Clocks.
 *
 * SystemClock reads wall time in whole seconds. ManualClock is
 * driven explicitly and is what tests and replays use.
 */

import type { Clock } from "@keel/types";
import { LedgerError } from "./types.js";

export const SECONDS_PER_DAY = 86_400;

/**
 * Validate a clock reading: a non-negative safe integer.
 */
export function assertTimestamp(value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new LedgerError("INVALID_TIMESTAMP", `Timestamp must be a non-negative integer of seconds, got: ${String(value)}`);
  }
}

export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}

export class ManualClock implements Clock {
  private _now: number;

  constructor(start = 0) {
    assertTimestamp(start);
    this._now = start;
  }

  now(): number {
    return this._now;
  }

  /** Move forward by `seconds`. */
  advance(seconds: number): number {
    assertTimestamp(seconds);
    this._now += seconds;
    return this._now;
  }

  /** Jump to an absolute instant. Going backwards is rejected. */
  set(instant: number): void {
    assertTimestamp(instant);
    if (instant < this._now) {
      throw new LedgerError("INVALID_TIMESTAMP", `Clock cannot move backwards from ${String(this._now)} to ${String(instant)}`);
    }
    this._now = instant;
  }
}
