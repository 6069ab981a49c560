/**
 * Deterministic clock for tests. Time only moves when told to.
 */

import type { Clock } from "@tandem/core";

export const FAKE_CLOCK_START = Date.parse("2026-01-01T00:00:00.000Z");

export class FakeClock implements Clock {
  private _now: number;

  constructor(start: number = FAKE_CLOCK_START) {
    this._now = start;
  }

  get now(): () => number {
    return () => this._now;
  }

  /** Move time forward by `ms`. */
  advance(ms: number): void {
    this._now += ms;
  }

  /** Current instant as ISO 8601. */
  iso(): string {
    return new Date(this._now).toISOString();
  }
}
