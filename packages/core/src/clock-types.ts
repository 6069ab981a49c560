/**
 * Clock abstraction: injectable for deterministic testing.
 *
 * Production code uses the wall clock via `defaultClock`.
 * Tests inject a fake clock that controls time explicitly.
 */

export interface Clock {
  /** UNIX epoch milliseconds. */
  readonly now: () => number;
}

/** Production clock backed by Date.now(). */
export const defaultClock: Clock = {
  now: () => Date.now(),
};

/** ISO-8601 timestamp for the clock's current instant. */
export function isoNow(clock: Clock): string {
  return new Date(clock.now()).toISOString();
}
