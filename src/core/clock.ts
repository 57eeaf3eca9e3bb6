/**
 * @fileoverview Timestamp source for record stores.
 *
 * Wall clocks can step backwards (NTP adjustments, manual changes). Records in
 * one store must carry non-decreasing timestamps, so the clock never hands out
 * an instant earlier than the last one it returned.
 */

export type TimeSource = () => Date;

export interface Clock {
  /** Next timestamp as an ISO-8601 string. */
  now(): string;
}

export function createMonotonicClock(source: TimeSource = () => new Date()): Clock {
  let last = Number.NEGATIVE_INFINITY;
  return {
    now(): string {
      const current = source().getTime();
      if (Number.isNaN(current)) {
        throw new RangeError('Time source returned an invalid date');
      }
      last = Math.max(last, current);
      return new Date(last).toISOString();
    },
  };
}

/**
 * Clock that starts at `start` and advances by `stepMs` on every call.
 * Handy for deterministic fixtures and reproducible demo output.
 */
export function createSteppingClock(start: Date, stepMs = 1000): Clock {
  let next = start.getTime();
  return createMonotonicClock(() => {
    const value = new Date(next);
    next += stepMs;
    return value;
  });
}
