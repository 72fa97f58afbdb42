// Clocks
//
// Everything that needs "now" takes a Clock so tests can pin time.

import type { Timestamp } from '@revlog/protocol';

export type Clock = () => Timestamp;

/**
 * Wall-clock time, millisecond precision.
 */
export const systemClock: Clock = () => new Date().toISOString();

/**
 * A clock that only moves when told to.
 */
export type ManualClock = {
  now: Clock;
  set(timestamp: Timestamp): void;
  advance(ms: number): Timestamp;
};

export function createManualClock(start: Timestamp): ManualClock {
  let current = Date.parse(start);

  return {
    now: () => new Date(current).toISOString(),
    set(timestamp) {
      current = Date.parse(timestamp);
    },
    advance(ms) {
      current += ms;
      return new Date(current).toISOString();
    },
  };
}
