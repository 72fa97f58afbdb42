// Timestamp Utilities
//
// Timestamps travel as ISO 8601 strings but are always compared by their
// epoch-millisecond value, so "2024-01-01T00:00:00Z" and
// "2024-01-01T00:00:00.000Z" are the same instant.

import type { Timestamp } from '../types/common.js';

/**
 * Result of parsing a timestamp
 */
export type TimestampParseResult =
  | { valid: true; timestamp: Timestamp }
  | { valid: false; error: string };

// A calendar date (read as UTC midnight), or a date and time with an explicit zone
const ISO_TIMESTAMP =
  /^\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?(?:Z|[+-]\d{2}:\d{2}))?$/;

/**
 * Parse a timestamp-like value into canonical form
 * (`Date#toISOString()`, UTC, millisecond precision).
 *
 * Strings must be ISO 8601. A time of day needs `Z` or an offset, so the
 * result never depends on the host's time zone.
 */
export function parseTimestamp(value: Timestamp | Date): TimestampParseResult {
  const millis =
    value instanceof Date ? value.getTime() : ISO_TIMESTAMP.test(value) ? Date.parse(value) : NaN;

  if (Number.isNaN(millis)) {
    return { valid: false, error: `Invalid timestamp: ${String(value)}` };
  }

  return { valid: true, timestamp: new Date(millis).toISOString() };
}

/**
 * Milliseconds since the epoch for a timestamp.
 */
export function toMillis(timestamp: Timestamp): number {
  return Date.parse(timestamp);
}

/**
 * Negative when `a` is before `b`, positive when after, zero when equal.
 */
export function compareTimestamps(a: Timestamp, b: Timestamp): number {
  return toMillis(a) - toMillis(b);
}

/**
 * The earlier of two timestamps. An unset value stands for +∞.
 */
export function minTimestamp(a: Timestamp | undefined, b: Timestamp | undefined): Timestamp | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return compareTimestamps(a, b) <= 0 ? a : b;
}
