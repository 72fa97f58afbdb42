// Input validation for runtime operations

import { parseTimestamp } from '@revlog/protocol';
import type { EntityId, Payload, Timestamp } from '@revlog/protocol';
import { ValidationError } from './errors.js';

/**
 * Parse a timestamp into canonical form.
 *
 * @throws ValidationError if the value is not a valid instant
 */
export function requireTimestamp(value: Timestamp | Date, field: string): Timestamp {
  const result = parseTimestamp(value);
  if (!result.valid) {
    throw new ValidationError(result.error, { field, details: { value: String(value) } });
  }
  return result.timestamp;
}

/**
 * @throws ValidationError unless the value is a positive safe integer
 */
export function requireEntityId(value: number, field: string): EntityId {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ValidationError(`${field} must be a positive integer, got ${value}`, {
      field,
      details: { value },
    });
  }
  return value;
}

/**
 * Whether a value can be stored as a revision payload (a plain JSON object).
 */
export function isPayload(value: unknown): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * @throws ValidationError unless the value is a plain object
 */
export function requirePayload(value: unknown, field: string): Payload {
  if (!isPayload(value)) {
    throw new ValidationError(`${field} must be an object`, { field });
  }
  return value;
}
