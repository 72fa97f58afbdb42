// Common types used across the protocol

/**
 * ISO 8601 timestamp string (millisecond precision, UTC)
 */
export type Timestamp = string;

/**
 * Identifier of a single revision. Assigned by the log, strictly increasing.
 */
export type RevisionId = number;

/**
 * Identifier of a logical entity, shared by all of its revisions.
 */
export type EntityId = number;

/**
 * Application-defined revision content. Opaque to the log.
 */
export type Payload = Record<string, unknown>;
