// Runtime error types

import type { EntityId, RevisionId, Timestamp } from '@revlog/protocol';

export {
  RepositoryError,
  ConstraintViolation,
  RevisionNotFoundError,
  type RevisionConstraint,
} from '@revlog/repositories';

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * More than one revision of an entity is active at the same instant.
 *
 * This means writes to the entity were not serialized. It is reported,
 * never repaired.
 */
export class IntegrityError extends RuntimeError {
  readonly entityId: EntityId;
  readonly at: Timestamp;
  readonly revisionIds: RevisionId[];

  constructor(entityId: EntityId, at: Timestamp, revisionIds: RevisionId[]) {
    super(
      'INTEGRITY_ERROR',
      `Entity ${entityId} has ${revisionIds.length} active revisions at ${at}: ${revisionIds.join(', ')}`
    );
    this.name = 'IntegrityError';
    this.entityId = entityId;
    this.at = at;
    this.revisionIds = revisionIds;
  }
}

/**
 * Error when an insert names an entity that already has an active revision
 * and duplicate identifiers are configured to be rejected.
 */
export class DuplicateIdentifierError extends RuntimeError {
  readonly entityId: EntityId;
  readonly activeRevisionId: RevisionId;

  constructor(entityId: EntityId, activeRevisionId: RevisionId) {
    super(
      'DUPLICATE_IDENTIFIER',
      `Entity ${entityId} already has an active revision (${activeRevisionId})`
    );
    this.name = 'DuplicateIdentifierError';
    this.entityId = entityId;
    this.activeRevisionId = activeRevisionId;
  }
}

/**
 * Error when an update changes an entity's ID and identity changes are
 * configured to be rejected.
 */
export class IdentityChangeError extends RuntimeError {
  readonly fromEntityId: EntityId;
  readonly toEntityId: EntityId;

  constructor(fromEntityId: EntityId, toEntityId: EntityId) {
    super(
      'IDENTITY_CHANGE',
      `Changing entity ID from ${fromEntityId} to ${toEntityId} is not allowed`
    );
    this.name = 'IdentityChangeError';
    this.fromEntityId = fromEntityId;
    this.toEntityId = toEntityId;
  }
}
