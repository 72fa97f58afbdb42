// Repository error types
//
// Raised by every RevisionRepository implementation, whatever the backend.

import type { RevisionId } from '@revlog/protocol';

/**
 * Base class for errors raised by the storage layer.
 */
export class RepositoryError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RepositoryError';
    this.code = code;
  }
}

/**
 * Write-time constraints enforced on the revision log.
 */
export type RevisionConstraint =
  | 'entity_id_le_revision_id'
  | 'entity_id_allocated'
  | 'added_le_removed'
  | 'removed_only_tightens';

/**
 * A write would break a revision invariant. The write is rejected as a
 * whole; nothing has been changed.
 */
export class ConstraintViolation extends RepositoryError {
  readonly constraint: RevisionConstraint;
  readonly revisionId?: RevisionId;

  constructor(constraint: RevisionConstraint, message: string, revisionId?: RevisionId) {
    super('CONSTRAINT_VIOLATION', message);
    this.name = 'ConstraintViolation';
    this.constraint = constraint;
    this.revisionId = revisionId;
  }
}

/**
 * Error when a referenced revision does not exist.
 */
export class RevisionNotFoundError extends RepositoryError {
  readonly revisionId: RevisionId;

  constructor(revisionId: RevisionId) {
    super('REVISION_NOT_FOUND', `Revision not found: ${revisionId}`);
    this.name = 'RevisionNotFoundError';
    this.revisionId = revisionId;
  }
}
