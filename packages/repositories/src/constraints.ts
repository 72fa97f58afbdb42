// Write-time invariant checks shared by all backends

import { compareTimestamps } from '@revlog/protocol';
import type { EntityId, Revision, RevisionId, Timestamp } from '@revlog/protocol';
import { ConstraintViolation } from './errors.js';

/**
 * Check a new revision before it is written.
 *
 * @throws ConstraintViolation if `entityId > revisionId` or `removedAt < addedAt`
 */
export function checkNewRevision(
  revisionId: RevisionId,
  entityId: EntityId,
  addedAt: Timestamp,
  removedAt?: Timestamp
): void {
  if (entityId > revisionId) {
    throw new ConstraintViolation(
      'entity_id_le_revision_id',
      `Entity ID ${entityId} is greater than revision ID ${revisionId}`,
      revisionId
    );
  }

  if (removedAt !== undefined && compareTimestamps(addedAt, removedAt) > 0) {
    throw new ConstraintViolation(
      'added_le_removed',
      `removedAt ${removedAt} is before addedAt ${addedAt}`,
      revisionId
    );
  }
}

/**
 * Check that `removedAt` may be applied to an existing revision.
 *
 * @returns false when the revision already carries exactly this bound
 * @throws ConstraintViolation if the bound precedes `addedAt` or would move
 *   an existing bound later
 */
export function checkRemoval(revision: Revision, removedAt: Timestamp): boolean {
  if (compareTimestamps(revision.addedAt, removedAt) > 0) {
    throw new ConstraintViolation(
      'added_le_removed',
      `removedAt ${removedAt} is before addedAt ${revision.addedAt} of revision ${revision.revisionId}`,
      revision.revisionId
    );
  }

  if (revision.removedAt !== undefined) {
    const delta = compareTimestamps(removedAt, revision.removedAt);
    if (delta > 0) {
      throw new ConstraintViolation(
        'removed_only_tightens',
        `Revision ${revision.revisionId} is already removed at ${revision.removedAt}; it cannot move to ${removedAt}`,
        revision.revisionId
      );
    }
    if (delta === 0) return false;
  }

  return true;
}
