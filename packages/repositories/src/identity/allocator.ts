// Identity allocation for new entities
//
// An entity created without an explicit ID takes the ID of its first
// revision. Revision IDs are unique and increasing, so auto-assigned entity
// IDs never collide and always satisfy `entityId <= revisionId`.

import type { EntityId, RevisionId } from '@revlog/protocol';

/**
 * Derives the entity ID for a revision that is about to be appended.
 */
export interface IdentityAllocator {
  assign(explicitEntityId: EntityId | undefined, revisionId: RevisionId): EntityId;
}

/**
 * The allocator used by every built-in backend.
 *
 * An explicit ID is returned unchanged, even when it belongs to an entity
 * that already has an active revision (insert-or-replace). Rejecting such
 * collisions is a policy of the mutation layer, not of the log.
 */
export const revisionIdentityAllocator: IdentityAllocator = {
  assign(explicitEntityId, revisionId) {
    return explicitEntityId ?? revisionId;
  },
};
