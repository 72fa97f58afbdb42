// Revision types - versions of entities on an append-only timeline

import type { EntityId, Payload, RevisionId, Timestamp } from './common.js';

/**
 * A Revision is one version of an entity.
 *
 * Revisions are immutable except for `removedAt`, which starts unset and may
 * later be set, and after that only moved earlier. The effective interval of a
 * revision is `[addedAt, removedAt)`, or `[addedAt, ∞)` while `removedAt` is
 * unset. For a given entity these intervals never overlap.
 */
export type Revision = {
  revisionId: RevisionId;

  /**
   * Stable identity across versions. Never greater than `revisionId`.
   */
  entityId: EntityId;

  /**
   * Inclusive start of the effective interval
   */
  addedAt: Timestamp;

  /**
   * Exclusive end of the effective interval. Equal to `addedAt` for a
   * revision superseded within the same clock tick.
   */
  removedAt?: Timestamp;

  payload: Payload;
};

/**
 * The visible state of every entity at one instant, keyed by entity ID.
 */
export type Snapshot = Map<EntityId, Payload>;
