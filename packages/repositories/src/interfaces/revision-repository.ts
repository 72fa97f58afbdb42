import type { EntityId, Payload, Revision, RevisionId, Timestamp } from '@revlog/protocol';

/**
 * Input for appending a Revision.
 *
 * Timestamps must already be in canonical form (see `parseTimestamp`).
 */
export type AppendRevisionInput = {
  /**
   * Explicit entity ID. When omitted the entity takes the new revision's ID.
   */
  entityId?: EntityId;
  addedAt: Timestamp;

  /**
   * Only set by callers that load closed history directly; normal writes
   * leave this unset and let supersession close the revision.
   */
  removedAt?: Timestamp;
  payload: Payload;
};

/**
 * Filter for browsing the log
 */
export type RevisionFilter = {
  entityId?: EntityId;

  /**
   * Only revisions with `addedAt >= since`
   */
  since?: Timestamp;

  /**
   * Only revisions with `addedAt <= until`
   */
  until?: Timestamp;
  limit?: number;
  offset?: number;
};

/**
 * Repository interface for the revision log.
 *
 * The log is append-only. Revisions are never deleted, and the only field
 * that ever changes after an append is `removedAt`, which may be set once and
 * afterwards only moved earlier.
 *
 * Every implementation enforces at write time:
 * - `entityId <= revisionId`
 * - `addedAt <= removedAt`
 * - `removedAt` only tightens
 *
 * and raises `ConstraintViolation` without changing anything otherwise.
 */
export interface RevisionRepository {
  /**
   * Append a revision. Assigns the next revision ID and, when no entity ID is
   * given, derives one through the identity allocator.
   */
  append(input: AppendRevisionInput): Promise<Revision>;

  /**
   * Get a revision by ID
   */
  get(revisionId: RevisionId): Promise<Revision | null>;

  /**
   * All revisions of an entity, ordered by revision ID ascending
   */
  revisionsOf(entityId: EntityId): Promise<Revision[]>;

  /**
   * Set or tighten the end of a revision's effective interval.
   * @throws RevisionNotFoundError if the revision does not exist
   */
  setRemoved(revisionId: RevisionId, removedAt: Timestamp): Promise<Revision>;

  /**
   * Revisions whose interval contains `at`, optionally for one entity.
   * Ordered by entity ID, then revision ID. Does not check uniqueness.
   */
  activeAt(at: Timestamp, entityId?: EntityId): Promise<Revision[]>;

  /**
   * Browse the log, ordered by revision ID ascending
   */
  list(filter?: RevisionFilter): Promise<Revision[]>;

  /**
   * Take the write lock for one entity until the enclosing transaction ends.
   * Outside a transaction this returns immediately.
   */
  lockEntity(entityId: EntityId): Promise<void>;
}
