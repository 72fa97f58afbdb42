// Snapshot View - point-in-time queries over the revision log
//
// Reads only. Any instant is allowed: the past gives an audit view, the
// present the current state, the future the state already scheduled.

import { sortByTimeline } from '@revlog/protocol';
import type { EntityId, Payload, Revision, Snapshot, Timestamp } from '@revlog/protocol';
import type { RepositoryContext } from '@revlog/repositories';
import { systemClock } from '../clock.js';
import type { Clock } from '../clock.js';
import { IntegrityError } from '../errors.js';
import { requireEntityId, requireTimestamp } from '../validation.js';

/**
 * Options for creating a SnapshotView.
 */
export type SnapshotViewOptions = {
  repos: RepositoryContext;

  /** Source of "now" for queries without an explicit instant */
  now?: Clock;
};

/**
 * Throw if any entity has more than one active revision in `revisions`.
 */
export function assertSingleActive(revisions: readonly Revision[], at: Timestamp): void {
  const byEntity = new Map<EntityId, Revision[]>();
  for (const revision of revisions) {
    const group = byEntity.get(revision.entityId) ?? [];
    group.push(revision);
    byEntity.set(revision.entityId, group);
  }

  for (const [entityId, group] of byEntity) {
    if (group.length > 1) {
      throw new IntegrityError(
        entityId,
        at,
        group.map((r) => r.revisionId)
      );
    }
  }
}

export class SnapshotView {
  private repos: RepositoryContext;
  private now: Clock;

  constructor(options: SnapshotViewOptions) {
    this.repos = options.repos;
    this.now = options.now ?? systemClock;
  }

  /**
   * State of every entity at `at` (default: now), keyed by entity ID.
   * Entities with no active revision at `at` are absent.
   */
  asOf(at?: Timestamp | Date): Promise<Snapshot>;
  /**
   * Payload of one entity at `at`, or null if it has no visible state then.
   */
  asOf(at: Timestamp | Date | undefined, entityId: EntityId): Promise<Payload | null>;
  async asOf(at?: Timestamp | Date, entityId?: EntityId): Promise<Snapshot | Payload | null> {
    if (entityId !== undefined) {
      const revision = await this.revisionAt(at, entityId);
      return revision ? revision.payload : null;
    }

    const revisions = await this.revisionsAsOf(at);
    return new Map(revisions.map((r) => [r.entityId, r.payload]));
  }

  /**
   * The active revision of one entity at `at`, or null.
   *
   * @throws IntegrityError if more than one revision is active
   */
  async revisionAt(at: Timestamp | Date | undefined, entityId: EntityId): Promise<Revision | null> {
    const instant = this.instant(at);
    const active = await this.repos.revisions.activeAt(instant, requireEntityId(entityId, 'entityId'));
    assertSingleActive(active, instant);
    return active[0] ?? null;
  }

  /**
   * Every active revision at `at`, ordered by entity ID.
   *
   * @throws IntegrityError if some entity has more than one active revision
   */
  async revisionsAsOf(at?: Timestamp | Date): Promise<Revision[]> {
    const instant = this.instant(at);
    const active = await this.repos.revisions.activeAt(instant);
    assertSingleActive(active, instant);
    return active;
  }

  /**
   * Full history of one entity in timeline order, including revisions that
   * were superseded within the same tick.
   */
  async history(entityId: EntityId): Promise<Revision[]> {
    const revisions = await this.repos.revisions.revisionsOf(requireEntityId(entityId, 'entityId'));
    return sortByTimeline(revisions);
  }

  private instant(at: Timestamp | Date | undefined): Timestamp {
    return at === undefined ? this.now() : requireTimestamp(at, 'at');
  }
}

/**
 * Create a SnapshotView.
 */
export function createSnapshotView(options: SnapshotViewOptions): SnapshotView {
  return new SnapshotView(options);
}
