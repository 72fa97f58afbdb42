// Attribution - who opened or closed a revision
//
// Attribution is recorded after commit and never participates in the
// revision invariants. Bulk loads may skip it or hand it over in one batch.

import type { Actor, AttributionEvent, RevisionId } from '@revlog/protocol';
import { systemClock } from '../clock.js';
import type { Clock } from '../clock.js';

/**
 * Hook invoked by the mutation facade when an actor is supplied.
 */
export interface AttributionHook {
  onRevisionOpened(revisionId: RevisionId, actor: Actor): void | Promise<void>;
  onRevisionClosed(revisionId: RevisionId, actor: Actor): void | Promise<void>;

  /**
   * Receive many events at once. Used for batched bulk loads when present;
   * otherwise the per-revision callbacks are called for each event.
   */
  onBatch?(events: AttributionEvent[]): void | Promise<void>;
}

/**
 * Deliver events one by one through the per-revision callbacks.
 */
export async function dispatchEach(
  hook: AttributionHook,
  events: readonly AttributionEvent[]
): Promise<void> {
  for (const event of events) {
    if (event.kind === 'opened') {
      await hook.onRevisionOpened(event.revisionId, event.actor);
    } else {
      await hook.onRevisionClosed(event.revisionId, event.actor);
    }
  }
}

/**
 * Deliver events in one call when the hook supports batches.
 */
export async function dispatchBatch(
  hook: AttributionHook,
  events: AttributionEvent[]
): Promise<void> {
  if (events.length === 0) return;
  if (hook.onBatch) {
    await hook.onBatch(events);
    return;
  }
  await dispatchEach(hook, events);
}

/**
 * Filter for attribution queries.
 */
export type AttributionQueryFilter = {
  actorId?: string;
  kind?: AttributionEvent['kind'];
  revisionId?: RevisionId;
  limit?: number;
  offset?: number;
};

/**
 * An attribution hook that also answers queries.
 */
export interface AttributionStore extends AttributionHook {
  /** The actor that appended the revision */
  openedBy(revisionId: RevisionId): Promise<Actor | null>;

  /** The actor that most recently set or tightened the revision's end */
  closedBy(revisionId: RevisionId): Promise<Actor | null>;

  /** Recorded events, oldest first */
  query(filter?: AttributionQueryFilter): Promise<AttributionEvent[]>;
}

/**
 * Create an in-memory attribution store for testing and development.
 *
 * This store keeps all entries in memory and is not persisted.
 * For production use, implement AttributionStore backed by a database.
 */
export function createInMemoryAttributionStore(options: { now?: Clock } = {}): AttributionStore {
  const now = options.now ?? systemClock;
  const events: AttributionEvent[] = [];

  function record(kind: AttributionEvent['kind'], revisionId: RevisionId, actor: Actor): void {
    events.push({ kind, revisionId, actor, recordedAt: now() });
  }

  function latest(kind: AttributionEvent['kind'], revisionId: RevisionId): Actor | null {
    for (let i = events.length - 1; i >= 0; i--) {
      const event = events[i];
      if (event && event.kind === kind && event.revisionId === revisionId) {
        return event.actor;
      }
    }
    return null;
  }

  return {
    onRevisionOpened(revisionId, actor) {
      record('opened', revisionId, actor);
    },

    onRevisionClosed(revisionId, actor) {
      record('closed', revisionId, actor);
    },

    onBatch(batch) {
      events.push(...batch);
    },

    async openedBy(revisionId) {
      return latest('opened', revisionId);
    },

    async closedBy(revisionId) {
      return latest('closed', revisionId);
    },

    async query(filter = {}) {
      let result = events.filter(
        (e) =>
          (filter.actorId === undefined || e.actor.id === filter.actorId) &&
          (filter.kind === undefined || e.kind === filter.kind) &&
          (filter.revisionId === undefined || e.revisionId === filter.revisionId)
      );

      if (filter.offset) {
        result = result.slice(filter.offset);
      }

      if (filter.limit) {
        result = result.slice(0, filter.limit);
      }

      return result;
    },
  };
}
