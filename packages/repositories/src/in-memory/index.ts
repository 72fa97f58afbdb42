// In-memory repository implementations for development and testing
//
// This module provides a complete in-memory implementation of the revision
// log, useful for:
// - Local development without a database
// - Fast unit testing
// - Bulk-load experiments
//
// Writes made inside `transaction()` are staged and applied to the shared
// store in one synchronous step at commit, so readers outside the transaction
// never observe an append whose supersession has not run yet. A thrown error
// discards the staged writes.
//
// Data does not persist between restarts.

import { compareTimestamps, isActiveAt } from '@revlog/protocol';
import type { EntityId, Revision, RevisionId, Timestamp } from '@revlog/protocol';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  RevisionRepository,
  RevisionFilter,
} from '../interfaces/index.js';
import { revisionIdentityAllocator } from '../identity/index.js';
import type { IdentityAllocator } from '../identity/index.js';
import { checkNewRevision, checkRemoval } from '../constraints.js';
import { RevisionNotFoundError } from '../errors.js';
import { KeyedMutex } from './locks.js';
import type { Release } from './locks.js';

export { KeyedMutex, type Release } from './locks.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  /** Committed revisions by revision ID */
  revisions: Map<RevisionId, Revision>;
  /** Revision IDs per entity, ascending */
  entityIndex: Map<EntityId, RevisionId[]>;
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends TransactionalRepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all data and reset the revision counter */
  clear(): void;
}

/**
 * Options for the in-memory context
 */
export type InMemoryRepositoryOptions = {
  /** Identity allocator for entities appended without an explicit ID */
  identityAllocator?: IdentityAllocator;
};

/**
 * Writes and locks belonging to one open transaction.
 */
type TransactionState = {
  writes: Map<RevisionId, Revision>;
  locked: Set<EntityId>;
  releases: Release[];
};

function copyRevision(revision: Revision): Revision {
  return { ...revision };
}

/**
 * Insert an ID into an ascending list, keeping it ascending.
 */
function insertSorted(ids: RevisionId[], id: RevisionId): void {
  let low = 0;
  let high = ids.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    const current = ids[mid];
    if (current !== undefined && current < id) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  ids.splice(low, 0, id);
}

/**
 * Create a complete in-memory repository context.
 *
 * All data is stored in memory and will not persist between restarts.
 * Useful for development and testing.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 *
 * // Use like any other repository context
 * const revision = await repos.revisions.append({
 *   addedAt: new Date().toISOString(),
 *   payload: { fullName: 'Ada Lovelace' },
 * });
 *
 * // Access underlying data for debugging
 * console.log(repos._data.revisions.size);
 *
 * // Clear all data
 * repos.clear();
 * ```
 */
export function createInMemoryRepositoryContext(
  options: InMemoryRepositoryOptions = {}
): InMemoryRepositoryContext {
  const allocator = options.identityAllocator ?? revisionIdentityAllocator;

  // Data stores
  const revisions = new Map<RevisionId, Revision>();
  const entityIndex = new Map<EntityId, RevisionId[]>();
  const locks = new KeyedMutex<EntityId>();
  let lastRevisionId = 0;

  function commitRevision(revision: Revision): void {
    if (!revisions.has(revision.revisionId)) {
      // Transactions can commit out of ID order
      const ids = entityIndex.get(revision.entityId) ?? [];
      insertSorted(ids, revision.revisionId);
      entityIndex.set(revision.entityId, ids);
    }
    revisions.set(revision.revisionId, revision);
  }

  function commit(tx: TransactionState): void {
    for (const revision of tx.writes.values()) {
      commitRevision(revision);
    }
  }

  function createRevisionRepository(tx?: TransactionState): RevisionRepository {
    function read(revisionId: RevisionId): Revision | undefined {
      return tx?.writes.get(revisionId) ?? revisions.get(revisionId);
    }

    function write(revision: Revision): void {
      if (tx) {
        tx.writes.set(revision.revisionId, revision);
      } else {
        commitRevision(revision);
      }
    }

    function idsOf(entityId: EntityId): RevisionId[] {
      const ids = [...(entityIndex.get(entityId) ?? [])];
      if (tx) {
        for (const revision of tx.writes.values()) {
          if (revision.entityId === entityId && !revisions.has(revision.revisionId)) {
            insertSorted(ids, revision.revisionId);
          }
        }
      }
      return ids;
    }

    function allRevisions(): Revision[] {
      const ids = new Set(revisions.keys());
      if (tx) {
        for (const id of tx.writes.keys()) ids.add(id);
      }
      const result: Revision[] = [];
      for (const id of [...ids].sort((a, b) => a - b)) {
        const revision = read(id);
        if (revision) result.push(revision);
      }
      return result;
    }

    return {
      async append(input) {
        const revisionId = lastRevisionId + 1;
        const entityId = allocator.assign(input.entityId, revisionId);
        checkNewRevision(revisionId, entityId, input.addedAt, input.removedAt);

        // Only consume the ID once the checks have passed
        lastRevisionId = revisionId;

        const revision: Revision = {
          revisionId,
          entityId,
          addedAt: input.addedAt,
          removedAt: input.removedAt,
          payload: { ...input.payload },
        };
        write(revision);
        return copyRevision(revision);
      },

      async get(revisionId) {
        const revision = read(revisionId);
        return revision ? copyRevision(revision) : null;
      },

      async revisionsOf(entityId) {
        const result: Revision[] = [];
        for (const id of idsOf(entityId)) {
          const revision = read(id);
          if (revision) result.push(copyRevision(revision));
        }
        return result;
      },

      async setRemoved(revisionId: RevisionId, removedAt: Timestamp) {
        const existing = read(revisionId);
        if (!existing) {
          throw new RevisionNotFoundError(revisionId);
        }

        if (!checkRemoval(existing, removedAt)) {
          return copyRevision(existing);
        }

        const updated: Revision = { ...existing, removedAt };
        write(updated);
        return copyRevision(updated);
      },

      async activeAt(at, entityId) {
        const candidates =
          entityId === undefined
            ? allRevisions()
            : idsOf(entityId).flatMap((id) => {
                const revision = read(id);
                return revision ? [revision] : [];
              });

        return candidates
          .filter((r) => isActiveAt(r, at))
          .sort((a, b) => a.entityId - b.entityId || a.revisionId - b.revisionId)
          .map(copyRevision);
      },

      async list(filter: RevisionFilter = {}) {
        let result = filter.entityId === undefined
          ? allRevisions()
          : idsOf(filter.entityId).flatMap((id) => {
              const revision = read(id);
              return revision ? [revision] : [];
            });

        const { since, until } = filter;
        if (since !== undefined) {
          result = result.filter((r) => compareTimestamps(r.addedAt, since) >= 0);
        }

        if (until !== undefined) {
          result = result.filter((r) => compareTimestamps(r.addedAt, until) <= 0);
        }

        if (filter.offset) {
          result = result.slice(filter.offset);
        }

        if (filter.limit) {
          result = result.slice(0, filter.limit);
        }

        return result.map(copyRevision);
      },

      async lockEntity(entityId) {
        if (!tx || tx.locked.has(entityId)) return;
        tx.locked.add(entityId);
        tx.releases.push(await locks.acquire(entityId));
      },
    };
  }

  const context: InMemoryRepositoryContext = {
    revisions: createRevisionRepository(),

    async transaction<T>(fn: (repos: RepositoryContext) => Promise<T>): Promise<T> {
      const tx: TransactionState = {
        writes: new Map(),
        locked: new Set(),
        releases: [],
      };

      try {
        const result = await fn({ revisions: createRevisionRepository(tx) });
        commit(tx);
        return result;
      } finally {
        for (const release of tx.releases.reverse()) {
          release();
        }
      }
    },

    _data: {
      revisions,
      entityIndex,
    },

    clear() {
      revisions.clear();
      entityIndex.clear();
      lastRevisionId = 0;
    },
  };

  return context;
}
