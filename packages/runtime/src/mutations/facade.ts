// Mutation Facade - the write boundary
//
// Maps insert, update and delete onto appends to the revision log followed
// by supersession. Each operation:
// 1. Validates its input
// 2. Runs in one transaction, holding the lock of every entity it writes
// 3. Applies the duplicate-identifier and identity-change policies
// 4. Reports attribution after commit when an actor is given

import type {
  Actor,
  AttributionEvent,
  EntityId,
  Revision,
  RevisionId,
  Timestamp,
} from '@revlog/protocol';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
} from '@revlog/repositories';
import { dispatchBatch, dispatchEach } from '../attribution/index.js';
import type { AttributionHook } from '../attribution/index.js';
import { systemClock } from '../clock.js';
import {
  ConstraintViolation,
  DuplicateIdentifierError,
  IdentityChangeError,
  IntegrityError,
} from '../errors.js';
import { consoleLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import { resolveSupersession } from '../supersession/index.js';
import { requireEntityId, requirePayload, requireTimestamp } from '../validation.js';
import type {
  InsertManyOptions,
  MutationFacadeConfig,
  MutationFacadeOptions,
  MutationOptions,
  MutationResult,
  RevisionInput,
} from './types.js';

/**
 * Check if a repository context supports transactions.
 */
function isTransactional(
  repos: RepositoryContext | TransactionalRepositoryContext
): repos is TransactionalRepositoryContext {
  return 'transaction' in repos && typeof repos.transaction === 'function';
}

/**
 * A validated write, ready to append.
 */
type PreparedInput = {
  entityId?: EntityId;
  addedAt: Timestamp;
  payload: RevisionInput['payload'];
};

/**
 * Whether the duplicate-identifier policy applies to an explicit entity ID.
 */
type WriteMode = 'insert' | 'update';

/**
 * Entity IDs one transaction may write under: existing IDs it has locked,
 * and revision IDs it allocated itself.
 */
type WriteScope = {
  locked: Set<EntityId>;
  allocated: Set<RevisionId>;
};

/**
 * Lock every named entity ID that already exists, in ascending order.
 *
 * Every lock a write can wait for is taken here, before anything is
 * appended, so two writers never hold locks the other one needs. A revision
 * appended by a transaction that has not committed is invisible to other
 * writers, so nobody else can name or lock its ID until it commits.
 */
async function openScope(
  repos: RepositoryContext,
  entityIds: Iterable<EntityId>
): Promise<WriteScope> {
  const scope: WriteScope = { locked: new Set(), allocated: new Set() };

  for (const id of [...new Set(entityIds)].sort((a, b) => a - b)) {
    if (!(await repos.revisions.get(id))) continue;
    await repos.revisions.lockEntity(id);
    scope.locked.add(id);
  }

  return scope;
}

/**
 * @throws ConstraintViolation unless the ID names an existing revision or
 *   one allocated earlier in the same transaction
 */
function requireNamed(scope: WriteScope, entityId: EntityId): void {
  if (scope.locked.has(entityId) || scope.allocated.has(entityId)) return;

  throw new ConstraintViolation(
    'entity_id_allocated',
    `Entity ID ${entityId} does not name an existing revision`
  );
}

/**
 * Close the active revision of an entity at `at`.
 *
 * @returns The closed revision, or null when nothing is active
 * @throws IntegrityError if more than one revision is active
 */
async function closeActive(
  repos: RepositoryContext,
  entityId: EntityId,
  at: Timestamp
): Promise<Revision | null> {
  const active = await repos.revisions.activeAt(at, entityId);
  if (active.length > 1) {
    throw new IntegrityError(entityId, at, active.map((r) => r.revisionId));
  }

  const [current] = active;
  if (!current) return null;

  return repos.revisions.setRemoved(current.revisionId, at);
}

function attributionEvents(
  results: readonly MutationResult[],
  actor: Actor,
  recordedAt: Timestamp
): AttributionEvent[] {
  const events: AttributionEvent[] = [];

  for (const { revision, closed } of results) {
    events.push({ kind: 'opened', revisionId: revision.revisionId, actor, recordedAt });
    if (revision.removedAt !== undefined) {
      events.push({ kind: 'closed', revisionId: revision.revisionId, actor, recordedAt });
    }
    for (const other of closed) {
      events.push({ kind: 'closed', revisionId: other.revisionId, actor, recordedAt });
    }
  }

  return events;
}

/**
 * MutationFacade - all writes to the revision log go through here.
 *
 * @example
 * ```ts
 * const facade = createMutationFacade({
 *   repos: createTransactionalPgRepositoryContext(db),
 *   attribution: createInMemoryAttributionStore(),
 *   config: { onDuplicateIdentifier: 'reject' },
 * });
 *
 * const { revision } = await facade.insert(
 *   { payload: { fullName: 'Ada Lovelace' } },
 *   { actor: { id: 'user-1', method: 'api' } }
 * );
 *
 * await facade.update(revision.entityId, { payload: { fullName: 'Ada King' } });
 * await facade.delete(revision.entityId);
 * ```
 */
export class MutationFacade {
  private repos: RepositoryContext | TransactionalRepositoryContext;
  private attribution?: AttributionHook;
  private logger: Logger;
  private config: Required<MutationFacadeConfig>;

  constructor(options: MutationFacadeOptions) {
    this.repos = options.repos;
    this.attribution = options.attribution;
    this.logger = options.logger ?? consoleLogger;
    this.config = {
      onDuplicateIdentifier: options.config?.onDuplicateIdentifier ?? 'allow-as-update',
      identityChange: options.config?.identityChange ?? 'allow',
      transactionsEnabled: options.config?.transactionsEnabled ?? true,
      now: options.config?.now ?? systemClock,
    };
  }

  /**
   * Append a new revision and close whatever it supersedes.
   *
   * With an explicit `entityId` that already has an active revision, the
   * insert replaces it, or fails with DuplicateIdentifierError when the
   * facade is configured to reject duplicates.
   */
  async insert(input: RevisionInput, options: MutationOptions = {}): Promise<MutationResult> {
    const now = this.config.now();
    const prepared = this.prepare(input, now);

    const result = await this.run(async (repos) => {
      const named = prepared.entityId === undefined ? [] : [prepared.entityId];
      const scope = await openScope(repos, named);
      return this.appendAndResolve(repos, scope, prepared, 'insert', now);
    });

    this.logAppended(result);
    await this.attribute([result], options.actor, now);
    return result;
  }

  /**
   * Replace the state of `oldEntityId`.
   *
   * Without a new `entityId`, or with the same one, this is an insert under
   * `oldEntityId`. With a different one, the active revision of `oldEntityId`
   * is closed at now and the payload is inserted under the new ID, subject to
   * the duplicate-identifier policy like any insert.
   */
  async update(
    oldEntityId: EntityId,
    input: RevisionInput,
    options: MutationOptions = {}
  ): Promise<MutationResult> {
    const now = this.config.now();
    const fromEntityId = requireEntityId(oldEntityId, 'oldEntityId');
    const prepared = this.prepare(input, now);
    const toEntityId = prepared.entityId ?? fromEntityId;

    if (toEntityId !== fromEntityId && this.config.identityChange === 'reject') {
      throw new IdentityChangeError(fromEntityId, toEntityId);
    }

    const result = await this.run(async (repos) => {
      const scope = await openScope(repos, [fromEntityId, toEntityId]);
      if (toEntityId === fromEntityId) {
        const sameEntity = { ...prepared, entityId: fromEntityId };
        return this.appendAndResolve(repos, scope, sameEntity, 'update', now);
      }

      // The new ID is checked before the old entity is closed
      requireNamed(scope, toEntityId);
      await this.checkDuplicate(repos, toEntityId, now);

      const previous = await closeActive(repos, fromEntityId, now);
      const inserted = await this.appendAndResolve(repos, scope, prepared, 'update', now);
      return {
        revision: inserted.revision,
        closed: previous ? [previous, ...inserted.closed] : inserted.closed,
      };
    });

    if (toEntityId !== fromEntityId) {
      this.logger.warn('Entity ID changed by update', { fromEntityId, toEntityId });
    }
    this.logAppended(result);
    await this.attribute([result], options.actor, now);
    return result;
  }

  /**
   * Close the active revision of an entity at now. History is kept.
   *
   * @returns The closed revision, or null when the entity has no active
   *   revision
   */
  async delete(entityId: EntityId, options: MutationOptions = {}): Promise<Revision | null> {
    const now = this.config.now();
    const id = requireEntityId(entityId, 'entityId');

    const closed = await this.run(async (repos) => {
      const scope = await openScope(repos, [id]);
      // An ID that names no revision has no history to close
      return scope.locked.has(id) ? closeActive(repos, id, now) : null;
    });

    if (!closed) {
      this.logger.debug('Nothing to delete', { entityId: id, at: now });
      return null;
    }

    this.logger.info('Revision deleted', {
      entityId: id,
      revisionId: closed.revisionId,
      removedAt: closed.removedAt,
    });

    if (options.actor && this.attribution) {
      await this.attribution.onRevisionClosed(closed.revisionId, options.actor);
    }

    return closed;
  }

  /**
   * Insert many rows in one transaction.
   *
   * Every row is validated before anything is written. Rows are applied in
   * order, so later rows for the same entity supersede earlier ones.
   * Attribution defaults to one batch after commit.
   */
  async insertMany(
    rows: readonly RevisionInput[],
    options: InsertManyOptions = {}
  ): Promise<MutationResult[]> {
    const now = this.config.now();
    const prepared = rows.map((row) => this.prepare(row, now));
    const explicitIds = prepared.flatMap((row) => (row.entityId === undefined ? [] : [row.entityId]));

    const results = await this.run(async (repos) => {
      // A row may also name an ID allocated by an earlier row of the batch
      const scope = await openScope(repos, explicitIds);

      const applied: MutationResult[] = [];
      for (const row of prepared) {
        applied.push(await this.appendAndResolve(repos, scope, row, 'insert', now));
      }
      return applied;
    });

    this.logger.info('Bulk insert completed', {
      count: results.length,
      closed: results.reduce((sum, r) => sum + r.closed.length, 0),
    });

    const mode = options.attribution ?? 'batch';
    if (mode !== 'skip') {
      await this.attribute(results, options.actor, now, mode);
    }

    return results;
  }

  /**
   * Append one prepared write and run supersession for it.
   * An explicit entity ID must be in `scope`.
   */
  private async appendAndResolve(
    repos: RepositoryContext,
    scope: WriteScope,
    input: PreparedInput,
    mode: WriteMode,
    now: Timestamp
  ): Promise<MutationResult> {
    if (input.entityId !== undefined) {
      requireNamed(scope, input.entityId);
      if (mode === 'insert') {
        await this.checkDuplicate(repos, input.entityId, now);
      }
    }

    const appended = await repos.revisions.append(input);
    scope.allocated.add(appended.revisionId);

    const changed = await resolveSupersession(repos.revisions, appended);
    const own = changed.find((r) => r.revisionId === appended.revisionId);

    return {
      revision: own ?? appended,
      closed: changed.filter((r) => r.revisionId !== appended.revisionId),
    };
  }

  private async checkDuplicate(
    repos: RepositoryContext,
    entityId: EntityId,
    now: Timestamp
  ): Promise<void> {
    const [active] = await repos.revisions.activeAt(now, entityId);
    if (!active) return;

    if (this.config.onDuplicateIdentifier === 'reject') {
      throw new DuplicateIdentifierError(entityId, active.revisionId);
    }

    this.logger.warn('Insert replaces an active revision', {
      entityId,
      activeRevisionId: active.revisionId,
    });
  }

  private prepare(input: RevisionInput, now: Timestamp): PreparedInput {
    return {
      entityId: input.entityId === undefined ? undefined : requireEntityId(input.entityId, 'entityId'),
      addedAt: input.addedAt === undefined ? now : requireTimestamp(input.addedAt, 'addedAt'),
      payload: requirePayload(input.payload, 'payload'),
    };
  }

  private run<T>(fn: (repos: RepositoryContext) => Promise<T>): Promise<T> {
    if (this.config.transactionsEnabled && isTransactional(this.repos)) {
      return this.repos.transaction(fn);
    }
    return fn(this.repos);
  }

  private logAppended(result: MutationResult): void {
    const { revision, closed } = result;

    this.logger.info('Revision appended', {
      revisionId: revision.revisionId,
      entityId: revision.entityId,
      addedAt: revision.addedAt,
    });

    if (closed.length > 0) {
      this.logger.info('Revisions superseded', {
        entityId: revision.entityId,
        revisionIds: closed.map((r) => r.revisionId),
      });
    }
  }

  /**
   * Report attribution for committed results. Hook errors propagate; the
   * revisions themselves are already committed.
   */
  private async attribute(
    results: readonly MutationResult[],
    actor: Actor | undefined,
    recordedAt: Timestamp,
    mode: 'per-row' | 'batch' = 'per-row'
  ): Promise<void> {
    if (!actor || !this.attribution) return;

    const events = attributionEvents(results, actor, recordedAt);
    if (mode === 'batch') {
      await dispatchBatch(this.attribution, events);
    } else {
      await dispatchEach(this.attribution, events);
    }
  }
}

/**
 * Create a MutationFacade.
 */
export function createMutationFacade(options: MutationFacadeOptions): MutationFacade {
  return new MutationFacade(options);
}
