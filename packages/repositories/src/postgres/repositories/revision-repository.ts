import { eq, and, asc, gt, gte, lte, isNull, or, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import postgres from 'postgres';
import type { EntityId, Revision, RevisionId, Timestamp } from '@revlog/protocol';
import type { DbExecutor } from '../db.js';
import { revisions } from '../schema/index.js';
import type {
  RevisionRepository,
  AppendRevisionInput,
  RevisionFilter,
} from '../../interfaces/index.js';
import { revisionIdentityAllocator } from '../../identity/index.js';
import type { IdentityAllocator } from '../../identity/index.js';
import { checkNewRevision, checkRemoval } from '../../constraints.js';
import { ConstraintViolation, RevisionNotFoundError } from '../../errors.js';
import type { RevisionConstraint } from '../../errors.js';

/**
 * First key of the two-key advisory lock space used for entity locks.
 */
const ENTITY_LOCK_NAMESPACE = 0x7265766c; // "revl"

const SQLSTATE_CHECK_VIOLATION = '23514';

const CHECK_CONSTRAINTS: Record<string, RevisionConstraint> = {
  revisions_entity_le_revision: 'entity_id_le_revision_id',
  revisions_added_le_removed: 'added_le_removed',
};

export class PgRevisionRepository implements RevisionRepository {
  constructor(
    private db: DbExecutor,
    private allocator: IdentityAllocator = revisionIdentityAllocator
  ) {}

  async append(input: AppendRevisionInput): Promise<Revision> {
    const revisionId = await this.nextRevisionId();
    const entityId = this.allocator.assign(input.entityId, revisionId);
    checkNewRevision(revisionId, entityId, input.addedAt, input.removedAt);

    const [row] = await this.translateErrors(
      this.db
        .insert(revisions)
        .values({
          revisionId,
          entityId,
          addedAt: new Date(input.addedAt),
          removedAt: input.removedAt ? new Date(input.removedAt) : null,
          payload: input.payload,
        })
        .returning()
    );

    return this.rowToRevision(row);
  }

  async get(revisionId: RevisionId): Promise<Revision | null> {
    const [row] = await this.db
      .select()
      .from(revisions)
      .where(eq(revisions.revisionId, revisionId));
    return row ? this.rowToRevision(row) : null;
  }

  async revisionsOf(entityId: EntityId): Promise<Revision[]> {
    const rows = await this.db
      .select()
      .from(revisions)
      .where(eq(revisions.entityId, entityId))
      .orderBy(asc(revisions.revisionId));

    return rows.map((r) => this.rowToRevision(r));
  }

  async setRemoved(revisionId: RevisionId, removedAt: Timestamp): Promise<Revision> {
    const [current] = await this.db
      .select()
      .from(revisions)
      .where(eq(revisions.revisionId, revisionId))
      .for('update');

    if (!current) {
      throw new RevisionNotFoundError(revisionId);
    }

    const existing = this.rowToRevision(current);
    if (!checkRemoval(existing, removedAt)) {
      return existing;
    }

    const [row] = await this.translateErrors(
      this.db
        .update(revisions)
        .set({ removedAt: new Date(removedAt) })
        .where(eq(revisions.revisionId, revisionId))
        .returning()
    );

    return this.rowToRevision(row);
  }

  async activeAt(at: Timestamp, entityId?: EntityId): Promise<Revision[]> {
    const instant = new Date(at);
    const conditions: Array<SQL | undefined> = [
      lte(revisions.addedAt, instant),
      or(isNull(revisions.removedAt), gt(revisions.removedAt, instant)),
    ];

    if (entityId !== undefined) {
      conditions.push(eq(revisions.entityId, entityId));
    }

    const rows = await this.db
      .select()
      .from(revisions)
      .where(and(...conditions))
      .orderBy(asc(revisions.entityId), asc(revisions.revisionId));

    return rows.map((r) => this.rowToRevision(r));
  }

  async list(filter: RevisionFilter = {}): Promise<Revision[]> {
    const conditions: SQL[] = [];

    if (filter.entityId !== undefined) {
      conditions.push(eq(revisions.entityId, filter.entityId));
    }

    if (filter.since) {
      conditions.push(gte(revisions.addedAt, new Date(filter.since)));
    }

    if (filter.until) {
      conditions.push(lte(revisions.addedAt, new Date(filter.until)));
    }

    let query = this.db.select().from(revisions).$dynamic();

    if (conditions.length > 0) {
      query = query.where(and(...conditions));
    }

    query = query.orderBy(asc(revisions.revisionId));

    if (filter.limit) {
      query = query.limit(filter.limit);
    }

    if (filter.offset) {
      query = query.offset(filter.offset);
    }

    const rows = await query;
    return rows.map((r) => this.rowToRevision(r));
  }

  async lockEntity(entityId: EntityId): Promise<void> {
    // Transaction-scoped: released automatically at commit or rollback
    await this.db.execute(
      sql`select pg_advisory_xact_lock(${ENTITY_LOCK_NAMESPACE}::integer, ${entityId}::integer)`
    );
  }

  /**
   * Reserve the next revision ID. A rejected append leaves a gap, which keeps
   * IDs increasing without coordinating with other sessions.
   */
  private async nextRevisionId(): Promise<RevisionId> {
    const [row] = await this.db.execute<{ id: number }>(
      sql`select nextval('revision_id_seq')::integer as id`
    );

    if (!row) {
      throw new Error('revision_id_seq returned no value');
    }

    return row.id;
  }

  /**
   * Rethrow CHECK violations raised by Postgres as ConstraintViolation.
   */
  private async translateErrors<T>(query: Promise<T>): Promise<T> {
    try {
      return await query;
    } catch (error) {
      const pgError = findPostgresError(error);
      if (pgError?.code === SQLSTATE_CHECK_VIOLATION) {
        const constraint = CHECK_CONSTRAINTS[pgError.constraint_name];
        if (constraint) {
          throw new ConstraintViolation(constraint, pgError.message);
        }
      }
      throw error;
    }
  }

  private rowToRevision(row: typeof revisions.$inferSelect): Revision {
    return {
      revisionId: row.revisionId,
      entityId: row.entityId,
      addedAt: row.addedAt.toISOString(),
      removedAt: row.removedAt?.toISOString(),
      payload: row.payload,
    };
  }
}

function findPostgresError(error: unknown): postgres.PostgresError | null {
  if (error instanceof postgres.PostgresError) return error;
  if (error instanceof Error && error.cause instanceof postgres.PostgresError) return error.cause;
  return null;
}
