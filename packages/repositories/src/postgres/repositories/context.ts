import type { Database, DbExecutor } from '../db.js';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
} from '../../interfaces/index.js';
import type { IdentityAllocator } from '../../identity/index.js';
import { PgRevisionRepository } from './revision-repository.js';

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Every call runs in its own implicit transaction, so `lockEntity` has no
 * lasting effect here. Use `createTransactionalPgRepositoryContext` for
 * writes.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createPgRepositoryContext(db);
 *
 * const history = await repos.revisions.revisionsOf(42);
 * ```
 */
export function createPgRepositoryContext(
  db: DbExecutor,
  allocator?: IdentityAllocator
): RepositoryContext {
  return {
    revisions: new PgRevisionRepository(db, allocator),
  };
}

/**
 * Create a TransactionalRepositoryContext backed by Postgres.
 *
 * This extends the basic RepositoryContext with transaction support,
 * allowing an append and its supersession to commit atomically.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createTransactionalPgRepositoryContext(db);
 *
 * const revision = await repos.transaction(async (txRepos) => {
 *   await txRepos.revisions.lockEntity(42);
 *   return txRepos.revisions.append({ entityId: 42, addedAt, payload });
 * });
 * ```
 */
export function createTransactionalPgRepositoryContext(
  db: Database,
  allocator?: IdentityAllocator
): TransactionalRepositoryContext {
  return new TransactionalPgRepositoryContext(db, allocator);
}

/**
 * TransactionalRepositoryContext implementation for Postgres.
 */
class TransactionalPgRepositoryContext implements TransactionalRepositoryContext {
  readonly revisions: PgRevisionRepository;

  constructor(
    private db: Database,
    private allocator?: IdentityAllocator
  ) {
    this.revisions = new PgRevisionRepository(db, allocator);
  }

  /**
   * Execute a function within a database transaction.
   *
   * - If the function returns successfully, all changes are committed
   * - If the function throws, all changes are rolled back and advisory
   *   entity locks are released
   */
  async transaction<T>(fn: TransactionFn<T>): Promise<T> {
    return this.db.transaction(async (tx) => {
      const txRepos: RepositoryContext = {
        revisions: new PgRevisionRepository(tx, this.allocator),
      };

      return fn(txRepos);
    });
  }
}
