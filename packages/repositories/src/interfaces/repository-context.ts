import type { RevisionRepository } from './revision-repository.js';

/**
 * RepositoryContext bundles the repositories the runtime needs.
 *
 * This is the primary dependency injection point for the runtime.
 * Pass a RepositoryContext to any code that needs data access,
 * and you can swap implementations (Postgres, in-memory, etc.)
 * without changing the consuming code.
 *
 * Example usage:
 * ```typescript
 * const repos = createPgRepositoryContext(db);
 * const revision = await repos.revisions.get(12);
 * ```
 */
export interface RepositoryContext {
  readonly revisions: RevisionRepository;
}

/**
 * Factory type for creating a RepositoryContext.
 * Implementations can use this to provide their own initialization logic.
 */
export type RepositoryContextFactory<TConfig = unknown> = (
  config: TConfig
) => RepositoryContext | Promise<RepositoryContext>;

/**
 * Transaction wrapper type for atomic operations across repositories.
 */
export type TransactionFn<T> = (
  repos: RepositoryContext
) => Promise<T>;

/**
 * Extended context with transaction support.
 *
 * Append-then-resolve must run inside one transaction so that a failed
 * supersession never leaves a half-applied append behind.
 */
export interface TransactionalRepositoryContext extends RepositoryContext {
  /**
   * Execute a function within a transaction.
   * All repository operations within the function will be atomic.
   *
   * @param fn Function to execute within the transaction
   * @returns The return value of the function
   * @throws Rolls back the transaction if the function throws
   */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;
}
