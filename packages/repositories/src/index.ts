// @revlog/repositories
// Repository interfaces and implementations for the revision log.
//
// This package defines the "contract" for data operations. The actual implementations
// (Postgres, in-memory) fulfill these contracts, allowing the runtime
// to work with any storage backend.
//
// Key concepts:
// - Interfaces define WHAT operations are available, not HOW they're implemented
// - RepositoryContext bundles the repositories for dependency injection
// - Every backend enforces the same write-time constraints

export * from './interfaces/index.js';
export * from './identity/index.js';
export {
  RepositoryError,
  ConstraintViolation,
  RevisionNotFoundError,
  type RevisionConstraint,
} from './errors.js';
export * as postgres from './postgres/index.js';
export * as memory from './in-memory/index.js';
