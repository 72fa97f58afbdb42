// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type {
  RevisionRepository,
  AppendRevisionInput,
  RevisionFilter,
} from './revision-repository.js';

export type {
  RepositoryContext,
  RepositoryContextFactory,
  TransactionFn,
  TransactionalRepositoryContext,
} from './repository-context.js';
