// Postgres repository implementations
export { PgRevisionRepository } from './revision-repository.js';
export {
  createPgRepositoryContext,
  createTransactionalPgRepositoryContext,
} from './context.js';
