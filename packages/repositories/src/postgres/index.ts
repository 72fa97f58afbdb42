// Postgres implementation (drizzle-orm + postgres.js)

export { createDatabase, type Database, type DatabaseConfig, type DbExecutor } from './db.js';
export * as schema from './schema/index.js';
export {
  PgRevisionRepository,
  createPgRepositoryContext,
  createTransactionalPgRepositoryContext,
} from './repositories/index.js';
