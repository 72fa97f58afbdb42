// Storage selection
//
// Supports two modes:
// - In-memory (when DATABASE_URL is unset): no setup required, data is lost
//   on restart
// - Postgres: set DATABASE_URL

import {
  postgres,
  memory,
  type TransactionalRepositoryContext,
} from '@revlog/repositories';
import type { ApiConfig } from './config.js';

export type Storage = {
  repos: TransactionalRepositoryContext;
  kind: 'memory' | 'postgres';

  /** Release the database connection, if any */
  close(): Promise<void>;
};

/**
 * Open the storage the configuration asks for.
 */
export function openStorage(config: ApiConfig): Storage {
  if (!config.databaseUrl) {
    return {
      repos: memory.createInMemoryRepositoryContext(),
      kind: 'memory',
      close: async () => {},
    };
  }

  const { db, client } = postgres.createDatabase({
    connectionString: config.databaseUrl,
    maxConnections: config.databaseMaxConnections,
  });

  return {
    repos: postgres.createTransactionalPgRepositoryContext(db),
    kind: 'postgres',
    close: () => client.end(),
  };
}
