// API configuration from environment variables

import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  DATABASE_URL: z.string().url().optional(),
  DATABASE_MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),
  REVLOG_ON_DUPLICATE_IDENTIFIER: z.enum(['allow-as-update', 'reject']).default('allow-as-update'),
  REVLOG_IDENTITY_CHANGE: z.enum(['allow', 'reject']).default('allow'),
  REVLOG_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type ApiConfig = {
  mode: 'development' | 'test' | 'production';

  /** Postgres connection string; the in-memory store is used when absent */
  databaseUrl?: string;
  databaseMaxConnections: number;

  onDuplicateIdentifier: 'allow-as-update' | 'reject';
  identityChange: 'allow' | 'reject';
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
};

/**
 * Error thrown when the environment does not describe a valid configuration.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Read the API configuration.
 *
 * Empty strings count as unset, so `DATABASE_URL=` selects the in-memory
 * store.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ApiConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    mode: parsed.NODE_ENV,
    databaseUrl: parsed.DATABASE_URL,
    databaseMaxConnections: parsed.DATABASE_MAX_CONNECTIONS,
    onDuplicateIdentifier: parsed.REVLOG_ON_DUPLICATE_IDENTIFIER,
    identityChange: parsed.REVLOG_IDENTITY_CHANGE,
    logLevel: parsed.REVLOG_LOG_LEVEL,
  };
}
