// Long-lived services shared by every request

import type { TransactionalRepositoryContext } from '@revlog/repositories';
import {
  createInMemoryAttributionStore,
  createMutationFacade,
  createSnapshotView,
  consoleLogger,
  silentLogger,
  systemClock,
  withMinimumLevel,
} from '@revlog/runtime';
import type {
  AttributionStore,
  Clock,
  Logger,
  MutationFacade,
  SnapshotView,
} from '@revlog/runtime';
import type { ApiConfig } from './config.js';
import { openStorage } from './db.js';

export type Services = {
  repos: TransactionalRepositoryContext;
  facade: MutationFacade;
  view: SnapshotView;
  attribution: AttributionStore;
  logger: Logger;
  close(): Promise<void>;
};

export type ServiceOverrides = {
  repos?: TransactionalRepositoryContext;
  logger?: Logger;
  now?: Clock;
};

export function createLogger(level: ApiConfig['logLevel']): Logger {
  return level === 'silent' ? silentLogger : withMinimumLevel(consoleLogger, level);
}

/**
 * Wire storage, the mutation facade and the snapshot view together.
 *
 * Attribution is kept in memory; it does not survive a restart.
 */
export function createServices(config: ApiConfig, overrides: ServiceOverrides = {}): Services {
  const storage = overrides.repos
    ? { repos: overrides.repos, close: async () => {} }
    : openStorage(config);
  const logger = overrides.logger ?? createLogger(config.logLevel);
  const now = overrides.now ?? systemClock;
  const attribution = createInMemoryAttributionStore({ now });

  const facade = createMutationFacade({
    repos: storage.repos,
    attribution,
    logger,
    config: {
      onDuplicateIdentifier: config.onDuplicateIdentifier,
      identityChange: config.identityChange,
      now,
    },
  });

  return {
    repos: storage.repos,
    facade,
    view: createSnapshotView({ repos: storage.repos, now }),
    attribution,
    logger,
    close: storage.close,
  };
}
