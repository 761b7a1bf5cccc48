// Engine host from configuration
//
// Postgres when DATABASE_URL is set, in-memory repositories otherwise.

import {
  createInMemoryRepositoryContext,
  postgres,
  type TransactionalRepositoryContext,
} from '@enginehost/repositories';
import {
  consoleLogger,
  createEngineHost,
  createLevelLogger,
  silentLogger,
  type EngineFactoryRegistry,
  type EngineHost,
  type EngineLogger,
} from '@enginehost/runtime';
import type { HostConfig } from './config.js';

export type ConfiguredHost = {
  host: EngineHost;
  /** Shut the host down and close the database connection */
  close(): Promise<void>;
};

export type CreateHostFromConfigOptions = {
  factories?: EngineFactoryRegistry;
  logger?: EngineLogger;
};

export function loggerFor(config: HostConfig): EngineLogger {
  return config.logLevel === 'silent' ? silentLogger : createLevelLogger(consoleLogger, config.logLevel);
}

export async function createHostFromConfig(
  config: HostConfig,
  options: CreateHostFromConfigOptions = {}
): Promise<ConfiguredHost> {
  const logger = options.logger ?? loggerFor(config);

  let repos: TransactionalRepositoryContext;
  let closeDatabase = async () => {};

  if (config.databaseUrl) {
    const { db, client } = postgres.createDatabase({
      connectionString: config.databaseUrl,
      maxConnections: config.databaseMaxConnections,
    });
    repos = postgres.createTransactionalPgRepositoryContext(db);
    closeDatabase = async () => {
      await client.end();
    };
  } else {
    logger.warn('DATABASE_URL is not set; engine metadata and datasets will not survive a restart');
    repos = createInMemoryRepositoryContext();
  }

  const host = await createEngineHost({
    repos,
    factories: options.factories,
    mirrorRoot: config.mirrorRoot,
    logger,
  });

  if (host.restored.failed.length > 0) {
    logger.warn('Some engines could not be restored', { failed: host.restored.failed });
  }

  return {
    host,
    async close() {
      await host.shutdown();
      await closeDatabase();
    },
  };
}
