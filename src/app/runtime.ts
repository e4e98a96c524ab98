/**
 * Runtime wiring shared by the API server and the CLI.
 *
 * Builds the storage gateway, the ingestion client and the refresh
 * orchestrator from configuration.
 */

import { initCache, type CacheClient } from '../infra/cache/index.js';
import { initDatabase, type RegionInsightsDbClient } from '../infra/database/client.js';
import {
  createDatasetRegistry,
  makeRegionReference,
  type DatasetRegistry,
  type RegionReference,
} from '../modules/dataset-registry/index.js';
import {
  makeDbHealthChecker,
  makeRefreshHealthChecker,
  type HealthChecker,
} from '../modules/health/index.js';
import { makeIngestionClient, type FetchFn } from '../modules/ingestion/index.js';
import { RefreshOrchestrator, runRefresh } from '../modules/refresh/index.js';
import {
  ensureStorageSchema,
  makeKyselyStorageGateway,
  makeMemoryStorageGateway,
  type StorageGateway,
} from '../modules/storage/index.js';

import type { AppConfig } from '../infra/config/index.js';
import type { Logger } from 'pino';

export interface Runtime {
  storage: StorageGateway;
  registry: DatasetRegistry;
  regionReference: RegionReference;
  orchestrator: RefreshOrchestrator;
  cacheClient: CacheClient;
  healthCheckers: HealthChecker[];
  /** Releases the database pool, if any */
  close(): Promise<void>;
}

export interface CreateRuntimeOptions {
  config: AppConfig;
  logger: Logger;
  /** Overrides the global fetch used for dataset downloads */
  fetch?: FetchFn;
}

/**
 * Creates the long-lived services of the process.
 * The schema is bootstrapped before the first run when a database is configured.
 */
export const createRuntime = async (options: CreateRuntimeOptions): Promise<Runtime> => {
  const { config, logger } = options;

  let db: RegionInsightsDbClient | null = null;
  let storage: StorageGateway;

  if (config.database.url !== undefined) {
    db = initDatabase({ url: config.database.url });
    await ensureStorageSchema(db, logger);
    storage = makeKyselyStorageGateway({ db, logger });
  } else {
    logger.warn('DATABASE_URL not configured - refreshed data is kept in memory only');
    storage = makeMemoryStorageGateway({ logger });
  }

  const registry = createDatasetRegistry();
  const regionReference = makeRegionReference();

  const fetcher = makeIngestionClient({
    config: config.ingestion,
    logger,
    ...(options.fetch !== undefined && { fetch: options.fetch }),
  });

  const orchestrator = new RefreshOrchestrator({
    config: { historySize: config.refresh.historySize },
    logger,
    pipeline: (run) =>
      runRefresh(
        {
          datasets: registry.listDatasets(),
          fetcher,
          storage,
          regionReference,
          logger,
        },
        run
      ),
  });

  const cacheClient = initCache({
    config: {
      enabled: config.cache.enabled,
      defaultTtlMs: config.cache.defaultTtlMs,
      maxEntries: config.cache.maxEntries,
    },
    logger,
  });

  const healthCheckers: HealthChecker[] = [makeRefreshHealthChecker(orchestrator)];
  if (db !== null) {
    healthCheckers.unshift(makeDbHealthChecker(db, { name: 'database' }));
  }

  return {
    storage,
    registry,
    regionReference,
    orchestrator,
    cacheClient,
    healthCheckers,
    async close() {
      if (db !== null) {
        await db.destroy();
      }
    },
  };
};
