/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { wrapRegionDataRepo } from './cache-wrappers.js';
import { invalidateOnRefresh, type CacheClient } from '../infra/cache/index.js';
import { registerCors } from '../infra/plugins/cors.js';
import {
  makeDatasetRoutes,
  type DatasetRegistry,
  type RegionReference,
} from '../modules/dataset-registry/index.js';
import { makeHealthRoutes, type HealthChecker } from '../modules/health/index.js';
import { makeRefreshRoutes, type RefreshOrchestrator } from '../modules/refresh/index.js';
import { makeRegionDataRepo, makeRegionDataRoutes } from '../modules/region-data/index.js';

import type { AppConfig } from '../infra/config/index.js';
import type { StorageGateway } from '../modules/storage/index.js';
import type { Logger } from 'pino';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  logger: Logger;
  storage: StorageGateway;
  registry: DatasetRegistry;
  regionReference: RegionReference;
  orchestrator: RefreshOrchestrator;
  cacheClient: CacheClient;
  healthCheckers?: HealthChecker[];
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps: AppDeps;
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps, version } = options;
  const { config, orchestrator, registry, regionReference } = deps;
  const { responseCache, keyBuilder } = deps.cacheClient;

  const app = fastifyLib({
    ...fastifyOptions,
  });

  await registerCors(app, { cors: config.cors, isDevelopment: config.server.isDevelopment });

  // ─────────────────────────────────────────────────────────────────────────────
  // Read Path (cached)
  // ─────────────────────────────────────────────────────────────────────────────
  const rawRegionDataRepo = makeRegionDataRepo({ storage: deps.storage });
  const regionDataRepo = wrapRegionDataRepo(
    rawRegionDataRepo,
    responseCache,
    keyBuilder,
    config.cache.ttlMs
  );

  // Every successful refresh invalidates the whole read cache
  const unsubscribe = invalidateOnRefresh(responseCache, orchestrator, deps.logger);
  app.addHook('onClose', (_instance, done) => {
    unsubscribe();
    done();
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // Routes
  // ─────────────────────────────────────────────────────────────────────────────
  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers: deps.healthCheckers ?? [],
    })
  );

  await app.register(makeDatasetRoutes({ registry, sources: regionDataRepo }));
  await app.register(makeRefreshRoutes({ orchestrator, cache: responseCache }));
  await app.register(makeRegionDataRoutes({ repo: regionDataRepo, regionReference }));

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    // Handle validation errors
    if (error.validation != null) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: 'Request validation failed',
        details: error.validation,
      });
    }

    // Handle known HTTP errors
    if (error.statusCode != null) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    // Handle unexpected errors
    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
