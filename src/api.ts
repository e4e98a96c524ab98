/**
 * API server entry point
 * Starts the Fastify HTTP server and the periodic refresh scheduler
 */

import { buildApp } from './app/build-app.js';
import { createRuntime } from './app/runtime.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { createLogger } from './infra/logger/index.js';
import { makeRefreshScheduler } from './modules/refresh/index.js';

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  // Create logger
  const logger = createLogger({
    level: config.logger.level,
    name: 'region-insights-server',
    pretty: config.logger.pretty,
  });

  logger.info({ config: { server: config.server, refresh: config.refresh } }, 'Starting API server');

  // Initialize dependencies
  const runtime = await createRuntime({ config, logger });
  const scheduler = makeRefreshScheduler({ orchestrator: runtime.orchestrator, logger });

  // Build application - let Fastify create its own logger based on config
  const app = await buildApp({
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        ...(config.logger.pretty && {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          },
        }),
      },
      disableRequestLogging: false,
    },
    deps: {
      config,
      logger,
      storage: runtime.storage,
      registry: runtime.registry,
      regionReference: runtime.regionReference,
      orchestrator: runtime.orchestrator,
      cacheClient: runtime.cacheClient,
      healthCheckers: runtime.healthCheckers,
    },
    version: config.server.version,
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');
    scheduler.stop();

    try {
      await app.close();
      await runtime.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  // Start server
  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }

  // Refresh scheduling
  if (config.refresh.intervalMs !== undefined) {
    scheduler.start(config.refresh.intervalMs);
  }

  if (config.refresh.runOnStart) {
    const started = runtime.orchestrator.triggerNow('startup');
    if (started.isOk()) {
      void started.value.completion.then((summary) => {
        logger.info(
          { runId: summary.runId, state: summary.state, degraded: summary.degraded },
          'Startup refresh finished'
        );
      });
    } else {
      logger.warn({ runningRunId: started.error.runningRunId }, started.error.message);
    }
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
