/**
 * Refresh Module REST Routes
 *
 * - POST /api/v1/refresh: Start a refresh run (202, or 409 when one is running)
 * - GET /api/v1/refresh/status: Current state, last run and run history
 * - POST /api/v1/cache/clear: Drop every cached query result
 * - GET /api/v1/cache/stats: Cache counters
 */

import { REFRESH_ERROR_HTTP_STATUS } from '../../core/errors.js';

import { toRefreshStatusDto } from './dto.js';

import type { RefreshOrchestrator } from '../../core/orchestrator.js';
import type { ResponseCache } from '@/infra/cache/index.js';
import type { FastifyPluginAsync } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies for refresh routes.
 */
export interface MakeRefreshRoutesDeps {
  orchestrator: Pick<RefreshOrchestrator, 'triggerNow' | 'getStatus'>;
  cache: Pick<ResponseCache, 'invalidateAll' | 'stats'>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates refresh REST routes.
 */
export const makeRefreshRoutes = (deps: MakeRefreshRoutesDeps): FastifyPluginAsync => {
  const { orchestrator, cache } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/refresh - Trigger a run
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post('/api/v1/refresh', async (request, reply) => {
      const result = orchestrator.triggerNow('manual');

      if (result.isErr()) {
        return reply.status(REFRESH_ERROR_HTTP_STATUS[result.error.type]).send({
          ok: false,
          error: result.error.type,
          message: result.error.message,
          runningRunId: result.error.runningRunId,
        });
      }

      const run = result.value;
      request.log.info({ runId: run.runId }, 'Refresh triggered over HTTP');
      void run.completion.then((summary) => {
        request.log.info({ runId: summary.runId, state: summary.state }, 'Refresh finished');
      });

      return reply.status(202).send({
        ok: true,
        data: { runId: run.runId, trigger: run.trigger, startedAt: run.startedAt },
      });
    });

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/refresh/status - Run status
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get('/api/v1/refresh/status', async (_request, reply) => {
      return reply.status(200).send({
        ok: true,
        data: toRefreshStatusDto(orchestrator.getStatus()),
      });
    });

    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/cache/clear - Invalidate cached query results
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post('/api/v1/cache/clear', async (_request, reply) => {
      const evicted = await cache.invalidateAll();
      return reply.status(200).send({ ok: true, data: { evicted } });
    });

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/cache/stats - Cache counters
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get('/api/v1/cache/stats', async (_request, reply) => {
      return reply.status(200).send({ ok: true, data: await cache.stats() });
    });
  };
};
