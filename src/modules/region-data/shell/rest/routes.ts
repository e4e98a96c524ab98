/**
 * Region Data Module REST Routes
 *
 * Read-only queries over refreshed data:
 * - GET /api/v1/regions: Current regions
 * - GET /api/v1/regions/stats: Derived per-region statistics
 * - GET /api/v1/regions/budgets: Regional budget rows
 * - GET /api/v1/regions/employment: Monthly employment figures
 * - GET /api/v1/communes: Communes
 * - GET /api/v1/kpis: Headline figures
 */

import { getHttpStatusForError, type RegionDataError } from '../../core/errors.js';
import { getKpis } from '../../core/usecases/get-kpis.js';
import { listCommunes } from '../../core/usecases/list-communes.js';
import { listEmployment } from '../../core/usecases/list-employment.js';
import { listRegionBudgets } from '../../core/usecases/list-region-budgets.js';
import { listRegionStats } from '../../core/usecases/list-region-stats.js';

import {
  toCommuneDto,
  toEmploymentMonthDto,
  toKpisDto,
  toPageDto,
  toRegionBudgetDto,
  toRegionStatsDto,
} from './dto.js';
import {
  CommunesQuerySchema,
  EmploymentQuerySchema,
  RegionYearQuerySchema,
  type CommunesQueryString,
  type EmploymentQueryString,
  type RegionYearQuery,
} from './schemas.js';

import type { RegionDataRepository } from '../../core/ports.js';
import type { RegionReference } from '@/modules/dataset-registry/index.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies for region data routes.
 */
export interface MakeRegionDataRoutesDeps {
  repo: RegionDataRepository;
  regionReference: RegionReference;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function sendError(reply: FastifyReply, error: RegionDataError) {
  return reply.status(getHttpStatusForError(error)).send({
    ok: false,
    error: error.type,
    message: error.message,
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates region data REST routes.
 */
export const makeRegionDataRoutes = (deps: MakeRegionDataRoutesDeps): FastifyPluginAsync => {
  const { repo, regionReference } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/regions - Region reference
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get('/api/v1/regions', async (_request, reply) => {
      const regions = [...regionReference].map(([code, name]) => ({ code, name }));
      return reply.status(200).send({ ok: true, data: regions });
    });

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/regions/stats - Derived statistics
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: RegionYearQuery }>(
      '/api/v1/regions/stats',
      { schema: { querystring: RegionYearQuerySchema } },
      async (request, reply) => {
        const result = await listRegionStats({ repo }, request.query);
        if (result.isErr()) {
          return sendError(reply, result.error);
        }
        return reply.status(200).send({ ok: true, data: toPageDto(result.value, toRegionStatsDto) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/regions/budgets - Budget rows
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: RegionYearQuery }>(
      '/api/v1/regions/budgets',
      { schema: { querystring: RegionYearQuerySchema } },
      async (request, reply) => {
        const result = await listRegionBudgets({ repo }, request.query);
        if (result.isErr()) {
          return sendError(reply, result.error);
        }
        return reply
          .status(200)
          .send({ ok: true, data: toPageDto(result.value, toRegionBudgetDto) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/regions/employment - Monthly employment
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: EmploymentQueryString }>(
      '/api/v1/regions/employment',
      { schema: { querystring: EmploymentQuerySchema } },
      async (request, reply) => {
        const result = await listEmployment({ repo }, request.query);
        if (result.isErr()) {
          return sendError(reply, result.error);
        }
        return reply
          .status(200)
          .send({ ok: true, data: toPageDto(result.value, toEmploymentMonthDto) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/communes - Communes
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: CommunesQueryString }>(
      '/api/v1/communes',
      { schema: { querystring: CommunesQuerySchema } },
      async (request, reply) => {
        const result = await listCommunes({ repo }, request.query);
        if (result.isErr()) {
          return sendError(reply, result.error);
        }
        return reply.status(200).send({ ok: true, data: toPageDto(result.value, toCommuneDto) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/kpis - Headline figures
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get('/api/v1/kpis', async (_request, reply) => {
      const result = await getKpis({ repo });
      if (result.isErr()) {
        return sendError(reply, result.error);
      }
      return reply.status(200).send({ ok: true, data: toKpisDto(result.value) });
    });
  };
};
