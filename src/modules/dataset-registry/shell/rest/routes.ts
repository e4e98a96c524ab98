/**
 * Dataset Registry REST Routes
 *
 * - GET /api/v1/datasets: Registered datasets with their last fetch
 * - GET /api/v1/datasets/:id: One dataset
 */

import { Type, type Static } from '@sinclair/typebox';

import { DATASET_REGISTRY_ERROR_HTTP_STATUS } from '../../core/errors.js';

import type { DatasetRegistry } from '../../core/registry.js';
import type { DatasetSpec } from '../../core/types.js';
import type { DatabaseError } from '@/common/types/errors.js';
import type { DatasetSourceEntry } from '@/modules/storage/index.js';
import type { FastifyBaseLogger, FastifyPluginAsync } from 'fastify';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

const DatasetParamsSchema = Type.Object(
  {
    id: Type.String({ minLength: 1, maxLength: 64 }),
  },
  { additionalProperties: false }
);

type DatasetParams = Static<typeof DatasetParamsSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies for dataset routes.
 */
export interface MakeDatasetRoutesDeps {
  registry: DatasetRegistry;
  /** Provenance of the last successful fetches */
  sources: {
    listDatasetSources(): Promise<Result<DatasetSourceEntry[], DatabaseError>>;
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const toLastFetchDto = (entry: DatasetSourceEntry) => ({
  runId: entry.runId,
  fetchedAt: entry.fetchedAt,
  resourceUrl: entry.resourceUrl,
  title: entry.title,
  organization: entry.organization,
  license: entry.license,
  lastModified: entry.lastModified,
  totalRows: entry.totalRows,
  keptRows: entry.keptRows,
  rejectedRows: entry.rejectedRows,
  duplicateRows: entry.duplicateRows,
});

const toDatasetDto = (spec: DatasetSpec, entry: DatasetSourceEntry | undefined) => ({
  id: spec.id,
  displayName: spec.displayName,
  description: spec.description,
  publisher: spec.publisher,
  source: spec.source,
  refreshCadence: spec.refreshCadence,
  targetTable: spec.targetTable,
  naturalKey: spec.naturalKey,
  duplicatePolicy: spec.duplicatePolicy,
  columns: spec.columns.map((column) => ({
    name: column.name,
    type: column.type,
    required: column.required,
    onMissing: column.onMissing,
  })),
  lastFetch: entry === undefined ? null : toLastFetchDto(entry),
});

/**
 * Provenance by dataset id. A read failure leaves every dataset without
 * provenance rather than failing the listing.
 */
const loadSources = async (
  sources: MakeDatasetRoutesDeps['sources'],
  log: FastifyBaseLogger
): Promise<Map<string, DatasetSourceEntry>> => {
  const result = await sources.listDatasetSources();
  if (result.isErr()) {
    log.warn({ err: result.error }, 'Dataset provenance unavailable');
    return new Map();
  }
  return new Map(result.value.map((entry) => [entry.datasetId, entry]));
};

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates dataset registry REST routes.
 */
export const makeDatasetRoutes = (deps: MakeDatasetRoutesDeps): FastifyPluginAsync => {
  const { registry, sources } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/datasets - List datasets
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get('/api/v1/datasets', async (request, reply) => {
      const provenance = await loadSources(sources, request.log);
      const datasets = registry
        .listDatasets()
        .map((spec) => toDatasetDto(spec, provenance.get(spec.id)));

      return reply.status(200).send({ ok: true, data: datasets });
    });

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/datasets/:id - Get one dataset
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: DatasetParams }>(
      '/api/v1/datasets/:id',
      { schema: { params: DatasetParamsSchema } },
      async (request, reply) => {
        const result = registry.getDataset(request.params.id);

        if (result.isErr()) {
          return reply.status(DATASET_REGISTRY_ERROR_HTTP_STATUS[result.error.type]).send({
            ok: false,
            error: result.error.type,
            message: result.error.message,
          });
        }

        const provenance = await loadSources(sources, request.log);
        return reply.status(200).send({
          ok: true,
          data: toDatasetDto(result.value, provenance.get(result.value.id)),
        });
      }
    );
  };
};
