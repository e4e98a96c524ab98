/**
 * Run Refresh Use Case
 *
 * One pass of the pipeline:
 * 1. fetch and clean every registered dataset concurrently
 * 2. transform once all of them have settled
 * 3. commit dataset tables, then region_stats, then dataset_sources
 *
 * A failed dataset is recorded and left out; its siblings carry on. The
 * first failed commit ends the run and earlier commits stay in place.
 */

import { describeError } from '@/common/types/errors.js';
import { cleanDataset, type CleanRecord } from '@/modules/cleaning/index.js';
import { RawStreamError } from '@/modules/ingestion/index.js';
import {
  regionStatsToRecord,
  sourceEntryToRecord,
  TABLE_DEFINITIONS,
  type StorageGateway,
  type TableName,
} from '@/modules/storage/index.js';
import { transformRegions, type TransformOutput } from '@/modules/transform/index.js';

import { createNoDatasetsAvailableError, type RefreshFailure } from '../errors.js';

import type { DatasetFetcher } from '../ports.js';
import type {
  DatasetFailure,
  DatasetOutcome,
  RefreshRunInfo,
  RefreshRunSummary,
} from '../types.js';
import type {
  DatasetId,
  DatasetSpec,
  RegionReference,
} from '@/modules/dataset-registry/index.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RunRefreshDeps {
  datasets: readonly DatasetSpec[];
  fetcher: DatasetFetcher;
  storage: StorageGateway;
  regionReference: RegionReference;
  logger: Logger;
  now?: () => Date;
}

interface ProcessedDataset {
  readonly spec: DatasetSpec;
  readonly outcome: DatasetOutcome;
  /** Clean records; null when the dataset failed */
  readonly records: readonly CleanRecord[] | null;
}

interface CommitStep {
  readonly table: TableName;
  readonly records: readonly CleanRecord[];
  readonly naturalKey: readonly string[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Fetch + Clean
// ─────────────────────────────────────────────────────────────────────────────

const failed = (spec: DatasetSpec, error: DatasetFailure): ProcessedDataset => ({
  spec,
  outcome: { status: 'failed', datasetId: spec.id, error },
  records: null,
});

const processDataset = async (
  spec: DatasetSpec,
  fetcher: DatasetFetcher,
  log: Logger
): Promise<ProcessedDataset> => {
  try {
    const fetched = await fetcher.fetch(spec);
    if (fetched.isErr()) {
      log.warn({ datasetId: spec.id, err: fetched.error }, `Dataset fetch failed: ${fetched.error.message}`);
      return failed(spec, fetched.error);
    }

    const stream = fetched.value;
    const cleaned = await cleanDataset(spec, stream.records, stream.headers);
    if (cleaned.isErr()) {
      log.warn({ datasetId: spec.id, err: cleaned.error }, cleaned.error.message);
      return failed(spec, cleaned.error);
    }

    const { records, report } = cleaned.value;
    log.info(
      {
        datasetId: spec.id,
        totalRows: report.totalRows,
        keptRows: report.keptRows,
        rejectedRows: report.rejectedRows,
        duplicateRows: report.duplicateRows,
      },
      'Dataset cleaned'
    );

    return {
      spec,
      outcome: { status: 'succeeded', datasetId: spec.id, metadata: stream.metadata, report },
      records,
    };
  } catch (error) {
    if (error instanceof RawStreamError) {
      log.warn({ datasetId: spec.id, err: error.error }, error.message);
      return failed(spec, error.error);
    }

    log.error({ datasetId: spec.id, err: error }, 'Unexpected error while processing dataset');
    return failed(spec, {
      type: 'DatasetProcessingFailed',
      message: `Failed to process dataset '${spec.id}': ${describeError(error)}`,
      datasetId: spec.id,
      cause: error,
    });
  }
};

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Executes one refresh run. Never throws for dataset or storage failures;
 * those end up in the summary.
 */
export const runRefresh = async (
  deps: RunRefreshDeps,
  run: RefreshRunInfo
): Promise<RefreshRunSummary> => {
  const now = deps.now ?? (() => new Date());
  const log = deps.logger.child({ runId: run.runId });
  const startedMs = Date.parse(run.startedAt);

  log.info({ trigger: run.trigger, datasets: deps.datasets.map((d) => d.id) }, 'Refresh started');

  const processed = await Promise.all(
    deps.datasets.map((spec) => processDataset(spec, deps.fetcher, log))
  );
  const outcomes = processed.map((p) => p.outcome);
  const failedIds = outcomes.filter((o) => o.status === 'failed').map((o) => o.datasetId);
  const committedTables: TableName[] = [];

  const finish = (
    state: 'succeeded' | 'failed',
    transform: TransformOutput | null,
    error: RefreshFailure | null
  ): RefreshRunSummary => {
    const finishedAt = now();
    return {
      ...run,
      state,
      finishedAt: finishedAt.toISOString(),
      durationMs: Math.max(0, finishedAt.getTime() - startedMs),
      datasets: outcomes,
      transform: transform?.report ?? null,
      committedTables,
      degraded: state === 'succeeded' && failedIds.length > 0,
      error,
    };
  };

  const available = processed.filter((p) => p.records !== null);
  if (available.length === 0) {
    const error = createNoDatasetsAvailableError(failedIds);
    log.error({ failed: failedIds }, error.message);
    return finish('failed', null, error);
  }

  const recordsOf = (id: DatasetId): readonly CleanRecord[] | null =>
    processed.find((p) => p.spec.id === id)?.records ?? null;

  const transform = transformRegions({
    budgets: recordsOf('region_budgets'),
    communes: recordsOf('communes'),
    employment: recordsOf('regional_employment'),
    regionReference: deps.regionReference,
  });

  if (transform.report.excludedCommunes > 0) {
    log.warn(
      {
        excludedCommunes: transform.report.excludedCommunes,
        samples: transform.report.excludedCommuneSamples,
      },
      'Communes without a current region were excluded'
    );
  }

  const steps: CommitStep[] = [];
  for (const { spec, records } of available) {
    if (records !== null) {
      steps.push({ table: spec.targetTable, records, naturalKey: spec.naturalKey });
    }
  }
  steps.push({
    table: 'region_stats',
    records: transform.records.map((record) => regionStatsToRecord(record, run.runId)),
    naturalKey: TABLE_DEFINITIONS.region_stats.naturalKey,
  });
  steps.push({
    table: 'dataset_sources',
    records: outcomes.flatMap((o) =>
      o.status === 'succeeded' ? [sourceEntryToRecord(o.metadata, o.report, run.runId)] : []
    ),
    naturalKey: TABLE_DEFINITIONS.dataset_sources.naturalKey,
  });

  for (const step of steps) {
    const result = await deps.storage.upsertBatch(step.table, step.records, step.naturalKey);
    if (result.isErr()) {
      log.error(
        { table: step.table, committedTables, err: result.error },
        'Refresh aborted on commit failure'
      );
      return finish('failed', transform, result.error);
    }
    committedTables.push(step.table);
  }

  const summary = finish('succeeded', transform, null);
  log.info(
    {
      durationMs: summary.durationMs,
      regionStats: transform.report.records,
      failed: failedIds,
      degraded: summary.degraded,
    },
    'Refresh succeeded'
  );
  return summary;
};
