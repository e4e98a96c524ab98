/**
 * JSON views of refresh state. Error causes stay server-side.
 */

import type { DatasetOutcome, RefreshRunSummary, RefreshStatus } from '../../core/types.js';

export interface DatasetOutcomeDto {
  datasetId: string;
  status: 'succeeded' | 'failed';
  error: { type: string; message: string } | null;
  totalRows: number | null;
  keptRows: number | null;
  rejectedRows: number | null;
  duplicateRows: number | null;
  resourceUrl: string | null;
}

export interface RunSummaryDto {
  runId: string;
  trigger: string;
  state: 'succeeded' | 'failed';
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  degraded: boolean;
  committedTables: string[];
  regionStats: number | null;
  excludedCommunes: number | null;
  error: { type: string; message: string } | null;
  datasets: DatasetOutcomeDto[];
}

export interface RefreshStatusDto {
  state: string;
  current: { runId: string; trigger: string; startedAt: string } | null;
  lastRun: RunSummaryDto | null;
  history: RunSummaryDto[];
}

const toOutcomeDto = (outcome: DatasetOutcome): DatasetOutcomeDto => {
  if (outcome.status === 'failed') {
    return {
      datasetId: outcome.datasetId,
      status: 'failed',
      error: { type: outcome.error.type, message: outcome.error.message },
      totalRows: null,
      keptRows: null,
      rejectedRows: null,
      duplicateRows: null,
      resourceUrl: null,
    };
  }

  return {
    datasetId: outcome.datasetId,
    status: 'succeeded',
    error: null,
    totalRows: outcome.report.totalRows,
    keptRows: outcome.report.keptRows,
    rejectedRows: outcome.report.rejectedRows,
    duplicateRows: outcome.report.duplicateRows,
    resourceUrl: outcome.metadata.resourceUrl,
  };
};

export const toRunSummaryDto = (summary: RefreshRunSummary): RunSummaryDto => ({
  runId: summary.runId,
  trigger: summary.trigger,
  state: summary.state,
  startedAt: summary.startedAt,
  finishedAt: summary.finishedAt,
  durationMs: summary.durationMs,
  degraded: summary.degraded,
  committedTables: [...summary.committedTables],
  regionStats: summary.transform?.records ?? null,
  excludedCommunes: summary.transform?.excludedCommunes ?? null,
  error: summary.error === null ? null : { type: summary.error.type, message: summary.error.message },
  datasets: summary.datasets.map(toOutcomeDto),
});

export const toRefreshStatusDto = (status: RefreshStatus): RefreshStatusDto => ({
  state: status.state,
  current:
    status.current === null
      ? null
      : {
          runId: status.current.runId,
          trigger: status.current.trigger,
          startedAt: status.current.startedAt,
        },
  lastRun: status.lastRun === null ? null : toRunSummaryDto(status.lastRun),
  history: status.history.map(toRunSummaryDto),
});
