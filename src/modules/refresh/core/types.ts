/**
 * Refresh Module - Domain Types
 */

import type { RefreshFailure } from './errors.js';
import type { CleaningReport } from '@/modules/cleaning/index.js';
import type { DatasetId } from '@/modules/dataset-registry/index.js';
import type { IngestionError, SourceMetadata } from '@/modules/ingestion/index.js';
import type { TableName } from '@/modules/storage/index.js';
import type { TransformReport } from '@/modules/transform/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Run State
// ─────────────────────────────────────────────────────────────────────────────

/**
 * idle → running → succeeded | failed, and back to running on the next trigger.
 */
export type RefreshState = 'idle' | 'running' | 'succeeded' | 'failed';

export type RefreshTrigger = 'manual' | 'scheduled' | 'startup' | 'cli';

// ─────────────────────────────────────────────────────────────────────────────
// Dataset Outcomes
// ─────────────────────────────────────────────────────────────────────────────

/**
 * An unexpected exception while processing one dataset.
 */
export interface DatasetProcessingError {
  readonly type: 'DatasetProcessingFailed';
  readonly message: string;
  readonly datasetId: DatasetId;
  readonly cause?: unknown;
}

export type DatasetFailure = IngestionError | DatasetProcessingError;

export type DatasetOutcome =
  | {
      readonly status: 'succeeded';
      readonly datasetId: DatasetId;
      readonly metadata: SourceMetadata;
      readonly report: CleaningReport;
    }
  | {
      readonly status: 'failed';
      readonly datasetId: DatasetId;
      readonly error: DatasetFailure;
    };

// ─────────────────────────────────────────────────────────────────────────────
// Runs
// ─────────────────────────────────────────────────────────────────────────────

export interface RefreshRunInfo {
  readonly runId: string;
  readonly trigger: RefreshTrigger;
  readonly startedAt: string;
}

/**
 * A started run. `completion` settles once the run has reached a final
 * state and every completion listener has returned; it never rejects.
 */
export interface RefreshRun extends RefreshRunInfo {
  readonly completion: Promise<RefreshRunSummary>;
}

export interface RefreshRunSummary extends RefreshRunInfo {
  readonly state: 'succeeded' | 'failed';
  readonly finishedAt: string;
  readonly durationMs: number;
  readonly datasets: readonly DatasetOutcome[];
  readonly transform: TransformReport | null;
  /** Tables committed before the run ended, in commit order */
  readonly committedTables: readonly TableName[];
  /** Succeeded with at least one dataset failed */
  readonly degraded: boolean;
  readonly error: RefreshFailure | null;
}

/**
 * Emitted after a run reaches `succeeded`.
 */
export interface RefreshCompletedEvent {
  readonly runId: string;
  readonly succeeded: readonly DatasetId[];
  readonly failed: readonly DatasetId[];
  readonly finishedAt: string;
}

export type RefreshCompletedListener = (event: RefreshCompletedEvent) => Promise<void> | void;

export interface RefreshStatus {
  readonly state: RefreshState;
  /** The in-flight run, if any */
  readonly current: RefreshRunInfo | null;
  /** Most recently finished run */
  readonly lastRun: RefreshRunSummary | null;
  /** Finished runs, newest first */
  readonly history: readonly RefreshRunSummary[];
}

export interface RefreshConfig {
  /** Finished runs kept in memory */
  historySize: number;
}
