/**
 * Refresh Module - Public API
 *
 * Runs the fetch → clean → transform → store pipeline, on demand or on a schedule.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  RefreshState,
  RefreshTrigger,
  DatasetProcessingError,
  DatasetFailure,
  DatasetOutcome,
  RefreshRunInfo,
  RefreshRun,
  RefreshRunSummary,
  RefreshCompletedEvent,
  RefreshCompletedListener,
  RefreshStatus,
  RefreshConfig,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  AlreadyRunningError,
  StorageCommitFailureError,
  NoDatasetsAvailableError,
  UnexpectedRefreshError,
  RefreshFailure,
} from './core/errors.js';
export {
  createAlreadyRunningError,
  createNoDatasetsAvailableError,
  createUnexpectedRefreshError,
  REFRESH_ERROR_HTTP_STATUS,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports & Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export type { DatasetFetcher } from './core/ports.js';
export { runRefresh, type RunRefreshDeps } from './core/usecases/run-refresh.js';
export {
  RefreshOrchestrator,
  type RefreshPipeline,
  type RefreshOrchestratorOptions,
} from './core/orchestrator.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeRefreshScheduler,
  type RefreshScheduler,
  type RefreshSchedulerOptions,
} from './shell/scheduler/refresh-scheduler.js';
export { makeRefreshRoutes, type MakeRefreshRoutesDeps } from './shell/rest/routes.js';
export {
  toRunSummaryDto,
  toRefreshStatusDto,
  type RunSummaryDto,
  type RefreshStatusDto,
  type DatasetOutcomeDto,
} from './shell/rest/dto.js';
