/**
 * Refresh Orchestrator
 *
 * Owns the run state machine. At most one run is in flight: the check
 * and the claim in `triggerNow` happen in the same synchronous turn, so
 * concurrent triggers cannot both start a run.
 */

import { randomUUID } from 'node:crypto';

import { err, ok, type Result } from 'neverthrow';

import { describeError } from '@/common/types/errors.js';

import {
  createAlreadyRunningError,
  createUnexpectedRefreshError,
  type AlreadyRunningError,
} from './errors.js';

import type {
  RefreshCompletedEvent,
  RefreshCompletedListener,
  RefreshConfig,
  RefreshRun,
  RefreshRunInfo,
  RefreshRunSummary,
  RefreshState,
  RefreshStatus,
  RefreshTrigger,
} from './types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Executes the pipeline for one run.
 */
export type RefreshPipeline = (run: RefreshRunInfo) => Promise<RefreshRunSummary>;

export interface RefreshOrchestratorOptions {
  pipeline: RefreshPipeline;
  config: RefreshConfig;
  logger: Logger;
  now?: () => Date;
  generateRunId?: () => string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export class RefreshOrchestrator {
  private readonly pipeline: RefreshPipeline;
  private readonly historySize: number;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly generateRunId: () => string;

  private state: RefreshState = 'idle';
  private current: RefreshRunInfo | null = null;
  private readonly history: RefreshRunSummary[] = [];
  private readonly listeners = new Set<RefreshCompletedListener>();

  constructor(options: RefreshOrchestratorOptions) {
    this.pipeline = options.pipeline;
    this.historySize = Math.max(1, options.config.historySize);
    this.log = options.logger.child({ component: 'RefreshOrchestrator' });
    this.now = options.now ?? (() => new Date());
    this.generateRunId = options.generateRunId ?? randomUUID;
  }

  /**
   * Starts a run unless one is already in flight.
   */
  triggerNow(trigger: RefreshTrigger = 'manual'): Result<RefreshRun, AlreadyRunningError> {
    if (this.current !== null) {
      this.log.info(
        { trigger, runningRunId: this.current.runId },
        'Refresh already running, trigger rejected'
      );
      return err(createAlreadyRunningError(this.current.runId));
    }

    const run: RefreshRunInfo = {
      runId: this.generateRunId(),
      trigger,
      startedAt: this.now().toISOString(),
    };
    this.current = run;
    this.state = 'running';

    return ok({ ...run, completion: this.execute(run) });
  }

  /**
   * Starts a run and waits for it to finish.
   */
  async runOnce(
    trigger: RefreshTrigger = 'manual'
  ): Promise<Result<RefreshRunSummary, AlreadyRunningError>> {
    const started = this.triggerNow(trigger);
    if (started.isErr()) {
      return err(started.error);
    }
    return ok(await started.value.completion);
  }

  getStatus(): RefreshStatus {
    return {
      state: this.state,
      current: this.current,
      lastRun: this.history[0] ?? null,
      history: [...this.history],
    };
  }

  isRunning(): boolean {
    return this.current !== null;
  }

  /**
   * Registers a listener for successful runs.
   * @returns Unsubscribe function
   */
  onRefreshCompleted(listener: RefreshCompletedListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────────

  private async execute(run: RefreshRunInfo): Promise<RefreshRunSummary> {
    let summary: RefreshRunSummary;
    try {
      summary = await this.pipeline(run);
    } catch (error) {
      this.log.error({ err: error, runId: run.runId }, 'Refresh pipeline threw');
      summary = this.failedSummary(run, error);
    }

    this.history.unshift(summary);
    this.history.length = Math.min(this.history.length, this.historySize);
    this.state = summary.state;
    this.current = null;

    if (summary.state === 'succeeded') {
      await this.emit({
        runId: summary.runId,
        succeeded: summary.datasets.filter((d) => d.status === 'succeeded').map((d) => d.datasetId),
        failed: summary.datasets.filter((d) => d.status === 'failed').map((d) => d.datasetId),
        finishedAt: summary.finishedAt,
      });
    }

    return summary;
  }

  private async emit(event: RefreshCompletedEvent): Promise<void> {
    for (const listener of [...this.listeners]) {
      try {
        await listener(event);
      } catch (error) {
        this.log.error({ err: error, runId: event.runId }, 'Refresh completion listener failed');
      }
    }
  }

  private failedSummary(run: RefreshRunInfo, error: unknown): RefreshRunSummary {
    const finishedAt = this.now();
    return {
      ...run,
      state: 'failed',
      finishedAt: finishedAt.toISOString(),
      durationMs: Math.max(0, finishedAt.getTime() - Date.parse(run.startedAt)),
      datasets: [],
      transform: null,
      committedTables: [],
      degraded: false,
      error: createUnexpectedRefreshError(`Refresh pipeline threw: ${describeError(error)}`, error),
    };
  }
}
