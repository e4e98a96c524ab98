/**
 * Periodic refresh scheduler.
 *
 * Fires `triggerNow('scheduled')` on a fixed interval. A tick that lands
 * while a run is in flight is skipped; stopping never cancels the
 * in-flight run.
 */

import type { RefreshOrchestrator } from '../../core/orchestrator.js';
import type { Logger } from 'pino';

export interface RefreshSchedulerOptions {
  orchestrator: Pick<RefreshOrchestrator, 'triggerNow'>;
  logger: Logger;
}

export interface RefreshScheduler {
  /**
   * Starts ticking every `intervalMs`. Restarts when already active.
   */
  start(intervalMs: number): void;
  stop(): void;
  isActive(): boolean;
  /** Ticks skipped because a run was in flight */
  skippedTicks(): number;
}

export const makeRefreshScheduler = (options: RefreshSchedulerOptions): RefreshScheduler => {
  const { orchestrator } = options;
  const log = options.logger.child({ component: 'RefreshScheduler' });

  let timer: NodeJS.Timeout | null = null;
  let skipped = 0;

  const tick = (): void => {
    const started = orchestrator.triggerNow('scheduled');
    if (started.isErr()) {
      skipped++;
      log.info(
        { runningRunId: started.error.runningRunId },
        'Skipping scheduled refresh, previous run still in progress'
      );
      return;
    }

    const run = started.value;
    log.info({ runId: run.runId }, 'Scheduled refresh started');
    void run.completion.then((summary) => {
      log.info({ runId: summary.runId, state: summary.state }, 'Scheduled refresh finished');
    });
  };

  const stop = (): void => {
    if (timer !== null) {
      clearInterval(timer);
      timer = null;
      log.info('Periodic refresh stopped');
    }
  };

  return {
    start(intervalMs) {
      stop();
      timer = setInterval(tick, intervalMs);
      // Allow the interval to not keep the process alive
      timer.unref();
      log.info({ intervalMs }, 'Periodic refresh started');
    },

    stop,

    isActive() {
      return timer !== null;
    },

    skippedTicks() {
      return skipped;
    },
  };
};
