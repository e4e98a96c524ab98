import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  makeRefreshScheduler,
  RefreshOrchestrator,
  type RefreshCompletedEvent,
  type RefreshRunInfo,
  type RefreshRunSummary,
} from '@/modules/refresh/index.js';

import { makeTestLogger } from '../../fixtures/builders.js';
import { makeDeferred } from '../../fixtures/fakes.js';

const succeeded = (run: RefreshRunInfo): RefreshRunSummary => ({
  ...run,
  state: 'succeeded',
  finishedAt: run.startedAt,
  durationMs: 0,
  datasets: [],
  transform: null,
  committedTables: [],
  degraded: false,
  error: null,
});

describe('makeRefreshScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const setup = () => {
    let gate = makeDeferred();
    const triggers: string[] = [];
    let sequence = 0;

    const orchestrator = new RefreshOrchestrator({
      config: { historySize: 10 },
      logger: makeTestLogger(),
      generateRunId: () => {
        sequence++;
        return `run-${String(sequence)}`;
      },
      pipeline: async (run) => {
        triggers.push(run.trigger);
        await gate.promise;
        return succeeded(run);
      },
    });
    const scheduler = makeRefreshScheduler({ orchestrator, logger: makeTestLogger() });

    return {
      orchestrator,
      scheduler,
      triggers,
      release: () => {
        const current = gate;
        gate = makeDeferred();
        current.resolve();
      },
    };
  };

  it('starts a scheduled run on each tick', () => {
    const { orchestrator, scheduler, triggers } = setup();

    scheduler.start(1000);
    expect(scheduler.isActive()).toBe(true);
    expect(orchestrator.isRunning()).toBe(false);

    vi.advanceTimersByTime(1000);

    expect(triggers).toEqual(['scheduled']);
    expect(orchestrator.getStatus().current?.trigger).toBe('scheduled');
    scheduler.stop();
  });

  it('skips ticks while a run is in flight', async () => {
    const { orchestrator, scheduler, triggers, release } = setup();
    const completed = makeDeferred<RefreshCompletedEvent>();
    orchestrator.onRefreshCompleted((event) => {
      completed.resolve(event);
    });

    scheduler.start(1000);
    vi.advanceTimersByTime(3000);

    expect(triggers).toEqual(['scheduled']);
    expect(scheduler.skippedTicks()).toBe(2);

    release();
    const event = await completed.promise;
    expect(event.runId).toBe('run-1');
    expect(orchestrator.isRunning()).toBe(false);

    vi.advanceTimersByTime(1000);
    expect(triggers).toEqual(['scheduled', 'scheduled']);
    expect(orchestrator.getStatus().current?.runId).toBe('run-2');
    expect(scheduler.skippedTicks()).toBe(2);
    scheduler.stop();
  });

  it('stops ticking without cancelling the in-flight run', () => {
    const { orchestrator, scheduler, triggers } = setup();

    scheduler.start(1000);
    vi.advanceTimersByTime(1000);
    scheduler.stop();
    vi.advanceTimersByTime(5000);

    expect(scheduler.isActive()).toBe(false);
    expect(triggers).toEqual(['scheduled']);
    expect(orchestrator.isRunning()).toBe(true);
    expect(scheduler.skippedTicks()).toBe(0);
  });

  it('restarts with the new interval when started twice', () => {
    const { scheduler, triggers } = setup();

    scheduler.start(1000);
    scheduler.start(5000);
    vi.advanceTimersByTime(4999);
    expect(triggers).toEqual([]);

    vi.advanceTimersByTime(1);
    expect(triggers).toEqual(['scheduled']);
    scheduler.stop();
  });
});
