/**
 * Integration tests for the refresh, dataset and region data endpoints
 */

import { describe, expect, it, afterEach } from 'vitest';

import { createApp } from '@/app/build-app.js';

import { makeBudgetRow, makeCommuneRow, makeEmploymentRow } from '../fixtures/builders.js';
import { makeDeferred, makeTestAppDeps, type TestAppOptions } from '../fixtures/fakes.js';

import type { RefreshCompletedEvent } from '@/modules/refresh/index.js';
import type { FastifyInstance } from 'fastify';

const sources: TestAppOptions['sources'] = {
  region_budgets: { kind: 'rows', rows: [makeBudgetRow(), makeBudgetRow()] },
  communes: { kind: 'rows', rows: [makeCommuneRow()] },
  regional_employment: { kind: 'rows', rows: [makeEmploymentRow()] },
};

describe('Refresh API', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    if (app !== undefined) {
      await app.close();
      app = undefined;
    }
  });

  const start = async (options: TestAppOptions) => {
    const testApp = makeTestAppDeps(options);
    const instance = await createApp({ fastifyOptions: { logger: false }, deps: testApp.deps });
    app = instance;

    const completed = makeDeferred<RefreshCompletedEvent>();
    testApp.deps.orchestrator.onRefreshCompleted((event) => {
      completed.resolve(event);
    });

    return { server: instance, completed: completed.promise, ...testApp };
  };

  it('starts one run and rejects a second trigger while it is in flight', async () => {
    const gate = makeDeferred();
    const { server, completed } = await start({ sources, gate: gate.promise });

    const first = await server.inject({ method: 'POST', url: '/api/v1/refresh' });
    expect(first.statusCode).toBe(202);
    expect(first.json().data).toMatchObject({ runId: 'run-1', trigger: 'manual' });

    const second = await server.inject({ method: 'POST', url: '/api/v1/refresh' });
    expect(second.statusCode).toBe(409);
    expect(second.json()).toEqual({
      ok: false,
      error: 'AlreadyRunning',
      message: "Refresh run 'run-1' is already in progress",
      runningRunId: 'run-1',
    });

    const running = await server.inject({ method: 'GET', url: '/api/v1/refresh/status' });
    expect(running.json().data).toMatchObject({
      state: 'running',
      current: { runId: 'run-1', trigger: 'manual' },
      lastRun: null,
      history: [],
    });

    gate.resolve();
    await completed;

    const finished = await server.inject({ method: 'GET', url: '/api/v1/refresh/status' });
    const status = finished.json().data;
    expect(status.state).toBe('succeeded');
    expect(status.current).toBeNull();
    expect(status.lastRun).toMatchObject({
      runId: 'run-1',
      state: 'succeeded',
      degraded: false,
      regionStats: 1,
      error: null,
    });
    expect(status.history).toHaveLength(1);
  });

  it('serves refreshed region stats and drops stale cached reads', async () => {
    const { server, completed } = await start({ sources });

    const before = await server.inject({ method: 'GET', url: '/api/v1/regions/stats' });
    expect(before.json().data.items).toEqual([]);

    await server.inject({ method: 'POST', url: '/api/v1/refresh' });
    await completed;

    const after = await server.inject({ method: 'GET', url: '/api/v1/regions/stats' });
    expect(after.statusCode).toBe(200);
    expect(after.json().data).toEqual({
      items: [
        {
          regionCode: '11',
          regionName: 'Île-de-France',
          year: 2023,
          population: 500,
          communeCount: 1,
          totalRevenue: '1000',
          totalExpenditure: '800',
          debt: null,
          revenuePerCapita: '2.00',
          expenditurePerCapita: '1.60',
          debtPerCapita: null,
          salaryMass: '100',
          partialUnemploymentBase: '5',
          employmentMonths: 1,
        },
      ],
      limit: 100,
      offset: 0,
    });
  });

  it('serves headline figures and searches communes by name after a refresh', async () => {
    const { server, completed } = await start({ sources });

    await server.inject({ method: 'POST', url: '/api/v1/refresh' });
    await completed;

    const kpis = await server.inject({ method: 'GET', url: '/api/v1/kpis' });
    expect(kpis.statusCode).toBe(200);
    expect(kpis.json()).toEqual({
      ok: true,
      data: {
        totalCommunes: 1,
        totalRegions: 1,
        totalPopulation: 500,
        budgetYearRange: { min: 2023, max: 2023 },
      },
    });

    const found = await server.inject({ method: 'GET', url: '/api/v1/communes?search=par' });
    expect(found.json().data.items.map((c: { communeName: string }) => c.communeName)).toEqual([
      'Paris',
    ]);

    const missing = await server.inject({ method: 'GET', url: '/api/v1/communes?search=lyon' });
    expect(missing.json().data.items).toEqual([]);
  });

  it('lists datasets with provenance of their last fetch', async () => {
    const { server, completed } = await start({ sources });

    await server.inject({ method: 'POST', url: '/api/v1/refresh' });
    await completed;

    const response = await server.inject({ method: 'GET', url: '/api/v1/datasets' });
    const datasets = response.json().data;
    expect(datasets.map((d: { id: string }) => d.id)).toEqual([
      'region_budgets',
      'communes',
      'regional_employment',
    ]);
    expect(datasets[0].lastFetch).toMatchObject({
      runId: 'run-1',
      resourceUrl: 'https://files.test/region_budgets.csv',
      totalRows: 2,
      keptRows: 1,
      duplicateRows: 1,
    });
  });

  it('returns 404 for an unknown dataset', async () => {
    const { server } = await start({ sources });

    const response = await server.inject({ method: 'GET', url: '/api/v1/datasets/unknown' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      ok: false,
      error: 'DatasetNotFound',
      message: "Dataset with id 'unknown' not found",
    });
  });

  it('lists the current regions', async () => {
    const { server } = await start({ sources });

    const response = await server.inject({ method: 'GET', url: '/api/v1/regions' });

    const regions = response.json().data;
    expect(regions).toHaveLength(18);
    expect(regions).toContainEqual({ code: '53', name: 'Bretagne' });
  });

  it('rejects malformed region codes', async () => {
    const { server } = await start({ sources });

    const response = await server.inject({
      method: 'GET',
      url: '/api/v1/regions/stats?regionCode=IDF',
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      ok: false,
      error: 'InvalidQuery',
      message: "'IDF' is not a region code",
    });
  });

  it('clears the cache on demand', async () => {
    const { server } = await start({ sources });

    await server.inject({ method: 'GET', url: '/api/v1/regions/stats' });
    await server.inject({ method: 'GET', url: '/api/v1/communes' });

    const cleared = await server.inject({ method: 'POST', url: '/api/v1/cache/clear' });
    expect(cleared.json()).toEqual({ ok: true, data: { evicted: 2 } });

    const stats = await server.inject({ method: 'GET', url: '/api/v1/cache/stats' });
    expect(stats.json().data).toMatchObject({ size: 0, computations: 2, invalidations: 1 });
  });
});
