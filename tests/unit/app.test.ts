/**
 * Unit tests for app factory
 */

import { describe, expect, it, beforeEach, afterEach } from 'vitest';

import { buildApp, createApp } from '@/app/build-app.js';

import { makeTestAppDeps } from '../fixtures/fakes.js';

describe('App Factory', () => {
  describe('buildApp', () => {
    it('creates a Fastify instance', async () => {
      const app = await buildApp({
        fastifyOptions: { logger: false },
        deps: makeTestAppDeps().deps,
      });

      expect(app).toBeDefined();
      expect(app.server).toBeDefined();

      await app.close();
    });

    it('accepts custom logger', async () => {
      const app = await buildApp({
        fastifyOptions: { logger: { level: 'silent' } },
        deps: makeTestAppDeps().deps,
      });

      expect(app.log.level).toBe('silent');

      await app.close();
    });

    it('registers health, dataset, refresh and region routes', async () => {
      const app = await buildApp({
        fastifyOptions: { logger: false },
        deps: makeTestAppDeps().deps,
      });
      await app.ready();

      expect(app.hasRoute({ method: 'GET', url: '/health/live' })).toBe(true);
      expect(app.hasRoute({ method: 'GET', url: '/health/ready' })).toBe(true);
      expect(app.hasRoute({ method: 'GET', url: '/api/v1/datasets' })).toBe(true);
      expect(app.hasRoute({ method: 'GET', url: '/api/v1/datasets/:id' })).toBe(true);
      expect(app.hasRoute({ method: 'POST', url: '/api/v1/refresh' })).toBe(true);
      expect(app.hasRoute({ method: 'GET', url: '/api/v1/refresh/status' })).toBe(true);
      expect(app.hasRoute({ method: 'GET', url: '/api/v1/regions/stats' })).toBe(true);
      expect(app.hasRoute({ method: 'GET', url: '/api/v1/communes' })).toBe(true);
      expect(app.hasRoute({ method: 'GET', url: '/api/v1/kpis' })).toBe(true);

      await app.close();
    });
  });

  describe('createApp', () => {
    it('returns a ready app instance', async () => {
      const app = await createApp({
        fastifyOptions: { logger: false },
        deps: makeTestAppDeps().deps,
      });

      const response = await app.inject({
        method: 'GET',
        url: '/health/live',
      });

      expect(response.statusCode).toBe(200);

      await app.close();
    });
  });

  describe('Error Handling', () => {
    let app: Awaited<ReturnType<typeof createApp>>;

    beforeEach(async () => {
      app = await createApp({
        fastifyOptions: { logger: false },
        deps: makeTestAppDeps().deps,
      });
    });

    afterEach(async () => {
      await app.close();
    });

    it('returns 404 for unknown routes', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/unknown-route',
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        ok: false,
        error: 'NotFoundError',
        message: 'Route GET /unknown-route not found',
      });
    });

    it('returns 404 with correct method in message', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/does-not-exist',
      });

      expect(response.statusCode).toBe(404);
      expect(response.json().message).toBe('Route POST /does-not-exist not found');
    });

    it('returns 400 for querystring validation failures', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/regions/stats?limit=0',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        ok: false,
        error: 'ValidationError',
        message: 'Request validation failed',
      });
    });
  });
});
