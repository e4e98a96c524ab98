import { describe, expect, it, vi } from 'vitest';

import { CacheErrorFactory, createSilentCache } from '@/infra/cache/index.js';

import { makeTestLogger } from '../../../fixtures/builders.js';
import { makeFakeCachePort } from '../../../fixtures/fakes.js';

const failure = CacheErrorFactory.connection('store offline');

describe('SilentCache', () => {
  it('passes values through when the store works', async () => {
    const cache = createSilentCache(makeFakeCachePort<string>(), { logger: makeTestLogger() });

    await cache.set('key', 'value');

    expect(await cache.get('key')).toBe('value');
    expect(await cache.get('other')).toBeUndefined();
    expect(await cache.stats()).toEqual({ hits: 1, misses: 1, size: 1 });
  });

  it('turns a failed get into a miss and logs a warning', async () => {
    const logger = makeTestLogger();
    const warn = vi.spyOn(logger, 'warn');
    const cache = createSilentCache(makeFakeCachePort<string>({ failWithError: failure }), {
      logger,
    });

    expect(await cache.get('key')).toBeUndefined();
    expect(warn).toHaveBeenCalledWith(
      { err: failure, key: 'key' },
      '[Cache] Get failed: store offline'
    );
  });

  it('swallows failed writes', async () => {
    const logger = makeTestLogger();
    const warn = vi.spyOn(logger, 'warn');
    const cache = createSilentCache(makeFakeCachePort<string>({ failWithError: failure }), {
      logger,
    });

    await expect(cache.set('key', 'value', { ttlMs: 500 })).resolves.toBeUndefined();
    expect(warn).toHaveBeenCalledWith(
      { err: failure, key: 'key', ttlMs: 500 },
      '[Cache] Set failed: store offline'
    );
  });

  it('returns zero evictions when clearing fails', async () => {
    const cache = createSilentCache(makeFakeCachePort<string>({ failWithError: failure }), {
      logger: makeTestLogger(),
    });

    expect(await cache.clear()).toBe(0);
  });

  it('returns the eviction count from the store', async () => {
    const cache = createSilentCache(makeFakeCachePort<number>(), { logger: makeTestLogger() });
    await cache.set('a', 1);
    await cache.set('b', 2);

    expect(await cache.clear()).toBe(2);
  });
});
