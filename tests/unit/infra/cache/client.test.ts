import { describe, expect, it } from 'vitest';

import { CacheNamespace, initCache } from '@/infra/cache/index.js';

import { makeTestLogger } from '../../../fixtures/builders.js';

describe('initCache', () => {
  it('caches through the memory adapter when enabled', async () => {
    const { cache, keyBuilder } = initCache({
      config: { enabled: true, defaultTtlMs: 60_000, maxEntries: 10 },
      logger: makeTestLogger(),
    });

    await cache.set('k', 'v');

    expect(await cache.get('k')).toBe('v');
    expect(keyBuilder.build(CacheNamespace.DATASETS, 'sources')).toBe(
      'region-insights:datasets:sources'
    );
  });

  it('uses the no-op adapter when disabled', async () => {
    const { cache } = initCache({
      config: { enabled: false, defaultTtlMs: 60_000, maxEntries: 10 },
      logger: makeTestLogger(),
    });

    await cache.set('k', 'v');

    expect(await cache.get('k')).toBeUndefined();
  });

  it('applies a custom key prefix', () => {
    const { keyBuilder } = initCache({
      config: { enabled: true, defaultTtlMs: 1000, maxEntries: 10, keyPrefix: 'test' },
      logger: makeTestLogger(),
    });

    expect(keyBuilder.build(CacheNamespace.DATASETS, 'sources')).toBe('test:datasets:sources');
  });
});
