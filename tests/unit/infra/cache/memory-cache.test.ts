import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { createMemoryCache } from '@/infra/cache/index.js';

import type { CachePort } from '@/infra/cache/index.js';

const makeClock = (start = 1_000_000) => {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
};

const getValue = async <T>(cache: CachePort<T>, key: string) =>
  (await cache.get(key))._unsafeUnwrap();

describe('MemoryCache', () => {
  it('returns undefined for missing keys', async () => {
    const cache = createMemoryCache<string>();

    expect(await getValue(cache, 'missing')).toBeUndefined();
  });

  it('returns a fresh copy of stored objects', async () => {
    const cache = createMemoryCache<{ regionCode: string; revenue: Decimal }>();
    const value = { regionCode: '11', revenue: new Decimal('1234.56') };
    await cache.set('stats', value);

    const first = await getValue(cache, 'stats');
    expect(first).not.toBe(value);
    expect(first?.regionCode).toBe('11');
    expect(first?.revenue.toString()).toBe('1234.56');
  });

  it('serves an entry until just before its expiry instant', async () => {
    const clock = makeClock();
    const cache = createMemoryCache<string>({ defaultTtlMs: 1000, now: clock.now });
    await cache.set('key', 'value');

    clock.advance(999);
    expect(await getValue(cache, 'key')).toBe('value');

    clock.advance(1);
    expect(await getValue(cache, 'key')).toBeUndefined();
  });

  it('uses the per-call TTL over the default', async () => {
    const clock = makeClock();
    const cache = createMemoryCache<string>({ defaultTtlMs: 10_000, now: clock.now });
    await cache.set('short', 'value', { ttlMs: 100 });

    clock.advance(100);
    expect(await getValue(cache, 'short')).toBeUndefined();
  });

  it('never stores a value with a zero TTL', async () => {
    const cache = createMemoryCache<string>();
    await cache.set('key', 'value', { ttlMs: 0 });

    expect(await getValue(cache, 'key')).toBeUndefined();
    expect((await cache.stats()).size).toBe(0);
  });

  it('evicts the least recently used entry at capacity', async () => {
    const cache = createMemoryCache<number>({ maxEntries: 2 });
    await cache.set('a', 1);
    await cache.set('b', 2);
    await cache.get('a');
    await cache.set('c', 3);

    expect(await getValue(cache, 'a')).toBe(1);
    expect(await getValue(cache, 'b')).toBeUndefined();
    expect(await getValue(cache, 'c')).toBe(3);
  });

  it('clear returns the number of evicted entries', async () => {
    const cache = createMemoryCache<number>();
    await cache.set('a', 1);
    await cache.set('b', 2);

    expect((await cache.clear())._unsafeUnwrap()).toBe(2);
    expect((await cache.stats()).size).toBe(0);
  });

  it('counts hits and misses, including expired reads as misses', async () => {
    const clock = makeClock();
    const cache = createMemoryCache<string>({ defaultTtlMs: 50, now: clock.now });
    await cache.set('key', 'value');

    await cache.get('key');
    await cache.get('other');
    clock.advance(50);
    await cache.get('key');

    expect(await cache.stats()).toEqual({ hits: 1, misses: 2, size: 0 });
  });
});
