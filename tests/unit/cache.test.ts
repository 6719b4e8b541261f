import { describe, it, expect, afterEach } from 'vitest';
import { TtlCache } from '../../src/utils/cache.js';

describe('TtlCache', () => {
  let clock = 0;
  const caches: TtlCache<string>[] = [];

  function createCache(options: { defaultTtlMs?: number; maxSize?: number } = {}): TtlCache<string> {
    const cache = new TtlCache<string>({ ...options, cleanupIntervalMs: 0, now: () => clock });
    caches.push(cache);
    return cache;
  }

  afterEach(() => {
    clock = 0;
    for (const cache of caches.splice(0)) cache.destroy();
  });

  it('returns stored values until they expire', () => {
    const cache = createCache({ defaultTtlMs: 100 });
    cache.set('a', 'one');

    clock = 100;
    expect(cache.get('a')).toBe('one');
    clock = 101;
    expect(cache.get('a')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('honours a per-entry ttl', () => {
    const cache = createCache({ defaultTtlMs: 100 });
    cache.set('a', 'one', 10);

    clock = 50;
    expect(cache.has('a')).toBe(false);
  });

  it('keeps entries forever with a zero ttl', () => {
    const cache = createCache({ defaultTtlMs: 0 });
    cache.set('a', 'one');

    clock = Number.MAX_SAFE_INTEGER;
    expect(cache.get('a')).toBe('one');
  });

  it('evicts the least recently written key at capacity', () => {
    const cache = createCache({ maxSize: 2 });
    cache.set('a', 'one');
    cache.set('b', 'two');
    cache.set('a', 'uno');
    cache.set('c', 'three');

    expect(cache.keys()).toEqual(['a', 'c']);
    expect(cache.get('a')).toBe('uno');
  });

  it('prefers dropping expired entries over live ones', () => {
    const cache = createCache({ defaultTtlMs: 100, maxSize: 2 });
    cache.set('a', 'one', 10);
    cache.set('b', 'two');

    clock = 20;
    cache.set('c', 'three');
    expect(cache.keys()).toEqual(['b', 'c']);
  });

  it('clears and deletes', () => {
    const cache = createCache();
    cache.set('a', 'one');
    cache.set('b', 'two');

    expect(cache.delete('a')).toBe(true);
    expect(cache.delete('a')).toBe(false);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
