import { describe, it, expect } from 'vitest';
import { RequestCoalescer } from '../request-coalescer.js';
import { TtlCache } from '../ttl-cache.js';

describe('TtlCache', () => {
  it('expires entries after their TTL', () => {
    let now = 0;
    const cache = new TtlCache<string>(100, () => now);
    cache.set('a', 'x');
    cache.set('b', 'y', 500);

    now = 100;
    expect(cache.get('a')).toBe('x');
    now = 101;
    expect(cache.get('a')).toBeNull();
    expect(cache.get('b')).toBe('y');
  });

  it('prunes expired entries and keeps hit statistics', () => {
    let now = 0;
    const cache = new TtlCache<number>(10, () => now);
    cache.set('a', 1);
    cache.set('b', 2, 50);
    cache.get('a');
    cache.get('missing');

    now = 20;
    expect(cache.prune()).toBe(1);
    expect(cache.size()).toBe(1);
    expect(cache.stats()).toEqual({ size: 1, hits: 1, misses: 1, hitRate: 50 });
  });
});

describe('RequestCoalescer', () => {
  it('shares one promise per key while it is pending', async () => {
    const coalescer = new RequestCoalescer<number>();
    let calls = 0;
    const work = async () => {
      calls++;
      return 42;
    };

    const [a, b] = await Promise.all([coalescer.run('k', work), coalescer.run('k', work)]);

    expect(a).toBe(42);
    expect(b).toBe(42);
    expect(calls).toBe(1);
    expect(coalescer.isInFlight('k')).toBe(false);
  });

  it('releases the key when the work fails', async () => {
    const coalescer = new RequestCoalescer<number>();

    await expect(coalescer.run('k', async () => { throw new Error('boom'); })).rejects.toThrow('boom');
    expect(coalescer.size()).toBe(0);
  });
});
