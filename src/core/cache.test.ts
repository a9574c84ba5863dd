import { describe, expect, it, vi } from 'vitest';
import { MemoryCache } from './cache.js';

describe('MemoryCache', () => {
  it('expires entries after their ttl', () => {
    let now = 1_000;
    const cache = new MemoryCache<string>(10, () => now);
    cache.set('key', 'value');

    now += 10_000;
    expect(cache.get('key')).toBe('value');
    now += 1;
    expect(cache.get('key')).toBeUndefined();
  });

  it('drops expired entries for keys that are never read again', async () => {
    let now = 0;
    const cache = new MemoryCache<number>(1, () => now);

    for (let index = 0; index < 1000; index += 1) {
      await cache.withTtl(`list-${index}`, undefined, async () => index);
      now += 2_000;
    }

    expect(cache.size).toBe(1);
    expect(cache.get('list-999')).toBeUndefined();
  });

  it('keeps entries that are still fresh when sweeping', () => {
    let now = 0;
    const cache = new MemoryCache<string>(10, () => now);
    cache.set('old', 'a');
    now += 5_000;
    cache.set('newer', 'b');
    now += 6_000;
    cache.set('newest', 'c');

    expect(cache.size).toBe(2);
    expect(cache.get('old')).toBeUndefined();
    expect(cache.get('newer')).toBe('b');
  });

  it('shares one fetch between concurrent callers', async () => {
    const cache = new MemoryCache<number>(60);
    const fetcher = vi.fn(async () => 42);

    const [first, second] = await Promise.all([
      cache.withTtl('key', undefined, fetcher),
      cache.withTtl('key', undefined, fetcher)
    ]);

    expect(first).toBe(42);
    expect(second).toBe(42);
    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(cache.get('key')).toBe(42);
  });

  it('does not cache failures', async () => {
    const cache = new MemoryCache<number>(60);
    const fetcher = vi.fn().mockRejectedValueOnce(new Error('boom')).mockResolvedValueOnce(7);

    await expect(cache.withTtl('key', undefined, fetcher)).rejects.toThrow('boom');
    await expect(cache.withTtl('key', undefined, fetcher)).resolves.toBe(7);
    expect(fetcher).toHaveBeenCalledTimes(2);
  });
});
