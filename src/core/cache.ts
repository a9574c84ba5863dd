type CacheEntry<T> = {
  value: T;
  expiresAt: number;
};

export class MemoryCache<T> {
  private readonly store = new Map<string, CacheEntry<T>>();
  private readonly pending = new Map<string, Promise<T>>();

  constructor(
    private readonly defaultTtlSeconds = 300,
    private readonly now: () => number = Date.now
  ) {}

  get(key: string): T | undefined {
    const entry = this.store.get(key);
    if (!entry) {
      return undefined;
    }
    if (this.now() > entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return entry.value;
  }

  get size(): number {
    return this.store.size;
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.store) {
      if (now > entry.expiresAt) {
        this.store.delete(key);
      }
    }
  }

  /** Drops every expired entry before storing, so keys that are never read again do not pile up. */
  set(key: string, value: T, ttlSeconds?: number): void {
    const ttl = ttlSeconds ?? this.defaultTtlSeconds;
    const now = this.now();
    this.sweep(now);
    this.store.set(key, {
      value,
      expiresAt: now + ttl * 1000
    });
  }

  /** Concurrent callers for the same key share one fetch. Failed fetches are not cached. */
  async withTtl(key: string, ttlSeconds: number | undefined, fetcher: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }
    const inFlight = this.pending.get(key);
    if (inFlight) {
      return inFlight;
    }
    const request = fetcher()
      .then((value) => {
        this.set(key, value, ttlSeconds);
        return value;
      })
      .finally(() => {
        this.pending.delete(key);
      });
    this.pending.set(key, request);
    return request;
  }
}
