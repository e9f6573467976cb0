interface CacheEntry<T> {
  value: T;
  fetchedAt: number;
}

export interface TtlCacheOptions {
  ttlSeconds: number;
  /** Millisecond clock, `Date.now` unless a test supplies its own. */
  now?: () => number;
}

/**
 * In-memory cache whose entries expire a fixed time after they were stored.
 *
 * An entry is served while `now - fetchedAt <= ttl`; a stale entry is dropped
 * on read. Unbounded, with no background sweep. `prune()` drops every stale entry.
 */
export class TtlCache<T> {
  private store = new Map<string, CacheEntry<T>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: TtlCacheOptions) {
    if (!Number.isFinite(options.ttlSeconds) || options.ttlSeconds < 0) {
      throw new RangeError(`ttlSeconds must be a non-negative number, got ${options.ttlSeconds}`);
    }
    this.ttlMs = options.ttlSeconds * 1000;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.store.size;
  }

  get(key: string): T | undefined {
    const entry = this.store.get(key);
    if (!entry) return undefined;
    if (this.isStale(entry)) {
      this.store.delete(key);
      return undefined;
    }
    return entry.value;
  }

  put(key: string, value: T): void {
    this.store.set(key, { value, fetchedAt: this.now() });
  }

  delete(key: string): boolean {
    return this.store.delete(key);
  }

  prune(): number {
    let removed = 0;
    for (const [key, entry] of this.store) {
      if (this.isStale(entry)) {
        this.store.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.store.clear();
  }

  private isStale(entry: CacheEntry<T>): boolean {
    return this.now() - entry.fetchedAt > this.ttlMs;
  }
}
