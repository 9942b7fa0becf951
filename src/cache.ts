interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export interface ResultCacheOptions {
  maxEntries: number;
  ttlMs: number;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

/**
 * In-memory store bounded by size and age. Map insertion order doubles as
 * recency order: a hit re-inserts the key, so the first key is always the
 * least recently used one.
 */
export class ResultCache<K, V> {
  private readonly store = new Map<K, CacheEntry<V>>();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: ResultCacheOptions) {
    if (!Number.isInteger(options.maxEntries) || options.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${options.maxEntries}`);
    }
    if (!(options.ttlMs > 0)) {
      throw new RangeError(`ttlMs must be positive, got ${options.ttlMs}`);
    }
    this.maxEntries = options.maxEntries;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.store.size;
  }

  has(key: K): boolean {
    return this.lookup(key) !== undefined;
  }

  get(key: K): V | undefined {
    return this.lookup(key)?.value;
  }

  set(key: K, value: V): void {
    this.store.delete(key);
    while (this.store.size >= this.maxEntries) {
      const oldest = this.store.keys().next();
      if (oldest.done) {
        break;
      }
      this.store.delete(oldest.value);
    }
    this.store.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  delete(key: K): boolean {
    return this.store.delete(key);
  }

  clear(): void {
    this.store.clear();
  }

  /** Returns the cached value, or computes and stores it. Rejections are not stored. */
  async getOrCompute(key: K, compute: () => Promise<V>): Promise<V> {
    const cached = this.lookup(key);
    if (cached) {
      return cached.value;
    }
    const value = await compute();
    this.set(key, value);
    return value;
  }

  private lookup(key: K): CacheEntry<V> | undefined {
    const entry = this.store.get(key);
    if (!entry) {
      return undefined;
    }
    if (this.now() >= entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    this.store.delete(key);
    this.store.set(key, entry);
    return entry;
  }
}
