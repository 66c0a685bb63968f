interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export interface LruTtlCacheOptions {
  ttlMs: number;
  capacity: number;
  now?: () => number;
}

/**
 * Size-bounded map with per-entry expiry. Map insertion order doubles as
 * recency order: a hit re-inserts the key at the tail, eviction takes the head.
 */
export class LruTtlCache<K, V> {
  private readonly entries = new Map<K, CacheEntry<V>>();
  private readonly ttlMs: number;
  private readonly capacity: number;
  private readonly now: () => number;

  constructor(options: LruTtlCacheOptions) {
    if (options.capacity < 1) throw new Error('Cache capacity must be at least 1');
    if (options.ttlMs <= 0) throw new Error('Cache TTL must be positive');
    this.ttlMs = options.ttlMs;
    this.capacity = options.capacity;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  /** Replaces any existing entry with a fresh TTL */
  set(key: K, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  /** Live keys, least recently used first */
  keys(): K[] {
    const now = this.now();
    return [...this.entries.entries()]
      .filter(([, entry]) => entry.expiresAt > now)
      .map(([key]) => key);
  }

  clear(): void {
    this.entries.clear();
  }
}
