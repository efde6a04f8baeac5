type CacheEntry<V> = {
  value: V;
  expiresAt: number;
};

/**
 * Map with per-entry expiry. When `maxEntries` is reached the oldest insert is
 * evicted first.
 */
export class TTLCache<V> {
  private store = new Map<string, CacheEntry<V>>();
  private readonly defaultTtlMs: number;
  private readonly maxEntries: number;

  constructor(defaultTtlMs = 0, maxEntries = 500) {
    this.defaultTtlMs = Math.max(0, defaultTtlMs);
    this.maxEntries = Math.max(1, maxEntries);
  }

  get size(): number {
    return this.store.size;
  }

  get(key: string): V | undefined {
    const entry = this.store.get(key);
    if (!entry) {
      return undefined;
    }

    if (entry.expiresAt !== 0 && Date.now() > entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: string, value: V, ttlMs?: number): void {
    const ttl = typeof ttlMs === "number" ? ttlMs : this.defaultTtlMs;
    const expiresAt = ttl > 0 ? Date.now() + ttl : 0;
    this.store.delete(key);
    if (this.store.size >= this.maxEntries) {
      const oldest = this.store.keys().next();
      if (!oldest.done) {
        this.store.delete(oldest.value);
      }
    }
    this.store.set(key, { value, expiresAt });
  }

  delete(key: string): void {
    this.store.delete(key);
  }

  clear(): void {
    this.store.clear();
  }
}
