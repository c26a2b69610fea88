// TTL-based cache for automatic expiration
// Holds idle conversation sessions until they expire

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export class TTLCache<K, V> {
  private cache = new Map<K, CacheEntry<V>>();
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;

  constructor(
    private defaultTTL: number = 60 * 60 * 1000, // 1 hour default
    private cleanupMs: number = 60 * 1000, // Sweep every minute
    private onExpire?: (key: K, value: V) => void
  ) {
    this.startCleanup();
  }

  private startCleanup(): void {
    this.cleanupInterval = setInterval(() => {
      this.cleanup();
    }, this.cleanupMs);
    // The sweep alone must not keep the process alive
    this.cleanupInterval.unref();
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [key, entry] of this.cache.entries()) {
      if (entry.expiresAt <= now) {
        this.cache.delete(key);
        this.onExpire?.(key, entry.value);
      }
    }
  }

  set(key: K, value: V, ttl?: number): void {
    const expiresAt = Date.now() + (ttl ?? this.defaultTTL);
    this.cache.set(key, { value, expiresAt });
  }

  get(key: K): V | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt <= Date.now()) {
      this.cache.delete(key);
      this.onExpire?.(key, entry.value);
      return undefined;
    }

    return entry.value;
  }

  /** Push the expiry of a live entry forward; returns false when the entry is gone */
  touch(key: K, ttl?: number): boolean {
    const value = this.get(key);
    if (value === undefined) return false;
    this.set(key, value, ttl);
    return true;
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  get size(): number {
    return this.cache.size;
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.cache.clear();
  }
}
