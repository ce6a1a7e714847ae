/**
 * Fixed-capacity LRU cache with optional per-entry expiry.
 */

type CacheEntry<V> = {
  value: V;
  /** 0 means the entry never expires. */
  expiresAt: number;
  hitCount: number;
};

export type LRUCacheOptions<K, V> = {
  /** Maximum number of entries (default: 100). */
  capacity?: number;
  /** Entry lifetime in milliseconds; 0 disables expiry (default: 0). */
  ttlMs?: number;
  /** Called with each entry dropped to make room or on expiry. */
  onEvict?: (key: K, value: V) => void;
};

export class LRUCache<K, V> {
  private entries = new Map<K, CacheEntry<V>>();
  readonly capacity: number;
  private ttlMs: number;
  private onEvict?: (key: K, value: V) => void;

  constructor(options: LRUCacheOptions<K, V> = {}) {
    const capacity = options.capacity ?? 100;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`LRU capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.ttlMs = options.ttlMs ?? 0;
    this.onEvict = options.onEvict;
  }

  /**
   * Get a value and mark it most recently used. Undefined if absent or expired.
   */
  get(key: K): V | undefined {
    const entry = this.live(key);
    if (!entry) return undefined;

    entry.hitCount++;
    // Map preserves insertion order; re-inserting moves the key to the end.
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  /** Read without touching recency. */
  peek(key: K): V | undefined {
    return this.live(key)?.value;
  }

  set(key: K, value: V): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.capacity) {
      this.evictLRU();
    }

    this.entries.set(key, {
      value,
      expiresAt: this.ttlMs > 0 ? Date.now() + this.ttlMs : 0,
      hitCount: 0,
    });
  }

  has(key: K): boolean {
    return this.live(key) !== undefined;
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  /** Keys from least to most recently used. */
  keys(): K[] {
    return [...this.entries.keys()];
  }

  /** Remove all expired entries. */
  prune(): number {
    const now = Date.now();
    let pruned = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt !== 0 && now > entry.expiresAt) {
        this.evict(key, entry);
        pruned++;
      }
    }
    return pruned;
  }

  getStats(): { size: number; capacity: number; hitCount: number } {
    let hitCount = 0;
    for (const entry of this.entries.values()) {
      hitCount += entry.hitCount;
    }
    return { size: this.entries.size, capacity: this.capacity, hitCount };
  }

  private live(key: K): CacheEntry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt !== 0 && Date.now() > entry.expiresAt) {
      this.evict(key, entry);
      return undefined;
    }
    return entry;
  }

  private evictLRU(): void {
    const first = this.entries.entries().next();
    if (first.done) return;
    const [key, entry] = first.value;
    this.evict(key, entry);
  }

  private evict(key: K, entry: CacheEntry<V>): void {
    this.entries.delete(key);
    this.onEvict?.(key, entry.value);
  }
}
