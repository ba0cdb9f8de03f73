/**
 * Fixed-capacity LRU cache
 *
 * Relies on Map preserving insertion order: a hit re-inserts the key at the
 * tail, eviction removes from the head. Hit/miss counters are plain fields.
 */

export interface CacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
}

export class LruCache<K, V extends {}> {
  hits = 0;
  misses = 0;
  private readonly entries = new Map<K, V>();

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`LRU capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Read an entry, counting a hit or a miss and refreshing recency
   */
  get(key: K): V | undefined {
    const value = this.entries.get(key);
    if (value === undefined) {
      this.misses += 1;
      return undefined;
    }
    this.entries.delete(key);
    this.entries.set(key, value);
    this.hits += 1;
    return value;
  }

  /** Membership test without touching recency or counters */
  has(key: K): boolean {
    return this.entries.has(key);
  }

  set(key: K, value: V): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    }
    this.entries.set(key, value);

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): CacheStats {
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
    };
  }
}
