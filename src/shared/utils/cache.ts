/**
 * Bounded in-memory memo table keyed by string value
 *
 * Insertion-ordered (FIFO). Once capacity is reached, the oldest share of
 * entries is evicted in a single pass rather than one at a time.
 */

export interface FifoCacheOptions {
  capacity: number;
  /**
   * Fraction of capacity evicted per pass (default: 0.2)
   */
  evictionRatio?: number;
}

export interface FifoCacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
}

export class FifoCache<T> {
  private entries = new Map<string, T>();
  private readonly capacity: number;
  private readonly evictBatch: number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: FifoCacheOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${options.capacity}`);
    }
    const ratio = options.evictionRatio ?? 0.2;
    this.capacity = options.capacity;
    this.evictBatch = Math.max(1, Math.ceil(options.capacity * ratio));
  }

  /**
   * Get value from cache
   */
  get(key: string): T | undefined {
    const value = this.entries.get(key);
    if (value === undefined) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    return value;
  }

  /**
   * Set value in cache. Existing keys keep their original insertion slot.
   */
  set(key: string, value: T): void {
    if (this.entries.has(key)) {
      this.entries.set(key, value);
      return;
    }

    if (this.entries.size >= this.capacity) {
      this.evictOldest();
    }

    this.entries.set(key, value);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  /**
   * Return the cached value or compute, store and return it
   */
  getOrCompute(key: string, compute: (key: string) => T): T {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }
    const value = compute(key);
    this.set(key, value);
    return value;
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  getStats(): FifoCacheStats {
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }

  private evictOldest(): void {
    let remaining = this.evictBatch;
    for (const key of this.entries.keys()) {
      if (remaining-- <= 0) {
        break;
      }
      this.entries.delete(key);
      this.evictions++;
    }
  }
}
