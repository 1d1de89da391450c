/**
 * LRU CACHE
 * =========
 *
 * Bounded memo with least-recently-used eviction. Entries never expire:
 * a cache lives inside one scoring snapshot and is dropped with it.
 */

export class LruCache<T> {
  private map = new Map<string, T>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(private readonly maxSize: number) {
    if (!Number.isInteger(maxSize) || maxSize <= 0) {
      throw new RangeError(`LruCache maxSize must be a positive integer, got ${maxSize}`);
    }
  }

  /**
   * Get value and mark it most recently used
   */
  get(key: string): T | undefined {
    const value = this.map.get(key);
    if (value === undefined) {
      this.misses++;
      return undefined;
    }

    // Map keeps insertion order: re-insert to move to the tail
    this.map.delete(key);
    this.map.set(key, value);
    this.hits++;
    return value;
  }

  set(key: string, value: T): void {
    if (this.map.has(key)) {
      this.map.delete(key);
    } else if (this.map.size >= this.maxSize) {
      this.evictLru();
    }
    this.map.set(key, value);
  }

  /**
   * Return cached value or compute and store it
   */
  getOrCompute(key: string, compute: () => T): T {
    const cached = this.get(key);
    if (cached !== undefined) return cached;

    const value = compute();
    this.set(key, value);
    return value;
  }

  size(): number {
    return this.map.size;
  }

  stats() {
    return {
      size: this.map.size,
      maxSize: this.maxSize,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: this.hits + this.misses > 0
        ? Math.round((this.hits / (this.hits + this.misses)) * 100)
        : 0,
    };
  }

  private evictLru(): void {
    const oldest = this.map.keys().next();
    if (!oldest.done) {
      this.map.delete(oldest.value);
      this.evictions++;
    }
  }
}
