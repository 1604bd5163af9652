/**
 * TTL CACHE
 * =========
 *
 * In-memory time-boxed cache in front of every outbound provider call.
 *
 * Used for:
 * - Quote series (10 min)
 * - FRED series (1 h)
 * - Instrument display names (1 day)
 * - Idle sessions (refreshed on every touch)
 */

type CacheEntry<T> = {
  value: T;
  expiresAt: number;
};

export type Clock = () => number;

export class TtlCache<T> {
  private map = new Map<string, CacheEntry<T>>();
  private hits = 0;
  private misses = 0;

  constructor(
    private defaultTtlMs: number,
    private now: Clock = Date.now
  ) {}

  /**
   * Get value if not expired
   */
  get(key: string): T | null {
    const e = this.map.get(key);
    if (!e) {
      this.misses++;
      return null;
    }
    if (this.now() > e.expiresAt) {
      this.map.delete(key);
      this.misses++;
      return null;
    }
    this.hits++;
    return e.value;
  }

  set(key: string, value: T, ttlMs?: number): void {
    this.map.set(key, {
      value,
      expiresAt: this.now() + (ttlMs ?? this.defaultTtlMs),
    });
  }

  del(key: string): boolean {
    return this.map.delete(key);
  }

  clear(): void {
    this.map.clear();
  }

  size(): number {
    return this.map.size;
  }

  stats() {
    return {
      size: this.map.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: this.hits + this.misses > 0
        ? Math.round((this.hits / (this.hits + this.misses)) * 100)
        : 0,
    };
  }

  /**
   * Drop expired entries, returns how many were removed
   */
  prune(): number {
    const now = this.now();
    let pruned = 0;
    for (const [k, e] of this.map.entries()) {
      if (now > e.expiresAt) {
        this.map.delete(k);
        pruned++;
      }
    }
    return pruned;
  }
}
