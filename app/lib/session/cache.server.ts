/**
 * In-memory response cache with per-read TTL checks.
 * Expired entries are purged lazily, on the read that finds them expired;
 * past `maxEntries` the least recently used entry is evicted.
 */

import { LRUCache } from "lru-cache";
import { systemClock, type Clock } from "~/lib/clock";

export const DEFAULT_MAX_ENTRIES = 1000;

export interface CacheEntry<T> {
  key: string;
  value: T;
  /** Milliseconds since the epoch, from the cache's clock */
  createdAt: number;
}

export class ResponseCache {
  private readonly entries: LRUCache<string, CacheEntry<unknown>>;
  private readonly clock: Clock;

  constructor(clock: Clock = systemClock, maxEntries = DEFAULT_MAX_ENTRIES) {
    this.clock = clock;
    this.entries = new LRUCache<string, CacheEntry<unknown>>({ max: maxEntries });
  }

  /**
   * Return the cached value while `now - createdAt < ttlSeconds`.
   * An expired entry is deleted and reported as absent.
   */
  get<T>(key: string, ttlSeconds: number): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.clock.now() - entry.createdAt >= ttlSeconds * 1000) {
      this.entries.delete(key);
      return undefined;
    }

    // Callers read a key with the type they stored under it.
    return entry.value as T;
  }

  /**
   * Store a value, replacing any entry under the same key.
   */
  set<T>(key: string, value: T): void {
    this.entries.set(key, { key, value, createdAt: this.clock.now() });
  }

  has(key: string, ttlSeconds: number): boolean {
    return this.get(key, ttlSeconds) !== undefined;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Number of stored entries, expired ones included until they are read.
   */
  get size(): number {
    return this.entries.size;
  }
}
