/**
 * Cache Infrastructure Types
 *
 * Read-model cache with Redis + in-memory fallback.
 * Used by: catalog query services
 */

export interface CacheConfig {
  /** Default TTL in seconds */
  defaultTtlSeconds: number;
  /** Maximum entries in memory cache */
  maxEntries: number;
  /** Redis key prefix */
  keyPrefix: string;
}

export interface CacheStore {
  get<T = unknown>(key: string): Promise<T | null>;
  set<T = unknown>(key: string, value: T, ttlSeconds?: number): Promise<void>;
  del(...keys: string[]): Promise<void>;
  /** Get cache statistics */
  stats(): { hits: number; misses: number; size: number };
}
