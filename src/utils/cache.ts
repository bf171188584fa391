/**
 * Application Cache Utilities
 *
 * LRU caching for frequently read data, with TTL-based expiration.
 */

import { LRUCache } from 'lru-cache';
import { createLogger } from './logger';

const log = createLogger('CACHE');

export interface CacheOptions {
  /** Time-to-live in milliseconds (0 disables expiry) */
  ttlMs: number;
  /** Maximum number of items in cache */
  maxItems: number;
  /** Cache name for logging */
  name: string;
}

export interface CacheStats {
  name: string;
  size: number;
  hits: number;
  misses: number;
  hitRate: string;
}

/**
 * Generic typed LRU cache wrapper
 */
export class ApplicationCache<T extends object> {
  private cache: LRUCache<string, T>;
  private name: string;
  private hits = 0;
  private misses = 0;

  constructor(options: CacheOptions) {
    this.name = options.name;
    this.cache = new LRUCache<string, T>({
      max: options.maxItems,
      ...(options.ttlMs > 0 ? { ttl: options.ttlMs } : {}),
    });
  }

  get(key: string): T | undefined {
    const value = this.cache.get(key);
    if (value !== undefined) {
      this.hits++;
    } else {
      this.misses++;
    }
    return value;
  }

  set(key: string, value: T): void {
    this.cache.set(key, value);
  }

  invalidate(key: string): void {
    this.cache.delete(key);
  }

  /**
   * Delete all keys starting with a prefix
   */
  invalidatePrefix(prefix: string): void {
    for (const key of [...this.cache.keys()]) {
      if (key.startsWith(prefix)) {
        this.cache.delete(key);
      }
    }
  }

  clear(): void {
    this.cache.clear();
    log.debug(`Cleared ${this.name} cache`);
  }

  getStats(): CacheStats {
    const total = this.hits + this.misses;
    const hitRate = total > 0 ? ((this.hits / total) * 100).toFixed(1) + '%' : 'N/A';
    return {
      name: this.name,
      size: this.cache.size,
      hits: this.hits,
      misses: this.misses,
      hitRate,
    };
  }
}
