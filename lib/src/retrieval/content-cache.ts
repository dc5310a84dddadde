/**
 * Content Cache for Chunk Retrieval
 *
 * LRU cache of chunk contents keyed by chunk file path, bounded by entry
 * count and aggregate UTF-8 bytes. At most one load per key is in flight;
 * concurrent misses share it. `clear()` bumps a generation counter so loads
 * that started before the clear never insert afterwards.
 *
 * @example
 * ```typescript
 * const cache = new ContentCache({ maxEntries: 64, maxBytes: 32 * 1024 * 1024 });
 * const content = await cache.getOrLoad(entry.file_path, () => store.readContent(entry.file_path));
 * ```
 */

import {
  ContentCacheConfigSchema,
  type CacheEntry,
  type ContentCacheConfig,
  type ContentCacheStats,
} from './types.js';

interface InFlightLoad {
  generation: number;
  promise: Promise<string>;
}

type CacheEventType = 'hit' | 'miss' | 'set' | 'evict' | 'skip' | 'clear';

// =============================================================================
// Content Cache Class
// =============================================================================

export class ContentCache {
  private readonly config: ContentCacheConfig;
  private readonly cache: Map<string, CacheEntry> = new Map();
  private readonly inFlight: Map<string, InFlightLoad> = new Map();
  private totalBytes = 0;
  private generation = 0;
  private stats = {
    hits: 0,
    misses: 0,
    loads: 0,
    evictions: 0,
  };

  constructor(config?: Partial<ContentCacheConfig>) {
    this.config = ContentCacheConfigSchema.parse(config ?? {});
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Cached content, refreshed as most recently used, or undefined
   */
  get(key: string): string | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      this.stats.misses++;
      this.notifyUpdate('miss', key);
      return undefined;
    }

    entry.accessCount++;
    entry.lastAccessAt = Date.now();

    // Move to end (most recently used) by re-inserting
    this.cache.delete(key);
    this.cache.set(key, entry);

    this.stats.hits++;
    this.notifyUpdate('hit', key);
    return entry.content;
  }

  /**
   * Cached content, or the result of one shared load. Failed loads are not
   * cached and reject every waiter.
   */
  getOrLoad(key: string, loader: () => Promise<string>): Promise<string> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return Promise.resolve(cached);
    }

    const pending = this.inFlight.get(key);
    if (pending && pending.generation === this.generation) {
      return pending.promise;
    }

    const generation = this.generation;
    const load = async (): Promise<string> => {
      try {
        const content = await loader();
        if (this.generation === generation) {
          this.set(key, content);
        } else {
          this.notifyUpdate('skip', key);
        }
        return content;
      } finally {
        if (this.inFlight.get(key)?.generation === generation) {
          this.inFlight.delete(key);
        }
      }
    };

    this.stats.loads++;
    const promise = load();
    this.inFlight.set(key, { generation, promise });
    return promise;
  }

  /**
   * Insert content, evicting least recently used entries to make room.
   * Content larger than maxBytes is not cached.
   */
  set(key: string, content: string): void {
    const bytes = Buffer.byteLength(content, 'utf8');
    this.delete(key);

    if (bytes > this.config.maxBytes) {
      this.notifyUpdate('skip', key, bytes);
      return;
    }

    while (
      this.cache.size > 0 &&
      (this.cache.size >= this.config.maxEntries || this.totalBytes + bytes > this.config.maxBytes)
    ) {
      const oldestKey = this.cache.keys().next().value;
      if (oldestKey === undefined) {
        break;
      }
      this.delete(oldestKey);
      this.stats.evictions++;
      this.notifyUpdate('evict', oldestKey);
    }

    this.cache.set(key, { content, bytes, lastAccessAt: Date.now(), accessCount: 0 });
    this.totalBytes += bytes;
    this.notifyUpdate('set', key, bytes);
  }

  has(key: string): boolean {
    return this.cache.has(key);
  }

  delete(key: string): boolean {
    const entry = this.cache.get(key);
    if (!entry) {
      return false;
    }
    this.cache.delete(key);
    this.totalBytes -= entry.bytes;
    return true;
  }

  /**
   * Drop every entry and abandon in-flight loads
   */
  clear(): void {
    this.cache.clear();
    this.inFlight.clear();
    this.totalBytes = 0;
    this.generation++;
    this.stats = { hits: 0, misses: 0, loads: 0, evictions: 0 };
    this.notifyUpdate('clear');
  }

  get size(): number {
    return this.cache.size;
  }

  /**
   * Keys from least to most recently used
   */
  keys(): string[] {
    return [...this.cache.keys()];
  }

  getStats(): ContentCacheStats {
    const totalRequests = this.stats.hits + this.stats.misses;

    return {
      size: this.cache.size,
      bytes: this.totalBytes,
      maxEntries: this.config.maxEntries,
      maxBytes: this.config.maxBytes,
      hits: this.stats.hits,
      misses: this.stats.misses,
      loads: this.stats.loads,
      hitRate: totalRequests > 0 ? this.stats.hits / totalRequests : 0,
      evictions: this.stats.evictions,
      generation: this.generation,
    };
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private notifyUpdate(type: CacheEventType, key?: string, bytes?: number): void {
    if (this.config.onUpdate) {
      this.config.onUpdate({ type, key, bytes });
    }
  }
}
