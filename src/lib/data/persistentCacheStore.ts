import type { CacheEntry } from '@/lib/cache';
import type { CacheType } from '@/lib/types';

/**
 * Slow, unbounded tier of the lookup cache (a document store).
 * Retention is the store's own concern.
 */
export interface PersistentCacheStore {
  get(key: string, cacheType: CacheType): Promise<CacheEntry | null>;
  put(entry: CacheEntry): Promise<void>;
}

/**
 * In-process stand-in for the document store, used offline and in tests.
 */
export class MemoryPersistentCacheStore implements PersistentCacheStore {
  private readonly entries = new Map<string, CacheEntry>();

  async get(key: string, cacheType: CacheType): Promise<CacheEntry | null> {
    const entry = this.entries.get(key);
    if (!entry || entry.cacheType !== cacheType) {
      return null;
    }
    return entry;
  }

  async put(entry: CacheEntry): Promise<void> {
    this.entries.set(entry.key, entry);
  }

  get size(): number {
    return this.entries.size;
  }
}
