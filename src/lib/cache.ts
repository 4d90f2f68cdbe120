import CryptoJS from 'crypto-js';
import type { CacheType, LookupResult, RefinementContext } from '@/lib/types';
import type { PersistentCacheStore } from '@/lib/data/persistentCacheStore';
import { logDebug, logWarn } from '@/lib/logger';

// Memory tier bounds
export const MEMORY_CACHE_MAX_ENTRIES = 20;
export const MEMORY_CACHE_MAX_BYTES = 5 * 1024 * 1024;

// Age after which `allowStale: false` reads treat an entry as a miss (7 days)
export const DEFAULT_STALE_AFTER_MS = 7 * 24 * 60 * 60 * 1000;

/**
 * Cache entry structure shared by both tiers
 */
export interface CacheEntry {
  key: string;
  cacheType: CacheType;
  result: LookupResult;
  insertedAt: number; // epoch ms
}

export interface CacheReadOptions {
  allowStale?: boolean;
}

export interface LookupCacheOptions {
  maxEntries?: number;
  maxBytes?: number;
  staleAfterMs?: number;
  now?: () => number;
}

function normalizeQueryPart(value: string | undefined): string {
  return (value ?? '').toLowerCase().trim();
}

/**
 * Pick the cache namespace for a request: refined searches and
 * multi-result searches never share entries with plain lookups.
 */
export function resolveCacheType(
  refinementContext: RefinementContext | undefined,
  maxResults: number
): CacheType {
  if (refinementContext) return 'refinement';
  return maxResults > 1 ? 'alternatives' : 'standard';
}

/**
 * Generate a consistent cache key from the query.
 * Casing and surrounding whitespace never change the key.
 */
export function makeCacheKey(
  productName: string,
  brand: string | undefined,
  refinementContext: RefinementContext | undefined,
  cacheType: CacheType
): string {
  const name = normalizeQueryPart(productName);
  const normalizedBrand = normalizeQueryPart(brand);
  const baseKey = normalizedBrand.length === 0 ? name : `${name}__${normalizedBrand}`;

  if (refinementContext) {
    const contextString = [
      refinementContext.store ?? '',
      refinementContext.packageSize ?? '',
      refinementContext.additionalDetails ?? '',
    ].join('|');
    return `${baseKey}__ref_${CryptoJS.MD5(contextString).toString()}`;
  }

  return `${baseKey}__${cacheType}`;
}

/**
 * Approximate in-memory size of a result (UTF-16 code units).
 */
export function estimateResultBytes(result: LookupResult): number {
  return JSON.stringify(result).length * 2;
}

/**
 * Human-readable cache age, e.g. "2 days ago".
 */
export function formatCacheAge(cachedAt: string | Date, now: Date = new Date()): string {
  const cachedTime = cachedAt instanceof Date ? cachedAt.getTime() : Date.parse(cachedAt);
  if (Number.isNaN(cachedTime)) {
    return 'just now';
  }
  const intervalSeconds = Math.max(0, (now.getTime() - cachedTime) / 1000);
  const hours = Math.floor(intervalSeconds / 3600);
  const days = Math.floor(intervalSeconds / 86400);

  if (days > 0) {
    return `${days} day${days === 1 ? '' : 's'} ago`;
  }
  if (hours > 0) {
    return `${hours} hour${hours === 1 ? '' : 's'} ago`;
  }
  return 'just now';
}

interface MemoryEntry {
  entry: CacheEntry;
  bytes: number;
}

/**
 * Two-tier lookup cache: a bounded LRU map in memory in front of a
 * persistent store. Entries never expire on their own; `cachedAt` is shown
 * to the user, who can force a refresh.
 *
 * Memory-tier operations are synchronous, so each get/put is atomic on the
 * event loop. Persistent-tier failures are logged and treated as misses.
 */
export class LookupCache {
  private readonly memory = new Map<string, MemoryEntry>();
  private memoryBytes = 0;
  private readonly maxEntries: number;
  private readonly maxBytes: number;
  private readonly staleAfterMs: number;
  private readonly now: () => number;

  constructor(
    private readonly persistent: PersistentCacheStore,
    options: LookupCacheOptions = {}
  ) {
    this.maxEntries = options.maxEntries ?? MEMORY_CACHE_MAX_ENTRIES;
    this.maxBytes = options.maxBytes ?? MEMORY_CACHE_MAX_BYTES;
    this.staleAfterMs = options.staleAfterMs ?? DEFAULT_STALE_AFTER_MS;
    this.now = options.now ?? Date.now;
  }

  get memorySize(): number {
    return this.memory.size;
  }

  private isFresh(entry: CacheEntry): boolean {
    return this.now() - entry.insertedAt <= this.staleAfterMs;
  }

  private removeFromMemory(key: string): void {
    const existing = this.memory.get(key);
    if (!existing) return;
    this.memory.delete(key);
    this.memoryBytes -= existing.bytes;
  }

  private storeInMemory(entry: CacheEntry): void {
    const bytes = estimateResultBytes(entry.result);
    if (bytes > this.maxBytes) {
      logWarn('Lookup result too large for memory cache', { key: entry.key, bytes });
      return;
    }

    this.removeFromMemory(entry.key);

    // Map iteration order is insertion order: the first key is least recently used
    while (
      this.memory.size > 0 &&
      (this.memory.size >= this.maxEntries || this.memoryBytes + bytes > this.maxBytes)
    ) {
      const oldestKey = this.memory.keys().next().value;
      if (oldestKey === undefined) break;
      this.removeFromMemory(oldestKey);
      logDebug('Evicted lookup from memory cache', { key: oldestKey });
    }

    this.memory.set(entry.key, { entry, bytes });
    this.memoryBytes += bytes;
  }

  private readMemory(key: string): CacheEntry | null {
    const hit = this.memory.get(key);
    if (!hit) return null;
    // Refresh recency
    this.memory.delete(key);
    this.memory.set(key, hit);
    return hit.entry;
  }

  private async readPersistent(key: string, cacheType: CacheType): Promise<CacheEntry | null> {
    try {
      return await this.persistent.get(key, cacheType);
    } catch (error) {
      logWarn('Persistent cache lookup failed, treating as miss', { key }, error);
      return null;
    }
  }

  async get(
    key: string,
    cacheType: CacheType,
    options: CacheReadOptions = {}
  ): Promise<LookupResult | null> {
    const allowStale = options.allowStale ?? true;

    const memoryHit = this.readMemory(key);
    if (memoryHit && (allowStale || this.isFresh(memoryHit))) {
      logDebug('Memory cache hit', { key });
      return structuredClone(memoryHit.result);
    }

    const persistentHit = await this.readPersistent(key, cacheType);
    if (!persistentHit || (!allowStale && !this.isFresh(persistentHit))) {
      return null;
    }

    const result: LookupResult = {
      ...persistentHit.result,
      cachedAt: persistentHit.result.cachedAt ?? new Date(persistentHit.insertedAt).toISOString(),
    };
    const promoted: CacheEntry = { ...persistentHit, key, result };
    this.storeInMemory(promoted);
    logDebug('Persistent cache hit, promoted to memory', { key });
    return structuredClone(result);
  }

  /**
   * Store a copy of a found result in both tiers. The result must already carry its
   * `cachedAt` stamp. A failed persistent write only loses the second tier.
   */
  async put(key: string, cacheType: CacheType, result: LookupResult): Promise<void> {
    if (!result.found) {
      return;
    }

    // Callers keep their own copy; hits hand out copies too
    const entry: CacheEntry = { key, cacheType, result: structuredClone(result), insertedAt: this.now() };
    this.storeInMemory(entry);

    try {
      await this.persistent.put(entry);
    } catch (error) {
      logWarn('Persistent cache write failed', { key }, error);
    }
  }

  clearMemory(): void {
    this.memory.clear();
    this.memoryBytes = 0;
  }
}
