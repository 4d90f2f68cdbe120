import { makeCacheKey, resolveCacheType, type LookupCache } from '@/lib/cache';
import type { RemoteLookupClient } from '@/lib/lookup/remoteClient';
import { ProgressNarrator, STATUS_INTERVAL_MS, type StatusListener } from '@/lib/lookup/progressNarrator';
import type { RateLimiter } from '@/lib/rateLimit';
import {
  fail,
  lookupErrors,
  ok,
  type ActionResult,
  type LookupError,
  type LookupRequest,
  type LookupResult,
} from '@/lib/types';
import { logDebug, logError, logInfo, logWarn } from '@/lib/logger';

const console = {
  log: logDebug,
  info: logInfo,
  warn: logWarn,
  error: logError,
} as const;

export const MAX_RESULTS_LIMIT = 3;

export interface LookupOrchestratorDeps {
  rateLimiter: RateLimiter;
  cache: LookupCache;
  remote: RemoteLookupClient;
  now?: () => Date;
  statusIntervalMs?: number;
}

export type LookupOutcome = ActionResult<LookupResult, LookupError>;

export function clampMaxResults(maxResults: number | undefined): number {
  if (maxResults === undefined || !Number.isFinite(maxResults)) return 1;
  return Math.min(MAX_RESULTS_LIMIT, Math.max(1, Math.floor(maxResults)));
}

/**
 * "Find this product": rate limit gate, then memory and persistent cache,
 * then the remote lookup with progress narration, then cache write-back.
 *
 * The rate limiter is consulted before the cache on every call.
 */
export class LookupOrchestrator {
  private readonly rateLimiter: RateLimiter;
  private readonly cache: LookupCache;
  private readonly remote: RemoteLookupClient;
  private readonly now: () => Date;
  private readonly statusIntervalMs: number;
  private readonly statusListeners = new Set<StatusListener>();

  constructor(deps: LookupOrchestratorDeps) {
    this.rateLimiter = deps.rateLimiter;
    this.cache = deps.cache;
    this.remote = deps.remote;
    this.now = deps.now ?? (() => new Date());
    this.statusIntervalMs = deps.statusIntervalMs ?? STATUS_INTERVAL_MS;
  }

  /**
   * Listen to the "Searching Tesco..." status strings shown while a remote
   * lookup is in flight. An empty string means the search finished.
   */
  onStatus(listener: StatusListener): () => void {
    this.statusListeners.add(listener);
    return () => {
      this.statusListeners.delete(listener);
    };
  }

  remainingLookupsToday(): Promise<number> {
    return this.rateLimiter.remainingToday(this.now());
  }

  async find(request: LookupRequest): Promise<LookupOutcome> {
    const productName = request.productName.trim();
    if (productName.length === 0) {
      return fail(lookupErrors.invalidRequest('Please enter a food name first.'));
    }

    const brand = request.brand?.trim() || undefined;
    const maxResults = clampMaxResults(request.maxResults);
    const skipCache = request.skipCache ?? false;
    const refinementContext = request.refinementContext;

    console.info('Lookup started', { productName, brand, maxResults, skipCache, refined: !!refinementContext });

    try {
      const gate = await this.rateLimiter.tryAcquire(this.now());
      if (!gate.success) {
        console.info('Lookup rejected by rate limiter', { code: gate.error.code });
        return fail(gate.error);
      }

      const cacheType = resolveCacheType(refinementContext, maxResults);
      const cacheKey = makeCacheKey(productName, brand, refinementContext, cacheType);

      if (skipCache) {
        console.info('Skipping cache for forced refresh', { cacheKey });
      } else {
        const cached = await this.cache.get(cacheKey, cacheType);
        if (cached) {
          console.info('Lookup cache hit', { cacheKey, cachedAt: cached.cachedAt });
          return ok(cached);
        }
      }

      const remote = await this.callRemote({
        productName,
        brand,
        barcode: request.barcode,
        maxResults,
        refinementContext,
      });

      if (!remote.success) {
        console.warn('Remote lookup failed', { cacheKey, code: remote.error.code });
        return remote;
      }

      if (!remote.data.found) {
        console.info('No product data found', { productName });
        return fail(lookupErrors.noIngredientsFound());
      }

      await this.cache.put(cacheKey, cacheType, {
        ...remote.data,
        cachedAt: this.now().toISOString(),
      });

      console.info('Lookup completed', { cacheKey, matches: remote.data.matches?.length ?? 0 });
      return ok(remote.data);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error('Lookup failed unexpectedly', { productName, error: message });
      return fail(lookupErrors.networkError(message));
    }
  }

  private async callRemote(params: Parameters<RemoteLookupClient['lookup']>[0]): Promise<LookupOutcome> {
    const narrator = new ProgressNarrator(undefined, this.statusIntervalMs);
    const unsubscribe = narrator.subscribe((status) => {
      for (const listener of this.statusListeners) {
        listener(status);
      }
    });

    narrator.start();
    try {
      return await this.remote.lookup(params);
    } finally {
      narrator.stop();
      unsubscribe();
    }
  }
}
