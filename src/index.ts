import { LookupCache } from '@/lib/cache';
import { loadConfig, type LookupConfig } from '@/lib/config';
import { createAmplifyCacheStore } from '@/lib/data/amplifyCacheStore';
import {
  FileDailyCounterStore,
  MemoryDailyCounterStore,
  type DailyCounterStore,
} from '@/lib/data/dailyCounterStore';
import {
  MemoryPersistentCacheStore,
  type PersistentCacheStore,
} from '@/lib/data/persistentCacheStore';
import { GeminiLookupClient } from '@/lib/lookup/geminiClient';
import { LookupOrchestrator } from '@/lib/lookup/orchestrator';
import { HttpLookupClient, type RemoteLookupClient } from '@/lib/lookup/remoteClient';
import { RateLimiter } from '@/lib/rateLimit';
import { logInfo } from '@/lib/logger';

export * from '@/lib/types';
export { LookupCache, formatCacheAge, makeCacheKey, resolveCacheType } from '@/lib/cache';
export { loadConfig, type LookupConfig } from '@/lib/config';
export { RateLimiter, DEFAULT_RATE_LIMIT, type RateLimitConfig } from '@/lib/rateLimit';
export {
  FileDailyCounterStore,
  MemoryDailyCounterStore,
  type DailyCounterRecord,
  type DailyCounterStore,
} from '@/lib/data/dailyCounterStore';
export {
  MemoryPersistentCacheStore,
  type PersistentCacheStore,
} from '@/lib/data/persistentCacheStore';
export { AmplifyPersistentCacheStore } from '@/lib/data/amplifyCacheStore';
export { LookupOrchestrator, type LookupOutcome } from '@/lib/lookup/orchestrator';
export { HttpLookupClient, type RemoteLookupClient } from '@/lib/lookup/remoteClient';
export { GeminiLookupClient } from '@/lib/lookup/geminiClient';
export { ProgressNarrator, SEARCH_STATUS_MESSAGES } from '@/lib/lookup/progressNarrator';
export {
  annotateMatches,
  buildEntryDraft,
  extractSourceDomain,
  type EntryDraft,
} from '@/lib/lookup/entryDraft';
export {
  cleanIngredientsText,
  extractIngredientsFromRecognizedText,
  extractIngredientsSection,
  splitIngredients,
} from '@/lib/ingredients/textNormalizer';
export { parseServingSize, type ParsedServing } from '@/lib/servingSize';
export { normalizeUnit, type ServingUnit } from '@/lib/unitConversions';
export { scaleNutrition } from '@/lib/normalizer';

function createRemoteClient(config: LookupConfig): RemoteLookupClient {
  if (config.findIngredientsUrl) {
    return new HttpLookupClient(config.findIngredientsUrl);
  }
  return new GeminiLookupClient(config.geminiApiKey, config.geminiModel);
}

function createPersistentStore(config: LookupConfig): PersistentCacheStore {
  if (config.amplifyOutputsPath) {
    return createAmplifyCacheStore(config.amplifyOutputsPath);
  }
  return new MemoryPersistentCacheStore();
}

function createCounterStore(config: LookupConfig): DailyCounterStore {
  if (config.quotaFilePath) {
    return new FileDailyCounterStore(config.quotaFilePath);
  }
  return new MemoryDailyCounterStore();
}

/**
 * Wire a lookup orchestrator from configuration.
 */
export function createLookupService(config: LookupConfig = loadConfig()): LookupOrchestrator {
  const remote = createRemoteClient(config);
  logInfo('Creating lookup service', {
    remote: config.findIngredientsUrl ? 'http' : 'gemini',
    persistentCache: config.amplifyOutputsPath ? 'amplify' : 'memory',
    quota: config.quotaFilePath ? 'file' : 'memory',
  });

  return new LookupOrchestrator({
    rateLimiter: new RateLimiter(createCounterStore(config), config.rateLimit),
    cache: new LookupCache(createPersistentStore(config)),
    remote,
  });
}
