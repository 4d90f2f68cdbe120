import { readFileSync } from 'fs';
import { Amplify } from 'aws-amplify';
import { generateClient } from 'aws-amplify/data';
import type { Schema } from '@/amplify/data/resource';
import type { CacheEntry } from '@/lib/cache';
import type { PersistentCacheStore } from '@/lib/data/persistentCacheStore';
import { StoredLookupResultSchema } from '@/lib/lookup/schemas';
import type { CacheType } from '@/lib/types';
import { logWarn } from '@/lib/logger';

export type LookupDataClient = ReturnType<typeof generateClient<Schema>>;
export type ProductLookupCacheModel = Pick<
  LookupDataClient['models']['ProductLookupCache'],
  'listProductLookupCacheByCacheKey' | 'create'
>;

function describeErrors(errors: ReadonlyArray<{ message: string }>): string {
  return errors.map((error) => error.message).join('; ');
}

/**
 * Persistent cache tier backed by the Amplify Data `ProductLookupCache` model.
 * Records are looked up through the `cacheKey` secondary index; when a key
 * was refreshed more than once, the newest record wins.
 */
export class AmplifyPersistentCacheStore implements PersistentCacheStore {
  constructor(private readonly model: ProductLookupCacheModel) {}

  async get(key: string, cacheType: CacheType): Promise<CacheEntry | null> {
    const { data, errors } = await this.model.listProductLookupCacheByCacheKey({
      cacheKey: key,
    });

    if (errors && errors.length > 0) {
      throw new Error(`Cache lookup failed: ${describeErrors(errors)}`);
    }

    const record = data
      .filter((item) => item.cacheType === cacheType)
      .sort((a, b) => b.insertedAt - a.insertedAt)[0];
    if (!record) {
      return null;
    }

    const raw: unknown = typeof record.result === 'string' ? JSON.parse(record.result) : record.result;
    const parsed = StoredLookupResultSchema.safeParse(raw);
    if (!parsed.success) {
      logWarn('Discarding malformed cache record', { key, issues: parsed.error.issues.length });
      return null;
    }

    return {
      key,
      cacheType,
      result: parsed.data,
      insertedAt: record.insertedAt * 1000,
    };
  }

  async put(entry: CacheEntry): Promise<void> {
    const { errors } = await this.model.create({
      cacheKey: entry.key,
      cacheType: entry.cacheType,
      productName: entry.result.productName,
      result: JSON.parse(JSON.stringify(entry.result)),
      insertedAt: Math.floor(entry.insertedAt / 1000),
    });

    if (errors && errors.length > 0) {
      throw new Error(`Cache save failed: ${describeErrors(errors)}`);
    }
  }
}

let isConfigured = false;

/**
 * Configure Amplify from an amplify_outputs.json file and build the store.
 */
export function createAmplifyCacheStore(outputsPath: string): PersistentCacheStore {
  if (!isConfigured) {
    const outputs = JSON.parse(readFileSync(outputsPath, 'utf8'));
    Amplify.configure(outputs);
    isConfigured = true;
  }
  return new AmplifyPersistentCacheStore(generateClient<Schema>().models.ProductLookupCache);
}
