import { DEFAULT_GEMINI_MODEL, loadConfig } from '@/lib/config';
import { createAmplifyCacheStore } from '@/lib/data/amplifyCacheStore';
import { MemoryPersistentCacheStore } from '@/lib/data/persistentCacheStore';
import { createLookupService, LookupOrchestrator } from '@/index';
import { logWarn } from '@/lib/logger';

jest.mock('@/lib/logger', () => ({
  logDebug: jest.fn(),
  logInfo: jest.fn(),
  logWarn: jest.fn(),
  logError: jest.fn(),
}));

jest.mock('@/lib/data/amplifyCacheStore', () => ({
  AmplifyPersistentCacheStore: jest.fn(),
  createAmplifyCacheStore: jest.fn(),
}));

jest.mock('@google/genai', () => ({
  GoogleGenAI: jest.fn(),
  ThinkingLevel: { LOW: 'LOW' },
}));

describe('loadConfig', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      geminiModel: DEFAULT_GEMINI_MODEL,
      rateLimit: { windowMs: 60_000, maxPerWindow: 2, maxPerDay: 10 },
    });
    expect(DEFAULT_GEMINI_MODEL).toBe('gemini-3-flash-preview');
  });

  it('reads and trims every setting', () => {
    const config = loadConfig({
      FIND_INGREDIENTS_URL: ' https://lookup.test/findIngredients ',
      GEMINI_API_KEY: 'test-key',
      GEMINI_MODEL: 'gemini-test',
      AMPLIFY_OUTPUTS_PATH: './amplify_outputs.json',
      LOOKUP_QUOTA_FILE: '/tmp/lookup-quota.json',
      LOOKUP_MAX_PER_DAY: '25',
      LOOKUP_MAX_PER_WINDOW: '4',
      LOOKUP_WINDOW_SECONDS: '30',
    });

    expect(config).toEqual({
      findIngredientsUrl: 'https://lookup.test/findIngredients',
      geminiApiKey: 'test-key',
      geminiModel: 'gemini-test',
      amplifyOutputsPath: './amplify_outputs.json',
      quotaFilePath: '/tmp/lookup-quota.json',
      rateLimit: { windowMs: 30_000, maxPerWindow: 4, maxPerDay: 25 },
    });
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ FIND_INGREDIENTS_URL: '  ', GEMINI_MODEL: '' })).toEqual({
      geminiModel: DEFAULT_GEMINI_MODEL,
      rateLimit: { windowMs: 60_000, maxPerWindow: 2, maxPerDay: 10 },
    });
  });

  it('falls back to defaults for invalid limits', () => {
    const config = loadConfig({
      LOOKUP_MAX_PER_DAY: '-3',
      LOOKUP_MAX_PER_WINDOW: 'lots',
      LOOKUP_WINDOW_SECONDS: '1.5',
    });

    expect(config.rateLimit).toEqual({ windowMs: 60_000, maxPerWindow: 2, maxPerDay: 10 });
    expect(logWarn).toHaveBeenCalledTimes(3);
  });
});

describe('createLookupService', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('wires an in-memory service by default', async () => {
    const service = createLookupService(loadConfig({ LOOKUP_MAX_PER_DAY: '5' }));

    expect(service).toBeInstanceOf(LookupOrchestrator);
    expect(await service.remainingLookupsToday()).toBe(5);
    expect(createAmplifyCacheStore).not.toHaveBeenCalled();
  });

  it('uses the Amplify cache store when outputs are configured', () => {
    jest.mocked(createAmplifyCacheStore).mockReturnValue(new MemoryPersistentCacheStore());

    createLookupService(loadConfig({ AMPLIFY_OUTPUTS_PATH: './amplify_outputs.json' }));

    expect(createAmplifyCacheStore).toHaveBeenCalledWith('./amplify_outputs.json');
  });
});
