import { DEFAULT_RATE_LIMIT, type RateLimitConfig } from '@/lib/rateLimit';
import { logWarn } from '@/lib/logger';

export const DEFAULT_GEMINI_MODEL = 'gemini-3-flash-preview';

export interface LookupConfig {
  findIngredientsUrl?: string;
  geminiApiKey?: string;
  geminiModel: string;
  amplifyOutputsPath?: string;
  quotaFilePath?: string;
  rateLimit: RateLimitConfig;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    logWarn(`Ignoring invalid ${name}`, { value: raw, fallback });
    return fallback;
  }
  return value;
}

/**
 * Read the lookup engine settings from environment variables.
 * Unset or invalid limits fall back to the defaults.
 */
export function loadConfig(env: Env = process.env): LookupConfig {
  const windowSeconds = readPositiveInt(
    env,
    'LOOKUP_WINDOW_SECONDS',
    DEFAULT_RATE_LIMIT.windowMs / 1000
  );

  return {
    findIngredientsUrl: readString(env, 'FIND_INGREDIENTS_URL'),
    geminiApiKey: readString(env, 'GEMINI_API_KEY'),
    geminiModel: readString(env, 'GEMINI_MODEL') ?? DEFAULT_GEMINI_MODEL,
    amplifyOutputsPath: readString(env, 'AMPLIFY_OUTPUTS_PATH'),
    quotaFilePath: readString(env, 'LOOKUP_QUOTA_FILE'),
    rateLimit: {
      windowMs: windowSeconds * 1000,
      maxPerWindow: readPositiveInt(env, 'LOOKUP_MAX_PER_WINDOW', DEFAULT_RATE_LIMIT.maxPerWindow),
      maxPerDay: readPositiveInt(env, 'LOOKUP_MAX_PER_DAY', DEFAULT_RATE_LIMIT.maxPerDay),
    },
  };
}
