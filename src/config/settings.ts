import { RetryPolicy } from '../types';
import { LogLevel } from '../utils/logger';

export type StoreDriver = 'firestore' | 'memory';

export interface Settings {
  readonly cache: {
    readonly ttlSeconds: number;
  };
  readonly retry: RetryPolicy;
  readonly reasoning: {
    readonly model: string;
    readonly apiKey?: string;
  };
  readonly history: {
    readonly defaultPageSize: number;
    readonly maxPageSize: number;
  };
  readonly store: StoreDriver;
  readonly logLevel: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const DEFAULT_SETTINGS: Settings = {
  cache: {
    ttlSeconds: 24 * 60 * 60, // 24 hours
  },
  retry: {
    maxAttempts: 3,
    baseDelayMs: 500,
    maxDelayMs: 8000,
    jitterMs: 250,
    timeoutMs: 60000,
  },
  reasoning: {
    model: 'gpt-4o',
  },
  history: {
    defaultPageSize: 20,
    maxPageSize: 100,
  },
  store: 'firestore',
  logLevel: 'info',
};

type Env = Record<string, string | undefined>;

/**
 * Builds settings from environment variables, falling back to defaults.
 * Throws when any variable is present but invalid.
 */
export function loadSettings(env: Env = process.env): Settings {
  const errors: string[] = [];

  const readInt = (name: string, fallback: number, min: number): number => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
      return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
      errors.push(`${name} must be an integer >= ${min} (got "${raw}")`);
      return fallback;
    }
    return value;
  };

  const storeRaw = env.QUERY_STORE?.trim() || DEFAULT_SETTINGS.store;
  let store: StoreDriver = DEFAULT_SETTINGS.store;
  if (storeRaw === 'firestore' || storeRaw === 'memory') {
    store = storeRaw;
  } else {
    errors.push(`QUERY_STORE must be "firestore" or "memory" (got "${storeRaw}")`);
  }

  const logLevelRaw = env.LOG_LEVEL?.trim().toLowerCase() || DEFAULT_SETTINGS.logLevel;
  const logLevel = LOG_LEVELS.find((level) => level === logLevelRaw);
  if (!logLevel) {
    errors.push(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')} (got "${logLevelRaw}")`);
  }

  const defaults = DEFAULT_SETTINGS;
  const baseDelayMs = readInt('REASONING_BASE_DELAY_MS', defaults.retry.baseDelayMs, 0);
  const maxDelayMs = readInt('REASONING_MAX_DELAY_MS', defaults.retry.maxDelayMs, 0);
  if (maxDelayMs < baseDelayMs) {
    errors.push('REASONING_MAX_DELAY_MS must not be smaller than REASONING_BASE_DELAY_MS');
  }

  const defaultPageSize = readInt(
    'HISTORY_DEFAULT_PAGE_SIZE',
    defaults.history.defaultPageSize,
    1
  );
  const maxPageSize = readInt('HISTORY_MAX_PAGE_SIZE', defaults.history.maxPageSize, 1);
  if (defaultPageSize > maxPageSize) {
    errors.push('HISTORY_DEFAULT_PAGE_SIZE must not exceed HISTORY_MAX_PAGE_SIZE');
  }

  const apiKey = env.OPENAI_API_KEY?.trim();

  const settings: Settings = {
    cache: {
      ttlSeconds: readInt('QUERY_CACHE_TTL_SECONDS', defaults.cache.ttlSeconds, 0),
    },
    retry: Object.freeze({
      maxAttempts: readInt('REASONING_MAX_ATTEMPTS', defaults.retry.maxAttempts, 1),
      baseDelayMs,
      maxDelayMs,
      jitterMs: readInt('REASONING_JITTER_MS', defaults.retry.jitterMs, 0),
      timeoutMs: readInt('REASONING_TIMEOUT_MS', defaults.retry.timeoutMs, 1),
    }),
    reasoning: {
      model: env.REASONING_MODEL?.trim() || defaults.reasoning.model,
      apiKey: apiKey ? apiKey : undefined,
    },
    history: { defaultPageSize, maxPageSize },
    store,
    logLevel: logLevel ?? defaults.logLevel,
  };

  if (errors.length > 0) {
    throw new Error(`Invalid configuration: ${errors.join('; ')}`);
  }

  return Object.freeze(settings);
}
