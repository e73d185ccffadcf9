/**
 * Configuration Module
 *
 * Loads and validates environment variables for vendor discovery.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { ConfigError, type ServiceName } from '../errors/index.js';
import { isLogLevel, type LogLevel } from '../utils/logger.js';

const positiveNumber = z.coerce.number().positive();
const positiveInt = z.coerce.number().int().positive();

// Environment schema with optional values and defaults
const envSchema = z.object({
  // API Keys (required per command, so allow starting without them)
  GEMINI_API_KEY: z.string().optional(),
  GOOGLE_AI_API_KEY: z.string().optional(),
  GOOGLE_MAPS_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),

  // Models
  QUERY_MODEL: z.string().optional(),
  EMBEDDING_MODEL: z.string().optional(),
  EMBEDDING_PROVIDER: z.enum(['openai', 'gemini']).default('openai'),
  EMBEDDING_DIMENSIONS: positiveInt.default(1536),

  // Ranking
  RANK_TOP_K: positiveInt.default(10),

  // Per-service quotas
  QUERY_RPM: positiveNumber.default(60),
  QUERY_BURST: positiveInt.default(5),
  QUERY_CONCURRENCY: positiveInt.default(4),
  PLACES_SEARCH_RPM: positiveNumber.default(600),
  PLACES_SEARCH_BURST: positiveInt.default(10),
  PLACES_SEARCH_CONCURRENCY: positiveInt.default(5),
  PLACES_DETAIL_RPM: positiveNumber.default(600),
  PLACES_DETAIL_BURST: positiveInt.default(10),
  PLACES_DETAIL_CONCURRENCY: positiveInt.default(5),
  EMBEDDING_RPM: positiveNumber.default(1500),
  EMBEDDING_BURST: positiveInt.default(20),
  EMBEDDING_CONCURRENCY: positiveInt.default(5),

  // Calls
  REQUEST_TIMEOUT_MS: positiveInt.default(30000),
  MAX_RETRIES: z.coerce.number().int().min(0).default(2),

  // Data directory
  VENDORS_DATA_DIR: z.string().optional(),

  // Runtime options
  LOG_LEVEL: z.string().refine(isLogLevel, 'must be debug, info, warn, error or silent').optional(),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type Env = z.infer<typeof envSchema>;

/**
 * Quota and pool settings for one external service.
 */
export interface ServiceSettings {
  /** Sustained calls per minute */
  rpm: number;
  /** Token bucket capacity */
  burst: number;
  /** Calls in flight at once */
  concurrency: number;
}

export type EmbeddingProvider = 'openai' | 'gemini';

export interface Config {
  nodeEnv: Env['NODE_ENV'];
  isProduction: boolean;
  isDevelopment: boolean;
  isTest: boolean;
  logLevel: LogLevel;

  apiKeys: {
    gemini: string | undefined;
    googleMaps: string | undefined;
    openai: string | undefined;
  };

  dataDir: string;

  models: {
    query: string | undefined;
    embedding: string | undefined;
  };

  embedding: {
    provider: EmbeddingProvider;
    dimensions: number;
  };

  ranking: {
    topK: number;
  };

  services: Record<ServiceName, ServiceSettings>;
  requestTimeoutMs: number;
  maxRetries: number;
}

export type ApiKeyName = keyof Config['apiKeys'];

const API_KEY_ENV: Record<ApiKeyName, string> = {
  gemini: 'GEMINI_API_KEY',
  googleMaps: 'GOOGLE_MAPS_API_KEY',
  openai: 'OPENAI_API_KEY',
};

/**
 * Parse and validate an environment.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Empty strings count as unset, as they do in most .env files.
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
  );

  const parseResult = envSchema.safeParse(cleaned);
  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid environment variables:\n${issues}`);
  }

  const env: Env = parseResult.data;
  const defaultLevel: LogLevel = env.NODE_ENV === 'test' ? 'silent' : 'info';

  return {
    nodeEnv: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',
    isDevelopment: env.NODE_ENV === 'development',
    isTest: env.NODE_ENV === 'test',
    logLevel: env.LOG_LEVEL ?? defaultLevel,

    apiKeys: {
      gemini: env.GEMINI_API_KEY ?? env.GOOGLE_AI_API_KEY,
      googleMaps: env.GOOGLE_MAPS_API_KEY,
      openai: env.OPENAI_API_KEY,
    },

    dataDir: env.VENDORS_DATA_DIR ?? join(homedir(), '.event-vendors'),

    models: {
      query: env.QUERY_MODEL,
      embedding: env.EMBEDDING_MODEL,
    },

    embedding: {
      provider: env.EMBEDDING_PROVIDER,
      dimensions: env.EMBEDDING_DIMENSIONS,
    },

    ranking: {
      topK: env.RANK_TOP_K,
    },

    services: {
      query: { rpm: env.QUERY_RPM, burst: env.QUERY_BURST, concurrency: env.QUERY_CONCURRENCY },
      placesSearch: {
        rpm: env.PLACES_SEARCH_RPM,
        burst: env.PLACES_SEARCH_BURST,
        concurrency: env.PLACES_SEARCH_CONCURRENCY,
      },
      placesDetail: {
        rpm: env.PLACES_DETAIL_RPM,
        burst: env.PLACES_DETAIL_BURST,
        concurrency: env.PLACES_DETAIL_CONCURRENCY,
      },
      embedding: {
        rpm: env.EMBEDDING_RPM,
        burst: env.EMBEDDING_BURST,
        concurrency: env.EMBEDDING_CONCURRENCY,
      },
    },
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    maxRetries: env.MAX_RETRIES,
  };
}

let cachedConfig: Config | null = null;

/**
 * Process-wide configuration, parsed from `process.env` on first use.
 */
export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig(process.env);
  }
  return cachedConfig;
}

/**
 * Reset the cached configuration (useful for testing)
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Check if a specific API is configured
 */
export function hasApiKey(config: Config, api: ApiKeyName): boolean {
  return !!config.apiKeys[api];
}

/**
 * Get an API key or throw if not configured
 */
export function requireApiKey(config: Config, api: ApiKeyName): string {
  const key = config.apiKeys[api];
  if (!key) {
    throw new ConfigError(
      `Missing required API key: ${API_KEY_ENV[api]}. Please set it in your .env file.`
    );
  }
  return key;
}

/**
 * Names of the API keys a run needs but the configuration lacks.
 */
export function missingApiKeys(config: Config): string[] {
  const needed: ApiKeyName[] = [
    'gemini',
    'googleMaps',
    config.embedding.provider === 'openai' ? 'openai' : 'gemini',
  ];
  return [...new Set(needed)].filter((api) => !hasApiKey(config, api)).map((api) => API_KEY_ENV[api]);
}
