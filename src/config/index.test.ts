/**
 * Tests for configuration loading.
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigError } from '../errors/index.js';
import { getConfig, loadConfig, missingApiKeys, requireApiKey, resetConfig } from './index.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.nodeEnv).toBe('development');
    expect(config.logLevel).toBe('info');
    expect(config.dataDir).toBe(path.join(os.homedir(), '.event-vendors'));
    expect(config.embedding).toEqual({ provider: 'openai', dimensions: 1536 });
    expect(config.ranking.topK).toBe(10);
    expect(config.services.query).toEqual({ rpm: 60, burst: 5, concurrency: 4 });
    expect(config.services.embedding).toEqual({ rpm: 1500, burst: 20, concurrency: 5 });
    expect(config.requestTimeoutMs).toBe(30000);
    expect(config.maxRetries).toBe(2);
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({
      PLACES_SEARCH_RPM: '90',
      PLACES_SEARCH_BURST: '3',
      PLACES_SEARCH_CONCURRENCY: '2',
      MAX_RETRIES: '0',
      RANK_TOP_K: '5',
    });

    expect(config.services.placesSearch).toEqual({ rpm: 90, burst: 3, concurrency: 2 });
    expect(config.maxRetries).toBe(0);
    expect(config.ranking.topK).toBe(5);
  });

  it('is silent by default under test', () => {
    expect(loadConfig({ NODE_ENV: 'test' }).logLevel).toBe('silent');
    expect(loadConfig({ NODE_ENV: 'test', LOG_LEVEL: 'debug' }).logLevel).toBe('debug');
  });

  it('treats empty strings as unset', () => {
    const config = loadConfig({ OPENAI_API_KEY: '', EMBEDDING_DIMENSIONS: '' });

    expect(config.apiKeys.openai).toBeUndefined();
    expect(config.embedding.dimensions).toBe(1536);
  });

  it('falls back to GOOGLE_AI_API_KEY for Gemini', () => {
    expect(loadConfig({ GOOGLE_AI_API_KEY: 'test-secret' }).apiKeys.gemini).toBe('test-secret');
  });

  it('lists every invalid variable', () => {
    const load = () => loadConfig({ QUERY_RPM: '0', LOG_LEVEL: 'loud', EMBEDDING_PROVIDER: 'cohere' });

    expect(load).toThrow(ConfigError);
    expect(load).toThrow(/QUERY_RPM/);
    expect(load).toThrow(/LOG_LEVEL: must be debug, info, warn, error or silent/);
    expect(load).toThrow(/EMBEDDING_PROVIDER/);
  });
});

describe('API keys', () => {
  it('reports missing keys for the configured provider', () => {
    expect(missingApiKeys(loadConfig({}))).toEqual([
      'GEMINI_API_KEY',
      'GOOGLE_MAPS_API_KEY',
      'OPENAI_API_KEY',
    ]);
    expect(missingApiKeys(loadConfig({ EMBEDDING_PROVIDER: 'gemini' }))).toEqual([
      'GEMINI_API_KEY',
      'GOOGLE_MAPS_API_KEY',
    ]);
    expect(
      missingApiKeys(
        loadConfig({
          GEMINI_API_KEY: 'test-secret',
          GOOGLE_MAPS_API_KEY: 'test-secret',
          OPENAI_API_KEY: 'test-secret',
        })
      )
    ).toEqual([]);
  });

  it('requires a key by environment name', () => {
    expect(() => requireApiKey(loadConfig({}), 'googleMaps')).toThrow(
      'Missing required API key: GOOGLE_MAPS_API_KEY. Please set it in your .env file.'
    );
    expect(requireApiKey(loadConfig({ OPENAI_API_KEY: 'test-secret' }), 'openai')).toBe('test-secret');
  });
});

describe('getConfig', () => {
  afterEach(() => {
    resetConfig();
  });

  it('caches until reset', () => {
    const first = getConfig();
    expect(getConfig()).toBe(first);

    resetConfig();
    expect(getConfig()).not.toBe(first);
  });
});
