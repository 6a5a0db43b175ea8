import { describe, it, expect } from 'vitest';
import path from 'path';
import { getDatabaseConfig, getPipelineConfig } from '../../src/config.js';
import { validateEnvironment, getEnvironmentDocs } from '../../src/env-validation.js';
import { ConfigError } from '../../src/errors.js';

describe('getPipelineConfig', () => {
  it('uses defaults for an empty environment', () => {
    const config = getPipelineConfig({});

    expect(config.searchOrder).toEqual(['google', 'duckduckgo', 'bing']);
    expect(config.fetchRetry).toEqual({ maxAttempts: 3, baseDelayMs: 2000, maxDelayMs: 30000 });
    expect(config.searchRetry).toEqual({ maxAttempts: 3, baseDelayMs: 2000, maxDelayMs: 30000 });
    expect(config.maxContentLength).toBe(2000);
    expect(config.minContentLength).toBe(100);
    expect(config.cacheEnabled).toBe(true);
    expect(config.cacheMaxAgeMs).toBe(30 * 24 * 60 * 60 * 1000);
    expect(config.workerCount).toBe(4);
    expect(config.similarityThreshold).toBe(88);
    expect(config.outputDir).toBe(path.resolve('output'));
    expect(config.google).toEqual({ apiKey: undefined, engineId: undefined });
  });

  it('reads overrides', () => {
    const config = getPipelineConfig({
      SEARCH_ORDER: 'Bing, duckduckgo,bing',
      FETCH_MAX_ATTEMPTS: '5',
      SEARCH_MAX_ATTEMPTS: '2',
      CACHE_ENABLED: 'no',
      CACHE_MAX_AGE_DAYS: '1',
      GOOGLE_API_KEY: 'test-key',
    });

    expect(config.searchOrder).toEqual(['bing', 'duckduckgo']);
    expect(config.fetchRetry.maxAttempts).toBe(5);
    expect(config.searchRetry.maxAttempts).toBe(2);
    expect(config.cacheEnabled).toBe(false);
    expect(config.cacheMaxAgeMs).toBe(24 * 60 * 60 * 1000);
    expect(config.google.apiKey).toBe('test-key');
  });

  it('rejects invalid values', () => {
    expect(() => getPipelineConfig({ SIMILARITY_THRESHOLD: '101' })).toThrow(
      'SIMILARITY_THRESHOLD must be an integer between 0 and 100, got "101"'
    );
    expect(() => getPipelineConfig({ WORKER_COUNT: 'four' })).toThrow(ConfigError);
    expect(() => getPipelineConfig({ CACHE_ENABLED: 'sometimes' })).toThrow('CACHE_ENABLED must be true or false, got "sometimes"');
    expect(() => getPipelineConfig({ SEARCH_ORDER: 'google,yahoo' })).toThrow('SEARCH_ORDER contains unknown backend "yahoo"');
  });
});

describe('getDatabaseConfig', () => {
  it('returns null without a connection string', () => {
    expect(getDatabaseConfig({})).toBeNull();
  });

  it('reads SSL and pool settings', () => {
    expect(
      getDatabaseConfig({
        DATABASE_URL: 'postgres://localhost/registry',
        DATABASE_SSL: 'true',
        DATABASE_SSL_REJECT_UNAUTHORIZED: 'false',
        DATABASE_MAX_POOL_SIZE: '3',
      })
    ).toEqual({
      connectionString: 'postgres://localhost/registry',
      ssl: { rejectUnauthorized: false },
      maxPoolSize: 3,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });
  });
});

describe('validateEnvironment', () => {
  it('requires the classifier key for batch runs', () => {
    expect(validateEnvironment('batch', {})).toBe(false);
  });

  it('fills defaults for the active mode only', () => {
    const env: NodeJS.ProcessEnv = { ANTHROPIC_API_KEY: 'test-anthropic-key' };

    expect(validateEnvironment('batch', env)).toBe(true);
    expect(env.INPUT_FILE).toBe('input/participants.json');
    expect(env.WORKER_COUNT).toBe('4');
    expect(env.PORT).toBeUndefined();
  });

  it('does not need the classifier key to serve the dashboard', () => {
    const env: NodeJS.ProcessEnv = {};
    expect(validateEnvironment('http', env)).toBe(true);
    expect(env.PORT).toBe('3000');
  });

  it('documents every variable', () => {
    const docs = getEnvironmentDocs();
    expect(docs).toContain('ANTHROPIC_API_KEY=Anthropic API key used by the sector classifier [batch]\n');
    expect(docs).toContain('WORKER_COUNT=Organizations processed concurrently (default: 4)\n');
  });
});
