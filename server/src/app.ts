/**
 * Wires configuration into the registry, cache, services and orchestrator.
 */

import { getDatabaseConfig, type PipelineConfig } from './config.js';
import { createLogger } from './logger.js';
import { initializeDatabase } from './db/client.js';
import { runMigrations } from './db/migrate.js';
import { OrganizationDatabase } from './db/organization-db.js';
import { ResultCacheDatabase } from './db/result-cache-db.js';
import { JsonFileOrganizationStore, type OrganizationStore } from './stores/organization-store.js';
import { JsonFileCacheStore, type CacheStore } from './stores/cache-store.js';
import { OrganizationRegistry } from './registry/organization-registry.js';
import { ResultCache } from './cache/result-cache.js';
import { SimilarityResolver } from './normalization/similarity-resolver.js';
import { defaultDistinctEntityRules } from './normalization/conflict-rules.js';
import { AxiosHttpClient } from './services/http-client.js';
import { loadBlockedDomains } from './services/url-filter.js';
import { GoogleSearchBackend } from './services/search/google.js';
import { DuckDuckGoSearchBackend } from './services/search/duckduckgo.js';
import { BingSearchBackend } from './services/search/bing.js';
import { WebsiteResolver } from './services/website-resolver.js';
import { ContentFetcher } from './services/content-fetcher.js';
import { ContentValidator } from './services/content-validator.js';
import { AnthropicClassificationModel, type UsageReporter } from './services/classification-model.js';
import { SectorClassifier } from './services/sector-classifier.js';
import { IntervalGate } from './utils/rate-limiter.js';
import { EnrichmentOrchestrator } from './pipeline/enrichment-orchestrator.js';
import { BatchRunner } from './pipeline/batch-runner.js';

const logger = createLogger('app');

export interface Stores {
  organizations: OrganizationStore;
  cache: CacheStore;
  backend: 'postgres' | 'json';
}

/**
 * Postgres when DATABASE_URL is set, JSON files in the output directory otherwise
 */
export async function createStores(config: PipelineConfig): Promise<Stores> {
  const databaseConfig = getDatabaseConfig();
  if (databaseConfig) {
    initializeDatabase(databaseConfig);
    await runMigrations();
    logger.info('Using PostgreSQL stores');
    return { organizations: new OrganizationDatabase(), cache: new ResultCacheDatabase(), backend: 'postgres' };
  }

  logger.info({ outputDir: config.outputDir }, 'Using JSON file stores');
  return {
    organizations: JsonFileOrganizationStore.inDirectory(config.outputDir),
    cache: JsonFileCacheStore.inDirectory(config.outputDir),
    backend: 'json',
  };
}

export interface Pipeline {
  resolver: SimilarityResolver;
  registry: OrganizationRegistry;
  cache: ResultCache;
  orchestrator: EnrichmentOrchestrator;
  runner: BatchRunner;
  classifierUsage: UsageReporter;
}

export async function createPipeline(config: PipelineConfig, stores: Stores): Promise<Pipeline> {
  const registry = new OrganizationRegistry(stores.organizations);
  const cache = new ResultCache(stores.cache, { maxAgeMs: config.cacheMaxAgeMs, enabled: config.cacheEnabled });
  await registry.load();
  await cache.load();

  const http = new AxiosHttpClient({ timeoutMs: config.requestTimeoutMs, userAgent: config.userAgent });
  const websiteResolver = new WebsiteResolver(
    [
      new GoogleSearchBackend(http, config.google),
      new DuckDuckGoSearchBackend(http),
      new BingSearchBackend(http),
    ],
    loadBlockedDomains(),
    config.searchOrder,
    { retry: config.searchRetry }
  );

  const model = new AnthropicClassificationModel({ apiKey: config.anthropicApiKey, retry: config.classifyRetry });
  const classifier = new SectorClassifier(model, new IntervalGate(config.rateLimitIntervalMs));

  const orchestrator = new EnrichmentOrchestrator({
    registry,
    cache,
    websiteResolver,
    contentFetcher: new ContentFetcher(http, { followAboutLinks: config.followAboutLinks }),
    contentValidator: new ContentValidator({
      minLength: config.minContentLength,
      maxLength: config.maxContentLength,
    }),
    classifier,
    fetchRetry: config.fetchRetry,
  });

  return {
    resolver: new SimilarityResolver({
      threshold: config.similarityThreshold,
      rules: defaultDistinctEntityRules(),
    }),
    registry,
    cache,
    orchestrator,
    runner: new BatchRunner(registry, orchestrator),
    classifierUsage: model,
  };
}
