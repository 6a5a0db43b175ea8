/**
 * Per-organization enrichment state machine
 *
 *   pending -> website_search -> content_fetch -> content_validate -> classify -> completed
 *
 * with failure exits website_not_found, scraping_failed and
 * classification_failed, and a cache hit going straight from pending to
 * completed. The record is persisted at every transition. A stage failure
 * ends only this organization's run; PersistenceError propagates.
 */

import { createLogger } from '../logger.js';
import {
  ClassifyError,
  FetchError,
  NotFoundError,
  PersistenceError,
  PipelineError,
  errorMessage,
} from '../errors.js';
import { isTerminalStatus, type OrganizationRecord, type PipelineStage, type StageStatus } from '../types.js';
import { RetriesExhaustedError, withRetry, type BackoffConfig } from '../utils/retry.js';
import type { OrganizationRegistry } from '../registry/organization-registry.js';
import type { ResultCache } from '../cache/result-cache.js';
import type { WebsiteLookup } from '../services/website-resolver.js';
import type { PageTextSource } from '../services/content-fetcher.js';
import type { ContentGate } from '../services/content-validator.js';
import type { Classifier } from '../services/sector-classifier.js';

const logger = createLogger('enrichment-orchestrator');

export interface OrchestratorDeps {
  registry: OrganizationRegistry;
  cache: ResultCache;
  websiteResolver: WebsiteLookup;
  contentFetcher: PageTextSource;
  contentValidator: ContentGate;
  classifier: Classifier;
  fetchRetry: BackoffConfig;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const FAILURE_STATUS: Record<'website_search' | 'content_fetch' | 'content_validate' | 'classify', StageStatus> = {
  website_search: 'website_not_found',
  content_fetch: 'scraping_failed',
  content_validate: 'scraping_failed',
  classify: 'classification_failed',
};

type ActiveStage = keyof typeof FAILURE_STATUS;

function isActiveStage(status: StageStatus): status is ActiveStage {
  return status in FAILURE_STATUS;
}

export class EnrichmentOrchestrator {
  private readonly running = new Set<string>();
  private readonly now: () => number;

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? (() => Date.now());
  }

  isRunning(canonicalName: string): boolean {
    return this.running.has(canonicalName);
  }

  /**
   * Drive one organization to a terminal state. Terminal records are
   * returned unchanged; records left mid-pipeline by an earlier run resume
   * from the last stage whose inputs were persisted.
   */
  async process(canonicalName: string): Promise<OrganizationRecord> {
    let record = this.deps.registry.require(canonicalName);
    if (isTerminalStatus(record.stage_status)) {
      return record;
    }
    if (this.running.has(canonicalName)) {
      throw new Error(`Organization is already being processed: ${canonicalName}`);
    }

    this.running.add(canonicalName);
    const startedAt = this.now();
    try {
      record = await this.run(record, startedAt);
      return record;
    } finally {
      this.running.delete(canonicalName);
    }
  }

  /**
   * Re-run an organization from scratch. Its cache entry is invalidated,
   * the previous outcome cleared and retry_count incremented.
   */
  async retry(canonicalName: string): Promise<OrganizationRecord> {
    if (this.running.has(canonicalName)) {
      throw new Error(`Organization is already being processed: ${canonicalName}`);
    }
    const record = this.deps.registry.require(canonicalName);
    await this.deps.cache.invalidate(canonicalName);
    await this.deps.registry.save({
      ...record,
      website_url: null,
      search_method: 'none',
      content_excerpt: null,
      is_insurance: null,
      stage_status: 'pending',
      error_message: null,
      error_stage: null,
      retry_count: record.retry_count + 1,
      processing_duration_ms: null,
    });
    logger.info({ organization: canonicalName, retryCount: record.retry_count + 1 }, 'Retrying organization');
    return this.process(canonicalName);
  }

  private async run(start: OrganizationRecord, startedAt: number): Promise<OrganizationRecord> {
    const name = start.canonical_name;
    let record = start;

    if (record.stage_status === 'pending') {
      const cached = this.deps.cache.get(name);
      if (cached) {
        logger.info({ organization: name, cachedAt: cached.cached_at }, 'Cache hit');
        return this.transition(record, {
          ...cached.outcome,
          stage_status: 'completed',
          error_message: null,
          error_stage: null,
          processing_duration_ms: this.now() - startedAt,
        });
      }
      record = await this.transition(record, { stage_status: 'website_search' });
    }

    // Resume points: content_validate has no persisted input, so it refetches
    if (record.stage_status === 'content_validate' || (record.stage_status === 'content_fetch' && !record.website_url)) {
      record = await this.transition(record, { stage_status: record.website_url ? 'content_fetch' : 'website_search' });
    }
    if (record.stage_status === 'classify' && !record.content_excerpt) {
      record = await this.transition(record, { stage_status: record.website_url ? 'content_fetch' : 'website_search' });
    }

    try {
      if (record.stage_status === 'website_search') {
        const match = await this.deps.websiteResolver.resolve(name);
        if (!match) {
          throw new NotFoundError(`No plausible website found for "${name}"`);
        }
        record = await this.transition(record, {
          website_url: match.url,
          search_method: match.method,
          stage_status: 'content_fetch',
        });
      }

      let excerpt = record.content_excerpt;
      if (record.stage_status === 'content_fetch') {
        const text = await this.fetchContent(record.website_url ?? '', name);
        record = await this.transition(record, { stage_status: 'content_validate' });
        excerpt = this.deps.contentValidator.validate(text, name);
        record = await this.transition(record, { content_excerpt: excerpt, stage_status: 'classify' });
      }

      if (record.stage_status !== 'classify' || !excerpt) {
        throw new Error(`Unexpected stage ${record.stage_status} for ${name}`);
      }

      const answer = await this.deps.classifier.classify(excerpt, name);
      record = await this.transition(record, {
        is_insurance: answer === 'Yes',
        stage_status: 'completed',
        error_message: null,
        error_stage: null,
        processing_duration_ms: this.now() - startedAt,
      });

      await this.deps.cache.put(name, {
        website_url: record.website_url ?? '',
        search_method: record.search_method,
        content_excerpt: excerpt,
        is_insurance: answer === 'Yes',
      });
      logger.info({ organization: name, isInsurance: record.is_insurance, method: record.search_method }, 'Organization classified');
      return record;
    } catch (error) {
      if (error instanceof PersistenceError) {
        throw error;
      }
      return this.fail(record, error, startedAt);
    }
  }

  private async fetchContent(url: string, name: string): Promise<string> {
    try {
      return await withRetry(() => this.deps.contentFetcher.fetch(url, name), {
        ...this.deps.fetchRetry,
        isRetryable: (error) => error instanceof FetchError && error.retryable,
        operation: `content fetch ${url}`,
        sleep: this.deps.sleep,
      });
    } catch (error) {
      if (error instanceof RetriesExhaustedError) {
        throw new FetchError(error.message, { url, retryable: false }, { cause: error });
      }
      throw error;
    }
  }

  private async fail(record: OrganizationRecord, error: unknown, startedAt: number): Promise<OrganizationRecord> {
    const current = record.stage_status;
    const stage: ActiveStage = isActiveStage(current) ? current : 'website_search';
    const errorStage: PipelineStage =
      error instanceof PipelineError && error.stage !== 'cache' && error.stage !== 'config' ? error.stage : stage;
    const status = error instanceof ClassifyError ? 'classification_failed' : FAILURE_STATUS[stage];

    if (!(error instanceof PipelineError)) {
      logger.error({ err: error, organization: record.canonical_name, stage }, 'Unexpected error in enrichment stage');
    } else {
      logger.info({ organization: record.canonical_name, stage, status, error: error.message }, 'Organization failed');
    }

    return this.transition(record, {
      stage_status: status,
      error_message: errorMessage(error),
      error_stage: errorStage,
      processing_duration_ms: this.now() - startedAt,
    });
  }

  private transition(record: OrganizationRecord, patch: Partial<OrganizationRecord>): Promise<OrganizationRecord> {
    const next: OrganizationRecord = { ...record, ...patch };
    if (next.stage_status !== record.stage_status) {
      logger.debug({ organization: record.canonical_name, from: record.stage_status, to: next.stage_status }, 'Stage transition');
    }
    return this.deps.registry.save(next);
  }
}
