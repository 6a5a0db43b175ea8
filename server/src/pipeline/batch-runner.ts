/**
 * Runs the enrichment machine over every non-terminal organization with a
 * bounded worker pool. Aborting stops new organizations from starting;
 * in-flight ones finish their run and everything is already persisted, so
 * the next start picks up where this one stopped.
 */

import pLimit from 'p-limit';
import { createLogger } from '../logger.js';
import { PersistenceError, errorMessage } from '../errors.js';
import type { OrganizationRecord } from '../types.js';
import type { OrganizationRegistry, RegistryStats } from '../registry/organization-registry.js';
import type { EnrichmentOrchestrator } from './enrichment-orchestrator.js';

const logger = createLogger('batch-runner');

export interface BatchRunOptions {
  concurrency: number;
  signal?: AbortSignal;
  onRecord?: (record: OrganizationRecord) => void;
}

export interface BatchSummary {
  queued: number;
  processed: number;
  skipped: number;
  errored: number;
  interrupted: boolean;
  duration_ms: number;
  registry: RegistryStats;
}

export class BatchRunner {
  constructor(
    private readonly registry: OrganizationRegistry,
    private readonly orchestrator: EnrichmentOrchestrator,
    private readonly now: () => number = () => Date.now()
  ) {}

  async run(options: BatchRunOptions): Promise<BatchSummary> {
    const startedAt = this.now();
    const queue = this.registry.nonTerminal().map((record) => record.canonical_name);
    const limit = pLimit(Math.max(1, options.concurrency));

    let processed = 0;
    let skipped = 0;
    let errored = 0;
    const fatal: PersistenceError[] = [];

    logger.info({ queued: queue.length, concurrency: options.concurrency }, 'Batch started');

    const tasks = queue.map((name) =>
      limit(async () => {
        if (options.signal?.aborted || fatal.length > 0) {
          skipped++;
          return;
        }
        try {
          const record = await this.orchestrator.process(name);
          processed++;
          options.onRecord?.(record);
          if (processed % 25 === 0) {
            logger.info({ processed, remaining: queue.length - processed - skipped }, 'Batch progress');
          }
        } catch (error) {
          if (error instanceof PersistenceError) {
            fatal.push(error);
            return;
          }
          errored++;
          logger.error({ err: error, organization: name }, 'Organization run failed unexpectedly');
        }
      })
    );

    await Promise.all(tasks);

    if (fatal.length > 0) {
      logger.fatal({ error: errorMessage(fatal[0]) }, 'Batch stopped: registry could not be persisted');
      throw fatal[0];
    }

    const summary: BatchSummary = {
      queued: queue.length,
      processed,
      skipped,
      errored,
      interrupted: Boolean(options.signal?.aborted),
      duration_ms: this.now() - startedAt,
      registry: this.registry.stats(),
    };
    logger.info({ ...summary, registry: undefined }, summary.interrupted ? 'Batch interrupted' : 'Batch finished');
    return summary;
  }
}
