/**
 * Organization routes
 *
 * Read-only view of the registry for the dashboard, plus two writes:
 * re-running an organization and clearing the result cache. Mounted under /api.
 */

import { Router } from 'express';
import { createLogger } from '../logger.js';
import { isStageStatus, type OrganizationRecord } from '../types.js';
import type { OrganizationRegistry } from '../registry/organization-registry.js';
import type { ResultCache } from '../cache/result-cache.js';
import type { EnrichmentOrchestrator } from '../pipeline/enrichment-orchestrator.js';
import type { UsageReporter } from '../services/classification-model.js';
import { topErrors } from '../pipeline/summary.js';

const logger = createLogger('organization-routes');

export interface OrganizationRouteDeps {
  registry: OrganizationRegistry;
  cache: ResultCache;
  orchestrator: EnrichmentOrchestrator;
  classifierUsage?: UsageReporter;
}

const INSURANCE_FILTERS = new Map<string, boolean | null>([
  ['true', true],
  ['false', false],
  ['unknown', null],
]);

function matchesQuery(record: OrganizationRecord, needle: string): boolean {
  return [record.canonical_name, ...record.raw_variants].some((name) => name.toLowerCase().includes(needle));
}

export function createOrganizationsRouter(deps: OrganizationRouteDeps): Router {
  const router = Router();
  const { registry, cache, orchestrator } = deps;

  // GET /api/organizations - List records; filters: status, q (name search), is_insurance
  router.get('/organizations', (req, res) => {
    const { status, q, is_insurance: insurance } = req.query;
    if (status !== undefined && !isStageStatus(status)) {
      return res.status(400).json({ error: `Unknown status: ${String(status)}` });
    }
    const wanted = typeof insurance === 'string' ? INSURANCE_FILTERS.get(insurance) : undefined;
    if (insurance !== undefined && wanted === undefined) {
      return res.status(400).json({ error: 'is_insurance must be true, false or unknown' });
    }
    if (q !== undefined && typeof q !== 'string') {
      return res.status(400).json({ error: 'q must be a single string' });
    }

    let organizations = status === undefined ? registry.snapshot() : registry.inStage(status);
    if (wanted !== undefined) {
      organizations = organizations.filter((record) => record.is_insurance === wanted);
    }
    const needle = q?.trim().toLowerCase();
    if (needle) {
      organizations = organizations.filter((record) => matchesQuery(record, needle));
    }
    res.json({ organizations, count: organizations.length });
  });

  // GET /api/organizations/:name - One record by canonical name
  router.get('/organizations/:name', (req, res) => {
    const record = registry.get(req.params.name);
    if (!record) {
      return res.status(404).json({ error: 'Organization not found' });
    }
    res.json(record);
  });

  // GET /api/stats - Counters for the dashboard header
  router.get('/stats', (_req, res) => {
    res.json({
      ...registry.stats(),
      cache: cache.stats(),
      classifier: deps.classifierUsage?.usage() ?? null,
      top_errors: topErrors(registry.all()),
    });
  });

  // POST /api/organizations/:name/retry - Re-run the pipeline, bypassing the cache
  router.post('/organizations/:name/retry', async (req, res) => {
    const name = req.params.name;
    if (!registry.has(name)) {
      return res.status(404).json({ error: 'Organization not found' });
    }
    if (orchestrator.isRunning(name)) {
      return res.status(409).json({ error: 'Organization is being processed' });
    }

    try {
      const record = await orchestrator.retry(name);
      res.json(record);
    } catch (error) {
      logger.error({ err: error, organization: name }, 'Retry failed');
      res.status(500).json({ error: 'Retry failed' });
    }
  });

  // DELETE /api/cache - Drop every cached outcome
  router.delete('/cache', async (_req, res) => {
    try {
      const removed = cache.stats().size;
      await cache.clear();
      logger.info({ removed }, 'Result cache cleared');
      res.json({ removed });
    } catch (error) {
      logger.error({ err: error }, 'Failed to clear cache');
      res.status(500).json({ error: 'Failed to clear cache' });
    }
  });

  return router;
}
