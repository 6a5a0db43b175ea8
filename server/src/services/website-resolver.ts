/**
 * Website discovery across ordered search backends.
 *
 * Backends are tried in the configured order; the first one that yields a
 * plausible organizational URL wins and is reported with the match.
 * Transient backend failures (429, 5xx, network) are retried with backoff;
 * a backend that still errors or is unconfigured is skipped, not fatal.
 */

import { createLogger } from '../logger.js';
import { FetchError, errorMessage } from '../errors.js';
import { withRetry, type BackoffConfig } from '../utils/retry.js';
import type { SearchBackendName } from '../types.js';
import { rankCandidates } from './url-filter.js';
import { searchQueryFor, type SearchBackend } from './search/search-backend.js';

const logger = createLogger('website-resolver');

export interface WebsiteMatch {
  url: string;
  method: SearchBackendName;
}

export interface WebsiteLookup {
  resolve(organizationName: string): Promise<WebsiteMatch | null>;
}

export type BackendAttempt =
  | { backend: SearchBackendName; outcome: 'skipped' }
  | { backend: SearchBackendName; outcome: 'no_match'; candidates: number }
  | { backend: SearchBackendName; outcome: 'error'; error: string }
  | { backend: SearchBackendName; outcome: 'matched'; url: string };

export interface WebsiteResolverOptions {
  /** Per-backend retry for transient failures; one attempt when omitted */
  retry?: BackoffConfig;
  sleep?: (ms: number) => Promise<void>;
}

const NO_RETRY: BackoffConfig = { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 };

export class WebsiteResolver implements WebsiteLookup {
  private readonly backends: SearchBackend[];

  constructor(
    backends: SearchBackend[],
    private readonly blockedDomains: ReadonlySet<string>,
    order?: SearchBackendName[],
    private readonly options: WebsiteResolverOptions = {}
  ) {
    this.backends = order
      ? order.flatMap((name) => backends.filter((backend) => backend.name === name))
      : [...backends];
  }

  get order(): SearchBackendName[] {
    return this.backends.map((backend) => backend.name);
  }

  async resolve(organizationName: string): Promise<WebsiteMatch | null> {
    const { match } = await this.resolveWithTrace(organizationName);
    return match;
  }

  async resolveWithTrace(organizationName: string): Promise<{ match: WebsiteMatch | null; attempts: BackendAttempt[] }> {
    const attempts: BackendAttempt[] = [];
    const query = searchQueryFor(organizationName);

    for (const backend of this.backends) {
      if (!backend.isConfigured()) {
        attempts.push({ backend: backend.name, outcome: 'skipped' });
        continue;
      }

      let candidates: string[];
      try {
        candidates = await this.search(backend, query);
      } catch (error) {
        logger.warn({ backend: backend.name, organization: organizationName, error: errorMessage(error) }, 'Search backend failed');
        attempts.push({ backend: backend.name, outcome: 'error', error: errorMessage(error) });
        continue;
      }

      const [best] = rankCandidates(candidates, organizationName, this.blockedDomains);
      if (best) {
        attempts.push({ backend: backend.name, outcome: 'matched', url: best });
        logger.debug({ backend: backend.name, organization: organizationName, url: best }, 'Website found');
        return { match: { url: best, method: backend.name }, attempts };
      }
      attempts.push({ backend: backend.name, outcome: 'no_match', candidates: candidates.length });
    }

    logger.info({ organization: organizationName, attempts: describeAttempts(attempts) }, 'No website found');
    return { match: null, attempts };
  }

  private search(backend: SearchBackend, query: string): Promise<string[]> {
    return withRetry(() => backend.search(query), {
      ...(this.options.retry ?? NO_RETRY),
      isRetryable: (error) => error instanceof FetchError && error.retryable,
      operation: `${backend.name} search`,
      sleep: this.options.sleep,
    });
  }
}

export function describeAttempts(attempts: BackendAttempt[]): string {
  return attempts
    .map((attempt) => {
      switch (attempt.outcome) {
        case 'skipped':
          return `${attempt.backend}: not configured`;
        case 'no_match':
          return `${attempt.backend}: no plausible result among ${attempt.candidates}`;
        case 'error':
          return `${attempt.backend}: ${attempt.error}`;
        case 'matched':
          return `${attempt.backend}: ${attempt.url}`;
      }
    })
    .join('; ');
}
