/**
 * Shared types for the organization registry and enrichment pipeline
 */

export type StageStatus =
  | 'pending'
  | 'website_search'
  | 'content_fetch'
  | 'content_validate'
  | 'classify'
  | 'completed'
  | 'website_not_found'
  | 'scraping_failed'
  | 'classification_failed';

export const STAGE_STATUSES: readonly StageStatus[] = [
  'pending',
  'website_search',
  'content_fetch',
  'content_validate',
  'classify',
  'completed',
  'website_not_found',
  'scraping_failed',
  'classification_failed',
];

export const TERMINAL_STATUSES: readonly StageStatus[] = [
  'completed',
  'website_not_found',
  'scraping_failed',
  'classification_failed',
];

export function isStageStatus(value: unknown): value is StageStatus {
  return STAGE_STATUSES.some((status) => status === value);
}

export function isTerminalStatus(status: StageStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export type SearchBackendName = 'google' | 'duckduckgo' | 'bing';
export type SearchMethod = SearchBackendName | 'none';

export const SEARCH_BACKENDS: readonly SearchBackendName[] = ['google', 'duckduckgo', 'bing'];

export function isSearchMethod(value: unknown): value is SearchMethod {
  return value === 'none' || SEARCH_BACKENDS.some((backend) => backend === value);
}

/** Stage names used on errors; includes the non-state concerns cache and persistence */
export type PipelineStage =
  | 'website_search'
  | 'content_fetch'
  | 'content_validate'
  | 'classify'
  | 'cache'
  | 'persistence'
  | 'config';

export type ClassificationAnswer = 'Yes' | 'No';

/**
 * One row per canonical organization. Created at first sighting and
 * mutated only by the enrichment orchestrator.
 */
export interface OrganizationRecord {
  canonical_name: string;
  occurrence_count: number;
  raw_variants: string[];
  website_url: string | null;
  search_method: SearchMethod;
  content_excerpt: string | null;
  is_insurance: boolean | null;
  stage_status: StageStatus;
  error_message: string | null;
  error_stage: PipelineStage | null;
  retry_count: number;
  processing_duration_ms: number | null;
  last_updated: string;
}

/** The part of a completed record that is worth caching */
export interface EnrichmentOutcome {
  website_url: string;
  search_method: SearchMethod;
  content_excerpt: string;
  is_insurance: boolean;
}

export interface CacheEntry {
  canonical_name: string;
  outcome: EnrichmentOutcome;
  cached_at: string;
}

export interface RawNameCount {
  name: string;
  count: number;
}

/** Input row as exported from the participant spreadsheets */
export interface ParticipantRow {
  home_organization?: string | null;
  source?: string;
}
