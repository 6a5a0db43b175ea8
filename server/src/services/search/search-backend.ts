import type { SearchBackendName } from '../../types.js';

/**
 * One web search provider. search() returns candidate URLs in the
 * provider's rank order; filtering happens in the website resolver.
 */
export interface SearchBackend {
  readonly name: SearchBackendName;
  /** false when required credentials are missing; the resolver skips it */
  isConfigured(): boolean;
  search(query: string): Promise<string[]>;
}

export function searchQueryFor(organizationName: string): string {
  return `${organizationName} official website`;
}
