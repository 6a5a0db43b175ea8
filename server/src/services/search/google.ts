/**
 * Google Programmable Search (Custom Search JSON API)
 */

import type { HttpFetcher } from '../http-client.js';
import type { SearchBackend } from './search-backend.js';

const ENDPOINT = 'https://www.googleapis.com/customsearch/v1';

export interface GoogleSearchOptions {
  apiKey?: string;
  engineId?: string;
  resultsPerQuery?: number;
}

/** Links from a Custom Search response body; anything unexpected yields [] */
export function parseGoogleResults(body: unknown): string[] {
  if (typeof body !== 'object' || body === null || !('items' in body) || !Array.isArray(body.items)) {
    return [];
  }
  const links: string[] = [];
  for (const item of body.items) {
    if (typeof item === 'object' && item !== null && 'link' in item && typeof item.link === 'string') {
      links.push(item.link);
    }
  }
  return links;
}

export class GoogleSearchBackend implements SearchBackend {
  readonly name = 'google' as const;

  constructor(
    private readonly http: HttpFetcher,
    private readonly options: GoogleSearchOptions
  ) {}

  isConfigured(): boolean {
    return Boolean(this.options.apiKey && this.options.engineId);
  }

  async search(query: string): Promise<string[]> {
    const { apiKey, engineId } = this.options;
    if (!apiKey || !engineId) {
      return [];
    }
    const body = await this.http.getJson(ENDPOINT, {
      params: { key: apiKey, cx: engineId, q: query, num: this.options.resultsPerQuery ?? 10 },
    });
    return parseGoogleResults(body);
  }
}
