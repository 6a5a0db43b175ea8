/**
 * DuckDuckGo HTML endpoint. Result links point at a redirector that carries
 * the target in its uddg parameter.
 */

import { parseHTML } from 'linkedom';
import type { HttpFetcher } from '../http-client.js';
import type { SearchBackend } from './search-backend.js';

const ENDPOINT = 'https://html.duckduckgo.com/html/';

export function decodeDuckDuckGoHref(href: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(href, 'https://duckduckgo.com');
  } catch {
    return null;
  }
  if (parsed.hostname.endsWith('duckduckgo.com')) {
    const target = parsed.searchParams.get('uddg');
    return target || null;
  }
  return parsed.protocol === 'http:' || parsed.protocol === 'https:' ? parsed.toString() : null;
}

export function parseDuckDuckGoResults(html: string): string[] {
  const { document } = parseHTML(html);
  const urls: string[] = [];
  for (const anchor of document.querySelectorAll('a.result__a')) {
    const href = anchor.getAttribute('href');
    const url = href ? decodeDuckDuckGoHref(href) : null;
    if (url) {
      urls.push(url);
    }
  }
  return urls;
}

export class DuckDuckGoSearchBackend implements SearchBackend {
  readonly name = 'duckduckgo' as const;

  constructor(private readonly http: HttpFetcher) {}

  isConfigured(): boolean {
    return true;
  }

  async search(query: string): Promise<string[]> {
    const response = await this.http.getText(ENDPOINT, { params: { q: query } });
    return parseDuckDuckGoResults(response.body);
  }
}
