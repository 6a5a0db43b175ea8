/**
 * Bing web results page. Organic results are li.b_algo; some links are
 * wrapped in a /ck/a tracking redirect whose u parameter is "a1" followed
 * by the base64url-encoded target.
 */

import { parseHTML } from 'linkedom';
import type { HttpFetcher } from '../http-client.js';
import type { SearchBackend } from './search-backend.js';

const ENDPOINT = 'https://www.bing.com/search';

export function decodeBingHref(href: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(href, 'https://www.bing.com');
  } catch {
    return null;
  }

  if (parsed.hostname.endsWith('bing.com') && parsed.pathname.startsWith('/ck/a')) {
    const encoded = parsed.searchParams.get('u');
    if (!encoded || !encoded.startsWith('a1')) {
      return null;
    }
    const target = Buffer.from(encoded.slice(2), 'base64url').toString('utf-8');
    return /^https?:\/\//i.test(target) ? target : null;
  }

  return parsed.protocol === 'http:' || parsed.protocol === 'https:' ? parsed.toString() : null;
}

export function parseBingResults(html: string): string[] {
  const { document } = parseHTML(html);
  const urls: string[] = [];
  for (const anchor of document.querySelectorAll('li.b_algo h2 a')) {
    const href = anchor.getAttribute('href');
    const url = href ? decodeBingHref(href) : null;
    if (url) {
      urls.push(url);
    }
  }
  return urls;
}

export class BingSearchBackend implements SearchBackend {
  readonly name = 'bing' as const;

  constructor(private readonly http: HttpFetcher) {}

  isConfigured(): boolean {
    return true;
  }

  async search(query: string): Promise<string[]> {
    const response = await this.http.getText(ENDPOINT, { params: { q: query, setlang: 'en' } });
    return parseBingResults(response.body);
  }
}
