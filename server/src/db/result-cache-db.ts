import { query } from "./client.js";
import type { CacheLoadResult, CacheStore } from "../stores/cache-store.js";
import { isSearchMethod, type CacheEntry } from "../types.js";

interface CacheRow {
  cache_key: string;
  canonical_name: string;
  website_url: string;
  search_method: string;
  content_excerpt: string;
  is_insurance: boolean;
  cached_at: Date | string;
}

/**
 * PostgreSQL-backed result cache store
 */
export class ResultCacheDatabase implements CacheStore {
  async load(): Promise<CacheLoadResult> {
    const result = await query<CacheRow>("SELECT * FROM enrichment_cache");
    const entries = new Map<string, CacheEntry>();
    let discarded = 0;

    for (const row of result.rows) {
      if (!isSearchMethod(row.search_method)) {
        discarded++;
        continue;
      }
      entries.set(row.cache_key, {
        canonical_name: row.canonical_name,
        outcome: {
          website_url: row.website_url,
          search_method: row.search_method,
          content_excerpt: row.content_excerpt,
          is_insurance: row.is_insurance,
        },
        cached_at: row.cached_at instanceof Date ? row.cached_at.toISOString() : row.cached_at,
      });
    }
    return { entries, discarded };
  }

  async save(key: string, entry: CacheEntry): Promise<void> {
    await query(
      `INSERT INTO enrichment_cache (
        cache_key, canonical_name, website_url, search_method, content_excerpt, is_insurance, cached_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7)
      ON CONFLICT (cache_key) DO UPDATE SET
        canonical_name = EXCLUDED.canonical_name,
        website_url = EXCLUDED.website_url,
        search_method = EXCLUDED.search_method,
        content_excerpt = EXCLUDED.content_excerpt,
        is_insurance = EXCLUDED.is_insurance,
        cached_at = EXCLUDED.cached_at`,
      [
        key,
        entry.canonical_name,
        entry.outcome.website_url,
        entry.outcome.search_method,
        entry.outcome.content_excerpt,
        entry.outcome.is_insurance,
        entry.cached_at,
      ]
    );
  }

  async remove(key: string): Promise<void> {
    await query("DELETE FROM enrichment_cache WHERE cache_key = $1", [key]);
  }

  async clear(): Promise<void> {
    await query("DELETE FROM enrichment_cache");
  }
}
