/**
 * Result cache
 *
 * Completed enrichment outcomes keyed by case-folded canonical name. Entries
 * older than maxAgeMs read as absent and are overwritten (never merged) on
 * the next success. A store that cannot be read is treated as empty and
 * rebuilt by later writes; unreadable single entries are dropped.
 */

import { createLogger } from '../logger.js';
import { CacheCorruptionError, errorMessage } from '../errors.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import type { CacheEntry, EnrichmentOutcome } from '../types.js';
import type { CacheStore } from '../stores/cache-store.js';

const logger = createLogger('result-cache');

export interface ResultCacheOptions {
  maxAgeMs: number;
  enabled?: boolean;
  now?: () => Date;
}

export interface CacheStats {
  enabled: boolean;
  size: number;
  hits: number;
  misses: number;
  stale: number;
  recovered_from_corruption: boolean;
}

export function cacheKey(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * An entry is valid while its age is within maxAgeMs. Unparseable
 * timestamps and timestamps in the future count as invalid.
 */
export function isCacheEntryValid(entry: CacheEntry, maxAgeMs: number, now: Date): boolean {
  const cachedAt = Date.parse(entry.cached_at);
  if (Number.isNaN(cachedAt)) return false;
  const age = now.getTime() - cachedAt;
  return age >= 0 && age <= maxAgeMs;
}

export class ResultCache {
  private entries = new Map<string, CacheEntry>();
  private readonly locks = new KeyedMutex();
  private readonly maxAgeMs: number;
  private readonly enabled: boolean;
  private readonly now: () => Date;
  private hits = 0;
  private misses = 0;
  private stale = 0;
  private recovered = false;

  constructor(
    private readonly store: CacheStore,
    options: ResultCacheOptions
  ) {
    this.maxAgeMs = options.maxAgeMs;
    this.enabled = options.enabled ?? true;
    this.now = options.now ?? (() => new Date());
  }

  async load(): Promise<number> {
    try {
      const { entries, discarded } = await this.store.load();
      this.entries = entries;
      if (discarded > 0) {
        logger.warn({ discarded }, 'Discarded unreadable cache entries');
        this.recovered = true;
      }
    } catch (error) {
      if (!(error instanceof CacheCorruptionError)) {
        throw error;
      }
      logger.error({ err: error, filePath: error.filePath }, 'Cache store is corrupt, starting with an empty cache');
      this.entries = new Map();
      this.recovered = true;
    }
    logger.info({ entries: this.entries.size, enabled: this.enabled }, 'Result cache loaded');
    return this.entries.size;
  }

  isValid(entry: CacheEntry, maxAgeMs: number = this.maxAgeMs, now: Date = this.now()): boolean {
    return isCacheEntryValid(entry, maxAgeMs, now);
  }

  /**
   * Valid entry for name, or undefined when absent, stale or disabled
   */
  get(name: string): CacheEntry | undefined {
    if (!this.enabled) {
      return undefined;
    }

    const entry = this.entries.get(cacheKey(name));
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (!this.isValid(entry)) {
      this.stale++;
      logger.debug({ name, cachedAt: entry.cached_at }, 'Cache entry is stale');
      return undefined;
    }
    this.hits++;
    return { ...entry, outcome: { ...entry.outcome } };
  }

  /**
   * Store an outcome, replacing any previous entry for the key.
   * Write failures are logged; the in-memory entry is kept for this run.
   */
  async put(name: string, outcome: EnrichmentOutcome): Promise<CacheEntry | undefined> {
    if (!this.enabled) {
      return undefined;
    }

    const key = cacheKey(name);
    return this.locks.runExclusive(key, async () => {
      const entry: CacheEntry = {
        canonical_name: name,
        outcome: { ...outcome },
        cached_at: this.now().toISOString(),
      };
      this.entries.set(key, entry);
      try {
        await this.store.save(key, entry);
      } catch (error) {
        logger.warn({ name, error: errorMessage(error) }, 'Failed to persist cache entry');
      }
      return entry;
    });
  }

  async invalidate(name: string): Promise<boolean> {
    const key = cacheKey(name);
    return this.locks.runExclusive(key, async () => {
      const existed = this.entries.delete(key);
      if (existed) {
        await this.store.remove(key);
      }
      return existed;
    });
  }

  async clear(): Promise<void> {
    this.entries.clear();
    await this.store.clear();
  }

  stats(): CacheStats {
    return {
      enabled: this.enabled,
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      stale: this.stale,
      recovered_from_corruption: this.recovered,
    };
  }
}
