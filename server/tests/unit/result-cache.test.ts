import { describe, it, expect } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ResultCache, cacheKey, isCacheEntryValid } from '../../src/cache/result-cache.js';
import { JsonFileCacheStore } from '../../src/stores/cache-store.js';
import type { CacheEntry, EnrichmentOutcome } from '../../src/types.js';
import { InMemoryCacheStore, FIXED_NOW } from '../fixtures/pipeline-fakes.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const OUTCOME: EnrichmentOutcome = {
  website_url: 'https://www.allianz.com/',
  search_method: 'duckduckgo',
  content_excerpt: 'Allianz is an insurance and asset management company.',
  is_insurance: true,
};

function entryAgedDays(days: number): CacheEntry {
  return {
    canonical_name: 'Allianz SE',
    outcome: OUTCOME,
    cached_at: new Date(FIXED_NOW.getTime() - days * DAY_MS).toISOString(),
  };
}

describe('isCacheEntryValid', () => {
  it('accepts entries up to the maximum age', () => {
    expect(isCacheEntryValid(entryAgedDays(30), 30 * DAY_MS, FIXED_NOW)).toBe(true);
    expect(isCacheEntryValid(entryAgedDays(31), 30 * DAY_MS, FIXED_NOW)).toBe(false);
  });

  it('rejects timestamps in the future or unparseable ones', () => {
    expect(isCacheEntryValid(entryAgedDays(-1), 30 * DAY_MS, FIXED_NOW)).toBe(false);
    expect(isCacheEntryValid({ ...entryAgedDays(0), cached_at: 'yesterday' }, 30 * DAY_MS, FIXED_NOW)).toBe(false);
  });
});

describe('ResultCache', () => {
  it('keys entries by case-folded trimmed name', async () => {
    const cache = new ResultCache(new InMemoryCacheStore(), { maxAgeMs: DAY_MS, now: () => FIXED_NOW });
    await cache.put('Allianz SE', OUTCOME);

    expect(cacheKey('  Allianz SE ')).toBe('allianz se');
    expect(cache.get('ALLIANZ SE')?.outcome).toEqual(OUTCOME);
    expect(cache.stats()).toMatchObject({ size: 1, hits: 1, misses: 0 });
  });

  it('treats stale entries as misses and overwrites them on put', async () => {
    const store = new InMemoryCacheStore([['allianz se', entryAgedDays(40)]]);
    const cache = new ResultCache(store, { maxAgeMs: 30 * DAY_MS, now: () => FIXED_NOW });
    await cache.load();

    expect(cache.get('Allianz SE')).toBeUndefined();
    expect(cache.stats().stale).toBe(1);

    await cache.put('Allianz SE', { ...OUTCOME, is_insurance: false });
    expect(store.entries.get('allianz se')).toEqual({
      canonical_name: 'Allianz SE',
      outcome: { ...OUTCOME, is_insurance: false },
      cached_at: '2026-03-01T12:00:00.000Z',
    });
  });

  it('does nothing when disabled', async () => {
    const store = new InMemoryCacheStore();
    const cache = new ResultCache(store, { maxAgeMs: DAY_MS, enabled: false });
    expect(await cache.put('AXA', OUTCOME)).toBeUndefined();
    expect(cache.get('AXA')).toBeUndefined();
    expect(store.entries.size).toBe(0);
  });

  it('keeps the in-memory entry when the store write fails', async () => {
    const store = new InMemoryCacheStore();
    store.save = async () => {
      throw new Error('read-only file system');
    };
    const cache = new ResultCache(store, { maxAgeMs: DAY_MS, now: () => FIXED_NOW });

    await expect(cache.put('AXA', OUTCOME)).resolves.toBeDefined();
    expect(cache.get('AXA')?.outcome.is_insurance).toBe(true);
  });

  it('invalidates single entries', async () => {
    const store = new InMemoryCacheStore();
    const cache = new ResultCache(store, { maxAgeMs: DAY_MS, now: () => FIXED_NOW });
    await cache.put('AXA', OUTCOME);

    expect(await cache.invalidate('axa')).toBe(true);
    expect(await cache.invalidate('axa')).toBe(false);
    expect(store.entries.size).toBe(0);
  });
});

describe('ResultCache with JsonFileCacheStore', () => {
  async function tempCacheDir(): Promise<string> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'result-cache-'));
    return path.join(dir, 'cache');
  }

  it('round-trips entries through the directory', async () => {
    const dir = await tempCacheDir();
    const cache = new ResultCache(new JsonFileCacheStore(dir), { maxAgeMs: DAY_MS, now: () => FIXED_NOW });
    await cache.load();
    await cache.put('Munich Re', OUTCOME);

    const reopened = new ResultCache(new JsonFileCacheStore(dir), { maxAgeMs: DAY_MS, now: () => FIXED_NOW });
    expect(await reopened.load()).toBe(1);
    expect(reopened.get('munich re')?.canonical_name).toBe('Munich Re');
    expect(reopened.stats().recovered_from_corruption).toBe(false);
  });

  it('writes one file per entry', async () => {
    const dir = await tempCacheDir();
    const store = new JsonFileCacheStore(dir);
    const cache = new ResultCache(store, { maxAgeMs: DAY_MS, now: () => FIXED_NOW });
    await cache.put('AXA', OUTCOME);
    await cache.put('Munich Re', OUTCOME);

    const written: unknown = JSON.parse(await fs.readFile(store.entryPath('axa'), 'utf-8'));
    expect(written).toEqual({
      key: 'axa',
      entry: { canonical_name: 'AXA', outcome: OUTCOME, cached_at: '2026-03-01T12:00:00.000Z' },
    });
    expect((await fs.readdir(dir)).length).toBe(2);
  });

  it('drops an unparseable entry file and keeps the rest', async () => {
    const dir = await tempCacheDir();
    const store = new JsonFileCacheStore(dir);
    await store.save('axa', { canonical_name: 'AXA', outcome: OUTCOME, cached_at: FIXED_NOW.toISOString() });
    await fs.writeFile(path.join(dir, 'torn.json'), '{"key": "generali", "entry": {', 'utf-8');

    const cache = new ResultCache(new JsonFileCacheStore(dir), { maxAgeMs: DAY_MS, now: () => FIXED_NOW });
    expect(await cache.load()).toBe(1);
    expect(cache.stats().recovered_from_corruption).toBe(true);
    expect(await fs.readdir(dir)).toEqual([path.basename(store.entryPath('axa'))]);
  });

  it('starts empty when the cache location is not a directory', async () => {
    const dir = await tempCacheDir();
    await fs.writeFile(dir, 'not a directory', 'utf-8');
    const cache = new ResultCache(new JsonFileCacheStore(dir), { maxAgeMs: DAY_MS });

    expect(await cache.load()).toBe(0);
    expect(cache.stats().recovered_from_corruption).toBe(true);
  });

  it('counts malformed entries as discarded', async () => {
    const dir = await tempCacheDir();
    const store = new JsonFileCacheStore(dir);
    await store.save('axa', { canonical_name: 'AXA', outcome: OUTCOME, cached_at: FIXED_NOW.toISOString() });
    await fs.writeFile(
      path.join(dir, 'broken.json'),
      JSON.stringify({ key: 'broken', entry: { canonical_name: 'Broken', outcome: { is_insurance: 'maybe' }, cached_at: FIXED_NOW.toISOString() } }),
      'utf-8'
    );

    const loaded = await new JsonFileCacheStore(dir).load();
    expect([...loaded.entries.keys()]).toEqual(['axa']);
    expect(loaded.discarded).toBe(1);
  });

  it('clears every entry file', async () => {
    const dir = await tempCacheDir();
    const cache = new ResultCache(new JsonFileCacheStore(dir), { maxAgeMs: DAY_MS, now: () => FIXED_NOW });
    await cache.put('AXA', OUTCOME);
    await cache.put('Munich Re', OUTCOME);

    await cache.clear();

    expect(cache.stats().size).toBe(0);
    expect(await fs.readdir(dir)).toEqual([]);
  });
});
