/**
 * Organization registry
 *
 * The deduplicated entity table: one record per canonical organization,
 * keyed by canonical name. Every mutation is written through to the store
 * before the in-memory copy changes; a failed write is a PersistenceError.
 */

import { createLogger } from '../logger.js';
import { PersistenceError, UnknownOrganizationError, errorMessage } from '../errors.js';
import {
  isTerminalStatus,
  type OrganizationRecord,
  type StageStatus,
} from '../types.js';
import type { CanonicalGroup } from '../normalization/similarity-resolver.js';
import type { OrganizationStore } from '../stores/organization-store.js';

const logger = createLogger('organization-registry');

export interface SyncResult {
  created: number;
  refreshed: number;
  untouched: number;
}

export interface RegistryStats {
  total: number;
  by_status: Record<StageStatus, number>;
  insurance: number;
  not_insurance: number;
  unclassified: number;
}

export function newRecord(group: CanonicalGroup, now: Date): OrganizationRecord {
  return {
    canonical_name: group.canonical_name,
    occurrence_count: group.occurrence_count,
    raw_variants: [...group.variants],
    website_url: null,
    search_method: 'none',
    content_excerpt: null,
    is_insurance: null,
    stage_status: 'pending',
    error_message: null,
    error_stage: null,
    retry_count: 0,
    processing_duration_ms: null,
    last_updated: now.toISOString(),
  };
}

export function emptyStatusCounts(): Record<StageStatus, number> {
  return {
    pending: 0,
    website_search: 0,
    content_fetch: 0,
    content_validate: 0,
    classify: 0,
    completed: 0,
    website_not_found: 0,
    scraping_failed: 0,
    classification_failed: 0,
  };
}

export function summarizeRecords(records: Iterable<OrganizationRecord>): RegistryStats {
  const stats: RegistryStats = { total: 0, by_status: emptyStatusCounts(), insurance: 0, not_insurance: 0, unclassified: 0 };

  for (const record of records) {
    stats.total++;
    stats.by_status[record.stage_status]++;
    if (record.is_insurance === true) stats.insurance++;
    else if (record.is_insurance === false) stats.not_insurance++;
    else stats.unclassified++;
  }
  return stats;
}

export class OrganizationRegistry {
  private records = new Map<string, OrganizationRecord>();

  constructor(
    private readonly store: OrganizationStore,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async load(): Promise<number> {
    const records = await this.store.loadAll();
    this.records = new Map(records.map((record) => [record.canonical_name, record]));
    logger.info({ organizations: this.records.size }, 'Registry loaded');
    return this.records.size;
  }

  /**
   * Materialize records for a resolution result. New organizations start
   * pending; non-terminal ones get fresh counts and variants; terminal
   * records are left exactly as they are.
   */
  async syncFromResolution(groups: CanonicalGroup[]): Promise<SyncResult> {
    const result: SyncResult = { created: 0, refreshed: 0, untouched: 0 };
    const changed: OrganizationRecord[] = [];
    const now = this.clock();

    for (const group of groups) {
      const existing = this.records.get(group.canonical_name);
      if (!existing) {
        changed.push(newRecord(group, now));
        result.created++;
      } else if (isTerminalStatus(existing.stage_status)) {
        result.untouched++;
      } else {
        changed.push({
          ...existing,
          occurrence_count: group.occurrence_count,
          raw_variants: [...group.variants],
          last_updated: now.toISOString(),
        });
        result.refreshed++;
      }
    }

    if (changed.length > 0) {
      await this.persist(() => this.store.upsertMany(changed), `${changed.length} records`);
      for (const record of changed) {
        this.records.set(record.canonical_name, record);
      }
    }

    logger.info(result, 'Registry synchronized with resolved names');
    return result;
  }

  has(canonicalName: string): boolean {
    return this.records.has(canonicalName);
  }

  get(canonicalName: string): OrganizationRecord | undefined {
    const record = this.records.get(canonicalName);
    return record ? { ...record, raw_variants: [...record.raw_variants] } : undefined;
  }

  require(canonicalName: string): OrganizationRecord {
    const record = this.get(canonicalName);
    if (!record) {
      throw new UnknownOrganizationError(canonicalName);
    }
    return record;
  }

  all(): OrganizationRecord[] {
    return [...this.records.values()].map((record) => ({ ...record, raw_variants: [...record.raw_variants] }));
  }

  inStage(status: StageStatus): OrganizationRecord[] {
    return this.all().filter((record) => record.stage_status === status);
  }

  nonTerminal(): OrganizationRecord[] {
    return this.all().filter((record) => !isTerminalStatus(record.stage_status));
  }

  /**
   * Persist a mutated record. last_updated is stamped here.
   */
  async save(record: OrganizationRecord): Promise<OrganizationRecord> {
    if (!this.records.has(record.canonical_name)) {
      throw new UnknownOrganizationError(record.canonical_name);
    }
    const stamped: OrganizationRecord = { ...record, last_updated: this.clock().toISOString() };
    await this.persist(() => this.store.upsert(stamped), record.canonical_name);
    this.records.set(stamped.canonical_name, stamped);
    return { ...stamped };
  }

  stats(): RegistryStats {
    return summarizeRecords(this.records.values());
  }

  /** Read-only export of every record */
  snapshot(): OrganizationRecord[] {
    return this.all().sort((a, b) => a.canonical_name.localeCompare(b.canonical_name));
  }

  private async persist(write: () => Promise<void>, subject: string): Promise<void> {
    try {
      await write();
    } catch (error) {
      logger.error({ err: error, subject }, 'Registry write failed');
      throw new PersistenceError(`Failed to persist ${subject}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
