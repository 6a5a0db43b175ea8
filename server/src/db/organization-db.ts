import { getClient, query } from "./client.js";
import type { OrganizationStore } from "../stores/organization-store.js";
import {
  isSearchMethod,
  isStageStatus,
  type OrganizationRecord,
  type PipelineStage,
} from "../types.js";

export interface OrganizationRow {
  canonical_name: string;
  occurrence_count: number;
  raw_variants: unknown;
  website_url: string | null;
  search_method: string;
  content_excerpt: string | null;
  is_insurance: boolean | null;
  stage_status: string;
  error_message: string | null;
  error_stage: string | null;
  retry_count: number;
  processing_duration_ms: number | null;
  last_updated: Date | string;
}

const ERROR_STAGES: readonly PipelineStage[] = [
  "website_search",
  "content_fetch",
  "content_validate",
  "classify",
  "cache",
  "persistence",
  "config",
];

const UPSERT_SQL = `
  INSERT INTO organizations (
    canonical_name, occurrence_count, raw_variants, website_url, search_method,
    content_excerpt, is_insurance, stage_status, error_message, error_stage,
    retry_count, processing_duration_ms, last_updated
  ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
  ON CONFLICT (canonical_name) DO UPDATE SET
    occurrence_count = EXCLUDED.occurrence_count,
    raw_variants = EXCLUDED.raw_variants,
    website_url = EXCLUDED.website_url,
    search_method = EXCLUDED.search_method,
    content_excerpt = EXCLUDED.content_excerpt,
    is_insurance = EXCLUDED.is_insurance,
    stage_status = EXCLUDED.stage_status,
    error_message = EXCLUDED.error_message,
    error_stage = EXCLUDED.error_stage,
    retry_count = EXCLUDED.retry_count,
    processing_duration_ms = EXCLUDED.processing_duration_ms,
    last_updated = EXCLUDED.last_updated`;

function upsertParams(record: OrganizationRecord): unknown[] {
  return [
    record.canonical_name,
    record.occurrence_count,
    JSON.stringify(record.raw_variants),
    record.website_url,
    record.search_method,
    record.content_excerpt,
    record.is_insurance,
    record.stage_status,
    record.error_message,
    record.error_stage,
    record.retry_count,
    record.processing_duration_ms === null ? null : Math.round(record.processing_duration_ms),
    record.last_updated,
  ];
}

/**
 * Map a database row to a record. Rows with unknown enum values are rejected.
 */
export function rowToRecord(row: OrganizationRow): OrganizationRecord | null {
  if (!isStageStatus(row.stage_status) || !isSearchMethod(row.search_method)) {
    return null;
  }
  const errorStage = ERROR_STAGES.find((stage) => stage === row.error_stage) ?? null;
  const variants = Array.isArray(row.raw_variants)
    ? row.raw_variants.filter((variant): variant is string => typeof variant === "string")
    : [];

  return {
    canonical_name: row.canonical_name,
    occurrence_count: row.occurrence_count,
    raw_variants: variants,
    website_url: row.website_url,
    search_method: row.search_method,
    content_excerpt: row.content_excerpt,
    is_insurance: row.is_insurance,
    stage_status: row.stage_status,
    error_message: row.error_message,
    error_stage: errorStage,
    retry_count: row.retry_count,
    processing_duration_ms: row.processing_duration_ms,
    last_updated: row.last_updated instanceof Date ? row.last_updated.toISOString() : row.last_updated,
  };
}

/**
 * PostgreSQL-backed organization store
 */
export class OrganizationDatabase implements OrganizationStore {
  async loadAll(): Promise<OrganizationRecord[]> {
    const result = await query<OrganizationRow>(
      "SELECT * FROM organizations ORDER BY canonical_name"
    );
    const records: OrganizationRecord[] = [];
    for (const row of result.rows) {
      const record = rowToRecord(row);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  async upsert(record: OrganizationRecord): Promise<void> {
    await query(UPSERT_SQL, upsertParams(record));
  }

  /**
   * Upsert in one transaction so a sync is all-or-nothing
   */
  async upsertMany(records: OrganizationRecord[]): Promise<void> {
    if (records.length === 0) return;

    const client = await getClient();
    try {
      await client.query("BEGIN");
      for (const record of records) {
        await client.query(UPSERT_SQL, upsertParams(record));
      }
      await client.query("COMMIT");
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }
}
