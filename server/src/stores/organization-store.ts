import path from "path";
import { createLogger } from "../logger.js";
import { isSearchMethod, isStageStatus, type OrganizationRecord, type PipelineStage } from "../types.js";
import { JsonRecordDirectory } from "./json-record-directory.js";

const logger = createLogger("organization-store");

/**
 * Durable storage for organization records
 */
export interface OrganizationStore {
  loadAll(): Promise<OrganizationRecord[]>;
  upsert(record: OrganizationRecord): Promise<void>;
  upsertMany(records: OrganizationRecord[]): Promise<void>;
}

const PIPELINE_STAGES: readonly PipelineStage[] = [
  "website_search",
  "content_fetch",
  "content_validate",
  "classify",
  "cache",
  "persistence",
  "config",
];

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === "string";
}

function isNullableNumber(value: unknown): value is number | null {
  return value === null || typeof value === "number";
}

export function isOrganizationRecord(value: unknown): value is OrganizationRecord {
  if (typeof value !== "object" || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.canonical_name === "string" &&
    typeof record.occurrence_count === "number" &&
    Array.isArray(record.raw_variants) &&
    record.raw_variants.every((variant) => typeof variant === "string") &&
    isNullableString(record.website_url) &&
    isSearchMethod(record.search_method) &&
    isNullableString(record.content_excerpt) &&
    (record.is_insurance === null || typeof record.is_insurance === "boolean") &&
    isStageStatus(record.stage_status) &&
    isNullableString(record.error_message) &&
    (record.error_stage === null ||
      PIPELINE_STAGES.some((stage) => stage === record.error_stage)) &&
    typeof record.retry_count === "number" &&
    isNullableNumber(record.processing_duration_ms) &&
    typeof record.last_updated === "string"
  );
}

/**
 * Registry persisted as one JSON file per organization under registry/.
 * An upsert rewrites only that organization's file, atomically.
 */
export class JsonFileOrganizationStore implements OrganizationStore {
  private readonly directory: JsonRecordDirectory<OrganizationRecord>;

  constructor(dir: string) {
    this.directory = new JsonRecordDirectory<OrganizationRecord>(dir, "persistence");
  }

  static inDirectory(outputDir: string): JsonFileOrganizationStore {
    return new JsonFileOrganizationStore(path.join(outputDir, "registry"));
  }

  get dir(): string {
    return this.directory.dir;
  }

  /** Path of the file holding one organization's record */
  recordPath(canonicalName: string): string {
    return this.directory.fileFor(canonicalName).filePath;
  }

  async loadAll(): Promise<OrganizationRecord[]> {
    const { documents, corrupt } = await this.directory.readAll();
    if (corrupt.length > 0) {
      throw corrupt[0];
    }

    const records: OrganizationRecord[] = [];
    let skipped = 0;
    for (const document of documents) {
      if (isOrganizationRecord(document)) {
        records.push(document);
      } else {
        skipped++;
      }
    }
    if (skipped > 0) {
      logger.warn({ skipped, dir: this.dir }, "Skipped malformed registry records");
    }
    return records.sort((a, b) => a.canonical_name.localeCompare(b.canonical_name));
  }

  async upsert(record: OrganizationRecord): Promise<void> {
    await this.directory.write(record.canonical_name, record);
  }

  async upsertMany(records: OrganizationRecord[]): Promise<void> {
    for (const record of records) {
      await this.directory.write(record.canonical_name, record);
    }
  }
}
