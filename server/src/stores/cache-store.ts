import path from "path";
import { CacheCorruptionError } from "../errors.js";
import { createLogger } from "../logger.js";
import { isSearchMethod, type CacheEntry } from "../types.js";
import { JsonRecordDirectory, type DirectoryReadResult } from "./json-record-directory.js";

const logger = createLogger("cache-store");

export interface CacheLoadResult {
  entries: Map<string, CacheEntry>;
  /** Stored entries that could not be read and were discarded */
  discarded: number;
}

/**
 * Durable storage behind the result cache. Keys are already normalized.
 */
export interface CacheStore {
  /** Throws CacheCorruptionError when the store as a whole cannot be read */
  load(): Promise<CacheLoadResult>;
  save(key: string, entry: CacheEntry): Promise<void>;
  remove(key: string): Promise<void>;
  clear(): Promise<void>;
}

interface CacheFile {
  key: string;
  entry: CacheEntry;
}

export function isCacheEntry(value: unknown): value is CacheEntry {
  if (typeof value !== "object" || value === null) return false;
  if (!("canonical_name" in value) || typeof value.canonical_name !== "string") return false;
  if (!("cached_at" in value) || typeof value.cached_at !== "string") return false;
  if (Number.isNaN(Date.parse(value.cached_at))) return false;
  if (!("outcome" in value) || typeof value.outcome !== "object" || value.outcome === null) return false;

  const outcome: Record<string, unknown> = { ...value.outcome };
  return (
    typeof outcome.website_url === "string" &&
    isSearchMethod(outcome.search_method) &&
    typeof outcome.content_excerpt === "string" &&
    typeof outcome.is_insurance === "boolean"
  );
}

function isCacheFile(value: unknown): value is CacheFile {
  return (
    typeof value === "object" &&
    value !== null &&
    "key" in value &&
    typeof value.key === "string" &&
    "entry" in value &&
    isCacheEntry(value.entry)
  );
}

/**
 * Cache persisted as one JSON file per entry under cache/. Unreadable entry
 * files are deleted on load and counted as discarded.
 */
export class JsonFileCacheStore implements CacheStore {
  private readonly directory: JsonRecordDirectory<CacheFile>;

  constructor(dir: string) {
    this.directory = new JsonRecordDirectory<CacheFile>(dir, "cache");
  }

  static inDirectory(outputDir: string): JsonFileCacheStore {
    return new JsonFileCacheStore(path.join(outputDir, "cache"));
  }

  entryPath(key: string): string {
    return this.directory.fileFor(key).filePath;
  }

  async load(): Promise<CacheLoadResult> {
    let read: DirectoryReadResult;
    try {
      read = await this.directory.readAll();
    } catch (error) {
      throw new CacheCorruptionError(this.directory.dir, { cause: error });
    }

    const entries = new Map<string, CacheEntry>();
    let malformed = 0;
    for (const document of read.documents) {
      if (isCacheFile(document)) {
        entries.set(document.key, document.entry);
      } else {
        malformed++;
      }
    }

    for (const error of read.corrupt) {
      logger.warn({ filePath: error.filePath }, "Discarding unparseable cache entry");
      await this.directory.removeFile(error.filePath);
    }
    if (malformed > 0) {
      logger.warn({ malformed, dir: this.directory.dir }, "Skipped malformed cache entries");
    }
    return { entries, discarded: read.corrupt.length + malformed };
  }

  async save(key: string, entry: CacheEntry): Promise<void> {
    await this.directory.write(key, { key, entry });
  }

  async remove(key: string): Promise<void> {
    await this.directory.remove(key);
  }

  async clear(): Promise<void> {
    await this.directory.clear();
  }
}
