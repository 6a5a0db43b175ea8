import crypto from "crypto";
import fs from "fs/promises";
import path from "path";
import { CorruptDocumentError } from "../errors.js";
import type { PipelineStage } from "../types.js";
import { JsonDocumentFile, isMissingFile } from "./json-document-file.js";

export interface DirectoryReadResult {
  documents: unknown[];
  corrupt: CorruptDocumentError[];
}

/**
 * One JSON file per key, named by the MD5 of the key. Saving a record
 * rewrites only that record's file.
 */
export class JsonRecordDirectory<T> {
  private readonly files = new Map<string, JsonDocumentFile<T>>();

  constructor(
    readonly dir: string,
    private readonly stage: PipelineStage
  ) {}

  fileFor(key: string): JsonDocumentFile<T> {
    let file = this.files.get(key);
    if (!file) {
      const name = crypto.createHash("md5").update(key).digest("hex");
      file = new JsonDocumentFile<T>(path.join(this.dir, `${name}.json`), this.stage);
      this.files.set(key, file);
    }
    return file;
  }

  /**
   * Parse every record file. A missing directory reads as empty; files that
   * cannot be parsed are reported, not thrown.
   */
  async readAll(): Promise<DirectoryReadResult> {
    const result: DirectoryReadResult = { documents: [], corrupt: [] };
    for (const name of await this.recordFileNames()) {
      const file = new JsonDocumentFile<T>(path.join(this.dir, name), this.stage);
      try {
        const document = await file.read();
        if (document !== undefined) {
          result.documents.push(document);
        }
      } catch (error) {
        if (!(error instanceof CorruptDocumentError)) throw error;
        result.corrupt.push(error);
      }
    }
    return result;
  }

  write(key: string, document: T): Promise<void> {
    return this.fileFor(key).write(document);
  }

  remove(key: string): Promise<void> {
    return this.fileFor(key).remove();
  }

  async removeFile(filePath: string): Promise<void> {
    await fs.rm(filePath, { force: true });
  }

  async clear(): Promise<void> {
    await Promise.all([...this.files.values()].map((file) => file.remove()));
    for (const name of await this.recordFileNames()) {
      await fs.rm(path.join(this.dir, name), { force: true });
    }
  }

  private async recordFileNames(): Promise<string[]> {
    try {
      const names = await fs.readdir(this.dir);
      return names.filter((name) => name.endsWith(".json")).sort();
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }
  }
}
