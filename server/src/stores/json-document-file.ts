import fs from "fs/promises";
import path from "path";
import { CorruptDocumentError } from "../errors.js";
import type { PipelineStage } from "../types.js";

/**
 * A JSON document on disk with atomic replace-on-write.
 *
 * Writes go to a temporary sibling and are renamed over the target, so a
 * crash mid-write leaves the previous version intact. Writes and removals
 * are chained so two callers never interleave.
 */
export class JsonDocumentFile<T> {
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    readonly filePath: string,
    private readonly stage: PipelineStage
  ) {}

  /**
   * Read and parse the document. Missing file reads as undefined;
   * unparseable content throws CorruptDocumentError.
   */
  async read(): Promise<unknown> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new CorruptDocumentError(this.filePath, this.stage, { cause: error });
    }
  }

  write(document: T): Promise<void> {
    const body = JSON.stringify(document, null, 2);
    return this.enqueue(() => this.replace(body));
  }

  remove(): Promise<void> {
    return this.enqueue(() => fs.rm(this.filePath, { force: true }));
  }

  private enqueue(operation: () => Promise<void>): Promise<void> {
    const next = this.writeChain.then(operation);
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  private async replace(body: string): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmpPath, body, "utf-8");
    await fs.rename(tmpPath, this.filePath);
  }
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
