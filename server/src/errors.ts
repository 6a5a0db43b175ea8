/**
 * Error taxonomy for the enrichment pipeline
 *
 * Stage errors are caught at the orchestrator boundary and recorded on the
 * organization. PersistenceError is the exception: it ends the run.
 */

import type { PipelineStage } from './types.js';

export class PipelineError extends Error {
  readonly code: string;
  readonly stage: PipelineStage;

  constructor(message: string, code: string, stage: PipelineStage, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.stage = stage;
  }
}

/** No search backend produced a plausible organizational URL */
export class NotFoundError extends PipelineError {
  constructor(message: string) {
    super(message, 'website_not_found', 'website_search');
  }
}

export class FetchError extends PipelineError {
  readonly url: string;
  readonly status: number | null;
  readonly retryable: boolean;

  constructor(
    message: string,
    details: { url: string; status?: number | null; retryable: boolean },
    options?: { cause?: unknown }
  ) {
    super(message, 'fetch_failed', 'content_fetch', options);
    this.url = details.url;
    this.status = details.status ?? null;
    this.retryable = details.retryable;
  }
}

/** Fetched text is empty, too short or boilerplate */
export class QualityError extends PipelineError {
  constructor(message: string) {
    super(message, 'low_quality_content', 'content_validate');
  }
}

export class ClassifyError extends PipelineError {
  readonly rawAnswer: string | null;

  constructor(message: string, rawAnswer: string | null = null, options?: { cause?: unknown }) {
    super(message, 'classification_failed', 'classify', options);
    this.rawAnswer = rawAnswer;
  }
}

/** A persisted JSON document exists but cannot be parsed */
export class CorruptDocumentError extends PipelineError {
  readonly filePath: string;

  constructor(filePath: string, stage: PipelineStage, options?: { cause?: unknown }) {
    super(`Cannot parse ${filePath}`, 'corrupt_document', stage, options);
    this.filePath = filePath;
  }
}

export class CacheCorruptionError extends CorruptDocumentError {
  constructor(filePath: string, options?: { cause?: unknown }) {
    super(filePath, 'cache', options);
  }
}

/** Registry writes failed; the run cannot continue without losing progress */
export class PersistenceError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'persistence_failed', 'persistence', options);
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super(message, 'invalid_config', 'config');
  }
}

export class UnknownOrganizationError extends Error {
  readonly canonicalName: string;

  constructor(canonicalName: string) {
    super(`Organization not registered: ${canonicalName}`);
    this.name = 'UnknownOrganizationError';
    this.canonicalName = canonicalName;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
