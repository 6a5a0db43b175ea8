/**
 * Text completion backend for the sector classifier, via the Anthropic
 * Messages API. Transient API failures (overloaded, 5xx, 429, connection
 * errors) are retried with backoff.
 */

import Anthropic, { APIConnectionError, APIError } from '@anthropic-ai/sdk';
import { ModelConfig } from '../config/models.js';
import { withRetry, type BackoffConfig } from '../utils/retry.js';

export interface ClassificationModel {
  complete(prompt: string): Promise<string>;
}

export interface ModelUsage {
  model: string;
  requests: number;
  failures: number;
  input_tokens: number;
  output_tokens: number;
}

/** Anything that can report model usage for the dashboard and the batch summary */
export interface UsageReporter {
  usage(): ModelUsage;
}

/** The parts of a Messages API request this model sends */
export interface MessageRequest {
  model: string;
  max_tokens: number;
  temperature: number;
  messages: Array<{ role: 'user'; content: string }>;
}

/** The parts of a Messages API response this model reads */
export interface MessageResult {
  content: Array<{ type: string; text?: string }>;
  usage: { input_tokens: number; output_tokens: number };
}

export type CreateMessage = (request: MessageRequest) => Promise<MessageResult>;

/**
 * Check if an error is a retryable Anthropic API error
 */
export function isRetryableAnthropicError(error: unknown): boolean {
  if (error instanceof APIConnectionError) {
    return true;
  }

  if (error instanceof APIError) {
    const status = error.status;
    if (status !== undefined && (status >= 500 || status === 429)) {
      return true;
    }
  }

  return error instanceof Error && error.message.includes('overloaded_error');
}

export interface AnthropicModelOptions {
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  retry: BackoffConfig;
  sleep?: (ms: number) => Promise<void>;
  /** Defaults to the SDK client's messages.create */
  createMessage?: CreateMessage;
}

export class AnthropicClassificationModel implements ClassificationModel, UsageReporter {
  private client: Anthropic | null = null;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly createMessage: CreateMessage;
  private requests = 0;
  private failures = 0;
  private inputTokens = 0;
  private outputTokens = 0;

  constructor(private readonly options: AnthropicModelOptions) {
    this.model = options.model ?? ModelConfig.classifier;
    this.maxTokens = options.maxTokens ?? ModelConfig.classifierMaxTokens;
    this.createMessage = options.createMessage ?? ((request) => this.getClient().messages.create(request));
  }

  private getClient(): Anthropic {
    if (!this.client) {
      this.client = new Anthropic({ apiKey: this.options.apiKey });
    }
    return this.client;
  }

  async complete(prompt: string): Promise<string> {
    this.requests++;
    let response: MessageResult;
    try {
      response = await withRetry(
        () =>
          this.createMessage({
            model: this.model,
            max_tokens: this.maxTokens,
            temperature: 0,
            messages: [{ role: 'user', content: prompt }],
          }),
        {
          ...this.options.retry,
          jitter: 0.25,
          isRetryable: isRetryableAnthropicError,
          operation: 'sector classification',
          sleep: this.options.sleep,
        }
      );
    } catch (error) {
      this.failures++;
      throw error;
    }

    this.inputTokens += response.usage.input_tokens;
    this.outputTokens += response.usage.output_tokens;
    const block = response.content.find((item) => item.type === 'text');
    return block?.text ?? '';
  }

  usage(): ModelUsage {
    return {
      model: this.model,
      requests: this.requests,
      failures: this.failures,
      input_tokens: this.inputTokens,
      output_tokens: this.outputTokens,
    };
  }
}
