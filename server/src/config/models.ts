/**
 * Centralized AI model configuration
 *
 * Default models can be overridden via environment variables.
 */

export const ModelConfig = {
  /**
   * Model used for the insurance sector Yes/No question
   * Default: claude-haiku-4-5
   * Override: CLASSIFIER_MODEL
   */
  classifier: process.env.CLASSIFIER_MODEL || 'claude-haiku-4-5',

  /**
   * Answers are a single word; a small budget keeps them that way
   * Override: CLASSIFIER_MAX_TOKENS
   */
  classifierMaxTokens: Number(process.env.CLASSIFIER_MAX_TOKENS) || 10,
} as const;
