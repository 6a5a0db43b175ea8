/**
 * Insurance sector classification
 *
 * Asks the model a Yes/No question about the organization's content and
 * interprets the answer strictly. An answer that is not a clean Yes or No
 * gets one follow-up request whose response is parsed leniently; if that
 * fails too the organization ends in classification_failed.
 */

import { createLogger } from '../logger.js';
import { ClassifyError, errorMessage } from '../errors.js';
import type { ClassificationAnswer } from '../types.js';
import type { RateGate } from '../utils/rate-limiter.js';
import type { ClassificationModel } from './classification-model.js';

const logger = createLogger('sector-classifier');

export interface Classifier {
  classify(content: string, organizationName: string): Promise<ClassificationAnswer>;
}

const YES_WORDS = new Set(['yes', 'y', 'sim', 'si', 'sí', 'oui', 'ja', 'true']);
const NO_WORDS = new Set(['no', 'n', 'nao', 'não', 'non', 'nein', 'nee', 'false']);

export function buildClassificationPrompt(organizationName: string, content: string): string {
  return [
    'Decide whether the organization below operates in the insurance sector.',
    'Insurance sector includes insurers, reinsurers, insurance brokers and agents,',
    'insurtech companies, mutual and cooperative insurers, and insurance or',
    'reinsurance associations. Banks, asset managers and consultancies that',
    'only have some insurance clients do not count.',
    '',
    `Organization: ${organizationName}`,
    'Website content:',
    content,
    '',
    'Answer with exactly one word: Yes or No.',
  ].join('\n');
}

export function buildFollowUpPrompt(organizationName: string, content: string): string {
  return [
    `Is "${organizationName}" an insurance-sector organization, based on this text?`,
    content,
    '',
    'Reply with the single word Yes or the single word No. No explanation.',
  ].join('\n');
}

/**
 * Strict reading: the whole answer is Yes or No, ignoring case, surrounding
 * whitespace and one trailing period.
 */
export function normalizeAnswer(raw: string): ClassificationAnswer | null {
  const answer = raw.trim().replace(/\.$/, '').toLowerCase();
  if (answer === 'yes') return 'Yes';
  if (answer === 'no') return 'No';
  return null;
}

/**
 * Lenient reading used after a follow-up: strips quotes, markdown and
 * punctuation, then reads the first word, accepting common translations.
 */
export function cleanAnswer(raw: string): ClassificationAnswer | null {
  const cleaned = raw
    .normalize('NFC')
    .toLowerCase()
    .replace(/[*_`"'“”‘’#>]/g, ' ')
    .replace(/^[\s:\-–]*(answer|resposta|respuesta|réponse|antwort)\s*[:\-–]\s*/i, '')
    .trim();
  const firstWord = cleaned.split(/[^\p{L}]+/u).find((word) => word.length > 0);
  if (!firstWord) return null;
  if (YES_WORDS.has(firstWord)) return 'Yes';
  if (NO_WORDS.has(firstWord)) return 'No';
  return null;
}

export class SectorClassifier implements Classifier {
  constructor(
    private readonly model: ClassificationModel,
    private readonly gate: RateGate
  ) {}

  async classify(content: string, organizationName: string): Promise<ClassificationAnswer> {
    const first = await this.ask(buildClassificationPrompt(organizationName, content), organizationName);
    const strict = normalizeAnswer(first);
    if (strict) {
      return strict;
    }

    logger.warn({ organization: organizationName, answer: first }, 'Unparseable classification answer, asking again');
    const second = await this.ask(buildFollowUpPrompt(organizationName, content), organizationName);
    const answer = normalizeAnswer(second) ?? cleanAnswer(second);
    if (answer) {
      return answer;
    }

    throw new ClassifyError(`Unparseable classifier answer: "${second.slice(0, 80)}"`, second);
  }

  private async ask(prompt: string, organizationName: string): Promise<string> {
    await this.gate.acquire();
    try {
      return await this.model.complete(prompt);
    } catch (error) {
      throw new ClassifyError(`Classifier request failed for ${organizationName}: ${errorMessage(error)}`, null, {
        cause: error,
      });
    }
  }
}
