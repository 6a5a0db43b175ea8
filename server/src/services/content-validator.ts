/**
 * Quality gate between extraction and classification.
 *
 * Rejects text that cannot support a classification (empty, too short,
 * block pages and placeholders) and trims the rest to the configured
 * length, keeping sentences that describe the organization first.
 */

import { QualityError } from '../errors.js';
import { cleanText } from './content-fetcher.js';

const BOILERPLATE_PATTERNS: RegExp[] = [
  /access denied/i,
  /403 forbidden/i,
  /404 not found|page not found/i,
  /enable javascript|javascript is (disabled|required)/i,
  /just a moment\.\.\./i,
  /checking your browser/i,
  /are you a robot|captcha/i,
  /this domain (is|may be) for sale|buy this domain/i,
  /under construction|coming soon/i,
  /account (has been )?suspended/i,
  /we use cookies/i,
];

// Above this length a block-page phrase is assumed to be incidental
const BOILERPLATE_MAX_LENGTH = 600;

const DESCRIPTIVE_KEYWORDS = [
  'company',
  'organization',
  'organisation',
  'business',
  'industry',
  'founded',
  'headquarter',
  'mission',
  'services',
  'provides',
  'provider',
  'leading',
  'specializ',
  'specialis',
];

export interface ContentValidatorOptions {
  minLength: number;
  maxLength: number;
}

export interface ContentGate {
  validate(text: string, organizationName: string): string;
}

export function isBoilerplate(text: string): boolean {
  return text.length <= BOILERPLATE_MAX_LENGTH && BOILERPLATE_PATTERNS.some((pattern) => pattern.test(text));
}

export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+|\n+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

function truncateAtWord(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  const cut = text.slice(0, maxLength);
  const lastSpace = cut.lastIndexOf(' ');
  return lastSpace >= maxLength * 0.8 ? cut.slice(0, lastSpace) : cut;
}

/**
 * Fit text into maxLength. Descriptive sentences (and those naming the
 * organization) are taken first, then the rest in document order.
 */
export function prioritizeContent(text: string, maxLength: number, organizationName = ''): string {
  if (text.length <= maxLength) {
    return text;
  }

  const nameTokens = organizationName
    .toLowerCase()
    .split(/\s+/)
    .filter((token) => token.length >= 4);
  const isDescriptive = (sentence: string): boolean => {
    const lower = sentence.toLowerCase();
    return (
      DESCRIPTIVE_KEYWORDS.some((keyword) => lower.includes(keyword)) ||
      nameTokens.some((token) => lower.includes(token))
    );
  };

  const sentences = splitSentences(text);
  const ordered = [...sentences.filter(isDescriptive), ...sentences.filter((sentence) => !isDescriptive(sentence))];

  let result = '';
  for (const sentence of ordered) {
    const candidate = result ? `${result} ${sentence}` : sentence;
    if (candidate.length <= maxLength) {
      result = candidate;
    }
  }

  return result || truncateAtWord(text, maxLength);
}

export class ContentValidator implements ContentGate {
  constructor(private readonly options: ContentValidatorOptions) {}

  validate(text: string, organizationName: string): string {
    const cleaned = text
      .split(/\n{2,}/)
      .map(cleanText)
      .filter(Boolean)
      .join('\n');

    if (!cleaned) {
      throw new QualityError('No text extracted');
    }
    if (cleaned.length < this.options.minLength) {
      throw new QualityError(`Extracted text too short (${cleaned.length} < ${this.options.minLength} characters)`);
    }
    if (isBoilerplate(cleaned)) {
      throw new QualityError('Extracted text is a block page or placeholder');
    }

    return prioritizeContent(cleaned, this.options.maxLength, organizationName);
  }
}
