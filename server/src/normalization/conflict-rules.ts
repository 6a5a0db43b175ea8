/**
 * Distinct-entity rules
 *
 * A rule vetoes a merge between two comparison keys that score as similar
 * but name different organizations ("Bank of North America" and
 * "Bank of South America"). Rules only ever split; they never force a merge.
 */

import fs from 'fs';
import path from 'path';
import { getDataPath } from '../config.js';
import { ConfigError } from '../errors.js';
import { tokenize } from './similarity.js';

export interface DistinctEntityRule {
  readonly name: string;
  /** true when a and b must stay separate organizations */
  isDistinct(a: string, b: string): boolean;
}

export const STOPWORDS: ReadonlySet<string> = new Set([
  'a', 'an', 'and', 'at', 'da', 'das', 'de', 'del', 'della', 'der', 'des', 'di', 'do',
  'dos', 'du', 'e', 'et', 'for', 'in', 'la', 'le', 'les', 'of', 'on', 'the', 'und',
  'van', 'von', 'y',
]);

export function significantTokens(key: string): string[] {
  return tokenize(key).filter((token) => !STOPWORDS.has(token));
}

function sameSet(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  if (a.size !== b.size) return false;
  for (const value of a) {
    if (!b.has(value)) return false;
  }
  return true;
}

/**
 * Geographic qualifiers (countries, regions, demonyms) must match exactly.
 * Multi-word qualifiers are matched as phrases.
 */
export function geoQualifierRule(qualifiers: Iterable<string>): DistinctEntityRule {
  const phrases = [...new Set(qualifiers)];

  const extract = (key: string): Set<string> => {
    const padded = ` ${key} `;
    return new Set(phrases.filter((phrase) => padded.includes(` ${phrase} `)));
  };

  return {
    name: 'geo_qualifier',
    isDistinct(a, b) {
      return !sameSet(extract(a), extract(b));
    },
  };
}

const ROMAN_NUMERALS = new Set(['ii', 'iii', 'iv', 'vi', 'vii', 'viii', 'ix', 'xi', 'xii', 'xiii', 'xiv', 'xv']);

/** "Fund 2" vs "Fund 3", "Partners II" vs "Partners III" */
export function numberedEntityRule(): DistinctEntityRule {
  const extract = (key: string): Set<string> =>
    new Set(tokenize(key).filter((token) => /^\d+$/.test(token) || ROMAN_NUMERALS.has(token)));

  return {
    name: 'numbered_entity',
    isDistinct(a, b) {
      return !sameSet(extract(a), extract(b));
    },
  };
}

export const DEFAULT_OPPOSING_PAIRS: ReadonlyArray<readonly [string, string]> = [
  ['north', 'south'],
  ['east', 'west'],
  ['northern', 'southern'],
  ['eastern', 'western'],
  ['bank', 'fund'],
  ['development', 'investment'],
  ['international', 'national'],
  ['global', 'local'],
  ['public', 'private'],
  ['life', 'general'],
  ['upper', 'lower'],
];

/**
 * One side carries a keyword and the other its opposite
 */
export function opposingKeywordRule(
  pairs: ReadonlyArray<readonly [string, string]> = DEFAULT_OPPOSING_PAIRS
): DistinctEntityRule {
  return {
    name: 'opposing_keyword',
    isDistinct(a, b) {
      const tokensA = new Set(tokenize(a));
      const tokensB = new Set(tokenize(b));
      return pairs.some(([left, right]) => {
        const aLeftOnly = tokensA.has(left) && !tokensA.has(right);
        const aRightOnly = tokensA.has(right) && !tokensA.has(left);
        const bLeftOnly = tokensB.has(left) && !tokensB.has(right);
        const bRightOnly = tokensB.has(right) && !tokensB.has(left);
        return (aLeftOnly && bRightOnly) || (aRightOnly && bLeftOnly);
      });
    },
  };
}

/**
 * Jaccard overlap of significant tokens below the minimum means the names
 * only share surface characters.
 */
export function tokenOverlapRule(minJaccard = 0.3): DistinctEntityRule {
  return {
    name: 'low_token_overlap',
    isDistinct(a, b) {
      const tokensA = new Set(significantTokens(a));
      const tokensB = new Set(significantTokens(b));
      if (tokensA.size === 0 || tokensB.size === 0) {
        return false;
      }
      const shared = [...tokensA].filter((token) => tokensB.has(token)).length;
      const union = new Set([...tokensA, ...tokensB]).size;
      return shared / union < minJaccard;
    },
  };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

export function loadGeoQualifiers(dataDir: string = getDataPath()): string[] {
  const filePath = path.join(dataDir, 'geo-qualifiers.json');
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));

  if (typeof parsed !== 'object' || parsed === null || !('qualifiers' in parsed) || !isStringArray(parsed.qualifiers)) {
    throw new ConfigError(`${filePath} must contain a "qualifiers" string array`);
  }
  return parsed.qualifiers.map((qualifier) => qualifier.trim().toLowerCase()).filter(Boolean);
}

export function defaultDistinctEntityRules(dataDir?: string): DistinctEntityRule[] {
  return [
    geoQualifierRule(loadGeoQualifiers(dataDir)),
    numberedEntityRule(),
    opposingKeywordRule(),
    tokenOverlapRule(),
  ];
}

/** First rule that keeps a and b apart, if any */
export function findDistinctRule(
  rules: readonly DistinctEntityRule[],
  a: string,
  b: string
): DistinctEntityRule | undefined {
  return rules.find((rule) => rule.isDistinct(a, b));
}
