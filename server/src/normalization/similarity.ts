/**
 * String similarity scores on a 0-100 scale, computed on comparison keys.
 */

import { distance } from 'fastest-levenshtein';

export function tokenize(key: string): string[] {
  return key.split(' ').filter((token) => token.length > 0);
}

/**
 * 100 * (1 - levenshtein / longer length). Two empty strings are identical.
 */
export function editRatio(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) {
    return 100;
  }
  return 100 * (1 - distance(a, b) / longest);
}

/**
 * Token-set ratio: compares the shared tokens against each side's full
 * token set, so word order and a subset relationship do not lower the score.
 */
export function tokenSetRatio(a: string, b: string): number {
  const tokensA = new Set(tokenize(a));
  const tokensB = new Set(tokenize(b));

  if (tokensA.size === 0 || tokensB.size === 0) {
    return tokensA.size === tokensB.size ? 100 : 0;
  }

  const shared = [...tokensA].filter((token) => tokensB.has(token)).sort();
  const onlyA = [...tokensA].filter((token) => !tokensB.has(token)).sort();
  const onlyB = [...tokensB].filter((token) => !tokensA.has(token)).sort();

  const base = shared.join(' ');
  const withA = [...shared, ...onlyA].join(' ');
  const withB = [...shared, ...onlyB].join(' ');

  return Math.max(editRatio(base, withA), editRatio(base, withB), editRatio(withA, withB));
}

/** Mean of token-set ratio and edit ratio */
export function combinedSimilarity(a: string, b: string): number {
  return (tokenSetRatio(a, b) + editRatio(a, b)) / 2;
}
