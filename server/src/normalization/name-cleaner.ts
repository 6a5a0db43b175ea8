/**
 * Organization name cleaning
 *
 * Two forms come out of a raw spreadsheet cell:
 * - display: what a person would write (quotes, stray punctuation and
 *   whitespace removed, casing kept)
 * - key: the comparison form (accent-free, case-folded, punctuation-free,
 *   legal-form suffixes dropped)
 *
 * The key is always computed from the display form, so key(display(x)) == key(x).
 */

const EDGE_QUOTES = /^["'`“”‘’«»]+|["'`“”‘’«»]+$/g;
const LEADING_JUNK = /^[\s\-–—•*·.,;:|/\\]+/;
const TRAILING_JUNK = /[\s\-–—•*·.,;:!?|/\\_]+$/;

// Single letters separated by dots ("S.A.", "U.S.") collapse to one token
const DOTTED_INITIALS = /(?<![\p{L}\p{N}])(\p{L})\.(?=\p{L}(?![\p{L}\p{N}]))/gu;

const LEGAL_SUFFIXES = new Set([
  'inc', 'incorporated', 'corp', 'corporation', 'ltd', 'limited', 'llc', 'llp', 'lp',
  'plc', 'se', 'sa', 'sas', 'sarl', 'ag', 'gmbh', 'kg', 'kgaa', 'bv', 'nv', 'spa',
  'srl', 'oy', 'oyj', 'ab', 'pte', 'pty', 'co', 'company', 'group', 'holding',
  'holdings', 'ltda', 'sl', 'cv',
]);

export interface CleanedName {
  display: string;
  key: string;
}

/**
 * Human-facing form of a raw organization string
 */
export function toDisplayName(raw: string): string {
  let current = raw.replace(/\s+/g, ' ').trim();
  let previous: string;
  do {
    previous = current;
    current = current
      .replace(EDGE_QUOTES, '')
      .replace(LEADING_JUNK, '')
      .replace(TRAILING_JUNK, '')
      .trim();
  } while (current !== previous);
  return current;
}

/**
 * Comparison key. Empty only when the input has no letters or digits.
 */
export function toComparisonKey(raw: string): string {
  const folded = toDisplayName(raw)
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(DOTTED_INITIALS, '$1')
    .replace(/&/g, ' and ')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();

  if (!folded) {
    return '';
  }

  const tokens = folded.split(' ');
  if (tokens.length > 1 && tokens[0] === 'the') {
    tokens.shift();
  }
  while (tokens.length > 1 && LEGAL_SUFFIXES.has(tokens[tokens.length - 1])) {
    tokens.pop();
  }
  // "Smith & Co" leaves a dangling conjunction once the suffix is gone
  if (tokens.length > 1 && tokens[tokens.length - 1] === 'and') {
    tokens.pop();
  }
  return tokens.join(' ');
}

export function cleanName(raw: string): CleanedName {
  const display = toDisplayName(raw);
  return { display, key: toComparisonKey(display) };
}
