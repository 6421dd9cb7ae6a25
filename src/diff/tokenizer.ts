// Tokenizer - turns raw block/cell text into comparison tokens

import type { NormalizationPolicy } from '../config/comparison-config';

const WHITESPACE_RUN = /(\s+)/u;
const PUNCTUATION = /\p{P}/gu;

// Joins signature parts; cannot occur in normalized text
const UNIT_SEPARATOR = '␟';

/**
 * Split text into tokens under the given policy. Pure: identical input always
 * yields an identical token array.
 */
export function tokenize(text: string, policy: NormalizationPolicy): string[] {
  let normalized = text.normalize('NFC');
  if (policy.caseFold) {
    normalized = normalized.toLowerCase();
  }

  let tokens: string[];
  if (policy.collapseWhitespace) {
    tokens = normalized.split(/\s+/u).filter(t => t.length > 0);
  } else {
    // Keep whitespace runs as tokens so spacing changes are visible
    tokens = normalized.split(WHITESPACE_RUN).filter(t => t.length > 0);
  }

  if (policy.stripPunctuation) {
    tokens = tokens
      .map(t => t.replace(PUNCTUATION, ''))
      .filter(t => t.length > 0);
  }

  return tokens;
}

/** Normalized text of a block, tokens joined by single spaces */
export function normalizeText(text: string, policy: NormalizationPolicy): string {
  return tokenize(text, policy).join(' ');
}

/** Exact-match key for a unit (block, cell or row) */
export function signature(tokens: string[]): string {
  return tokens.join(UNIT_SEPARATOR);
}

/** Row key: cell signatures joined so that cell boundaries still count */
export function rowSignature(cells: string[][]): string {
  return cells.map(signature).join(UNIT_SEPARATOR + UNIT_SEPARATOR);
}
