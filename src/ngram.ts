/**
 * N-gram Similarity
 *
 * Character n-gram overlap between two strings. Both strings are padded with
 * n-1 pad characters on each side so that leading and trailing characters
 * take part in as many grams as inner ones:
 *
 *   "abc" (n=3) → $$abc$$ → [$$a, $ab, abc, bc$, c$$]
 *
 * Similarity is the multiset Jaccard coefficient of the two gram bags:
 *
 *   shared / (grams(a) + grams(b) - shared)
 *
 * Comparison is case-sensitive.
 */

import { DEFAULT_CONFIG } from './config.js';

/**
 * Split a string into padded character n-grams, counted by occurrence
 */
export function ngrams(
  text: string,
  n: number = DEFAULT_CONFIG.NGRAM_SIZE,
  padChar: string = DEFAULT_CONFIG.PAD_CHAR
): Map<string, number> {
  if (!Number.isInteger(n) || n < 1) {
    throw new RangeError(`N-gram size must be a positive integer (got ${n})`);
  }

  const padding = padChar.repeat(n - 1);
  const chars = Array.from(padding + (text || '') + padding);
  const grams = new Map<string, number>();

  for (let i = 0; i + n <= chars.length; i++) {
    const gram = chars.slice(i, i + n).join('');
    grams.set(gram, (grams.get(gram) || 0) + 1);
  }

  return grams;
}

function totalCount(grams: Map<string, number>): number {
  let total = 0;
  for (const count of grams.values()) total += count;
  return total;
}

/**
 * Calculate n-gram similarity between two strings
 *
 * @param n - Gram length (default 3)
 * @param padChar - Padding character (default "$")
 * @returns Similarity score between 0 (no shared grams) and 1 (identical)
 */
export function ngramScore(
  a: string,
  b: string,
  n: number = DEFAULT_CONFIG.NGRAM_SIZE,
  padChar: string = DEFAULT_CONFIG.PAD_CHAR
): number {
  if (a === b) return 1.0;

  const gramsA = ngrams(a, n, padChar);
  const gramsB = ngrams(b, n, padChar);

  let shared = 0;
  for (const [gram, countA] of gramsA) {
    const countB = gramsB.get(gram);
    if (countB) shared += Math.min(countA, countB);
  }

  if (shared === 0) return 0;

  const all = totalCount(gramsA) + totalCount(gramsB) - shared;
  return shared / all;
}
