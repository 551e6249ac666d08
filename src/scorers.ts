/**
 * Scorer registry
 *
 * Every similarity scorer shares one shape, (query, candidate) → score, so
 * the matcher is written once and picks its scorer by name.
 */

import { DEFAULT_CONFIG, type ScorerName } from './config.js';
import { InvalidMethodError } from './errors.js';
import { ngramScore } from './ngram.js';
import { phoneticScore } from './soundex.js';
import { editScore } from './edit-distance.js';

export type Scorer = (a: string, b: string) => number;

export interface ScorerDefinition {
  name: ScorerName;
  /** Column holding the best score in matched tables */
  scoreColumn: string;
  /** Column holding the variation that produced the best score */
  formColumn: string;
  create: (options: ScorerOptions) => Scorer;
}

export interface ScorerOptions {
  /** N-gram length for the ngram scorer (default 3) */
  ngramSize?: number;
  /** Padding character for the ngram scorer (default "$") */
  padChar?: string;
}

export const SCORERS: Readonly<Record<ScorerName, ScorerDefinition>> = {
  ngram: {
    name: 'ngram',
    scoreColumn: 'ngram_score',
    formColumn: 'best_ngram_form',
    create: ({ ngramSize = DEFAULT_CONFIG.NGRAM_SIZE, padChar = DEFAULT_CONFIG.PAD_CHAR }) =>
      (a, b) => ngramScore(a, b, ngramSize, padChar),
  },
  phonetic: {
    name: 'phonetic',
    scoreColumn: 'phonetic_match',
    formColumn: 'best_phonetic_form',
    create: () => phoneticScore,
  },
  levenshtein: {
    name: 'levenshtein',
    scoreColumn: 'levenshtein_score',
    formColumn: 'best_levenshtein_form',
    create: () => editScore,
  },
};

export function isScorerName(value: string): value is ScorerName {
  return Object.prototype.hasOwnProperty.call(SCORERS, value);
}

/**
 * Look up a scorer definition, failing on names outside the registry
 */
export function getScorerDefinition(name: string): ScorerDefinition {
  if (!isScorerName(name)) {
    throw new InvalidMethodError(name);
  }
  return SCORERS[name];
}
