// =============================================================================
// DEFAULT CONFIGURATION
// =============================================================================

export type ScorerName = 'ngram' | 'phonetic' | 'levenshtein';

export type MatchMethod = ScorerName | 'hybrid';

export const MATCH_METHODS: readonly MatchMethod[] = ['hybrid', 'ngram', 'phonetic', 'levenshtein'];

const DEFAULT_METHOD: MatchMethod = 'hybrid';

export const DEFAULT_CONFIG = {
  /** Character n-gram length used by the n-gram scorer */
  NGRAM_SIZE: 3,
  /** Padding character added around strings before n-gram splitting */
  PAD_CHAR: '$',
  TOP_N: 5,
  METHOD: DEFAULT_METHOD,
};

export function isMatchMethod(value: string): value is MatchMethod {
  return MATCH_METHODS.some(method => method === value);
}
