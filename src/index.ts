/**
 * acromatch - acronym-aware fuzzy matching of names against a candidate list
 *
 * @packageDocumentation
 */

// ============================================================================
// CONFIGURATION & ERRORS
// ============================================================================

export {
  DEFAULT_CONFIG,
  MATCH_METHODS,
  isMatchMethod,
  type MatchMethod,
  type ScorerName,
} from './config.js';

export {
  MatchError,
  InvalidColumnError,
  InvalidMethodError,
  DictionaryFormatError,
  type MatchErrorCode,
} from './errors.js';

// ============================================================================
// ACRONYM EXPANSION
// ============================================================================

export {
  expandAcronyms,
  type AcronymDictionary,
} from './acronyms.js';

// ============================================================================
// SIMILARITY SCORERS
// ============================================================================

export { ngrams, ngramScore } from './ngram.js';
export { soundex, phoneticScore } from './soundex.js';
export { editDistance, editScore } from './edit-distance.js';

export {
  SCORERS,
  isScorerName,
  getScorerDefinition,
  type Scorer,
  type ScorerDefinition,
  type ScorerOptions,
} from './scorers.js';

// ============================================================================
// TABLES, MATCHING & RANKING
// ============================================================================

export {
  createTable,
  resolveColumn,
  type CandidateRow,
  type CandidateTable,
} from './table.js';

export {
  matchCandidates,
  match,
  type MatchRecord,
  type MatchOptions,
} from './matcher.js';

export {
  rankCandidates,
  topMatches,
  type RankOptions,
  type RankedMatch,
} from './ranker.js';

// ============================================================================
// PARSER
// ============================================================================

export {
  type ParsedCandidateResult,
  type SupportedFormat,
  getFileType,
  getSupportedExtensions,
  splitRecords,
  parseCSV,
  parseJSONCandidates,
  loadCandidates,
  parseAcronymDictionary,
  loadAcronymDictionary,
} from './parser.js';
