/**
 * Ranking and Top-N Selection
 *
 * Single-method ranking sorts by one scorer. Hybrid ranking (the default) is
 * a filter-then-sort: a candidate must sound like the query (Soundex codes
 * equal) to be returned at all, and the survivors are ordered by n-gram
 * similarity. A strong n-gram match that fails the phonetic gate is dropped,
 * so a candidate set with no phonetic match yields an empty result.
 *
 * Example: query "John Smith Plumbing", dictionary { JS: "John Smith" }
 * - "JS Plumbing" expands to the query itself → phonetic 1, n-gram 1.0
 * - "Jon Smyth Plumbing" → phonetic 1 (J525), n-gram < 1
 * - "JB Electrical" → J142, excluded
 */

import { DEFAULT_CONFIG, isMatchMethod, type ScorerName } from './config.js';
import { InvalidMethodError } from './errors.js';
import { appendColumns, matchCandidates, type MatchOptions } from './matcher.js';
import { isScorerName, SCORERS } from './scorers.js';
import { createTable, type CandidateRow, type CandidateTable } from './table.js';

// ============================================================================
// TYPES
// ============================================================================

export interface RankOptions extends MatchOptions {
  /** Maximum number of results (default 5) */
  topN?: number;
  /** 'hybrid' (default), 'ngram', 'phonetic' or 'levenshtein' */
  method?: string;
}

export interface RankedMatch<R extends CandidateRow = CandidateRow> {
  index: number;
  row: R;
  value: string;
  /** Score the result is ordered by */
  score: number;
  scores: Partial<Record<ScorerName, number>>;
  bestForms: Partial<Record<ScorerName, string>>;
}

// ============================================================================
// RANKING
// ============================================================================

function validateTopN(topN: number): void {
  if (!Number.isInteger(topN) || topN < 0) {
    throw new RangeError(`topN must be a non-negative integer (got ${topN})`);
  }
}

/** Stable: equal scores keep candidate order */
function sortByScore<T extends { score: number }>(items: T[]): T[] {
  return [...items].sort((a, b) => b.score - a.score);
}

function rankSingle<R extends CandidateRow>(
  query: string,
  table: CandidateTable<R>,
  column: string,
  scorer: ScorerName,
  options: MatchOptions
): RankedMatch<R>[] {
  return matchCandidates(query, table, column, scorer, options).map(record => {
    const scores: Partial<Record<ScorerName, number>> = {};
    const bestForms: Partial<Record<ScorerName, string>> = {};
    scores[scorer] = record.score;
    bestForms[scorer] = record.bestForm;

    return { index: record.index, row: record.row, value: record.value, score: record.score, scores, bestForms };
  });
}

function rankHybrid<R extends CandidateRow>(
  query: string,
  table: CandidateTable<R>,
  column: string,
  options: MatchOptions
): RankedMatch<R>[] {
  const ngram = matchCandidates(query, table, column, 'ngram', options);
  const phonetic = new Map(
    matchCandidates(query, table, column, 'phonetic', options).map(record => [record.index, record])
  );

  const ranked: RankedMatch<R>[] = [];
  for (const record of ngram) {
    const sound = phonetic.get(record.index);
    if (!sound || sound.score !== 1) continue;

    ranked.push({
      index: record.index,
      row: record.row,
      value: record.value,
      score: record.score,
      scores: { ngram: record.score, phonetic: sound.score },
      bestForms: { ngram: record.bestForm, phonetic: sound.bestForm },
    });
  }

  return ranked;
}

function scorersFor(method: string): ScorerName[] {
  if (method === 'hybrid') return ['ngram', 'phonetic'];
  return isScorerName(method) ? [method] : [];
}

/**
 * Rank candidates against a query, best first, at most `topN` results.
 *
 * @throws InvalidMethodError for an unknown method
 * @throws InvalidColumnError when `column` is not a column of the table
 */
export function rankCandidates<R extends CandidateRow>(
  query: string,
  table: CandidateTable<R>,
  column: string,
  options: RankOptions = {}
): RankedMatch<R>[] {
  const { topN = DEFAULT_CONFIG.TOP_N, method = DEFAULT_CONFIG.METHOD, ...matchOptions } = options;

  if (!isMatchMethod(method)) {
    throw new InvalidMethodError(method);
  }
  validateTopN(topN);

  const ranked = method === 'hybrid'
    ? rankHybrid(query, table, column, matchOptions)
    : rankSingle(query, table, column, method, matchOptions);

  return sortByScore(ranked).slice(0, topN);
}

/**
 * Top matches as a table: the original rows, best first, with the score and
 * best-form columns of every scorer the method used.
 */
export function topMatches<R extends CandidateRow>(
  query: string,
  table: CandidateTable<R>,
  column: string,
  options: RankOptions = {}
): CandidateTable {
  const method = options.method ?? DEFAULT_CONFIG.METHOD;
  const ranked = rankCandidates(query, table, column, options);

  const used = scorersFor(method);
  const added = used.flatMap(name => [SCORERS[name].scoreColumn, SCORERS[name].formColumn]);

  const rows = ranked.map(match => {
    const row: Record<string, unknown> = { ...match.row };
    for (const name of used) {
      row[SCORERS[name].scoreColumn] = match.scores[name];
      row[SCORERS[name].formColumn] = match.bestForms[name];
    }
    return row;
  });

  return createTable(rows, appendColumns(table.columns, added));
}
