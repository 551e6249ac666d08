/**
 * Per-Method Matcher
 *
 * Scores every candidate row against a query with one scorer. Each row's
 * match value is expanded into its acronym variations first, and the best
 * scoring variation is kept alongside its score.
 */

import { expandAcronyms, type AcronymDictionary } from './acronyms.js';
import type { ScorerName } from './config.js';
import { getScorerDefinition, type Scorer, type ScorerOptions } from './scorers.js';
import { createTable, resolveColumn, type CandidateRow, type CandidateTable } from './table.js';

// ============================================================================
// TYPES
// ============================================================================

export interface MatchRecord<R extends CandidateRow = CandidateRow> {
  /** Position of the row in the candidate table */
  index: number;
  row: R;
  /** Match-column value of the row */
  value: string;
  /** Best score across the value's variations */
  score: number;
  /** Variation that achieved the best score */
  bestForm: string;
}

export interface MatchOptions extends ScorerOptions {
  dictionary?: AcronymDictionary;
}

// ============================================================================
// MATCHING
// ============================================================================

function bestVariation(query: string, value: string, dictionary: AcronymDictionary, scorer: Scorer): {
  score: number;
  bestForm: string;
} {
  let best = 0;
  let bestForm = value;

  for (const variation of expandAcronyms(value, dictionary)) {
    const score = scorer(query, variation);
    // Strictly greater: the original value wins ties
    if (score > best) {
      best = score;
      bestForm = variation;
    }
  }

  return { score: best, bestForm };
}

/**
 * Score every row of `table` against `query`, one record per row in row order.
 *
 * @throws InvalidColumnError when `column` is not a column of the table
 * @throws InvalidMethodError when `scorer` names no known scorer
 */
export function matchCandidates<R extends CandidateRow>(
  query: string,
  table: CandidateTable<R>,
  column: string,
  scorer: ScorerName | Scorer,
  options: MatchOptions = {}
): MatchRecord<R>[] {
  const score = typeof scorer === 'function' ? scorer : getScorerDefinition(scorer).create(options);
  const readValue = resolveColumn(table, column);
  const dictionary = options.dictionary ?? {};

  return table.rows.map((row, index) => {
    const value = readValue(row);
    return { index, row, value, ...bestVariation(query, value, dictionary, score) };
  });
}

/**
 * Table-shaped matching: every row comes back with the scorer's score and
 * best-form columns appended (`ngram_score` / `best_ngram_form` and so on).
 * The input table is left as it was.
 */
export function match<R extends CandidateRow>(
  query: string,
  table: CandidateTable<R>,
  column: string,
  scorer: ScorerName,
  options: MatchOptions = {}
): CandidateTable {
  const definition = getScorerDefinition(scorer);
  const records = matchCandidates(query, table, column, scorer, options);

  const rows = records.map(record => ({
    ...record.row,
    [definition.scoreColumn]: record.score,
    [definition.formColumn]: record.bestForm,
  }));

  return createTable(rows, appendColumns(table.columns, [definition.scoreColumn, definition.formColumn]));
}

export function appendColumns(columns: readonly string[], added: readonly string[]): string[] {
  return [...columns.filter(c => !added.includes(c)), ...added];
}
