/**
 * Candidate tables
 *
 * An ordered set of records with named fields. One field, the match column,
 * holds the text compared against the query; every other field rides along
 * untouched into the results.
 */

import { InvalidColumnError } from './errors.js';

export type CandidateRow = Readonly<Record<string, unknown>>;

export interface CandidateTable<R extends CandidateRow = CandidateRow> {
  readonly columns: readonly string[];
  readonly rows: readonly R[];
}

/**
 * Build a table from records.
 *
 * Columns default to the union of the records' own keys in first-seen
 * order. Pass them explicitly when the source has a header (a CSV file) so
 * that a column with no values in any row still counts as present.
 */
export function createTable<R extends CandidateRow>(
  rows: readonly R[],
  columns?: readonly string[]
): CandidateTable<R> {
  if (columns) {
    return { columns: [...columns], rows: [...rows] };
  }

  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) seen.add(key);
  }

  return { columns: [...seen], rows: [...rows] };
}

/**
 * Resolve the accessor for the match column, once per call.
 *
 * Values that are not strings read as the empty string.
 */
export function resolveColumn(
  table: CandidateTable,
  column: string
): (row: CandidateRow) => string {
  if (!table.columns.includes(column)) {
    throw new InvalidColumnError(column, table.columns);
  }

  return (row) => {
    const value = row[column];
    return typeof value === 'string' ? value : '';
  };
}
