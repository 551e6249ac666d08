/**
 * Error types raised at the matching call boundary.
 *
 * Every failure is reported before any scoring happens, so a caller never
 * sees a partially matched table.
 */

export type MatchErrorCode = 'INVALID_COLUMN' | 'INVALID_METHOD' | 'INVALID_DICTIONARY';

export class MatchError extends Error {
  constructor(message: string, public readonly code: MatchErrorCode) {
    super(message);
    this.name = 'MatchError';
  }
}

/**
 * The requested match column is not a column of the candidate table.
 */
export class InvalidColumnError extends MatchError {
  constructor(
    public readonly column: string,
    public readonly columns: readonly string[]
  ) {
    super(`Column '${column}' not found in candidate table.`, 'INVALID_COLUMN');
    this.name = 'InvalidColumnError';
  }
}

export class InvalidMethodError extends MatchError {
  constructor(public readonly method: string) {
    super(
      `Method must be 'hybrid', 'ngram', 'phonetic', or 'levenshtein' (got '${method}').`,
      'INVALID_METHOD'
    );
    this.name = 'InvalidMethodError';
  }
}

/**
 * An acronym dictionary file did not hold a JSON object of string values.
 */
export class DictionaryFormatError extends MatchError {
  constructor(public readonly source: string, reason: string) {
    super(`Invalid acronym dictionary in ${source}: ${reason}`, 'INVALID_DICTIONARY');
    this.name = 'DictionaryFormatError';
  }
}
