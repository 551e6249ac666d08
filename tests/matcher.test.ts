import { describe, it, expect } from 'vitest';
import { createTable, resolveColumn } from '../src/table.js';
import { matchCandidates, match } from '../src/matcher.js';
import { InvalidColumnError } from '../src/errors.js';

const DICTIONARY = { JS: 'John Smith', JB: 'James Brown' };
const QUERY = 'John Smith Plumbing';

function makeTable() {
  return createTable([
    { name: 'JS Plumbing', id: 1 },
    { name: 'Jon Smyth Plumbing', id: 2 },
    { name: 'JB Electrical', id: 3 },
  ]);
}

// ============================================================================
// TABLES
// ============================================================================

describe('createTable', () => {
  it('collects columns in first-seen order', () => {
    const table = createTable([{ a: 1, b: 2 }, { b: 3, c: 4 }]);
    expect(table.columns).toEqual(['a', 'b', 'c']);
  });

  it('uses explicit columns when given', () => {
    const table = createTable([], ['name']);
    expect(table.columns).toEqual(['name']);
    expect(table.rows).toEqual([]);
  });

  it('copies the row list', () => {
    const rows = [{ name: 'A' }];
    const table = createTable(rows);
    rows.push({ name: 'B' });
    expect(table.rows).toHaveLength(1);
  });
});

describe('resolveColumn', () => {
  it('throws InvalidColumnError for a missing column', () => {
    const table = makeTable();
    expect(() => resolveColumn(table, 'company')).toThrow(InvalidColumnError);

    try {
      resolveColumn(table, 'company');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidColumnError);
      if (error instanceof InvalidColumnError) {
        expect(error.code).toBe('INVALID_COLUMN');
        expect(error.column).toBe('company');
        expect(error.columns).toEqual(['name', 'id']);
        expect(error.message).toBe("Column 'company' not found in candidate table.");
      }
    }
  });

  it('reads non-string values as empty strings', () => {
    const table = createTable<Record<string, unknown>>([{ name: 42 }, { name: null }, { name: 'Acme' }]);
    const read = resolveColumn(table, 'name');
    expect(table.rows.map(read)).toEqual(['', '', 'Acme']);
  });
});

// ============================================================================
// PER-METHOD MATCHING
// ============================================================================

describe('matchCandidates', () => {
  it('returns one record per row in row order', () => {
    const records = matchCandidates(QUERY, makeTable(), 'name', 'ngram', { dictionary: DICTIONARY });
    expect(records.map(r => r.index)).toEqual([0, 1, 2]);
    expect(records.map(r => r.value)).toEqual(['JS Plumbing', 'Jon Smyth Plumbing', 'JB Electrical']);
    expect(records.map(r => r.row.id)).toEqual([1, 2, 3]);
  });

  it('keeps the best scoring acronym variation', () => {
    const [js, jon] = matchCandidates(QUERY, makeTable(), 'name', 'ngram', { dictionary: DICTIONARY });
    expect(js.score).toBe(1);
    expect(js.bestForm).toBe('John Smith Plumbing');
    expect(jon.score).toBeLessThan(1);
    expect(jon.bestForm).toBe('Jon Smyth Plumbing');
  });

  it('scores phonetic matches as 0 or 1', () => {
    const records = matchCandidates(QUERY, makeTable(), 'name', 'phonetic', { dictionary: DICTIONARY });
    expect(records.map(r => r.score)).toEqual([1, 1, 0]);
    expect(records.map(r => r.bestForm)).toEqual([
      'John Smith Plumbing',
      'Jon Smyth Plumbing',
      'JB Electrical',
    ]);
  });

  it('does not expand without a dictionary', () => {
    const [js] = matchCandidates(QUERY, makeTable(), 'name', 'phonetic');
    expect(js.score).toBe(0);
    expect(js.bestForm).toBe('JS Plumbing');
  });

  it('passes the padding character to the ngram scorer', () => {
    const table = createTable([{ name: 'a' }]);
    expect(matchCandidates('a$', table, 'name', 'ngram')[0].score).toBe(0.75);
    expect(matchCandidates('a$', table, 'name', 'ngram', { padChar: '#' })[0].score).toBeCloseTo(1 / 6, 10);
  });

  it('prefers the original value on ties', () => {
    const records = matchCandidates(QUERY, makeTable(), 'name', () => 0.5, { dictionary: DICTIONARY });
    expect(records.map(r => r.bestForm)).toEqual(['JS Plumbing', 'Jon Smyth Plumbing', 'JB Electrical']);
    expect(records.map(r => r.score)).toEqual([0.5, 0.5, 0.5]);
  });

  it('scores non-string values as the empty string', () => {
    const table = createTable<Record<string, unknown>>([{ name: null }, { name: 'abc' }]);
    const records = matchCandidates('abc', table, 'name', 'levenshtein');
    expect(records[0].score).toBe(0);
    expect(records[0].bestForm).toBe('');
    expect(records[1].score).toBe(1);
  });

  it('fails before scoring when the column is missing', () => {
    let calls = 0;
    const scorer = () => {
      calls++;
      return 1;
    };
    expect(() => matchCandidates(QUERY, makeTable(), 'company', scorer)).toThrow(InvalidColumnError);
    expect(calls).toBe(0);
  });

  it('leaves the candidate table untouched', () => {
    const rows = [Object.freeze({ name: 'JS Plumbing' }), Object.freeze({ name: 'JB Electrical' })];
    const table = Object.freeze(createTable(rows));
    matchCandidates(QUERY, table, 'name', 'ngram', { dictionary: DICTIONARY });
    expect(table.rows).toEqual([{ name: 'JS Plumbing' }, { name: 'JB Electrical' }]);
    expect(table.columns).toEqual(['name']);
  });
});

describe('match', () => {
  it('appends the scorer columns to every row', () => {
    const table = makeTable();
    const result = match(QUERY, table, 'name', 'ngram', { dictionary: DICTIONARY });

    expect(result.columns).toEqual(['name', 'id', 'ngram_score', 'best_ngram_form']);
    expect(result.rows).toHaveLength(3);
    expect(result.rows[0]).toEqual({
      name: 'JS Plumbing',
      id: 1,
      ngram_score: 1,
      best_ngram_form: 'John Smith Plumbing',
    });
    expect(table.rows[0]).toEqual({ name: 'JS Plumbing', id: 1 });
  });

  it('names columns after the scorer', () => {
    const phonetic = match(QUERY, makeTable(), 'name', 'phonetic');
    expect(phonetic.columns).toEqual(['name', 'id', 'phonetic_match', 'best_phonetic_form']);

    const levenshtein = match(QUERY, makeTable(), 'name', 'levenshtein');
    expect(levenshtein.columns).toEqual(['name', 'id', 'levenshtein_score', 'best_levenshtein_form']);
  });

  it('throws InvalidColumnError without returning a table', () => {
    expect(() => match(QUERY, makeTable(), 'company', 'ngram')).toThrow(InvalidColumnError);
  });
});
