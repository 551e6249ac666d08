import { describe, it, expect } from 'vitest';
import { expandAcronyms } from '../src/acronyms.js';

describe('expandAcronyms', () => {
  it('returns only the original text without a dictionary', () => {
    expect(expandAcronyms('JS Plumbing')).toEqual(['JS Plumbing']);
    expect(expandAcronyms('JS Plumbing', {})).toEqual(['JS Plumbing']);
  });

  it('adds one variation for a single acronym', () => {
    expect(expandAcronyms('JS Plumbing', { JS: 'John Smith' })).toEqual([
      'JS Plumbing',
      'John Smith Plumbing',
    ]);
  });

  it('expands one word at a time, left to right', () => {
    const dictionary = { JS: 'John Smith', JB: 'James Brown' };
    expect(expandAcronyms('JS JB Plumbing', dictionary)).toEqual([
      'JS JB Plumbing',
      'John Smith JB Plumbing',
      'JS James Brown Plumbing',
    ]);
  });

  it('gives each occurrence of a repeated acronym its own variation', () => {
    expect(expandAcronyms('JS and JS', { JS: 'John Smith' })).toEqual([
      'JS and JS',
      'John Smith and JS',
      'JS and John Smith',
    ]);
  });

  it('matches whole words case-sensitively', () => {
    const dictionary = { JS: 'John Smith' };
    expect(expandAcronyms('js Plumbing', dictionary)).toEqual(['js Plumbing']);
    expect(expandAcronyms('JSX Plumbing', dictionary)).toEqual(['JSX Plumbing']);
    expect(expandAcronyms('JS, Plumbing', dictionary)).toEqual(['JS, Plumbing']);
  });

  it('keeps the original text verbatim but joins variations with single spaces', () => {
    expect(expandAcronyms('  JS   Plumbing ', { JS: 'John Smith' })).toEqual([
      '  JS   Plumbing ',
      'John Smith Plumbing',
    ]);
  });

  it('ignores inherited object properties', () => {
    expect(expandAcronyms('constructor toString', {})).toEqual(['constructor toString']);
  });

  it('handles empty text', () => {
    expect(expandAcronyms('', { JS: 'John Smith' })).toEqual(['']);
  });
});
