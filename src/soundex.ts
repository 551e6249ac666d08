/**
 * Soundex Phonetic Matching
 *
 * American Soundex over the whole string: the first character is kept and
 * the following consonants are coded as digits until four symbols exist.
 *
 *   B F P V         → 1
 *   C G J K Q S X Z → 2
 *   D T             → 3
 *   L               → 4
 *   M N             → 5
 *   R               → 6
 *
 * Adjacent letters with the same digit are coded once. H and W do not
 * separate such letters; vowels, spaces and punctuation do. Spaces are not
 * stripped, so "John Smith Plumbing" codes as J525: the S after the space
 * starts a new run.
 */

const CODE_GROUPS: [string, string][] = [
  ['BFPV', '1'],
  ['CGJKQSXZ', '2'],
  ['DT', '3'],
  ['L', '4'],
  ['MN', '5'],
  ['R', '6'],
];

const LETTER_CODES: ReadonlyMap<string, string> = new Map(
  CODE_GROUPS.flatMap(([letters, code]) => Array.from(letters, (letter): [string, string] => [letter, code]))
);

const CODE_LENGTH = 4;

/**
 * Compute the Soundex code of a string ("" for empty input)
 */
export function soundex(text: string): string {
  if (!text) return '';

  const chars = Array.from(text.normalize('NFKD').toUpperCase());
  const result = [chars[0]];
  let last = LETTER_CODES.get(chars[0]) ?? null;

  for (const char of chars.slice(1)) {
    if (result.length === CODE_LENGTH) break;

    const code = LETTER_CODES.get(char);
    if (code !== undefined) {
      if (code !== last) result.push(code);
      last = code;
    } else if (char !== 'H' && char !== 'W') {
      last = null;
    }
  }

  return result.join('').padEnd(CODE_LENGTH, '0');
}

/**
 * Phonetic match as a hard signal: 1 when both Soundex codes are equal, else 0
 */
export function phoneticScore(a: string, b: string): 0 | 1 {
  return soundex(a || '') === soundex(b || '') ? 1 : 0;
}
