/**
 * Acronym Expansion
 *
 * Produces the variations of a candidate value that the scorers compare
 * against the query. Each variation swaps exactly one acronym for its
 * expansion, so "JS JB Plumbing" with both keys known yields three strings:
 * the original, one with JS expanded, one with JB expanded.
 */

/**
 * Whole-word, case-sensitive acronym → expansion
 */
export type AcronymDictionary = Readonly<Record<string, string>>;

function lookup(dictionary: AcronymDictionary, word: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(dictionary, word) ? dictionary[word] : undefined;
}

/**
 * Expand acronyms in `text` one word position at a time.
 *
 * The unmodified text always comes first, followed by one variation per
 * matching word, left to right.
 */
export function expandAcronyms(text: string, dictionary: AcronymDictionary = {}): string[] {
  const variations = [text];
  const words = text.split(/\s+/).filter(word => word.length > 0);

  for (let i = 0; i < words.length; i++) {
    const expansion = lookup(dictionary, words[i]);
    if (expansion === undefined) continue;

    variations.push([...words.slice(0, i), expansion, ...words.slice(i + 1)].join(' '));
  }

  return variations;
}
