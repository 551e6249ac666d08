/**
 * Edit-Distance Similarity
 *
 * Normalized similarity ratio built on an insert/delete edit distance in
 * which a substitution costs 2 (one deletion plus one insertion). With that
 * weighting the distance of two strings is at most len(a) + len(b), reached
 * when they share no character, which gives the ratio its 0-1 range:
 *
 *   ratio = 1 - distance / (len(a) + len(b))
 *
 * "kitten" vs "sitting": distance 5, total length 13 → 8/13 ≈ 0.615
 */

const SUBSTITUTION_COST = 2;

/**
 * Weighted edit distance between two strings
 */
export function editDistance(a: string, b: string): number {
  const s1 = Array.from(a || '');
  const s2 = Array.from(b || '');

  if (s1.length === 0) return s2.length;
  if (s2.length === 0) return s1.length;

  // Single rolling row over s2
  let previous = Array.from({ length: s2.length + 1 }, (_, j) => j);

  for (let i = 1; i <= s1.length; i++) {
    const current = [i];

    for (let j = 1; j <= s2.length; j++) {
      const substitution = previous[j - 1] + (s1[i - 1] === s2[j - 1] ? 0 : SUBSTITUTION_COST);
      current[j] = Math.min(
        previous[j] + 1,
        current[j - 1] + 1,
        substitution
      );
    }

    previous = current;
  }

  return previous[s2.length];
}

/**
 * Calculate edit-distance similarity between two strings
 *
 * @returns Similarity score between 0 (nothing in common) and 1 (identical)
 */
export function editScore(a: string, b: string): number {
  const total = Array.from(a || '').length + Array.from(b || '').length;
  if (total === 0) return 1.0;

  return 1 - editDistance(a, b) / total;
}
