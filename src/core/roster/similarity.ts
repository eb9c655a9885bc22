/**
 * String similarity computations.
 */

/** Score given when one normalized name contains the other */
export const CONTAINMENT_SCORE = 0.85;

/** Per-word ratio above which a single strong word match lifts the overall score */
const STRONG_WORD_MATCH = 0.8;

/**
 * Length of the longest common subsequence of two strings.
 * Two-row dynamic programming, O(|a|·|b|) time, O(|b|) space.
 */
export function longestCommonSubsequence(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;

  let previous = new Array<number>(b.length + 1).fill(0);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      if (a[i - 1] === b[j - 1]) {
        current[j] = (previous[j - 1] ?? 0) + 1;
      } else {
        current[j] = Math.max(previous[j] ?? 0, current[j - 1] ?? 0);
      }
    }
    [previous, current] = [current, previous];
    current.fill(0);
  }

  return previous[b.length] ?? 0;
}

/**
 * Edit-distance based similarity ratio in [0, 1].
 * Equals 2·LCS / (|a| + |b|), the insert/delete-only edit similarity.
 *
 * @returns 1 for identical strings (including two empty strings)
 */
export function sequenceRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * longestCommonSubsequence(a, b)) / total;
}

/**
 * Similarity between two already-normalized names.
 *
 * - Identical: 1
 * - Containment either way: 0.85
 * - Otherwise the sequence ratio, lifted by shared whole words
 *   (0.5 + 0.3 · shared / max word count) and by a strong single-word
 *   match (0.9 · best word ratio, when that ratio exceeds 0.8)
 */
export function nameSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length === 0 || b.length === 0) return 0;
  if (a.includes(b) || b.includes(a)) return CONTAINMENT_SCORE;

  let score = sequenceRatio(a, b);

  const wordsA = a.split(' ');
  const wordsB = b.split(' ');

  const setB = new Set(wordsB);
  const common = new Set(wordsA.filter((word) => setB.has(word))).size;
  if (common > 0) {
    score = Math.max(score, 0.5 + (common / Math.max(wordsA.length, wordsB.length)) * 0.3);
  }

  let bestWord = 0;
  for (const wordA of wordsA) {
    if (wordA.length <= 1) continue;
    for (const wordB of wordsB) {
      if (wordB.length <= 1) continue;
      bestWord = Math.max(bestWord, sequenceRatio(wordA, wordB));
    }
  }
  if (bestWord > STRONG_WORD_MATCH) {
    score = Math.max(score, bestWord * 0.9);
  }

  return score;
}
