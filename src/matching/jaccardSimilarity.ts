import { MIN_TOKEN_LENGTH, SCORE_PRECISION, STOP_WORDS } from './constants';

/**
 * Lower-cased word tokens that carry signal: stop words and tokens shorter
 * than MIN_TOKEN_LENGTH are dropped.
 */
export function tokenizeForSimilarity(text: string): Set<string> {
  const words = text.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? [];
  return new Set(words.filter((word) => word.length >= MIN_TOKEN_LENGTH && !STOP_WORDS.has(word)));
}

/**
 * Jaccard similarity |A ∩ B| / |A ∪ B| of two narrations.
 *
 * Returns 0 when either text is empty or neither has a qualifying token.
 *
 * @example
 * calculateJaccardSimilarity('Salary of John Doe for March 2024', 'March 2024 payroll John Doe staff')
 * // Returns: 0.5714285714285714 (4 shared of 7 distinct tokens)
 */
export function calculateJaccardSimilarity(
  text1: string | null | undefined,
  text2: string | null | undefined
): number {
  if (!text1 || !text2) {
    return 0;
  }

  const set1 = tokenizeForSimilarity(text1);
  const set2 = tokenizeForSimilarity(text2);

  let intersection = 0;
  for (const token of set1) {
    if (set2.has(token)) {
      intersection++;
    }
  }

  const union = set1.size + set2.size - intersection;
  return union === 0 ? 0 : intersection / union;
}

/**
 * Rounds a score for the audit trail.
 */
export function roundScore(score: number): number {
  const factor = 10 ** SCORE_PRECISION;
  return Math.round(score * factor) / factor;
}
