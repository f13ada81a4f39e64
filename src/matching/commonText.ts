/**
 * Common Text Extraction
 *
 * Last-resort evidence for narrations that share a long verbatim passage,
 * such as an insurance certificate or vehicle description copied into both
 * ledgers. Only continuous runs of 20-50 tokens count.
 */

import {
  PHRASE_MAX_REPORTED,
  PHRASE_MAX_WORDS,
  PHRASE_MIN_LENGTH,
  PHRASE_MIN_WORDS,
  PHRASE_OVERLAP_RATIO,
} from './constants';
import { safeExtract } from './safeExtract';
import type { CommonPhrase, CommonTextMatch } from './types';

// Word runs, or a single punctuation mark
const TOKEN_PATTERN = /\w+|[^\w\s]/g;

/**
 * All phrases of PHRASE_MIN_WORDS to PHRASE_MAX_WORDS consecutive tokens of
 * an already lower-cased text, joined by single spaces.
 */
export function extractPhrases(text: string): Set<string> {
  const tokens = text.match(TOKEN_PATTERN) ?? [];
  const phrases = new Set<string>();

  for (let start = 0; start + PHRASE_MIN_WORDS <= tokens.length; start++) {
    const maxLength = Math.min(PHRASE_MAX_WORDS, tokens.length - start);
    for (let length = PHRASE_MIN_WORDS; length <= maxLength; length++) {
      const phrase = tokens.slice(start, start + length).join(' ');
      if (phrase.length >= PHRASE_MIN_LENGTH) {
        phrases.add(phrase);
      }
    }
  }

  return phrases;
}

function overlaps(phrase: string, selected: string): boolean {
  if (phrase.includes(selected) || selected.includes(phrase)) {
    return true;
  }

  const words1 = new Set(phrase.split(' '));
  const words2 = new Set(selected.split(' '));
  let shared = 0;
  for (const word of words1) {
    if (words2.has(word)) {
      shared++;
    }
  }
  return shared / Math.max(words1.size, words2.size) > PHRASE_OVERLAP_RATIO;
}

/**
 * Longest shared phrases of two phrase sets, at most PHRASE_MAX_REPORTED of
 * them and none overlapping another.
 */
export function selectCommonPhrases(
  phrases1: ReadonlySet<string>,
  phrases2: ReadonlySet<string>
): CommonPhrase[] {
  const common = [...phrases1].filter((phrase) => phrases2.has(phrase));
  common.sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0));

  const selected: string[] = [];
  for (const phrase of common) {
    if (selected.some((existing) => overlaps(phrase, existing))) {
      continue;
    }
    selected.push(phrase);
    if (selected.length >= PHRASE_MAX_REPORTED) {
      break;
    }
  }

  return selected.map((phrase) => ({ phrase, wordCount: phrase.split(' ').length }));
}

/**
 * Renders phrases as "<n> words: <phrase>" joined by " | ".
 */
export function formatCommonPhrases(phrases: readonly CommonPhrase[]): string {
  return phrases.map(({ phrase, wordCount }) => `${wordCount} words: ${phrase}`).join(' | ');
}

/**
 * Finds the long phrases two narrations have in common.
 *
 * @returns null when either narration is empty or nothing qualifies
 */
export function findCommonText(
  text1: string | null | undefined,
  text2: string | null | undefined
): CommonTextMatch | null {
  if (!text1 || !text2) {
    return null;
  }

  return safeExtract<CommonTextMatch>('common_text', () => {
    const phrases = selectCommonPhrases(
      extractPhrases(text1.toLowerCase()),
      extractPhrases(text2.toLowerCase())
    );
    return phrases.length > 0 ? { phrases, display: formatCommonPhrases(phrases) } : null;
  });
}
