/**
 * Constants for the Interunit Loan Matching Engine
 *
 * Keyword lists and thresholds used by the extractors and the rule chain.
 * They are tuned on real ledger narrations from interunit fund transfers.
 */

import type { MatchClassification, MatchType } from './types';

// ============================================
// SIMILARITY
// ============================================

/**
 * Jaccard similarity at or above which two salary narrations are paired
 * even when person and period do not match exactly.
 */
export const SALARY_JACCARD_THRESHOLD = 0.3;

/**
 * Tokens of this length or shorter are ignored by the similarity scorer.
 */
export const MIN_TOKEN_LENGTH = 3;

/**
 * Words that carry no matching signal.
 */
export const STOP_WORDS: ReadonlySet<string> = new Set([
  'the',
  'a',
  'an',
  'and',
  'or',
  'but',
  'in',
  'on',
  'at',
  'to',
  'for',
  'of',
  'with',
  'by',
]);

/**
 * Scores in audit trails are rounded to this many decimals.
 */
export const SCORE_PRECISION = 3;

// ============================================
// COMMON TEXT PHRASES
// ============================================

export const PHRASE_MIN_WORDS = 20;
export const PHRASE_MAX_WORDS = 50;

/** Phrases shorter than this (in characters) are not considered */
export const PHRASE_MIN_LENGTH = 50;

/** At most this many shared phrases are reported */
export const PHRASE_MAX_REPORTED = 2;

/** Two phrases sharing more than this share of words count as one */
export const PHRASE_OVERLAP_RATIO = 0.7;

// ============================================
// SALARY
// ============================================

export const PRIMARY_SALARY_KEYWORDS: readonly string[] = [
  'salary',
  'sal',
  'wage',
  'payroll',
  'remuneration',
  'compensation',
];

/**
 * Period words; only reported in the audit trail.
 */
export const SECONDARY_SALARY_KEYWORDS: readonly string[] = [
  'monthly',
  'month',
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
  'jan',
  'feb',
  'mar',
  'apr',
  'jun',
  'jul',
  'aug',
  'sep',
  'oct',
  'nov',
  'dec',
];

/**
 * Business terms that disqualify a narration from being a salary payment,
 * unless it names a person explicitly.
 */
export const NON_SALARY_INDICATORS: readonly string[] = [
  'payment for',
  'purchase of',
  'rent',
  'electricity',
  'transportation',
  'marketing',
  'maintenance',
  'equipment',
  'insurance',
  'legal',
  'consulting',
  'training',
  'travel',
  'software',
  'security',
  'cleaning',
  'bank charges',
  'interest',
  'loan repayment',
  'tax payment',
  'bill payment',
  'expenses for',
  'fees for',
  'vendor payment',
  'po no',
  'work order',
  'invoice',
  'challan',
  'tds deduction',
  'vds deduction',
  'duty',
  'taxes',
  'port',
  'shipping',
  'carrying charges',
  'l/c',
  'letter of credit',
  'margin',
  'collateral',
  'acceptance commission',
  'retirement value',
  'principal',
  'time loan',
  'usance loan',
];

export const FINAL_SETTLEMENT_PHRASE = 'final settlement';

// ============================================
// INTERUNIT LOANS
// ============================================

/**
 * Phrases that mark a narration as an interunit loan leg.
 */
export const INTERUNIT_LOAN_PHRASES: readonly string[] = [
  'amount paid as interunit loan',
  'amount received as interunit loan',
  'interunit fund transfer',
  'inter unit fund transfer',
  'interunit loan',
];

/**
 * Phrase that introduces the lender-side final settlement person reference.
 */
export const INTER_UNIT_LOAN_PAYMENT_PHRASE = 'amount paid as inter unit loan';

/**
 * Trailing account digits used for cross-referencing.
 */
export const CROSS_REFERENCE_DIGITS = 5;
export const CROSS_REFERENCE_MIN_DIGITS = 4;

// ============================================
// CLASSIFICATION
// ============================================

/**
 * Match type → evidence category, auto-accept flag and initial status.
 */
export const MATCH_CLASSIFICATION: Readonly<Record<MatchType, MatchClassification>> = {
  PO: { matchMethod: 'reference_match', autoAccept: true, initialStatus: 'confirmed' },
  LC: { matchMethod: 'reference_match', autoAccept: true, initialStatus: 'confirmed' },
  LOAN_ID: { matchMethod: 'reference_match', autoAccept: true, initialStatus: 'confirmed' },
  FINAL_SETTLEMENT: {
    matchMethod: 'reference_match',
    autoAccept: true,
    initialStatus: 'confirmed',
  },
  INTERUNIT_LOAN: { matchMethod: 'cross_reference', autoAccept: true, initialStatus: 'confirmed' },
  SALARY: { matchMethod: 'similarity_match', autoAccept: false, initialStatus: 'matched' },
  COMMON_TEXT: { matchMethod: 'similarity_match', autoAccept: false, initialStatus: 'matched' },
  MANUAL_VERIFICATION: {
    matchMethod: 'fallback_match',
    autoAccept: false,
    initialStatus: 'pending_verification',
  },
};
