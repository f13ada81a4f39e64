/**
 * Match Rule Chain
 *
 * Ordered list of rules evaluated for every lender/borrower pair with equal
 * amounts. The first rule that returns an audit trail decides the match type.
 *
 * Priority:
 * 1. PO                   identical purchase order numbers
 * 2. FINAL_SETTLEMENT     same person on both final settlement references
 * 3. SALARY               same person and period, or similar salary narrations
 * 4. LC                   identical letter of credit after normalization
 * 5. INTERUNIT_LOAN       two-way account digit cross-reference
 * 6. LOAN_ID (phrase)     same loan id after the time loan repayment phrase
 * 7. LOAN_ID (generic)    identical loan id token
 * 8. MANUAL_VERIFICATION  keyed by the same operator
 * 9. COMMON_TEXT          long shared verbatim passage
 */

import { trailingDigits } from './accountReference';
import { formatCommonPhrases, selectCommonPhrases } from './commonText';
import { SALARY_JACCARD_THRESHOLD } from './constants';
import { calculateJaccardSimilarity, roundScore } from './jaccardSimilarity';
import type { LegProfile } from './legProfile';
import { normalizeLetterOfCredit } from './referenceExtractors';
import type { AuditTrail, AuditValue, MatchType } from './types';

export interface MatchRule {
  /** Unique rule name, recorded on the candidate */
  readonly name: string;
  readonly matchType: MatchType;
  /** Audit trail when the rule fires, null otherwise */
  evaluate(lender: LegProfile, borrower: LegProfile): AuditTrail | null;
}

/**
 * Builds an audit trail, leaving out absent values.
 */
export function buildAuditTrail(
  entries: Record<string, AuditValue | null | undefined>
): AuditTrail {
  const trail: Record<string, AuditValue> = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value !== null && value !== undefined) {
      trail[key] = value;
    }
  }
  return trail;
}

// ============================================
// RULES
// ============================================

export const purchaseOrderRule: MatchRule = {
  name: 'PO',
  matchType: 'PO',
  evaluate(lender, borrower) {
    if (!lender.purchaseOrder || lender.purchaseOrder !== borrower.purchaseOrder) {
      return null;
    }
    return buildAuditTrail({ po_number: lender.purchaseOrder });
  },
};

export const finalSettlementRule: MatchRule = {
  name: 'FINAL_SETTLEMENT',
  matchType: 'FINAL_SETTLEMENT',
  evaluate(lender, borrower) {
    const lenderPerson = lender.finalSettlement;
    const borrowerPerson = borrower.finalSettlement;
    if (!lenderPerson || !borrowerPerson || lenderPerson.personName !== borrowerPerson.personName) {
      return null;
    }
    return buildAuditTrail({
      match_reason: 'Final settlement match',
      lender_person: lenderPerson.personCombined,
      borrower_person: borrowerPerson.personCombined,
      person_name: lenderPerson.personName,
      person_id: lenderPerson.personId,
    });
  },
};

export const salaryRule: MatchRule = {
  name: 'SALARY',
  matchType: 'SALARY',
  evaluate(lender, borrower) {
    const lenderSalary = lender.salary;
    const borrowerSalary = borrower.salary;
    if (!lenderSalary || !borrowerSalary) {
      return null;
    }

    // Absent person or period on both sides still counts as equal
    const exactMatch =
      lenderSalary.personName === borrowerSalary.personName &&
      lenderSalary.period === borrowerSalary.period &&
      lenderSalary.isSalary &&
      borrowerSalary.isSalary;
    const jaccardScore = calculateJaccardSimilarity(lender.text, borrower.text);

    if (!exactMatch && jaccardScore < SALARY_JACCARD_THRESHOLD) {
      return null;
    }

    return buildAuditTrail({
      person: lenderSalary.personCombined ?? lenderSalary.personName,
      period: lenderSalary.period,
      lender_keywords: lenderSalary.matchedKeywords.join(', '),
      borrower_keywords: borrowerSalary.matchedKeywords.join(', '),
      jaccard_score: roundScore(jaccardScore),
      salary_match_branch: exactMatch ? 'exact' : 'jaccard',
    });
  },
};

export const letterOfCreditRule: MatchRule = {
  name: 'LC',
  matchType: 'LC',
  evaluate(lender, borrower) {
    if (!lender.letterOfCredit || !borrower.letterOfCredit) {
      return null;
    }

    const normalized = normalizeLetterOfCredit(lender.letterOfCredit);
    if (normalized !== normalizeLetterOfCredit(borrower.letterOfCredit)) {
      return null;
    }
    return buildAuditTrail({
      lc_number: lender.letterOfCredit,
      borrower_lc_number: borrower.letterOfCredit,
      normalized_lc: normalized,
    });
  },
};

export const interunitLoanRule: MatchRule = {
  name: 'INTERUNIT_LOAN',
  matchType: 'INTERUNIT_LOAN',
  evaluate(lender, borrower) {
    if (!lender.isInterunit || !borrower.isInterunit || !lender.account || !borrower.account) {
      return null;
    }

    const lenderLastDigits = trailingDigits(lender.account.accountNumber);
    const borrowerLastDigits = trailingDigits(borrower.account.accountNumber);

    // Lender account digits quoted by the borrower, or the borrower's "#ref" within them
    let crossReference1 = borrower.text.includes(lenderLastDigits);
    if (!crossReference1 && borrower.shortReference) {
      crossReference1 = lenderLastDigits.includes(borrower.shortReference);
    }

    let crossReference2 = lender.text.includes(borrowerLastDigits);
    if (!crossReference2 && lender.shortReference) {
      crossReference2 = borrowerLastDigits.includes(lender.shortReference);
    }

    if (!crossReference1 || !crossReference2) {
      return null;
    }

    return buildAuditTrail({
      lender_reference: lender.account.fullReference,
      borrower_reference: borrower.account.fullReference,
      lender_account: lender.account.accountNumber,
      borrower_account: borrower.account.accountNumber,
      lender_last_digits: lenderLastDigits,
      borrower_last_digits: borrowerLastDigits,
      lender_bank: lender.account.normalizedBank,
      borrower_bank: borrower.account.normalizedBank,
      cross_reference_1: crossReference1,
      cross_reference_2: crossReference2,
      match_reason: `Interunit loan cross-reference match: ${lenderLastDigits} <-> ${borrowerLastDigits}`,
    });
  },
};

export const timeLoanIdRule: MatchRule = {
  name: 'LOAN_ID_TIME_LOAN',
  matchType: 'LOAN_ID',
  evaluate(lender, borrower) {
    if (!lender.hasTimeLoanPhrase || !borrower.hasTimeLoanPhrase) {
      return null;
    }
    if (!lender.timeLoanId || lender.timeLoanId !== borrower.timeLoanId) {
      return null;
    }
    return buildAuditTrail({
      loan_id: lender.timeLoanId,
      match_reason: 'Time Loan phrase + matching Loan ID after phrase',
      phrase_detected: true,
    });
  },
};

export const loanIdRule: MatchRule = {
  name: 'LOAN_ID',
  matchType: 'LOAN_ID',
  evaluate(lender, borrower) {
    if (!lender.loanId || lender.loanId !== borrower.loanId) {
      return null;
    }
    return buildAuditTrail({ loan_id: lender.loanId });
  },
};

export const manualVerificationRule: MatchRule = {
  name: 'MANUAL_VERIFICATION',
  matchType: 'MANUAL_VERIFICATION',
  evaluate(lender, borrower) {
    if (!lender.enteredBy || lender.enteredBy !== borrower.enteredBy) {
      return null;
    }
    return buildAuditTrail({
      entered_by: lender.enteredBy,
      match_reason: 'Exact match on debit, credit, and entered_by fields',
      requires_verification: true,
    });
  },
};

export const commonTextRule: MatchRule = {
  name: 'COMMON_TEXT',
  matchType: 'COMMON_TEXT',
  evaluate(lender, borrower) {
    const phrases = selectCommonPhrases(lender.phrases, borrower.phrases);
    if (phrases.length === 0) {
      return null;
    }
    return buildAuditTrail({
      matched_phrase: formatCommonPhrases(phrases),
      word_count: phrases[0].wordCount,
      jaccard_score: roundScore(calculateJaccardSimilarity(lender.text, borrower.text)),
    });
  },
};

/**
 * The rule chain in priority order.
 */
export const MATCH_RULES: readonly MatchRule[] = [
  purchaseOrderRule,
  finalSettlementRule,
  salaryRule,
  letterOfCreditRule,
  interunitLoanRule,
  timeLoanIdRule,
  loanIdRule,
  manualVerificationRule,
  commonTextRule,
];
