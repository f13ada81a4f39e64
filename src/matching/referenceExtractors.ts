/**
 * Reference Extractors for Interunit Loan Reconciliation
 *
 * Structured document references that occasionally appear in narrations:
 * - Purchase orders:   ABC/PO/123/456
 * - Letters of credit: L/C-123/456, LC 889
 * - Loan ids:          LD-2435445106, ID 55, LOAN123
 *
 * Every extractor returns null when the pattern is absent.
 */

import { safeExtract } from './safeExtract';

const PO_PATTERN = /\b[A-Z]{2,4}\/PO\/\d+\/\d+\b/;
const LC_PATTERN = /\b(?:L\/C|LC)[-\s]?\d+[/\s]?\d*\b/;
const LOAN_ID_PATTERN = /\b(?:LD|ID|LOAN)[-\s]?(\d+)\b/;

/**
 * "Amount being paid as Principal & Interest [repayment] [of] Time Loan"
 */
const TIME_LOAN_PHRASE_PATTERN =
  /amount\s+being\s+paid\s+as\s*principal\s*&?\s*interest(?:\s+repayment)?\s+(?:of\s+)?time\s+loan/i;

/**
 * Extracts a purchase order number, upper-cased.
 *
 * @example
 * extractPurchaseOrder('abc/po/123/456 payment') // Returns: 'ABC/PO/123/456'
 */
export function extractPurchaseOrder(particulars: string | null | undefined): string | null {
  if (!particulars) {
    return null;
  }

  return safeExtract('purchase_order', () => {
    const match = PO_PATTERN.exec(particulars.toUpperCase());
    return match ? match[0] : null;
  });
}

/**
 * Extracts a letter of credit reference, upper-cased and trimmed.
 */
export function extractLetterOfCredit(particulars: string | null | undefined): string | null {
  if (!particulars) {
    return null;
  }

  return safeExtract('letter_of_credit', () => {
    const match = LC_PATTERN.exec(particulars.toUpperCase());
    return match ? match[0].trim() : null;
  });
}

/**
 * Normalizes an LC reference so that "L/C-123/456" and "lc-123/456" compare equal.
 *
 * @example
 * normalizeLetterOfCredit(' l/c-123/456 ') // Returns: 'LC-123/456'
 */
export function normalizeLetterOfCredit(lc: string): string {
  return lc.toUpperCase().trim().replace(/L\/C/g, 'LC');
}

/**
 * Extracts the first loan id token anywhere in the narration.
 */
export function extractLoanId(particulars: string | null | undefined): string | null {
  if (!particulars) {
    return null;
  }

  return safeExtract('loan_id', () => {
    const match = LOAN_ID_PATTERN.exec(particulars.toUpperCase());
    return match ? match[0] : null;
  });
}

/**
 * True when the narration carries the time loan repayment phrase.
 */
export function hasTimeLoanPhrase(particulars: string | null | undefined): boolean {
  if (!particulars) {
    return false;
  }

  return TIME_LOAN_PHRASE_PATTERN.test(particulars);
}

/**
 * Extracts the first loan id that appears after the time loan repayment
 * phrase, normalized to LD-<digits>.
 *
 * @example
 * extractLoanIdAfterTimeLoanPhrase(
 *   'Amount being paid as Principal & Interest of Time Loan ID-2435445106'
 * ) // Returns: 'LD-2435445106'
 */
export function extractLoanIdAfterTimeLoanPhrase(
  particulars: string | null | undefined
): string | null {
  if (!particulars) {
    return null;
  }

  return safeExtract('loan_id_after_phrase', () => {
    const phrase = TIME_LOAN_PHRASE_PATTERN.exec(particulars);
    if (!phrase) {
      return null;
    }

    const after = particulars.slice(phrase.index + phrase[0].length).toUpperCase();
    const match = LOAN_ID_PATTERN.exec(after);
    return match ? `LD-${match[1]}` : null;
  });
}
