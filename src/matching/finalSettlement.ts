/**
 * Final Settlement Extraction
 *
 * Employee final settlements are booked as interunit loans with an explicit
 * person reference on each side:
 * - Lender:   "... Amount paid as Inter Unit Loan ... (Md. Rahim - ID: 1042)"
 * - Borrower: "Payable to Md. Rahim - ID: 1042 ... final settlement ..."
 */

import { FINAL_SETTLEMENT_PHRASE, INTER_UNIT_LOAN_PAYMENT_PHRASE } from './constants';
import { safeExtract } from './safeExtract';
import type { FinalSettlementDetails, PersonReference } from './types';

// The colon may be a full-width "：" in exported ledgers
const LENDER_PERSON_PATTERN = /\(\s*(?<name>[^()]+?)\s*-\s*ID\s*[:：]\s*(?<id>\d+)\s*\)/i;
const BORROWER_PERSON_PATTERN = /payable\s+to\s+(?<name>[^\r\n-]+?)\s*-\s*ID\s*[:：]\s*(?<id>\d+)/i;

function toPersonReference(match: RegExpExecArray | null): PersonReference | null {
  const name = match?.groups?.name;
  const id = match?.groups?.id;
  if (!name || !id) {
    return null;
  }

  const personName = name.trim();
  const personId = id.trim();
  return {
    personName,
    personId,
    personCombined: `${personName}-ID : ${personId}`,
  };
}

/**
 * Finds the explicit person reference of a final settlement narration.
 *
 * The lender shape is tried first, then the borrower shape.
 */
export function extractPersonReference(particulars: string): PersonReference | null {
  const lower = particulars.toLowerCase();

  if (lower.includes(INTER_UNIT_LOAN_PAYMENT_PHRASE)) {
    const lender = toPersonReference(LENDER_PERSON_PATTERN.exec(particulars));
    if (lender) {
      return lender;
    }
  }

  if (lower.includes('payable to') && lower.includes(FINAL_SETTLEMENT_PHRASE)) {
    return toPersonReference(BORROWER_PERSON_PATTERN.exec(particulars));
  }

  return null;
}

/**
 * Extracts final settlement details, or null when no person reference is present.
 *
 * @example
 * extractFinalSettlementDetails('Payable to Md. Rahim - ID: 1042 final settlement')
 * // Returns: { personName: 'Md. Rahim', personId: '1042',
 * //            personCombined: 'Md. Rahim-ID : 1042', isFinalSettlement: true }
 */
export function extractFinalSettlementDetails(
  particulars: string | null | undefined
): FinalSettlementDetails | null {
  if (!particulars) {
    return null;
  }

  return safeExtract<FinalSettlementDetails>('final_settlement', () => {
    const person = extractPersonReference(particulars);
    return person ? { ...person, isFinalSettlement: true } : null;
  });
}
