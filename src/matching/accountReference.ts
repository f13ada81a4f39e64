/**
 * Account Reference Extraction
 *
 * One shared extractor for bank account references in narrations. Patterns
 * are tried in a fixed order and the first hit wins:
 *
 * 1. standard        MDBL-0012345678901234   (13-16 digits, optional bank code)
 * 2. hyphenated      OBL-123-4567890123      (ddd-dddddddddd)
 * 3. fallback        any run of 10+ digits
 * 4. short_reference MDBL#11026, #01234      (4-6 digits after '#')
 *
 * A bank code directly in front of the number is normalized through the
 * injected bank name lookup.
 */

import { CROSS_REFERENCE_DIGITS, CROSS_REFERENCE_MIN_DIGITS } from './constants';
import { safeExtract } from './safeExtract';
import type { AccountPatternName, AccountReference, BankNameLookup } from './types';

interface AccountPattern {
  name: AccountPatternName;
  /** Group 1: optional bank code, group 2: account number */
  regex: RegExp;
}

const ACCOUNT_PATTERNS: readonly AccountPattern[] = [
  {
    name: 'standard',
    regex: /(?:\b([A-Za-z]{2,})[-#:]?)?(?<!\d)(\d{13,16})(?!\d)/,
  },
  {
    name: 'hyphenated',
    regex: /(?:\b([A-Za-z]{2,})[-#:]?)?(?<!\d)(\d{3}-\d{10})(?!\d)/,
  },
  {
    name: 'fallback',
    regex: /(?:\b([A-Za-z]{2,})[-#:]?)?(?<!\d)(\d{10,})/,
  },
  {
    name: 'short_reference',
    regex: /(?:\b([A-Za-z]{2,})(?=#))?#(\d{4,6})\b/,
  },
];

/**
 * Pass-through lookup used when no bank table is injected.
 */
export const identityBankLookup: BankNameLookup = (codeOrName) => codeOrName;

/**
 * Extracts the first account reference found in a narration.
 *
 * @example
 * extractAccountReference('Amount paid as interunit loan to MDBL-0012345678901234', lookup)
 * // Returns: { accountNumber: '0012345678901234', bankCode: 'MDBL',
 * //            normalizedBank: 'MIDLAND BANK', fullReference: 'MDBL-0012345678901234',
 * //            pattern: 'standard' }
 */
export function extractAccountReference(
  particulars: string | null | undefined,
  bankNameLookup: BankNameLookup = identityBankLookup
): AccountReference | null {
  if (!particulars) {
    return null;
  }

  return safeExtract<AccountReference>('account_reference', () => {
    for (const { name, regex } of ACCOUNT_PATTERNS) {
      const match = regex.exec(particulars);
      if (!match) {
        continue;
      }

      const bankCode = match[1] ? match[1].toUpperCase() : null;
      return {
        accountNumber: match[2],
        bankCode,
        normalizedBank: bankCode ? bankNameLookup(bankCode) : null,
        fullReference: match[0],
        pattern: name,
      };
    }
    return null;
  });
}

/**
 * Trailing digits of an account number used for cross-referencing:
 * the last 5 when there are at least 5, otherwise the last 4.
 *
 * @example
 * trailingDigits('123-4567890123') // Returns: '90123'
 */
export function trailingDigits(accountNumber: string): string {
  const digits = accountNumber.replace(/\D/g, '');
  return digits.length >= CROSS_REFERENCE_DIGITS
    ? digits.slice(-CROSS_REFERENCE_DIGITS)
    : digits.slice(-CROSS_REFERENCE_MIN_DIGITS);
}

/**
 * Short "#dddd" / "#ddddd" reference in a narration, if any.
 */
export function extractShortReference(particulars: string): string | null {
  const match = /#(\d{4,5})/.exec(particulars);
  return match ? match[1] : null;
}
