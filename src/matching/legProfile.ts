/**
 * Per-leg feature cache.
 *
 * Every token a rule may need is extracted once per leg rather than once per
 * lender/borrower pair. Common-text phrases are only built when the last rule
 * of the chain asks for them, and are released once the leg is settled.
 */

import { extractAccountReference, extractShortReference } from './accountReference';
import { extractPhrases } from './commonText';
import { INTERUNIT_LOAN_PHRASES } from './constants';
import { extractFinalSettlementDetails } from './finalSettlement';
import {
  extractLetterOfCredit,
  extractLoanId,
  extractLoanIdAfterTimeLoanPhrase,
  extractPurchaseOrder,
  hasTimeLoanPhrase,
} from './referenceExtractors';
import { safeExtract } from './safeExtract';
import { extractSalaryDetails } from './salaryDetails';
import type {
  AccountReference,
  BankNameLookup,
  FinalSettlementDetails,
  LedgerLeg,
  SalaryDetails,
} from './types';

export class LegProfile {
  readonly uid: string;
  readonly amount: number;
  readonly text: string;
  readonly purchaseOrder: string | null;
  readonly letterOfCredit: string | null;
  readonly loanId: string | null;
  readonly hasTimeLoanPhrase: boolean;
  readonly timeLoanId: string | null;
  readonly salary: SalaryDetails | null;
  readonly finalSettlement: FinalSettlementDetails | null;
  readonly isInterunit: boolean;
  readonly account: AccountReference | null;
  readonly shortReference: string | null;
  /** Trimmed operator name, null when blank */
  readonly enteredBy: string | null;

  private phraseCache: ReadonlySet<string> | null = null;

  constructor(leg: LedgerLeg, bankNameLookup: BankNameLookup) {
    const { text } = leg;
    const lower = text.toLowerCase();

    this.uid = leg.record.uid;
    this.amount = leg.amount;
    this.text = text;
    this.purchaseOrder = extractPurchaseOrder(text);
    this.letterOfCredit = extractLetterOfCredit(text);
    this.loanId = extractLoanId(text);
    this.hasTimeLoanPhrase = hasTimeLoanPhrase(text);
    this.timeLoanId = this.hasTimeLoanPhrase ? extractLoanIdAfterTimeLoanPhrase(text) : null;
    this.salary = extractSalaryDetails(text);
    this.finalSettlement = extractFinalSettlementDetails(text);
    this.isInterunit = INTERUNIT_LOAN_PHRASES.some((phrase) => lower.includes(phrase));
    this.account = this.isInterunit ? extractAccountReference(text, bankNameLookup) : null;
    this.shortReference = extractShortReference(text);

    const enteredBy = leg.record.enteredBy?.trim();
    this.enteredBy = enteredBy ? enteredBy : null;
  }

  get phrases(): ReadonlySet<string> {
    if (!this.phraseCache) {
      this.phraseCache =
        safeExtract('common_text', () => extractPhrases(this.text.toLowerCase())) ?? new Set();
    }
    return this.phraseCache;
  }

  get hasCachedPhrases(): boolean {
    return this.phraseCache !== null;
  }

  /**
   * Drops the phrase set once the leg can no longer be compared
   */
  releasePhrases(): void {
    this.phraseCache = null;
  }
}
