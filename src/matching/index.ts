/**
 * Interunit Loan Matching Engine
 *
 * Pure, deterministic pairing of lender legs (debits) with borrower legs
 * (credits) from two units' ledgers, based on:
 * - Equal amounts
 * - Structured references (PO, L/C, loan ids, account digits)
 * - Salary and final settlement descriptors
 * - Jaccard similarity and long shared phrases
 *
 * Usage:
 * ```typescript
 * import { reconcile } from './matching';
 *
 * const result = reconcile(records, { bankNameLookup });
 * console.log(result.matches[0].matchType); // 'PO' | 'LC' | 'LOAN_ID' | ...
 * ```
 */

// Main functions
export { reconcile, findMatches, evaluatePair } from './findMatches';

// Rule chain
export { MATCH_RULES, buildAuditTrail } from './matchRules';
export type { MatchRule } from './matchRules';
export { LegProfile } from './legProfile';
export { classifyMatch, isAutoAccepted } from './classification';

// Individual extractors (for testing/debugging)
export { parseLedgerAmount, partitionLegs } from './amountGate';
export {
  extractPurchaseOrder,
  extractLetterOfCredit,
  normalizeLetterOfCredit,
  extractLoanId,
  hasTimeLoanPhrase,
  extractLoanIdAfterTimeLoanPhrase,
} from './referenceExtractors';
export { extractSalaryDetails } from './salaryDetails';
export { extractFinalSettlementDetails, extractPersonReference } from './finalSettlement';
export {
  extractAccountReference,
  extractShortReference,
  trailingDigits,
  identityBankLookup,
} from './accountReference';
export { calculateJaccardSimilarity, roundScore } from './jaccardSimilarity';
export { findCommonText, extractPhrases } from './commonText';

// Constants
export { SALARY_JACCARD_THRESHOLD, MATCH_CLASSIFICATION } from './constants';

// Types
export type {
  AmountInput,
  TransactionRecord,
  BankNameLookup,
  MatchingOptions,
  MatchType,
  MatchMethod,
  InitialMatchStatus,
  AuditValue,
  AuditTrail,
  MatchCandidate,
  ReconciliationResult,
  MatchClassification,
  SalaryDetails,
  FinalSettlementDetails,
  AccountReference,
  CommonTextMatch,
} from './types';
