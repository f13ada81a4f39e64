/**
 * Type Definitions for the Interunit Loan Matching Engine
 *
 * These types define the input/output contracts for the matching engine.
 * The engine is pure and deterministic - no database or external dependencies.
 */

// ============================================
// INPUT TYPES
// ============================================

/**
 * Amount as it arrives from the ledger store.
 * PostgreSQL NUMERIC columns come back as strings; empty string and null mean "absent".
 */
export type AmountInput = number | string | null | undefined;

/**
 * One normalized ledger line handed to the engine.
 * Company and period attributes are filtered upstream and are not needed here.
 */
export interface TransactionRecord {
  /** Stable, globally unique identifier of the ledger line */
  uid: string;
  /** Free-text narration */
  particulars: string | null | undefined;
  /** Debit amount (positive for a lender leg) */
  debit: AmountInput;
  /** Credit amount (positive for a borrower leg) */
  credit: AmountInput;
  /** Operator who keyed the voucher (used by the lowest-priority fallback rule) */
  enteredBy?: string | null;
}

/**
 * Canonical bank name lookup. Unknown codes pass through unchanged.
 */
export type BankNameLookup = (codeOrName: string) => string;

/**
 * Options accepted by the engine entry points.
 */
export interface MatchingOptions {
  bankNameLookup?: BankNameLookup;
}

// ============================================
// OUTPUT TYPES
// ============================================

export type MatchType =
  | 'PO'
  | 'LC'
  | 'LOAN_ID'
  | 'SALARY'
  | 'FINAL_SETTLEMENT'
  | 'INTERUNIT_LOAN'
  | 'MANUAL_VERIFICATION'
  | 'COMMON_TEXT';

/**
 * Coarse evidence category consumed by reporting and persistence.
 */
export type MatchMethod =
  | 'reference_match'
  | 'cross_reference'
  | 'similarity_match'
  | 'fallback_match';

/**
 * Status a match is persisted with right after the engine run.
 */
export type InitialMatchStatus = 'confirmed' | 'matched' | 'pending_verification';

/**
 * Audit values are JSON primitives only so the trail serializes as-is.
 */
export type AuditValue = string | number | boolean;

export type AuditTrail = Readonly<Record<string, AuditValue>>;

/**
 * One successful pairing. Frozen once created.
 */
export interface MatchCandidate {
  readonly lenderUid: string;
  readonly borrowerUid: string;
  readonly matchType: MatchType;
  /** The shared amount */
  readonly amount: number;
  /** Name of the rule that fired (two rules can produce LOAN_ID) */
  readonly rule: string;
  readonly auditTrail: AuditTrail;
}

/**
 * Complete outcome of one engine run.
 */
export interface ReconciliationResult {
  matches: MatchCandidate[];
  /** Lender legs that found no counterpart, in input order */
  unmatchedLenders: string[];
  /** Borrower legs left over after the scan, in input order */
  unmatchedBorrowers: string[];
  /** Records that are neither a valid lender nor a valid borrower leg */
  excluded: string[];
}

export interface MatchClassification {
  matchMethod: MatchMethod;
  autoAccept: boolean;
  initialStatus: InitialMatchStatus;
}

// ============================================
// EXTRACTED TOKENS
// ============================================

export interface PersonReference {
  personName: string;
  personId: string;
  /** "<Name>-ID : <digits>" */
  personCombined: string;
}

export interface FinalSettlementDetails extends PersonReference {
  isFinalSettlement: true;
}

export interface SalaryDetails {
  personName: string | null;
  personId: string | null;
  personCombined: string | null;
  period: string | null;
  isSalary: boolean;
  matchedKeywords: string[];
}

export type AccountPatternName = 'standard' | 'hyphenated' | 'fallback' | 'short_reference';

export interface AccountReference {
  accountNumber: string;
  bankCode: string | null;
  normalizedBank: string | null;
  /** The full matched text, e.g. "MDBL-0012345678901234" */
  fullReference: string;
  pattern: AccountPatternName;
}

export interface CommonPhrase {
  phrase: string;
  wordCount: number;
}

export interface CommonTextMatch {
  phrases: CommonPhrase[];
  /** "<n> words: <phrase>" entries joined by " | " */
  display: string;
}

// ============================================
// INTERNAL TYPES
// ============================================

export type LedgerRole = 'lender' | 'borrower';

/**
 * A matchable leg with its parsed amount.
 */
export interface LedgerLeg {
  record: TransactionRecord;
  role: LedgerRole;
  amount: number;
  text: string;
}
