/**
 * Interunit Loan Matching Orchestrator
 *
 * Entry point of the matching engine.
 *
 * Flow:
 * 1. Split records into lender and borrower legs (input order preserved)
 * 2. Profile every leg once
 * 3. For each lender, scan the unused borrowers with the same amount and
 *    run the rule chain; the first rule that fires pairs the two legs
 * 4. Report leftover legs as unmatched
 *
 * The pairing is greedy and first-compatible-wins. It is deterministic for
 * a given input order but never a globally optimal assignment.
 */

import { identityBankLookup } from './accountReference';
import { amountsEqual, partitionLegs } from './amountGate';
import { LegProfile } from './legProfile';
import { MATCH_RULES, type MatchRule } from './matchRules';
import type {
  MatchCandidate,
  MatchingOptions,
  ReconciliationResult,
  TransactionRecord,
} from './types';

/**
 * Runs the rule chain on one pair and builds the candidate of the first
 * rule that fires.
 */
export function evaluatePair(
  lender: LegProfile,
  borrower: LegProfile,
  rules: readonly MatchRule[] = MATCH_RULES
): MatchCandidate | null {
  for (const rule of rules) {
    const auditTrail = rule.evaluate(lender, borrower);
    if (auditTrail) {
      return Object.freeze({
        lenderUid: lender.uid,
        borrowerUid: borrower.uid,
        matchType: rule.matchType,
        amount: lender.amount,
        rule: rule.name,
        auditTrail: Object.freeze({ ...auditTrail }),
      });
    }
  }
  return null;
}

/**
 * Reconciles a set of ledger records.
 *
 * @param records - Normalized ledger lines from both units
 * @param options - Optional bank name lookup for account references
 * @returns Matches plus unmatched and excluded uids
 *
 * @example
 * const result = reconcile([
 *   { uid: 'L1', particulars: 'ABC/PO/123/456 payment', debit: 5000, credit: null },
 *   { uid: 'B1', particulars: 'Settling ABC/PO/123/456', debit: null, credit: 5000 },
 * ]);
 * // result.matches[0].matchType === 'PO'
 */
export function reconcile(
  records: readonly TransactionRecord[],
  options: MatchingOptions = {}
): ReconciliationResult {
  const bankNameLookup = options.bankNameLookup ?? identityBankLookup;
  const { lenders, borrowers, excluded } = partitionLegs(records);

  const lenderProfiles = lenders.map((leg) => new LegProfile(leg, bankNameLookup));
  const borrowerProfiles = borrowers.map((leg) => new LegProfile(leg, bankNameLookup));

  const usedUids = new Set<string>();
  const matches: MatchCandidate[] = [];

  for (const lender of lenderProfiles) {
    if (usedUids.has(lender.uid)) {
      continue;
    }

    for (const borrower of borrowerProfiles) {
      if (usedUids.has(borrower.uid) || borrower.uid === lender.uid) {
        continue;
      }
      if (!amountsEqual(lender.amount, borrower.amount)) {
        continue;
      }

      const candidate = evaluatePair(lender, borrower);
      if (candidate) {
        matches.push(candidate);
        usedUids.add(lender.uid);
        usedUids.add(borrower.uid);
        borrower.releasePhrases();
        break;
      }
    }

    // Each lender is scanned once
    lender.releasePhrases();
  }

  return {
    matches,
    unmatchedLenders: lenderProfiles.filter((p) => !usedUids.has(p.uid)).map((p) => p.uid),
    unmatchedBorrowers: borrowerProfiles.filter((p) => !usedUids.has(p.uid)).map((p) => p.uid),
    excluded,
  };
}

/**
 * Matches only, for callers that do not need the unmatched legs.
 */
export function findMatches(
  records: readonly TransactionRecord[],
  options: MatchingOptions = {}
): MatchCandidate[] {
  return reconcile(records, options).matches;
}
