/**
 * Amount Gate for Interunit Loan Reconciliation
 *
 * Splits ledger records into lender legs (positive debit) and borrower legs
 * (positive credit). A lender and a borrower are only ever compared when their
 * amounts are numerically equal.
 */

import type { AmountInput, LedgerLeg, TransactionRecord } from './types';

/**
 * Parses a ledger amount.
 *
 * Accepts numbers and numeric strings ("5000", "5,000.00"). Null, undefined,
 * empty and non-numeric values return null.
 *
 * @example
 * parseLedgerAmount('1,200.50') // Returns: 1200.5
 * parseLedgerAmount('')         // Returns: null
 * parseLedgerAmount('n/a')      // Returns: null
 */
export function parseLedgerAmount(value: AmountInput): number | null {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  const cleaned = value.replace(/,/g, '').trim();
  if (cleaned === '') {
    return null;
  }

  // Number() rejects trailing garbage that parseFloat would silently drop
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Exact numeric equality of two leg amounts.
 */
export function amountsEqual(a: number, b: number): boolean {
  return a === b;
}

/**
 * Partitions records into lender and borrower legs, preserving input order.
 *
 * A record is excluded when neither side is positive, when both sides are
 * positive, or when the positive side cannot be parsed.
 */
export function partitionLegs(records: readonly TransactionRecord[]): {
  lenders: LedgerLeg[];
  borrowers: LedgerLeg[];
  excluded: string[];
} {
  const lenders: LedgerLeg[] = [];
  const borrowers: LedgerLeg[] = [];
  const excluded: string[] = [];

  for (const record of records) {
    const debit = parseLedgerAmount(record.debit);
    const credit = parseLedgerAmount(record.credit);
    const isLender = debit !== null && debit > 0;
    const isBorrower = credit !== null && credit > 0;
    const text = record.particulars ?? '';

    if (isLender && !isBorrower) {
      lenders.push({ record, role: 'lender', amount: debit, text });
    } else if (isBorrower && !isLender) {
      borrowers.push({ record, role: 'borrower', amount: credit, text });
    } else {
      excluded.push(record.uid);
    }
  }

  return { lenders, borrowers, excluded };
}
