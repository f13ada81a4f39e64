/**
 * Tests for the Amount Gate
 */

import { amountsEqual, parseLedgerAmount, partitionLegs } from '../../src/matching/amountGate';
import type { TransactionRecord } from '../../src/matching/types';

describe('parseLedgerAmount', () => {
  it('should pass finite numbers through', () => {
    expect(parseLedgerAmount(5000)).toBe(5000);
    expect(parseLedgerAmount(0)).toBe(0);
  });

  it('should parse numeric strings with thousands separators', () => {
    expect(parseLedgerAmount('1,200.50')).toBe(1200.5);
    expect(parseLedgerAmount('  300 ')).toBe(300);
  });

  it('should treat absent values as null', () => {
    expect(parseLedgerAmount(null)).toBeNull();
    expect(parseLedgerAmount(undefined)).toBeNull();
    expect(parseLedgerAmount('')).toBeNull();
    expect(parseLedgerAmount('   ')).toBeNull();
  });

  it('should reject non-numeric values', () => {
    expect(parseLedgerAmount('n/a')).toBeNull();
    expect(parseLedgerAmount('12abc')).toBeNull();
    expect(parseLedgerAmount(Number.POSITIVE_INFINITY)).toBeNull();
    expect(parseLedgerAmount(Number.NaN)).toBeNull();
  });
});

describe('amountsEqual', () => {
  it('should require exact numeric equality', () => {
    expect(amountsEqual(5000, 5000)).toBe(true);
    expect(amountsEqual(5000, 5000.01)).toBe(false);
  });
});

describe('partitionLegs', () => {
  const records: TransactionRecord[] = [
    { uid: 'L1', particulars: 'loan out', debit: 100, credit: null },
    { uid: 'B1', particulars: 'loan in', debit: '', credit: '100' },
    { uid: 'X1', particulars: 'both sides', debit: 100, credit: 100 },
    { uid: 'X2', particulars: 'zero', debit: 0, credit: 0 },
    { uid: 'X3', particulars: 'garbage', debit: 'abc', credit: null },
    { uid: 'B2', particulars: null, debit: -5, credit: 50 },
  ];

  it('should split lenders and borrowers in input order', () => {
    const { lenders, borrowers } = partitionLegs(records);

    expect(lenders.map((leg) => leg.record.uid)).toEqual(['L1']);
    expect(borrowers.map((leg) => leg.record.uid)).toEqual(['B1', 'B2']);
  });

  it('should carry the parsed amount of the positive side', () => {
    const { lenders, borrowers } = partitionLegs(records);

    expect(lenders[0].amount).toBe(100);
    expect(borrowers[0].amount).toBe(100);
    expect(borrowers[1].amount).toBe(50);
  });

  it('should exclude records with no, both or unparseable positive sides', () => {
    const { excluded } = partitionLegs(records);

    expect(excluded).toEqual(['X1', 'X2', 'X3']);
  });

  it('should use an empty narration when particulars are missing', () => {
    const { borrowers } = partitionLegs(records);

    expect(borrowers[1].text).toBe('');
  });
});
