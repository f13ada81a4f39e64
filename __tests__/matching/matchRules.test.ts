/**
 * Tests for the Match Rule Chain
 *
 * Each rule is exercised on its own; precedence is covered by the
 * orchestrator tests.
 */

import { identityBankLookup } from '../../src/matching/accountReference';
import { LegProfile } from '../../src/matching/legProfile';
import {
  buildAuditTrail,
  commonTextRule,
  finalSettlementRule,
  interunitLoanRule,
  letterOfCreditRule,
  loanIdRule,
  manualVerificationRule,
  MATCH_RULES,
  purchaseOrderRule,
  salaryRule,
  timeLoanIdRule,
} from '../../src/matching/matchRules';
import type { LedgerRole } from '../../src/matching/types';

function profile(
  uid: string,
  text: string,
  role: LedgerRole,
  enteredBy: string | null = null
): LegProfile {
  return new LegProfile(
    {
      record: {
        uid,
        particulars: text,
        debit: role === 'lender' ? 1000 : null,
        credit: role === 'borrower' ? 1000 : null,
        enteredBy,
      },
      role,
      amount: 1000,
      text,
    },
    identityBankLookup
  );
}

const lender = (text: string, enteredBy: string | null = null) =>
  profile('L', text, 'lender', enteredBy);
const borrower = (text: string, enteredBy: string | null = null) =>
  profile('B', text, 'borrower', enteredBy);

describe('buildAuditTrail', () => {
  it('should leave out null and undefined values', () => {
    expect(buildAuditTrail({ a: 'x', b: null, c: undefined, d: 0, e: false })).toEqual({
      a: 'x',
      d: 0,
      e: false,
    });
  });
});

describe('MATCH_RULES', () => {
  it('should be ordered by priority', () => {
    expect(MATCH_RULES.map((rule) => rule.name)).toEqual([
      'PO',
      'FINAL_SETTLEMENT',
      'SALARY',
      'LC',
      'INTERUNIT_LOAN',
      'LOAN_ID_TIME_LOAN',
      'LOAN_ID',
      'MANUAL_VERIFICATION',
      'COMMON_TEXT',
    ]);
  });
});

describe('purchaseOrderRule', () => {
  it('should fire on identical PO numbers', () => {
    expect(
      purchaseOrderRule.evaluate(
        lender('ABC/PO/123/456 payment'),
        borrower('Settling abc/po/123/456')
      )
    ).toEqual({ po_number: 'ABC/PO/123/456' });
  });

  it('should not fire on different PO numbers', () => {
    expect(
      purchaseOrderRule.evaluate(lender('ABC/PO/123/456'), borrower('ABC/PO/123/457'))
    ).toBeNull();
  });
});

describe('finalSettlementRule', () => {
  it('should fire when both sides name the same person', () => {
    expect(
      finalSettlementRule.evaluate(
        lender('Amount paid as Inter Unit Loan for final settlement (Md. Rahim - ID: 1042)'),
        borrower('Payable to Md. Rahim - ID: 1042 final settlement')
      )
    ).toEqual({
      match_reason: 'Final settlement match',
      lender_person: 'Md. Rahim-ID : 1042',
      borrower_person: 'Md. Rahim-ID : 1042',
      person_name: 'Md. Rahim',
      person_id: '1042',
    });
  });

  it('should not fire for different people', () => {
    expect(
      finalSettlementRule.evaluate(
        lender('Amount paid as Inter Unit Loan for final settlement (Md. Rahim - ID: 1042)'),
        borrower('Payable to Md. Karim - ID: 77 final settlement')
      )
    ).toBeNull();
  });
});

describe('salaryRule', () => {
  it('should record an exact person and period match', () => {
    expect(
      salaryRule.evaluate(
        lender('Salary of Karim Uddin for March 2024'),
        borrower('Salary of Karim Uddin for March 2024 payable')
      )
    ).toEqual({
      person: 'karim uddin',
      period: 'March 2024',
      lender_keywords: 'salary, sal, march, mar',
      borrower_keywords: 'salary, sal, march, mar',
      jaccard_score: 0.833,
      salary_match_branch: 'exact',
    });
  });

  it('should fall back to Jaccard similarity', () => {
    const trail = salaryRule.evaluate(
      lender('Salary of John Doe for March 2024'),
      borrower('March 2024 payroll John Doe staff')
    );

    expect(trail).toEqual({
      person: 'john doe',
      period: 'March 2024',
      lender_keywords: 'salary, sal, march, mar',
      borrower_keywords: 'payroll, march, mar',
      jaccard_score: 0.571,
      salary_match_branch: 'jaccard',
    });
  });

  it('should not fire for different salaries with little overlap', () => {
    expect(
      salaryRule.evaluate(
        lender('Salary of John Doe for March 2024'),
        borrower('Wage of Karim Uddin for April 2023')
      )
    ).toBeNull();
  });

  it('should need salary details on both sides', () => {
    expect(
      salaryRule.evaluate(lender('Salary of John Doe for March 2024'), borrower('John Doe March 2024'))
    ).toBeNull();
  });
});

describe('letterOfCreditRule', () => {
  it('should compare normalized LC numbers', () => {
    expect(
      letterOfCreditRule.evaluate(
        lender('Margin for L/C-123/456 opened'),
        borrower('lc-123/456 margin received')
      )
    ).toEqual({
      lc_number: 'L/C-123/456',
      borrower_lc_number: 'LC-123/456',
      normalized_lc: 'LC-123/456',
    });
  });
});

describe('interunitLoanRule', () => {
  it('should fire on a two-way digit cross-reference', () => {
    const trail = interunitLoanRule.evaluate(
      lender('Amount paid as interunit loan to MDBL-0012345678901234'),
      borrower('Amount received as interunit loan #01234')
    );

    expect(trail).toEqual({
      lender_reference: 'MDBL-0012345678901234',
      borrower_reference: '#01234',
      lender_account: '0012345678901234',
      borrower_account: '01234',
      lender_last_digits: '01234',
      borrower_last_digits: '01234',
      lender_bank: 'MDBL',
      cross_reference_1: true,
      cross_reference_2: true,
      match_reason: 'Interunit loan cross-reference match: 01234 <-> 01234',
    });
  });

  it('should accept a short reference contained in the other side digits', () => {
    // The lender never quotes 45678 but its "#5678" sits inside it
    const trail = interunitLoanRule.evaluate(
      lender('Interunit fund transfer to 9876543210 ref #5678'),
      borrower('Interunit loan received in 1112345678 from 9876543210')
    );

    expect(trail).toEqual({
      lender_reference: '9876543210',
      borrower_reference: '1112345678',
      lender_account: '9876543210',
      borrower_account: '1112345678',
      lender_last_digits: '43210',
      borrower_last_digits: '45678',
      cross_reference_1: true,
      cross_reference_2: true,
      match_reason: 'Interunit loan cross-reference match: 43210 <-> 45678',
    });
  });

  it('should not fire when only one side quotes the other', () => {
    expect(
      interunitLoanRule.evaluate(
        lender('Amount paid as interunit loan to MDBL-0012345678901234'),
        borrower('Amount received as interunit loan from 9999988888 ref 01234')
      )
    ).toBeNull();
  });

  it('should need the interunit phrase on both sides', () => {
    expect(
      interunitLoanRule.evaluate(
        lender('Transfer to MDBL-0012345678901234'),
        borrower('Amount received as interunit loan #01234')
      )
    ).toBeNull();
  });
});

describe('loan id rules', () => {
  it('should match the loan id after the time loan phrase', () => {
    expect(
      timeLoanIdRule.evaluate(
        lender('Amount being paid as Principal & Interest of Time Loan ID-2435445106'),
        borrower('Amount being paid as Principal & Interest of Time Loan LD-2435445106 received')
      )
    ).toEqual({
      loan_id: 'LD-2435445106',
      match_reason: 'Time Loan phrase + matching Loan ID after phrase',
      phrase_detected: true,
    });
  });

  it('should match identical generic loan ids', () => {
    expect(
      loanIdRule.evaluate(lender('Loan transfer LD-778899'), borrower('Received against LD-778899'))
    ).toEqual({ loan_id: 'LD-778899' });
  });

  it('should not treat differently written ids as equal without the phrase', () => {
    expect(
      loanIdRule.evaluate(lender('Loan transfer ID-778899'), borrower('Received against LD-778899'))
    ).toBeNull();
  });
});

describe('manualVerificationRule', () => {
  it('should fire on the same operator', () => {
    expect(
      manualVerificationRule.evaluate(
        lender('Fund adjustment between units', 'opuser1'),
        borrower('Adjustment received', ' opuser1 ')
      )
    ).toEqual({
      entered_by: 'opuser1',
      match_reason: 'Exact match on debit, credit, and entered_by fields',
      requires_verification: true,
    });
  });

  it('should not fire on blank operators', () => {
    expect(
      manualVerificationRule.evaluate(lender('Fund adjustment', '  '), borrower('Adjustment', '  '))
    ).toBeNull();
  });
});

describe('commonTextRule', () => {
  const passage =
    'insurance cover note for vehicle chassis number ab12345 engine number cd67890 ' +
    'registered in the name of the company for the period of one year';

  it('should report the shared passage', () => {
    expect(
      commonTextRule.evaluate(lender(`Paid ${passage}`), borrower(`${passage} received`))
    ).toEqual({
      matched_phrase: `24 words: ${passage}`,
      word_count: 24,
      jaccard_score: 0.882,
    });
  });

  it('should not fire on short narrations', () => {
    expect(commonTextRule.evaluate(lender('misc payment'), borrower('misc payment'))).toBeNull();
  });
});

describe('LegProfile phrase cache', () => {
  it('should build phrases on demand and rebuild them after a release', () => {
    const leg = lender('insurance cover note for vehicle chassis number ab12345 engine number');

    expect(leg.hasCachedPhrases).toBe(false);
    const phrases = leg.phrases;
    expect(leg.hasCachedPhrases).toBe(true);

    leg.releasePhrases();
    expect(leg.hasCachedPhrases).toBe(false);
    expect(leg.phrases).toEqual(phrases);
  });
});
