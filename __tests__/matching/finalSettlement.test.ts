/**
 * Tests for Final Settlement Extraction
 */

import {
  extractFinalSettlementDetails,
  extractPersonReference,
} from '../../src/matching/finalSettlement';

describe('extractPersonReference', () => {
  it('should read the lender shape', () => {
    expect(
      extractPersonReference(
        'Amount paid as Inter Unit Loan for final settlement (Md. Rahim - ID: 1042)'
      )
    ).toEqual({
      personName: 'Md. Rahim',
      personId: '1042',
      personCombined: 'Md. Rahim-ID : 1042',
    });
  });

  it('should read the borrower shape', () => {
    expect(extractPersonReference('Payable to Md. Rahim - ID: 1042 final settlement')).toEqual({
      personName: 'Md. Rahim',
      personId: '1042',
      personCombined: 'Md. Rahim-ID : 1042',
    });
  });

  it('should accept a full-width colon', () => {
    expect(
      extractPersonReference('Payable to Md. Karim - ID：77 final settlement')?.personId
    ).toBe('77');
  });

  it('should require the final settlement phrase on the borrower shape', () => {
    expect(extractPersonReference('Payable to Md. Karim - ID: 77')).toBeNull();
  });
});

describe('extractFinalSettlementDetails', () => {
  it('should flag the details as a final settlement', () => {
    expect(
      extractFinalSettlementDetails('Payable to Md. Karim - ID: 77 final settlement')
    ).toEqual({
      personName: 'Md. Karim',
      personId: '77',
      personCombined: 'Md. Karim-ID : 77',
      isFinalSettlement: true,
    });
  });

  it('should return null without a person reference', () => {
    expect(extractFinalSettlementDetails('final settlement of dues')).toBeNull();
    expect(extractFinalSettlementDetails(undefined)).toBeNull();
  });
});
