import type { MatchCandidate } from '../../src/matching';
import { reconcile } from '../../src/matching/findMatches';
import {
  buildAuditInfo,
  getMatches,
  getRun,
  persistMatches,
  resetMatches,
  runReconciliation,
} from '../../src/services/reconciliation.service';
import { query, withTransaction } from '../../src/utils/db';
import { fakeClient, ledgerRow } from '../helpers/ledgerRows';

jest.mock('../../src/utils/db', () => ({
  pool: {},
  query: jest.fn(),
  withTransaction: jest.fn(),
  checkDatabaseHealth: jest.fn(),
}));

const mockedQuery = jest.mocked(query);
const mockedWithTransaction = jest.mocked(withTransaction);

const PO_NARRATION_LENDER = 'Payment for yarn against NFT/PO/2024/118';
const PO_NARRATION_BORROWER = 'Received for yarn supply NFT/PO/2024/118';

const poCandidate: MatchCandidate = {
  lenderUid: 'L-1',
  borrowerUid: 'B-1',
  matchType: 'PO',
  amount: 250000,
  rule: 'PO',
  auditTrail: { po_number: 'NFT/PO/2024/118' },
};

const runRow = (status: string) => ({
  id: '3f0c1c9e-9a53-4a8e-8f5c-0a4a3c2b1d10',
  lender_company: 'Alpha',
  borrower_company: 'Beta',
  statement_month: null,
  statement_year: '2024',
  pair_id: null,
  status,
  total_records: 0,
  matches_found: 0,
  auto_confirmed: 0,
  needs_review: 0,
  pending_verification: 0,
  unmatched_lenders: 0,
  unmatched_borrowers: 0,
  excluded: 0,
  by_type: null,
  error: null,
  started_at: null,
  completed_at: null,
  created_at: new Date('2024-04-01T00:00:00Z'),
});

describe('Reconciliation Service', () => {
  beforeEach(() => {
    mockedWithTransaction.mockImplementation((work) => work(fakeClient));
  });

  afterEach(() => {
    jest.resetAllMocks();
  });

  describe('buildAuditInfo', () => {
    it('should combine classification, rule evidence and both amounts', () => {
      expect(buildAuditInfo(poCandidate)).toEqual({
        match_type: 'PO',
        match_method: 'reference_match',
        po_number: 'NFT/PO/2024/118',
        lender_amount: 250000,
        borrower_amount: 250000,
      });
    });

    it('should keep the classification method for a salary match', () => {
      const [salaryMatch] = reconcile([
        {
          uid: 'L-S',
          particulars: 'Salary of John Doe for March 2024',
          debit: 42000,
          credit: null,
          enteredBy: null,
        },
        {
          uid: 'B-S',
          particulars: 'March 2024 payroll John Doe staff',
          debit: null,
          credit: 42000,
          enteredBy: null,
        },
      ]).matches;

      const info = buildAuditInfo(salaryMatch);

      expect(info.match_type).toBe('SALARY');
      expect(info.match_method).toBe('similarity_match');
      expect(info.salary_match_branch).toBe('jaccard');
      expect(info.jaccard_score).toBe(0.571);
    });
  });

  describe('persistMatches', () => {
    it('should update both legs guarded by their unmatched status and audit them', async () => {
      mockedQuery
        .mockResolvedValueOnce([{ uid: 'L-1' }, { uid: 'B-1' }])
        .mockResolvedValueOnce([{ id: '1' }, { id: '2' }]);

      const counts = await persistMatches([poCandidate], fakeClient);

      expect(counts).toEqual({ autoConfirmed: 1, needsReview: 0, pendingVerification: 0 });

      const [updateSql, updateValues, client] = mockedQuery.mock.calls[0];
      expect(updateSql).toContain("le.match_status = 'unmatched'");
      expect(client).toBe(fakeClient);
      expect(updateValues).toEqual([
        'L-1',
        'B-1',
        'confirmed',
        'reference_match',
        JSON.stringify({
          po_number: 'NFT/PO/2024/118',
          match_type: 'PO',
          match_method: 'reference_match',
          lender_amount: 250000,
          borrower_amount: 250000,
        }),
      ]);

      expect(mockedQuery.mock.calls[1][1]).toEqual([
        'L-1', 'B-1', 'auto_confirmed', 'PO', 'system', 'Rule PO',
        'B-1', 'L-1', 'auto_confirmed', 'PO', 'system', 'Rule PO',
      ]);
    });

    it('should count suggestions and pending verifications separately', async () => {
      mockedQuery
        .mockResolvedValueOnce([{ uid: 'L-2' }, { uid: 'B-2' }])
        .mockResolvedValueOnce([{ uid: 'L-3' }, { uid: 'B-3' }])
        .mockResolvedValueOnce([]);

      const counts = await persistMatches(
        [
          { ...poCandidate, lenderUid: 'L-2', borrowerUid: 'B-2', matchType: 'COMMON_TEXT', rule: 'COMMON_TEXT' },
          { ...poCandidate, lenderUid: 'L-3', borrowerUid: 'B-3', matchType: 'MANUAL_VERIFICATION', rule: 'MANUAL_VERIFICATION' },
        ],
        fakeClient
      );

      expect(counts).toEqual({ autoConfirmed: 0, needsReview: 1, pendingVerification: 1 });
      expect(mockedQuery.mock.calls[0][1]?.[2]).toBe('matched');
      expect(mockedQuery.mock.calls[1][1]?.[2]).toBe('pending_verification');
      expect(mockedQuery.mock.calls[2][1]?.[2]).toBe('suggested');
    });

    it('should abort with 409 when a leg was matched concurrently', async () => {
      mockedQuery.mockResolvedValueOnce([{ uid: 'L-1' }]);

      await expect(persistMatches([poCandidate], fakeClient)).rejects.toMatchObject({
        statusCode: 409,
        message: 'Ledger entries L-1 / B-1 are no longer unmatched',
      });
      expect(mockedQuery).toHaveBeenCalledTimes(1);
    });
  });

  describe('runReconciliation', () => {
    it('should match, persist and summarize the unmatched legs of a scope', async () => {
      mockedQuery
        .mockResolvedValueOnce([
          ledgerRow({ uid: 'L-1', particulars: PO_NARRATION_LENDER, debit: '250000.00', entered_by: 'clerk.a' }),
          ledgerRow({ uid: 'B-1', particulars: PO_NARRATION_BORROWER, credit: '250000.00', entered_by: 'clerk.b' }),
          ledgerRow({ uid: 'L-2', particulars: 'Advance for spares', debit: '5000', entered_by: 'clerk.a' }),
          ledgerRow({ uid: 'X-1', particulars: 'Opening balance', debit: '0', credit: '0' }),
        ])
        .mockResolvedValueOnce([{ uid: 'L-1' }, { uid: 'B-1' }])
        .mockResolvedValueOnce([{ id: '1' }, { id: '2' }]);

      const summary = await runReconciliation({ lenderCompany: 'Alpha', borrowerCompany: 'Beta' });

      expect(summary).toEqual({
        scope: { lenderCompany: 'Alpha', borrowerCompany: 'Beta' },
        totalRecords: 4,
        lenderCount: 2,
        borrowerCount: 1,
        matchesFound: 1,
        autoConfirmed: 1,
        needsReview: 0,
        pendingVerification: 0,
        unmatchedLenders: 1,
        unmatchedBorrowers: 0,
        excluded: 1,
        byType: { PO: 1 },
        durationMs: expect.any(Number),
      });
      expect(mockedQuery.mock.calls[0][1]).toEqual(['Alpha', 'Beta']);
    });

    it('should read an upload pair and skip the transaction when nothing matches', async () => {
      mockedQuery.mockResolvedValueOnce([
        ledgerRow({ uid: 'L-2', particulars: 'Advance for spares', debit: '5000' }),
      ]);

      const summary = await runReconciliation({ pairId: 'demo-2024-03' }, 'run-7');

      expect(mockedQuery.mock.calls[0][1]).toEqual(['demo-2024-03']);
      expect(mockedWithTransaction).not.toHaveBeenCalled();
      expect(summary.runId).toBe('run-7');
      expect(summary.matchesFound).toBe(0);
      expect(summary.unmatchedLenders).toBe(1);
    });
  });

  describe('getRun', () => {
    it('should map a stored run and drop empty scope fields', async () => {
      mockedQuery.mockResolvedValueOnce([runRow('queued')]);

      const run = await getRun('3f0c1c9e-9a53-4a8e-8f5c-0a4a3c2b1d10');

      expect(run).toMatchObject({
        status: 'queued',
        scope: { lenderCompany: 'Alpha', borrowerCompany: 'Beta', statementYear: '2024' },
        byType: {},
      });
      expect(run?.scope).not.toHaveProperty('statementMonth');
    });

    it('should fall back to the stored counters while Redis is disabled', async () => {
      mockedQuery.mockResolvedValueOnce([{ ...runRow('processing'), total_records: 12 }]);

      const run = await getRun('3f0c1c9e-9a53-4a8e-8f5c-0a4a3c2b1d10');

      expect(run?.status).toBe('processing');
      expect(run?.totalRecords).toBe(12);
    });

    it('should return null for an unknown run', async () => {
      mockedQuery.mockResolvedValueOnce([]);

      await expect(getRun('3f0c1c9e-9a53-4a8e-8f5c-0a4a3c2b1d11')).resolves.toBeNull();
    });
  });

  describe('getMatches', () => {
    it('should select lender legs in the statuses of the view', async () => {
      mockedQuery.mockResolvedValueOnce([]);

      await getMatches({ lenderCompany: 'Alpha', borrowerCompany: 'Beta' }, 'pending');

      const [sql, values] = mockedQuery.mock.calls[0];
      expect(sql).toContain('JOIN ledger_entries t2 ON t1.matched_with = t2.uid');
      expect(sql).toContain('t1.match_status = ANY($1)');
      expect(values).toEqual([['matched', 'pending_verification'], 'Alpha', 'Beta']);
    });
  });

  describe('resetMatches', () => {
    it('should reset counterparts outside the scope and audit every leg', async () => {
      mockedQuery
        .mockResolvedValueOnce([{ uid: 'L-1', matched_with: 'B-1' }])
        .mockResolvedValueOnce([
          { uid: 'L-1', matched_with: 'B-1', match_type: 'PO' },
          { uid: 'B-1', matched_with: 'L-1', match_type: 'PO' },
        ])
        .mockResolvedValueOnce([{ id: '1' }, { id: '2' }]);

      const reset = await resetMatches({ statementYear: '2024' }, 'reviewer.k');

      expect(reset).toBe(2);
      expect(mockedQuery.mock.calls[0][1]).toEqual(['2024']);
      expect(mockedQuery.mock.calls[1][1]).toEqual([['L-1', 'B-1']]);
      expect(mockedQuery.mock.calls[2][1]).toEqual([
        'L-1', 'B-1', 'reset', 'PO', 'reviewer.k', null,
        'B-1', 'L-1', 'reset', 'PO', 'reviewer.k', null,
      ]);
    });

    it('should return 0 when nothing is matched', async () => {
      mockedQuery.mockResolvedValueOnce([]);

      await expect(resetMatches()).resolves.toBe(0);
      expect(mockedQuery).toHaveBeenCalledTimes(1);
    });
  });
});
