import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../../src/app';
import { acceptMatch } from '../../src/services/match.service';
import {
  createRun,
  getMatches,
  getRun,
  resetMatches,
  runReconciliation,
  type RunRecord,
  type RunSummary,
} from '../../src/services/reconciliation.service';
import { AppError } from '../../src/utils/AppError';
import { dispatchRun } from '../../src/workers/reconciliationWorker';

jest.mock('../../src/utils/db', () => ({
  pool: {},
  query: jest.fn(),
  withTransaction: jest.fn(),
  checkDatabaseHealth: jest.fn(),
}));

jest.mock('../../src/services/reconciliation.service', () => ({
  runReconciliation: jest.fn(),
  createRun: jest.fn(),
  getRun: jest.fn(),
  listRuns: jest.fn(),
  getMatches: jest.fn(),
  resetMatches: jest.fn(),
}));

jest.mock('../../src/services/match.service', () => ({
  acceptMatch: jest.fn(),
  rejectMatch: jest.fn(),
}));

jest.mock('../../src/workers/reconciliationWorker', () => ({
  dispatchRun: jest.fn(),
}));

const RUN_ID = '3f0c1c9e-9a53-4a8e-8f5c-0a4a3c2b1d10';

const summary: RunSummary = {
  scope: {},
  totalRecords: 10,
  lenderCount: 5,
  borrowerCount: 5,
  matchesFound: 4,
  autoConfirmed: 3,
  needsReview: 1,
  pendingVerification: 0,
  unmatchedLenders: 1,
  unmatchedBorrowers: 1,
  excluded: 0,
  byType: { PO: 1, LOAN_ID: 2, SALARY: 1 },
  durationMs: 12,
};

const queuedRun: RunRecord = {
  id: RUN_ID,
  scope: {},
  status: 'queued',
  totalRecords: 0,
  matchesFound: 0,
  autoConfirmed: 0,
  needsReview: 0,
  pendingVerification: 0,
  unmatchedLenders: 0,
  unmatchedBorrowers: 0,
  excluded: 0,
  byType: {},
  error: null,
  startedAt: null,
  completedAt: null,
  createdAt: new Date('2024-04-01T00:00:00Z'),
};

describe('Reconciliation Routes', () => {
  let app: Application;

  beforeAll(() => {
    app = createApp();
  });

  afterEach(() => {
    jest.resetAllMocks();
  });

  describe('POST /api/v1/reconciliation/reconcile', () => {
    it('should run over every unmatched entry without a body', async () => {
      jest.mocked(runReconciliation).mockResolvedValue(summary);

      const response = await request(app).post('/api/v1/reconciliation/reconcile');

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('Reconciliation complete: 4 matches found');
      expect(response.body.data.byType).toEqual({ PO: 1, LOAN_ID: 2, SALARY: 1 });
      expect(runReconciliation).toHaveBeenCalledWith({});
    });

    it('should pass a company pair and period', async () => {
      jest.mocked(runReconciliation).mockResolvedValue(summary);

      await request(app)
        .post('/api/v1/reconciliation/reconcile')
        .send({ lender_company: 'Alpha', borrower_company: 'Beta', month: 'March', year: 2024 });

      expect(runReconciliation).toHaveBeenCalledWith({
        lenderCompany: 'Alpha',
        borrowerCompany: 'Beta',
        statementMonth: 'March',
        statementYear: '2024',
      });
    });

    it('should surface a concurrent-match conflict as 409', async () => {
      jest
        .mocked(runReconciliation)
        .mockRejectedValue(AppError.conflict('Ledger entries L-1 / B-1 are no longer unmatched'));

      const response = await request(app).post('/api/v1/reconciliation/reconcile');

      expect(response.status).toBe(409);
      expect(response.body.error).toBe('Ledger entries L-1 / B-1 are no longer unmatched');
    });
  });

  describe('POST /api/v1/reconciliation/pairs/:pairId/reconcile', () => {
    it('should scope the run to the upload pair', async () => {
      jest.mocked(runReconciliation).mockResolvedValue(summary);

      const response = await request(app).post('/api/v1/reconciliation/pairs/demo-2024-03/reconcile');

      expect(response.status).toBe(200);
      expect(runReconciliation).toHaveBeenCalledWith({ pairId: 'demo-2024-03' });
    });
  });

  describe('runs', () => {
    it('should queue a run and answer 202', async () => {
      jest.mocked(createRun).mockResolvedValue(queuedRun);
      jest.mocked(dispatchRun).mockResolvedValue('in-process');

      const response = await request(app).post('/api/v1/reconciliation/runs').send({});

      expect(response.status).toBe(202);
      expect(response.body.data).toEqual({ runId: RUN_ID, status: 'queued', dispatch: 'in-process' });
      expect(dispatchRun).toHaveBeenCalledWith(RUN_ID);
    });

    it('should return a known run', async () => {
      jest.mocked(getRun).mockResolvedValue({ ...queuedRun, status: 'completed', matchesFound: 4 });

      const response = await request(app).get(`/api/v1/reconciliation/runs/${RUN_ID}`);

      expect(response.status).toBe(200);
      expect(response.body.data).toMatchObject({ id: RUN_ID, status: 'completed', matchesFound: 4 });
    });

    it('should answer 404 for an unknown run', async () => {
      jest.mocked(getRun).mockResolvedValue(null);

      const response = await request(app).get(`/api/v1/reconciliation/runs/${RUN_ID}`);

      expect(response.status).toBe(404);
      expect(response.body.error).toBe(`Reconciliation run ${RUN_ID} not found`);
    });

    it('should reject a malformed run id before reaching the service', async () => {
      const response = await request(app).get('/api/v1/reconciliation/runs/latest');

      expect(response.status).toBe(400);
      expect(response.body.details).toEqual([{ field: 'runId', message: 'Invalid run ID format' }]);
      expect(getRun).not.toHaveBeenCalled();
    });
  });

  describe('match review', () => {
    it.each([
      ['/matches', 'all'],
      ['/matches/pending', 'pending'],
      ['/matches/confirmed', 'confirmed'],
    ])('GET %s should list the %s view', async (path, view) => {
      jest.mocked(getMatches).mockResolvedValue([]);

      const response = await request(app).get(`/api/v1/reconciliation${path}`);

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({ matches: [], count: 0 });
      expect(getMatches).toHaveBeenCalledWith(
        { lenderCompany: undefined, borrowerCompany: undefined, statementMonth: undefined, statementYear: undefined },
        view
      );
    });

    it('should accept a match on behalf of the reviewer', async () => {
      jest.mocked(acceptMatch).mockResolvedValue({
        uid: 'L-1',
        counterpartUid: 'B-1',
        status: 'confirmed',
        performedBy: 'reviewer.k',
      });

      const response = await request(app)
        .post('/api/v1/reconciliation/matches/accept')
        .send({ uid: 'L-1', confirmedBy: 'reviewer.k' });

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('Match accepted');
      expect(acceptMatch).toHaveBeenCalledWith('L-1', 'reviewer.k');
    });

    it('should require a uid to accept', async () => {
      const response = await request(app).post('/api/v1/reconciliation/matches/accept').send({});

      expect(response.status).toBe(400);
      expect(response.body.details).toEqual([{ field: 'uid', message: 'Required' }]);
    });

    it('should reset the scoped match state', async () => {
      jest.mocked(resetMatches).mockResolvedValue(6);

      const response = await request(app)
        .post('/api/v1/reconciliation/reset')
        .send({ year: '2024' });

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('Reset 6 ledger entries');
      expect(response.body.data).toEqual({ reset: 6 });
    });
  });
});
