/**
 * Reconciliation API Routes
 *
 * Endpoints for running the matching engine, tracking background runs and
 * reviewing matches. These routes handle HTTP concerns only - business logic
 * is delegated to services.
 *
 * IMPORTANT: Every state change writes immutable match_audit_log rows.
 */

import { Router, Request, Response } from 'express';
import { validateRequest } from '../middlewares';
import { pairIdParamsSchema } from '../schemas/ledger.schema';
import {
  companyScopeSchema,
  listRunsSchema,
  matchDecisionSchema,
  runIdParamsSchema,
  uidParamsSchema,
  type MatchDecision,
} from '../schemas/reconciliation.schema';
import { getAuditLogsForLeg } from '../services/audit.service';
import { acceptMatch, rejectMatch } from '../services/match.service';
import {
  createRun,
  getMatches,
  getRun,
  listRuns,
  resetMatches,
  runReconciliation,
  type MatchView,
} from '../services/reconciliation.service';
import { AppError, asyncHandler, sendList, sendSuccess } from '../utils';
import { dispatchRun } from '../workers/reconciliationWorker';

const router = Router();

// ============================================
// Reconciliation Runs
// ============================================

/**
 * @route   POST /api/v1/reconciliation/reconcile
 * @desc    Run the matching engine synchronously
 * @access  Public (should be protected in production)
 *
 * Body (optional): { lender_company, borrower_company, month, year }
 * Without a company pair every unmatched entry is considered.
 *
 * Response:
 * - 200 OK: run summary
 * - 409 Conflict: entries were matched concurrently; nothing was written
 */
router.post(
  '/reconcile',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const scope = companyScopeSchema.parse(req.body ?? {});
    const summary = await runReconciliation(scope);
    sendSuccess(res, summary, `Reconciliation complete: ${summary.matchesFound} matches found`);
  })
);

/**
 * @route   POST /api/v1/reconciliation/pairs/:pairId/reconcile
 * @desc    Run the matching engine over one upload pair
 */
router.post(
  '/pairs/:pairId/reconcile',
  validateRequest({ params: pairIdParamsSchema }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const summary = await runReconciliation({ pairId: req.params.pairId });
    sendSuccess(res, summary, `Reconciliation complete: ${summary.matchesFound} matches found`);
  })
);

/**
 * @route   POST /api/v1/reconciliation/runs
 * @desc    Queue a background reconciliation run
 *
 * Response:
 * - 202 Accepted: { runId, status, dispatch }
 */
router.post(
  '/runs',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const scope = companyScopeSchema.parse(req.body ?? {});
    const run = await createRun(scope);
    const dispatch = await dispatchRun(run.id);

    sendSuccess(
      res,
      { runId: run.id, status: run.status, dispatch },
      'Reconciliation run queued. Poll GET /runs/:runId for progress.',
      202
    );
  })
);

/**
 * @route   GET /api/v1/reconciliation/runs
 * @desc    Most recent runs
 *
 * Query params: limit (default 20, max 100)
 */
router.get(
  '/runs',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { limit } = listRunsSchema.parse(req.query);
    const runs = await listRuns(limit);
    sendList(res, 'runs', runs);
  })
);

/**
 * @route   GET /api/v1/reconciliation/runs/:runId
 * @desc    Run status; served from the Redis mirror while processing
 *
 * Response:
 * - 200 OK: run record
 * - 404 Not Found: Unknown run
 */
router.get(
  '/runs/:runId',
  validateRequest({ params: runIdParamsSchema }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const run = await getRun(req.params.runId);
    if (!run) {
      throw AppError.notFound(`Reconciliation run ${req.params.runId} not found`);
    }
    sendSuccess(res, run);
  })
);

// ============================================
// Match Review
// ============================================

function matchListHandler(view: MatchView) {
  return asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const scope = companyScopeSchema.parse(req.query);
    const matches = await getMatches(scope, view);
    sendList(res, 'matches', matches);
  });
}

/**
 * @route   GET /api/v1/reconciliation/matches
 * @desc    Matched pairs, one row per pair
 *
 * Query params: lender_company, borrower_company (together), month, year
 */
router.get('/matches', matchListHandler('all'));

/**
 * @route   GET /api/v1/reconciliation/matches/pending
 * @desc    Pairs waiting for a decision (matched, pending_verification)
 */
router.get('/matches/pending', matchListHandler('pending'));

/**
 * @route   GET /api/v1/reconciliation/matches/confirmed
 */
router.get('/matches/confirmed', matchListHandler('confirmed'));

/**
 * @route   POST /api/v1/reconciliation/matches/accept
 * @desc    Accept a suggested match; both legs become confirmed
 *
 * Body: { uid, confirmedBy? }
 *
 * Response:
 * - 200 OK: { uid, counterpartUid, status, performedBy }
 * - 400 Bad Request: Invalid state transition
 * - 404 Not Found: Unknown uid
 */
router.post(
  '/matches/accept',
  validateRequest({ body: matchDecisionSchema }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { uid, confirmedBy }: MatchDecision = req.body;
    const result = await acceptMatch(uid, confirmedBy);
    sendSuccess(res, result, 'Match accepted');
  })
);

/**
 * @route   POST /api/v1/reconciliation/matches/reject
 * @desc    Reject a match; both legs return to unmatched
 */
router.post(
  '/matches/reject',
  validateRequest({ body: matchDecisionSchema }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { uid, confirmedBy }: MatchDecision = req.body;
    const result = await rejectMatch(uid, confirmedBy);
    sendSuccess(res, result, 'Match rejected');
  })
);

/**
 * @route   POST /api/v1/reconciliation/reset
 * @desc    Clear match state for a company pair / period, or everything
 *
 * Body (optional): { lender_company, borrower_company, month, year }
 */
router.post(
  '/reset',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const scope = companyScopeSchema.parse(req.body ?? {});
    const reset = await resetMatches(scope);
    sendSuccess(res, { reset }, `Reset ${reset} ledger entries`);
  })
);

/**
 * @route   GET /api/v1/reconciliation/matches/:uid/audit
 * @desc    Audit history of a leg, newest first
 */
router.get(
  '/matches/:uid/audit',
  validateRequest({ params: uidParamsSchema }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const logs = await getAuditLogsForLeg(req.params.uid);
    sendList(res, 'logs', logs, { uid: req.params.uid });
  })
);

export default router;
