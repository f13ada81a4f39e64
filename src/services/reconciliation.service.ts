/**
 * Reconciliation Service for Interunit Loan Reconciliation
 *
 * Orchestration layer between routes, workers, the matching engine and the
 * database:
 * - Running the engine over the unmatched legs of a scope
 * - Persisting matches (symmetric double update + audit rows, one transaction)
 * - Tracking background runs
 * - Reading and resetting match state
 *
 * REDIS INTEGRATION:
 * - Run progress can be read from Redis while a run is processing
 * - PostgreSQL remains the SOURCE OF TRUTH
 */

import { bankNameLookup } from '../config';
import {
  classifyMatch,
  reconcile,
  type MatchCandidate,
  type MatchType,
} from '../matching';
import { getCachedRunProgress, setCachedRunProgress, setCachedRunStatus, type RunStatus } from '../redis';
import type { CompanyScope, MatchStatus } from '../schemas/ledger.schema';
import { AppError, logger } from '../utils';
import { query, withTransaction, type DbClient } from '../utils/db';
import {
  createAuditLogsBatch,
  pairAuditEntries,
  SYSTEM_ACTOR,
  type CreateAuditLogParams,
} from './audit.service';
import {
  ConditionBuilder,
  getUnmatchedEntries,
  getUnmatchedEntriesByPair,
  toTransactionRecord,
} from './ledger.service';

// ============================================
// Types
// ============================================

export interface ReconciliationScope extends CompanyScope {
  pairId?: string;
}

export interface RunSummary {
  runId?: string;
  scope: ReconciliationScope;
  totalRecords: number;
  lenderCount: number;
  borrowerCount: number;
  matchesFound: number;
  autoConfirmed: number;
  needsReview: number;
  pendingVerification: number;
  unmatchedLenders: number;
  unmatchedBorrowers: number;
  excluded: number;
  byType: Partial<Record<MatchType, number>>;
  durationMs: number;
}

type RunRow = {
  id: string;
  lender_company: string | null;
  borrower_company: string | null;
  statement_month: string | null;
  statement_year: string | null;
  pair_id: string | null;
  status: RunStatus;
  total_records: number;
  matches_found: number;
  auto_confirmed: number;
  needs_review: number;
  pending_verification: number;
  unmatched_lenders: number;
  unmatched_borrowers: number;
  excluded: number;
  by_type: Partial<Record<MatchType, number>> | null;
  error: string | null;
  started_at: Date | null;
  completed_at: Date | null;
  created_at: Date;
};

export interface RunRecord {
  id: string;
  scope: ReconciliationScope;
  status: RunStatus;
  totalRecords: number;
  matchesFound: number;
  autoConfirmed: number;
  needsReview: number;
  pendingVerification: number;
  unmatchedLenders: number;
  unmatchedBorrowers: number;
  excluded: number;
  byType: Partial<Record<MatchType, number>>;
  error: string | null;
  startedAt: Date | null;
  completedAt: Date | null;
  createdAt: Date;
}

export type MatchView = 'all' | 'pending' | 'confirmed';

export type MatchedPairRow = {
  lender_uid: string;
  borrower_uid: string;
  lender: string | null;
  borrower: string | null;
  statement_month: string | null;
  statement_year: string | null;
  amount: string | null;
  lender_particulars: string | null;
  borrower_particulars: string | null;
  lender_date: Date | null;
  borrower_date: Date | null;
  match_status: MatchStatus;
  match_method: string | null;
  audit_info: Record<string, unknown> | null;
  date_matched: Date | null;
  confirmed_by: string | null;
};

interface PersistedCounts {
  autoConfirmed: number;
  needsReview: number;
  pendingVerification: number;
}

// ============================================
// Constants
// ============================================

const MATCH_VIEW_STATUSES: Record<MatchView, MatchStatus[]> = {
  all: ['matched', 'confirmed', 'pending_verification'],
  pending: ['matched', 'pending_verification'],
  confirmed: ['confirmed'],
};

const RUN_COLUMNS = `id, lender_company, borrower_company, statement_month, statement_year, pair_id,
  status, total_records, matches_found, auto_confirmed, needs_review, pending_verification,
  unmatched_lenders, unmatched_borrowers, excluded, by_type, error, started_at, completed_at, created_at`;

// ============================================
// Helpers
// ============================================

/**
 * audit_info stored on both legs of a match
 */
export function buildAuditInfo(candidate: MatchCandidate): Record<string, string | number | boolean> {
  const { matchMethod } = classifyMatch(candidate.matchType);

  // Rule evidence never overrides the classification keys
  return {
    ...candidate.auditTrail,
    match_type: candidate.matchType,
    match_method: matchMethod,
    lender_amount: candidate.amount,
    borrower_amount: candidate.amount,
  };
}

/**
 * Removes undefined scope keys so summaries serialize cleanly
 */
function compactScope(scope: ReconciliationScope): ReconciliationScope {
  const compact: ReconciliationScope = {};
  if (scope.lenderCompany) compact.lenderCompany = scope.lenderCompany;
  if (scope.borrowerCompany) compact.borrowerCompany = scope.borrowerCompany;
  if (scope.statementMonth) compact.statementMonth = scope.statementMonth;
  if (scope.statementYear) compact.statementYear = scope.statementYear;
  if (scope.pairId) compact.pairId = scope.pairId;
  return compact;
}

function toRunRecord(row: RunRow): RunRecord {
  return {
    id: row.id,
    scope: compactScope({
      lenderCompany: row.lender_company ?? undefined,
      borrowerCompany: row.borrower_company ?? undefined,
      statementMonth: row.statement_month ?? undefined,
      statementYear: row.statement_year ?? undefined,
      pairId: row.pair_id ?? undefined,
    }),
    status: row.status,
    totalRecords: row.total_records,
    matchesFound: row.matches_found,
    autoConfirmed: row.auto_confirmed,
    needsReview: row.needs_review,
    pendingVerification: row.pending_verification,
    unmatchedLenders: row.unmatched_lenders,
    unmatchedBorrowers: row.unmatched_borrowers,
    excluded: row.excluded,
    byType: row.by_type ?? {},
    error: row.error,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    createdAt: row.created_at,
  };
}

// ============================================
// Persistence
// ============================================

/**
 * Writes every match to both legs and logs it, inside the caller's transaction.
 *
 * A leg that is no longer unmatched aborts the whole run with 409 so that no
 * pair is ever half-updated.
 */
export async function persistMatches(
  matches: readonly MatchCandidate[],
  client: DbClient
): Promise<PersistedCounts> {
  const counts: PersistedCounts = { autoConfirmed: 0, needsReview: 0, pendingVerification: 0 };
  const auditEntries: CreateAuditLogParams[] = [];

  for (const candidate of matches) {
    const { matchMethod, autoAccept, initialStatus } = classifyMatch(candidate.matchType);
    const auditInfo = JSON.stringify(buildAuditInfo(candidate));

    const updated = await query<{ uid: string }>(
      `UPDATE ledger_entries AS le
          SET matched_with = pair.counterpart,
              match_status = $3,
              match_method = $4,
              audit_info = $5::jsonb,
              date_matched = NOW()
         FROM (VALUES ($1::text, $2::text), ($2::text, $1::text)) AS pair(uid, counterpart)
        WHERE le.uid = pair.uid AND le.match_status = 'unmatched'
        RETURNING le.uid`,
      [candidate.lenderUid, candidate.borrowerUid, initialStatus, matchMethod, auditInfo],
      client
    );

    if (updated.length !== 2) {
      throw AppError.conflict(
        `Ledger entries ${candidate.lenderUid} / ${candidate.borrowerUid} are no longer unmatched`
      );
    }

    if (initialStatus === 'confirmed') counts.autoConfirmed++;
    else if (initialStatus === 'pending_verification') counts.pendingVerification++;
    else counts.needsReview++;

    auditEntries.push(
      ...pairAuditEntries(candidate.lenderUid, candidate.borrowerUid, {
        action: autoAccept ? 'auto_confirmed' : 'suggested',
        matchType: candidate.matchType,
        performedBy: SYSTEM_ACTOR,
        reason: `Rule ${candidate.rule}`,
      })
    );
  }

  await createAuditLogsBatch(auditEntries, client);

  return counts;
}

// ============================================
// Reconciliation
// ============================================

/**
 * Runs the matching engine over the unmatched legs of a scope and persists
 * the result.
 */
export async function runReconciliation(
  scope: ReconciliationScope,
  runId?: string
): Promise<RunSummary> {
  const startTime = Date.now();

  const rows = scope.pairId
    ? await getUnmatchedEntriesByPair(scope.pairId)
    : await getUnmatchedEntries(scope);
  const result = reconcile(rows.map(toTransactionRecord), { bankNameLookup });

  const counts =
    result.matches.length > 0
      ? await withTransaction((client) => persistMatches(result.matches, client))
      : { autoConfirmed: 0, needsReview: 0, pendingVerification: 0 };

  const byType: Partial<Record<MatchType, number>> = {};
  for (const match of result.matches) {
    byType[match.matchType] = (byType[match.matchType] ?? 0) + 1;
  }

  const summary: RunSummary = {
    ...(runId ? { runId } : {}),
    scope: compactScope(scope),
    totalRecords: rows.length,
    lenderCount: result.matches.length + result.unmatchedLenders.length,
    borrowerCount: result.matches.length + result.unmatchedBorrowers.length,
    matchesFound: result.matches.length,
    ...counts,
    unmatchedLenders: result.unmatchedLenders.length,
    unmatchedBorrowers: result.unmatchedBorrowers.length,
    excluded: result.excluded.length,
    byType,
    durationMs: Date.now() - startTime,
  };

  logger.info(
    `Reconciliation${runId ? ` [${runId}]` : ''}: ${summary.matchesFound} matches from ` +
      `${summary.totalRecords} records (${summary.autoConfirmed} auto-confirmed, ` +
      `${summary.needsReview} for review, ${summary.pendingVerification} pending verification) ` +
      `in ${summary.durationMs}ms`
  );

  return summary;
}

// ============================================
// Run Management
// ============================================

/**
 * Creates a queued run record
 */
export async function createRun(scope: ReconciliationScope): Promise<RunRecord> {
  const [row] = await query<RunRow>(
    `INSERT INTO reconciliation_runs
       (lender_company, borrower_company, statement_month, statement_year, pair_id, status)
     VALUES ($1, $2, $3, $4, $5, 'queued')
     RETURNING ${RUN_COLUMNS}`,
    [
      scope.lenderCompany ?? null,
      scope.borrowerCompany ?? null,
      scope.statementMonth ?? null,
      scope.statementYear ?? null,
      scope.pairId ?? null,
    ]
  );

  return toRunRecord(row);
}

/**
 * Gets a run
 *
 * For processing runs the Redis mirror is preferred, falling back to the
 * database values when Redis is unavailable.
 */
export async function getRun(runId: string, preferCache: boolean = true): Promise<RunRecord | null> {
  const [row] = await query<RunRow>(
    `SELECT ${RUN_COLUMNS} FROM reconciliation_runs WHERE id = $1`,
    [runId]
  );

  if (!row) {
    return null;
  }

  const run = toRunRecord(row);

  if (preferCache && run.status === 'processing') {
    const cached = await getCachedRunProgress(runId);
    if (cached) {
      return { ...run, ...cached };
    }
  }

  return run;
}

/**
 * Most recent runs first
 */
export async function listRuns(limit: number = 20): Promise<RunRecord[]> {
  const rows = await query<RunRow>(
    `SELECT ${RUN_COLUMNS} FROM reconciliation_runs ORDER BY created_at DESC LIMIT $1`,
    [limit]
  );
  return rows.map(toRunRecord);
}

export async function markRunProcessing(runId: string): Promise<void> {
  await query(
    `UPDATE reconciliation_runs
        SET status = 'processing', started_at = NOW(), completed_at = NULL, error = NULL
      WHERE id = $1`,
    [runId]
  );
  await setCachedRunStatus(runId, 'processing');
}

export async function markRunCompleted(runId: string, summary: RunSummary): Promise<void> {
  await query(
    `UPDATE reconciliation_runs
        SET status = 'completed',
            total_records = $2,
            matches_found = $3,
            auto_confirmed = $4,
            needs_review = $5,
            pending_verification = $6,
            unmatched_lenders = $7,
            unmatched_borrowers = $8,
            excluded = $9,
            by_type = $10::jsonb,
            completed_at = NOW()
      WHERE id = $1`,
    [
      runId,
      summary.totalRecords,
      summary.matchesFound,
      summary.autoConfirmed,
      summary.needsReview,
      summary.pendingVerification,
      summary.unmatchedLenders,
      summary.unmatchedBorrowers,
      summary.excluded,
      JSON.stringify(summary.byType),
    ]
  );

  await setCachedRunProgress(runId, {
    status: 'completed',
    totalRecords: summary.totalRecords,
    matchesFound: summary.matchesFound,
    autoConfirmed: summary.autoConfirmed,
    needsReview: summary.needsReview,
    pendingVerification: summary.pendingVerification,
  });
}

export async function markRunFailed(runId: string, error: string): Promise<void> {
  await query(
    `UPDATE reconciliation_runs SET status = 'failed', error = $2, completed_at = NOW() WHERE id = $1`,
    [runId, error]
  );
  await setCachedRunStatus(runId, 'failed');
}

// ============================================
// Match State
// ============================================

/**
 * Matched pairs, one row per pair (lender leg joined with its counterpart)
 */
export async function getMatches(
  scope: CompanyScope = {},
  view: MatchView = 'all'
): Promise<MatchedPairRow[]> {
  const builder = new ConditionBuilder()
    .raw("t1.role = 'lender'")
    .add((p) => `t1.match_status = ANY(${p})`, MATCH_VIEW_STATUSES[view])
    .companyPair(scope.lenderCompany, scope.borrowerCompany, 't1.')
    .addIfDefined('t1.statement_month', scope.statementMonth)
    .addIfDefined('t1.statement_year', scope.statementYear);

  return query<MatchedPairRow>(
    `SELECT t1.uid AS lender_uid,
            t2.uid AS borrower_uid,
            t1.lender,
            t1.borrower,
            t1.statement_month,
            t1.statement_year,
            t1.debit AS amount,
            t1.particulars AS lender_particulars,
            t2.particulars AS borrower_particulars,
            t1.entry_date AS lender_date,
            t2.entry_date AS borrower_date,
            t1.match_status,
            t1.match_method,
            t1.audit_info,
            t1.date_matched,
            t1.confirmed_by
       FROM ledger_entries t1
       JOIN ledger_entries t2 ON t1.matched_with = t2.uid
       ${builder.where()}
      ORDER BY t1.date_matched DESC NULLS LAST, t1.uid ASC`,
    builder.values
  );
}

/**
 * Clears match state for a scope (or everything). Counterparts of affected
 * legs are cleared too so no pair is left one-sided.
 *
 * @returns Number of legs reset
 */
export async function resetMatches(
  scope: CompanyScope = {},
  performedBy: string = SYSTEM_ACTOR
): Promise<number> {
  const builder = new ConditionBuilder()
    .raw("match_status <> 'unmatched'")
    .companyPair(scope.lenderCompany, scope.borrowerCompany)
    .addIfDefined('statement_month', scope.statementMonth)
    .addIfDefined('statement_year', scope.statementYear);

  return withTransaction(async (client) => {
    const legs = await query<{ uid: string; matched_with: string | null }>(
      `SELECT uid, matched_with FROM ledger_entries ${builder.where()} FOR UPDATE`,
      builder.values,
      client
    );

    if (legs.length === 0) {
      return 0;
    }

    const uids = new Set<string>();
    for (const leg of legs) {
      uids.add(leg.uid);
      if (leg.matched_with) uids.add(leg.matched_with);
    }

    const reset = await query<{ uid: string; matched_with: string | null; match_type: string | null }>(
      `UPDATE ledger_entries AS le
          SET match_status = 'unmatched',
              matched_with = NULL,
              match_method = NULL,
              audit_info = NULL,
              date_matched = NULL,
              confirmed_by = NULL
         FROM (SELECT uid, matched_with, audit_info->>'match_type' AS match_type
                 FROM ledger_entries WHERE uid = ANY($1)) AS prev
        WHERE le.uid = prev.uid AND le.match_status <> 'unmatched'
        RETURNING le.uid, prev.matched_with, prev.match_type`,
      [[...uids]],
      client
    );

    await createAuditLogsBatch(
      reset.map((leg) => ({
        uid: leg.uid,
        counterpartUid: leg.matched_with,
        action: 'reset',
        matchType: leg.match_type,
        performedBy,
      })),
      client
    );

    logger.info(`Reset match state of ${reset.length} ledger entries`);
    return reset.length;
  });
}

export const reconciliationService = {
  runReconciliation,
  persistMatches,
  createRun,
  getRun,
  listRuns,
  markRunProcessing,
  markRunCompleted,
  markRunFailed,
  getMatches,
  resetMatches,
};

export default reconciliationService;
