/**
 * Match Service for Interunit Loan Reconciliation
 *
 * User decisions on engine suggestions. Both legs of a pair always move
 * together.
 *
 * STATE TRANSITION RULES:
 * - accept: matched | pending_verification → confirmed
 * - reject: matched | pending_verification | confirmed → unmatched
 *
 * Invalid transitions are rejected with 400, never auto-corrected.
 * Every decision is atomic with its audit rows.
 */

import type { MatchStatus } from '../schemas/ledger.schema';
import { AppError } from '../utils';
import { query, withTransaction, type DbClient } from '../utils/db';
import {
  createAuditLogsBatch,
  DEFAULT_USER,
  pairAuditEntries,
  type AuditActionType,
} from './audit.service';

// ============================================
// Types
// ============================================

type LegState = {
  uid: string;
  match_status: MatchStatus;
  matched_with: string | null;
  audit_info: Record<string, unknown> | null;
};

export interface MatchDecisionResult {
  uid: string;
  counterpartUid: string;
  status: MatchStatus;
  performedBy: string;
}

// ============================================
// Validation Helpers
// ============================================

const ACCEPTABLE_STATUSES: MatchStatus[] = ['matched', 'pending_verification'];
const REJECTABLE_STATUSES: MatchStatus[] = ['matched', 'pending_verification', 'confirmed'];

/**
 * Validates that a status transition is allowed
 */
function validateStatusTransition(
  currentStatus: MatchStatus,
  allowedStatuses: MatchStatus[],
  actionName: string
): void {
  if (!allowedStatuses.includes(currentStatus)) {
    throw AppError.badRequest(
      `Cannot ${actionName} match with status "${currentStatus}". ` +
        `Allowed statuses: ${allowedStatuses.join(', ')}`
    );
  }
}

/**
 * Locks a leg for the rest of the transaction
 */
async function lockLeg(uid: string, client: DbClient): Promise<LegState | null> {
  const [leg] = await query<LegState>(
    `SELECT uid, match_status, matched_with, audit_info
       FROM ledger_entries WHERE uid = $1 FOR UPDATE`,
    [uid],
    client
  );
  return leg ?? null;
}

/**
 * Loads and locks both legs of the pair the given leg belongs to
 */
async function lockPair(
  uid: string,
  allowedStatuses: MatchStatus[],
  actionName: string,
  client: DbClient
): Promise<{ leg: LegState; counterpartUid: string }> {
  const leg = await lockLeg(uid, client);
  if (!leg) {
    throw AppError.notFound(`Ledger entry not found: ${uid}`);
  }

  validateStatusTransition(leg.match_status, allowedStatuses, actionName);

  if (!leg.matched_with) {
    throw AppError.badRequest(`Ledger entry ${uid} has no matched counterpart`);
  }

  const counterpart = await lockLeg(leg.matched_with, client);
  if (!counterpart) {
    throw AppError.conflict(`Counterpart ledger entry not found: ${leg.matched_with}`);
  }

  return { leg, counterpartUid: counterpart.uid };
}

function matchTypeOf(leg: LegState): string | null {
  const matchType = leg.audit_info?.match_type;
  return typeof matchType === 'string' ? matchType : null;
}

// ============================================
// Decisions
// ============================================

/**
 * Accepts a suggested match: both legs become confirmed
 */
export async function acceptMatch(
  uid: string,
  confirmedBy: string = DEFAULT_USER
): Promise<MatchDecisionResult> {
  return withTransaction(async (client) => {
    const { leg, counterpartUid } = await lockPair(uid, ACCEPTABLE_STATUSES, 'accept', client);

    await query(
      `UPDATE ledger_entries
          SET match_status = 'confirmed', confirmed_by = $2
        WHERE uid = ANY($1)`,
      [[uid, counterpartUid], confirmedBy],
      client
    );

    await recordDecision(uid, counterpartUid, 'confirmed', matchTypeOf(leg), confirmedBy, client);

    return { uid, counterpartUid, status: 'confirmed', performedBy: confirmedBy };
  });
}

/**
 * Rejects a match: both legs go back to unmatched with match columns cleared
 */
export async function rejectMatch(
  uid: string,
  confirmedBy: string = DEFAULT_USER
): Promise<MatchDecisionResult> {
  return withTransaction(async (client) => {
    const { leg, counterpartUid } = await lockPair(uid, REJECTABLE_STATUSES, 'reject', client);

    await query(
      `UPDATE ledger_entries
          SET match_status = 'unmatched',
              matched_with = NULL,
              match_method = NULL,
              audit_info = NULL,
              date_matched = NULL,
              confirmed_by = $2
        WHERE uid = ANY($1)`,
      [[uid, counterpartUid], confirmedBy],
      client
    );

    await recordDecision(uid, counterpartUid, 'rejected', matchTypeOf(leg), confirmedBy, client);

    return { uid, counterpartUid, status: 'unmatched', performedBy: confirmedBy };
  });
}

async function recordDecision(
  uid: string,
  counterpartUid: string,
  action: AuditActionType,
  matchType: string | null,
  performedBy: string,
  client: DbClient
): Promise<void> {
  await createAuditLogsBatch(
    pairAuditEntries(uid, counterpartUid, { action, matchType, performedBy }),
    client
  );
}

export const matchService = {
  acceptMatch,
  rejectMatch,
};

export default matchService;
