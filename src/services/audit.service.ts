/**
 * Audit Service for Interunit Loan Reconciliation
 *
 * Handles immutable audit log creation for every match state change.
 *
 * CRITICAL BUSINESS RULES:
 * - Every persisted match, accept, reject and reset MUST create audit rows
 * - Audit logs are IMMUTABLE - never update or delete
 * - "system" for engine actions, the user (default "user") for decisions
 * - Rows are written with the caller's transaction client so they commit
 *   or roll back together with the state change
 */

import { query, type DbClient } from '../utils/db';

// ============================================
// Types
// ============================================

export type AuditActionType = 'auto_confirmed' | 'suggested' | 'confirmed' | 'rejected' | 'reset';

export const SYSTEM_ACTOR = 'system';
export const DEFAULT_USER = 'user';

/**
 * Parameters for creating an audit log entry
 */
export interface CreateAuditLogParams {
  uid: string;
  counterpartUid: string | null;
  action: AuditActionType;
  matchType?: string | null;
  performedBy: string;
  reason?: string | null;
}

/**
 * Audit log entry as returned from database
 */
export type AuditLogEntry = {
  id: string;
  uid: string;
  counterpart_uid: string | null;
  action: AuditActionType;
  match_type: string | null;
  performed_by: string;
  reason: string | null;
  created_at: Date;
};

const AUDIT_COLUMNS = 'id, uid, counterpart_uid, action, match_type, performed_by, reason, created_at';

// ============================================
// Audit Log Creation
// ============================================

/**
 * Creates multiple audit log entries in a single statement
 *
 * @returns Count of created entries
 */
export async function createAuditLogsBatch(
  entries: CreateAuditLogParams[],
  client?: DbClient
): Promise<number> {
  if (entries.length === 0) {
    return 0;
  }

  const values: unknown[] = [];
  const placeholders = entries.map((entry, index) => {
    const offset = index * 6;
    values.push(
      entry.uid,
      entry.counterpartUid,
      entry.action,
      entry.matchType ?? null,
      entry.performedBy,
      entry.reason ?? null
    );
    return `($${offset + 1}, $${offset + 2}, $${offset + 3}, $${offset + 4}, $${offset + 5}, $${offset + 6})`;
  });

  const rows = await query<{ id: string }>(
    `INSERT INTO match_audit_log (uid, counterpart_uid, action, match_type, performed_by, reason)
     VALUES ${placeholders.join(', ')}
     RETURNING id`,
    values,
    client
  );

  return rows.length;
}

/**
 * Audit rows for both legs of a pair
 */
export function pairAuditEntries(
  uid: string,
  counterpartUid: string,
  base: Omit<CreateAuditLogParams, 'uid' | 'counterpartUid'>
): CreateAuditLogParams[] {
  return [
    { ...base, uid, counterpartUid },
    { ...base, uid: counterpartUid, counterpartUid: uid },
  ];
}

// ============================================
// Audit Log Retrieval
// ============================================

/**
 * Gets all audit log entries for a ledger leg, newest first
 */
export async function getAuditLogsForLeg(uid: string): Promise<AuditLogEntry[]> {
  return query<AuditLogEntry>(
    `SELECT ${AUDIT_COLUMNS} FROM match_audit_log WHERE uid = $1 ORDER BY created_at DESC, id DESC`,
    [uid]
  );
}

// ============================================
// Exports
// ============================================

export const auditService = {
  createAuditLogsBatch,
  pairAuditEntries,
  getAuditLogsForLeg,
};

export default auditService;
