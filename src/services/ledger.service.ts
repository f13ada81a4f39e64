/**
 * Ledger Service for Interunit Loan Reconciliation
 *
 * Stores normalized ledger lines from both units and serves the read models
 * used by the API and the matching engine:
 * - Importing entries (duplicates by uid are skipped)
 * - Filtering entries and listing filter options
 * - Unmatched legs for a company pair, period or upload pair
 * - Company pairs per statement period, to pick a reconciliation scope
 */

import type { TransactionRecord } from '../matching';
import type {
  CompanyPairStatus,
  CompanyScope,
  LedgerFilters,
  MatchStatus,
  NewLedgerEntry,
} from '../schemas/ledger.schema';
import { query, withTransaction } from '../utils/db';

// ============================================
// Types
// ============================================

export type LedgerRole = 'lender' | 'borrower';

/**
 * Ledger entry as returned from database.
 * NUMERIC columns come back as strings.
 */
export type LedgerEntryRow = {
  uid: string;
  lender: string | null;
  borrower: string | null;
  statement_month: string | null;
  statement_year: string | null;
  entry_date: Date | null;
  dr_cr: string | null;
  particulars: string | null;
  vch_type: string | null;
  vch_no: string | null;
  debit: string | null;
  credit: string | null;
  entered_by: string | null;
  input_date: Date;
  role: LedgerRole | null;
  pair_id: string | null;
  match_status: MatchStatus;
  matched_with: string | null;
  date_matched: Date | null;
  match_method: string | null;
  audit_info: Record<string, unknown> | null;
  confirmed_by: string | null;
};

export interface InsertResult {
  inserted: number;
  skipped: number;
}

export interface FilterOptions {
  lenders: string[];
  borrowers: string[];
  statementMonths: string[];
  statementYears: string[];
}

export type UploadPair = {
  pair_id: string;
  record_count: number;
  upload_date: Date;
};

/**
 * Company pair for one statement period; company1 sorts before company2
 */
export interface CompanyPair {
  company1: string;
  company2: string;
  statementMonth: string | null;
  statementYear: string | null;
  transactionCount: number;
  description: string;
}

type CompanyPairRow = {
  company1: string;
  company2: string;
  statement_month: string | null;
  statement_year: string | null;
  transaction_count: number;
};

// ============================================
// Constants
// ============================================

const INSERT_COLUMNS = [
  'uid',
  'lender',
  'borrower',
  'statement_month',
  'statement_year',
  'entry_date',
  'dr_cr',
  'particulars',
  'vch_type',
  'vch_no',
  'debit',
  'credit',
  'entered_by',
  'role',
  'pair_id',
] as const;

/**
 * Rows per INSERT statement (keeps bind parameters well under the 65535 limit)
 */
const INSERT_CHUNK_SIZE = 500;

const MATCHED_STATUSES: readonly MatchStatus[] = ['matched', 'confirmed', 'pending_verification'];

/**
 * Minimum entries for a pair to be listed
 */
const MIN_PAIR_TRANSACTIONS: Record<CompanyPairStatus, number> = {
  all: 1,
  unreconciled: 2,
  matched: 2,
};

const UNMATCHED_ORDER = 'ORDER BY lender ASC NULLS LAST, entry_date DESC NULLS LAST, uid ASC';

// ============================================
// Helpers
// ============================================

/**
 * Lender when only the debit is positive, borrower when only the credit is
 */
export function deriveRole(debit: number | null, credit: number | null): LedgerRole | null {
  const isLender = debit !== null && debit > 0;
  const isBorrower = credit !== null && credit > 0;

  if (isLender && !isBorrower) return 'lender';
  if (isBorrower && !isLender) return 'borrower';
  return null;
}

/**
 * Maps a stored entry to the matching engine input
 */
export function toTransactionRecord(row: LedgerEntryRow): TransactionRecord {
  return {
    uid: row.uid,
    particulars: row.particulars,
    debit: row.debit,
    credit: row.credit,
    enteredBy: row.entered_by,
  };
}

/**
 * Collects "column = $n" conditions for the defined values
 */
export class ConditionBuilder {
  private readonly conditions: string[] = [];
  readonly values: unknown[] = [];

  add(sql: (placeholder: string) => string, value: unknown): this {
    this.values.push(value);
    this.conditions.push(sql(`$${this.values.length}`));
    return this;
  }

  addIfDefined(column: string, value: string | undefined | null): this {
    if (value !== undefined && value !== null) {
      this.add((p) => `${column} = ${p}`, value);
    }
    return this;
  }

  raw(condition: string): this {
    this.conditions.push(condition);
    return this;
  }

  /**
   * Restrict to a company pair in either direction
   */
  companyPair(
    lenderCompany: string | undefined,
    borrowerCompany: string | undefined,
    alias: string = ''
  ): this {
    if (lenderCompany && borrowerCompany) {
      this.values.push(lenderCompany, borrowerCompany);
      const a = `$${this.values.length - 1}`;
      const b = `$${this.values.length}`;
      const lender = `${alias}lender`;
      const borrower = `${alias}borrower`;
      this.conditions.push(
        `((${lender} = ${a} AND ${borrower} = ${b}) OR (${lender} = ${b} AND ${borrower} = ${a}))`
      );
    }
    return this;
  }

  where(): string {
    return this.conditions.length > 0 ? `WHERE ${this.conditions.join(' AND ')}` : '';
  }
}

// ============================================
// Import
// ============================================

/**
 * Inserts entries in one transaction; entries whose uid already exists are skipped
 */
export async function insertLedgerEntries(entries: NewLedgerEntry[]): Promise<InsertResult> {
  if (entries.length === 0) {
    return { inserted: 0, skipped: 0 };
  }

  const inserted = await withTransaction(async (client) => {
    let count = 0;

    for (let start = 0; start < entries.length; start += INSERT_CHUNK_SIZE) {
      const chunk = entries.slice(start, start + INSERT_CHUNK_SIZE);
      const values: unknown[] = [];

      const placeholders = chunk.map((entry, index) => {
        const offset = index * INSERT_COLUMNS.length;
        values.push(
          entry.uid,
          entry.lender,
          entry.borrower,
          entry.statementMonth,
          entry.statementYear,
          entry.entryDate,
          entry.drCr,
          entry.particulars,
          entry.vchType,
          entry.vchNo,
          entry.debit,
          entry.credit,
          entry.enteredBy,
          deriveRole(entry.debit, entry.credit),
          entry.pairId
        );
        const params = INSERT_COLUMNS.map((_, column) => `$${offset + column + 1}`);
        return `(${params.join(', ')})`;
      });

      const rows = await query<{ uid: string }>(
        `INSERT INTO ledger_entries (${INSERT_COLUMNS.join(', ')})
         VALUES ${placeholders.join(', ')}
         ON CONFLICT (uid) DO NOTHING
         RETURNING uid`,
        values,
        client
      );
      count += rows.length;
    }

    return count;
  });

  return { inserted, skipped: entries.length - inserted };
}

// ============================================
// Queries
// ============================================

/**
 * Entries matching the given filters
 */
export async function getLedgerEntries(filters: LedgerFilters): Promise<LedgerEntryRow[]> {
  const builder = new ConditionBuilder()
    .addIfDefined('lender', filters.lender)
    .addIfDefined('borrower', filters.borrower)
    .addIfDefined('statement_month', filters.statement_month)
    .addIfDefined('statement_year', filters.statement_year)
    .addIfDefined('vch_type', filters.vch_type)
    .addIfDefined('entered_by', filters.entered_by)
    .addIfDefined('match_status', filters.match_status);

  builder.values.push(filters.limit);

  return query<LedgerEntryRow>(
    `SELECT * FROM ledger_entries ${builder.where()}
     ORDER BY entry_date DESC NULLS LAST, uid ASC
     LIMIT $${builder.values.length}`,
    builder.values
  );
}

/**
 * Distinct values for the filter dropdowns
 */
export async function getFilterOptions(): Promise<FilterOptions> {
  const distinct = async (column: string): Promise<string[]> => {
    const rows = await query<{ value: string }>(
      `SELECT DISTINCT ${column} AS value FROM ledger_entries
       WHERE ${column} IS NOT NULL ORDER BY value`
    );
    return rows.map((row) => row.value);
  };

  const [lenders, borrowers, statementMonths, statementYears] = await Promise.all([
    distinct('lender'),
    distinct('borrower'),
    distinct('statement_month'),
    distinct('statement_year'),
  ]);

  return { lenders, borrowers, statementMonths, statementYears };
}

/**
 * Unmatched entries, optionally for a company pair and statement period
 */
export async function getUnmatchedEntries(scope: CompanyScope = {}): Promise<LedgerEntryRow[]> {
  const builder = new ConditionBuilder()
    .raw("match_status = 'unmatched'")
    .companyPair(scope.lenderCompany, scope.borrowerCompany)
    .addIfDefined('statement_month', scope.statementMonth)
    .addIfDefined('statement_year', scope.statementYear);

  return query<LedgerEntryRow>(
    `SELECT * FROM ledger_entries ${builder.where()} ${UNMATCHED_ORDER}`,
    builder.values
  );
}

/**
 * All entries of an upload pair
 */
export async function getEntriesByPair(pairId: string): Promise<LedgerEntryRow[]> {
  return query<LedgerEntryRow>(
    'SELECT * FROM ledger_entries WHERE pair_id = $1 ORDER BY entry_date DESC NULLS LAST, uid ASC',
    [pairId]
  );
}

/**
 * Unmatched entries of an upload pair
 */
export async function getUnmatchedEntriesByPair(pairId: string): Promise<LedgerEntryRow[]> {
  return query<LedgerEntryRow>(
    `SELECT * FROM ledger_entries
     WHERE pair_id = $1 AND match_status = 'unmatched'
     ${UNMATCHED_ORDER}`,
    [pairId]
  );
}

/**
 * Upload pairs plus single-file uploads grouped by upload day, newest first
 */
export async function getUploadPairs(): Promise<UploadPair[]> {
  return query<UploadPair>(
    `SELECT pair_id, COUNT(*)::int AS record_count, MIN(input_date) AS upload_date
       FROM ledger_entries
      WHERE pair_id IS NOT NULL AND pair_id <> ''
      GROUP BY pair_id
     UNION ALL
     SELECT 'individual_' || TO_CHAR(input_date::date, 'YYYY-MM-DD') AS pair_id,
            COUNT(*)::int AS record_count, MIN(input_date) AS upload_date
       FROM ledger_entries
      WHERE pair_id IS NULL OR pair_id = ''
      GROUP BY input_date::date
     ORDER BY upload_date DESC`
  );
}

/**
 * Company pairs (either direction folded together) per statement period.
 * Unreconciled pairs come oldest first, the other listings newest first.
 */
export async function getCompanyPairs(status: CompanyPairStatus): Promise<CompanyPair[]> {
  const builder = new ConditionBuilder()
    .raw('lender IS NOT NULL')
    .raw('borrower IS NOT NULL')
    .raw('lender <> borrower');

  if (status === 'unreconciled') {
    builder.raw("match_status = 'unmatched'");
  } else if (status === 'matched') {
    builder.add((p) => `match_status = ANY(${p})`, MATCHED_STATUSES);
  }

  builder.values.push(MIN_PAIR_TRANSACTIONS[status]);
  const direction = status === 'unreconciled' ? 'ASC' : 'DESC';

  const rows = await query<CompanyPairRow>(
    `SELECT LEAST(lender, borrower) AS company1,
            GREATEST(lender, borrower) AS company2,
            statement_month, statement_year,
            COUNT(*)::int AS transaction_count
       FROM ledger_entries
       ${builder.where()}
      GROUP BY LEAST(lender, borrower), GREATEST(lender, borrower), statement_month, statement_year
     HAVING COUNT(*) >= $${builder.values.length}
      ORDER BY statement_year ${direction} NULLS LAST, statement_month ${direction} NULLS LAST,
               company1, company2`,
    builder.values
  );

  return rows.map((row) => {
    const period = [row.statement_month, row.statement_year].filter(Boolean).join(' ');
    return {
      company1: row.company1,
      company2: row.company2,
      statementMonth: row.statement_month,
      statementYear: row.statement_year,
      transactionCount: row.transaction_count,
      description: period
        ? `${row.company1} ↔ ${row.company2} (${period})`
        : `${row.company1} ↔ ${row.company2}`,
    };
  });
}

export const ledgerService = {
  insertLedgerEntries,
  getLedgerEntries,
  getFilterOptions,
  getUnmatchedEntries,
  getEntriesByPair,
  getUnmatchedEntriesByPair,
  getUploadPairs,
  getCompanyPairs,
};

export default ledgerService;
