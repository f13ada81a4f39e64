import { z } from 'zod';
import { parseLedgerAmount } from '../matching';

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Parses a voucher date to YYYY-MM-DD.
 * Supports formats: YYYY-MM-DD, DD/MM/YYYY, DD-MM-YYYY, DD.MM.YYYY
 */
export function parseEntryDate(value: string): string | null {
  const trimmed = value.trim();

  let year: number;
  let month: number;
  let day: number;

  const iso = trimmed.match(/^(\d{4})-(\d{1,2})-(\d{1,2})/);
  const dayFirst = trimmed.match(/^(\d{1,2})[\/.-](\d{1,2})[\/.-](\d{4})$/);
  if (iso) {
    [year, month, day] = [Number(iso[1]), Number(iso[2]), Number(iso[3])];
  } else if (dayFirst) {
    [day, month, year] = [Number(dayFirst[1]), Number(dayFirst[2]), Number(dayFirst[3])];
  } else {
    return null;
  }

  // Reject rollovers such as 31/02/2024
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return `${year}-${pad(month)}-${pad(day)}`;
}

/**
 * Blank strings and null collapse to null
 */
const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return null;
    const text = String(value).trim();
    return text === '' ? null : text;
  });

/**
 * Numbers or numeric strings ("5,000.00"); blank means absent
 */
const amount = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value, ctx) => {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' && value.trim() === '') return null;

    const parsed = parseLedgerAmount(value);
    if (parsed === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid amount: "${value}"` });
      return z.NEVER;
    }
    return parsed;
  });

const entryDate = z
  .string()
  .nullish()
  .transform((value, ctx) => {
    if (!value || value.trim() === '') return null;

    const parsed = parseEntryDate(value);
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: "${value}"` });
      return z.NEVER;
    }
    return parsed;
  });

/**
 * One normalized ledger line, as posted in JSON or read from a CSV row
 */
export const ledgerEntrySchema = z
  .object({
    uid: z.string().trim().min(1, 'uid is required').max(128),
    particulars: optionalText,
    debit: amount,
    credit: amount,
    lender: optionalText,
    borrower: optionalText,
    statement_month: optionalText,
    statement_year: optionalText,
    date: entryDate,
    dr_cr: optionalText,
    vch_type: optionalText,
    vch_no: optionalText,
    entered_by: optionalText,
    pair_id: optionalText,
  })
  .transform((row) => ({
    uid: row.uid,
    particulars: row.particulars,
    debit: row.debit,
    credit: row.credit,
    lender: row.lender,
    borrower: row.borrower,
    statementMonth: row.statement_month,
    statementYear: row.statement_year,
    entryDate: row.date,
    drCr: row.dr_cr,
    vchType: row.vch_type,
    vchNo: row.vch_no,
    enteredBy: row.entered_by,
    pairId: row.pair_id,
  }));

export type NewLedgerEntry = z.output<typeof ledgerEntrySchema>;

export const insertEntriesSchema = z.object({
  entries: z.array(ledgerEntrySchema).min(1, 'At least one entry is required').max(10000),
});

export const matchStatusSchema = z.enum(['unmatched', 'matched', 'confirmed', 'pending_verification']);

export type MatchStatus = z.infer<typeof matchStatusSchema>;

const queryText = z.string().trim().min(1).optional();

// Years may arrive as numbers in JSON bodies
const periodText = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .pipe(z.string().min(1))
  .optional();

export const ledgerFilterSchema = z.object({
  lender: queryText,
  borrower: queryText,
  statement_month: queryText,
  statement_year: queryText,
  vch_type: queryText,
  entered_by: queryText,
  match_status: matchStatusSchema.optional(),
  limit: z.coerce.number().int().min(1).max(5000).default(1000),
});

export type LedgerFilters = z.infer<typeof ledgerFilterSchema>;

/**
 * Company pair (either direction) plus optional statement period
 */
export interface CompanyScope {
  lenderCompany?: string;
  borrowerCompany?: string;
  statementMonth?: string;
  statementYear?: string;
}

export const companyScopeSchema = z
  .object({
    lender_company: queryText,
    borrower_company: queryText,
    month: periodText,
    year: periodText,
  })
  .refine((scope) => Boolean(scope.lender_company) === Boolean(scope.borrower_company), {
    message: 'lender_company and borrower_company must be given together',
    path: ['borrower_company'],
  })
  .transform(
    (scope): CompanyScope => ({
      lenderCompany: scope.lender_company,
      borrowerCompany: scope.borrower_company,
      statementMonth: scope.month,
      statementYear: scope.year,
    })
  );

/**
 * unreconciled: pairs still holding unmatched legs
 * matched: pairs holding matched, confirmed or pending legs
 * all: every pair that has entries
 */
export const companyPairStatusSchema = z.enum(['all', 'unreconciled', 'matched']);

export type CompanyPairStatus = z.infer<typeof companyPairStatusSchema>;

export const companyPairQuerySchema = z.object({
  status: companyPairStatusSchema.default('unreconciled'),
});

export const pairIdParamsSchema = z.object({
  pairId: z.string().trim().min(1).max(128),
});
