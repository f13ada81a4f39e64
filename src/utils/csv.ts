/**
 * CSV Utilities for Ledger Imports
 *
 * Streams a normalized ledger CSV through csv-parser and validates every row
 * against the same schema used by the JSON import endpoint.
 *
 * Key features:
 * - Stream-based parsing using csv-parser
 * - Header check before any row is accepted
 * - Row validation with row numbers in the error messages
 */

import { Readable } from 'stream';
import { EventEmitter } from 'events';
import csvParser from 'csv-parser';
import { ledgerEntrySchema, type NewLedgerEntry } from '../schemas/ledger.schema';

// ============================================
// Types
// ============================================

/**
 * Raw CSV row, keyed by lower-cased header
 */
export type LedgerCsvRow = Record<string, string>;

/**
 * Result of parsing a single row
 */
export type RowParseResult =
  | { success: true; data: NewLedgerEntry; rowNumber: number }
  | { success: false; error: string; rowNumber: number };

export interface CsvStats {
  total: number;
  valid: number;
  invalid: number;
}

export interface ParsedLedgerCsv {
  rows: NewLedgerEntry[];
  errors: Array<{ rowNumber: number; error: string }>;
  stats: CsvStats;
}

/**
 * Required columns in the CSV file
 */
export const REQUIRED_COLUMNS = ['uid', 'particulars', 'debit', 'credit'] as const;

// ============================================
// Validation Functions
// ============================================

/**
 * Validates that all required columns are present in the CSV headers
 */
export function validateCsvHeaders(headers: string[]): { valid: boolean; missing: string[] } {
  const normalizedHeaders = headers.map((h) => h.toLowerCase().trim());
  const missing = REQUIRED_COLUMNS.filter((col) => !normalizedHeaders.includes(col));

  return {
    valid: missing.length === 0,
    missing,
  };
}

/**
 * Parses and validates a single CSV row
 */
export function parseRow(row: LedgerCsvRow, rowNumber: number): RowParseResult {
  const result = ledgerEntrySchema.safeParse(row);

  if (!result.success) {
    const error = result.error.errors
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return { success: false, error, rowNumber };
  }

  return { success: true, data: result.data, rowNumber };
}

// ============================================
// Streaming CSV Parser
// ============================================

/**
 * Creates a streaming CSV processor that emits events for each row
 *
 * Events: 'row' (RowParseResult), 'headerError' (missing columns),
 * 'error' (Error), 'end' (CsvStats)
 *
 * @example
 * const processor = createCsvStreamProcessor(Readable.from(buffer));
 *
 * processor.on('row', (result) => {
 *   if (!result.success) {
 *     logger.warn(`Row ${result.rowNumber}: ${result.error}`);
 *   }
 * });
 */
export function createCsvStreamProcessor(input: Readable): EventEmitter {
  const emitter = new EventEmitter();

  // Header line is row 1, so the first data row is row 2
  let rowNumber = 1;
  let validCount = 0;
  let invalidCount = 0;
  let headersValidated = false;

  const stream = input.pipe(
    csvParser({
      mapHeaders: ({ header }) => header.replace(/^\uFEFF/, '').toLowerCase().trim(),
    })
  );

  stream.on('headers', (headers: string[]) => {
    const validation = validateCsvHeaders(headers);
    if (!validation.valid) {
      emitter.emit('headerError', validation.missing);
      stream.destroy();
      return;
    }
    headersValidated = true;
  });

  stream.on('data', (row: LedgerCsvRow) => {
    if (!headersValidated) return;

    rowNumber++;
    const result = parseRow(row, rowNumber);

    if (result.success) {
      validCount++;
    } else {
      invalidCount++;
    }

    emitter.emit('row', result);
  });

  stream.on('error', (error: Error) => {
    emitter.emit('error', error);
  });

  stream.on('end', () => {
    emitter.emit('end', {
      total: validCount + invalidCount,
      valid: validCount,
      invalid: invalidCount,
    });
  });

  return emitter;
}

/**
 * Parses a whole ledger CSV into valid rows and per-row errors
 */
export async function parseLedgerCsv(input: Readable): Promise<ParsedLedgerCsv> {
  return new Promise((resolve, reject) => {
    const rows: NewLedgerEntry[] = [];
    const errors: Array<{ rowNumber: number; error: string }> = [];

    const processor = createCsvStreamProcessor(input);

    processor.on('row', (result: RowParseResult) => {
      if (result.success) {
        rows.push(result.data);
      } else {
        errors.push({ rowNumber: result.rowNumber, error: result.error });
      }
    });

    processor.on('headerError', (missing: string[]) => {
      reject(new Error(`Missing required columns: ${missing.join(', ')}`));
    });

    processor.on('error', (error: Error) => {
      reject(error);
    });

    processor.on('end', (stats: CsvStats) => {
      resolve({ rows, errors, stats });
    });
  });
}

export default {
  createCsvStreamProcessor,
  parseLedgerCsv,
  parseRow,
  validateCsvHeaders,
};
