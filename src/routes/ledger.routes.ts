/**
 * Ledger API Routes
 *
 * Import and read endpoints for normalized ledger lines.
 * These routes handle HTTP concerns only - business logic is delegated to services.
 *
 * Endpoints:
 * - POST /entries - Insert normalized entries (JSON)
 * - POST /upload - Upload a normalized ledger CSV
 * - GET /entries - Filtered entries
 * - GET /filters - Distinct filter values
 * - GET /unmatched - Unmatched entries for a company pair / period
 * - GET /company-pairs - Company pairs per statement period
 * - GET /pairs - Upload pairs
 * - GET /pairs/:pairId/entries - Entries of an upload pair
 * - GET /pairs/:pairId/unmatched - Unmatched entries of an upload pair
 */

import { Readable } from 'stream';
import { Router, Request, Response } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { validateRequest } from '../middlewares';
import {
  companyPairQuerySchema,
  companyScopeSchema,
  insertEntriesSchema,
  ledgerFilterSchema,
  pairIdParamsSchema,
} from '../schemas/ledger.schema';
import {
  getCompanyPairs,
  getEntriesByPair,
  getFilterOptions,
  getLedgerEntries,
  getUnmatchedEntries,
  getUnmatchedEntriesByPair,
  getUploadPairs,
  insertLedgerEntries,
} from '../services/ledger.service';
import { AppError, asyncHandler, Logging, sendList, sendSuccess } from '../utils';
import { parseLedgerCsv, type ParsedLedgerCsv } from '../utils/csv';

const router = Router();

// ============================================
// Multer Configuration
// ============================================

const MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

/**
 * File filter to only accept CSV files
 */
const fileFilter = (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
  const allowedMimeTypes = ['text/csv', 'application/csv', 'text/plain', 'application/vnd.ms-excel'];

  const mimeTypeOk = allowedMimeTypes.includes(file.mimetype);
  const extensionOk = file.originalname.toLowerCase().endsWith('.csv');

  if (mimeTypeOk || extensionOk) {
    cb(null, true);
  } else {
    cb(AppError.badRequest('Only CSV files are allowed'));
  }
};

/**
 * Ledger files are small enough to parse from memory
 */
const upload = multer({
  storage: multer.memoryStorage(),
  fileFilter,
  limits: {
    fileSize: MAX_UPLOAD_BYTES,
    files: 1,
  },
});

// ============================================
// Routes
// ============================================

/**
 * @route   POST /api/v1/ledger/entries
 * @desc    Insert normalized ledger entries
 * @access  Public (should be protected in production)
 *
 * Body: { entries: [{ uid, particulars, debit, credit, lender?, borrower?, ... }] }
 *
 * Response:
 * - 201 Created: { inserted, skipped }
 * - 400 Bad Request: Validation failed
 */
router.post(
  '/entries',
  validateRequest({ body: insertEntriesSchema }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { entries }: z.output<typeof insertEntriesSchema> = req.body;

    const result = await insertLedgerEntries(entries);

    sendSuccess(res, result, `Inserted ${result.inserted} entries, skipped ${result.skipped}`, 201);
  })
);

/**
 * @route   POST /api/v1/ledger/upload
 * @desc    Upload a normalized ledger CSV
 * @access  Public (should be protected in production)
 *
 * Request:
 * - Content-Type: multipart/form-data
 * - Body: file (CSV file)
 *
 * Required columns: uid, particulars, debit, credit
 *
 * Response:
 * - 201 Created: { inserted, skipped, invalidRows, errors, stats }
 * - 400 Bad Request: No file, wrong type or missing columns
 */
router.post(
  '/upload',
  upload.single('file'),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    if (!req.file) {
      throw AppError.badRequest('No file uploaded. Please upload a CSV file.');
    }

    Logging.info(`📤 Ledger upload: ${req.file.originalname} (${req.file.size} bytes)`);

    let parsed: ParsedLedgerCsv;
    try {
      parsed = await parseLedgerCsv(Readable.from(req.file.buffer));
    } catch (error) {
      throw AppError.badRequest(
        `Could not read CSV: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }

    const result = await insertLedgerEntries(parsed.rows);

    sendSuccess(
      res,
      {
        ...result,
        invalidRows: parsed.stats.invalid,
        errors: parsed.errors,
        stats: parsed.stats,
      },
      `Imported ${result.inserted} of ${parsed.stats.total} rows`,
      201
    );
  })
);

/**
 * @route   GET /api/v1/ledger/entries
 * @desc    Ledger entries filtered by lender, borrower, period, voucher type,
 *          entered_by and match status
 * @access  Public
 */
router.get(
  '/entries',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const filters = ledgerFilterSchema.parse(req.query);
    const entries = await getLedgerEntries(filters);
    sendList(res, 'entries', entries);
  })
);

/**
 * @route   GET /api/v1/ledger/filters
 * @desc    Distinct lenders, borrowers, statement months and years
 * @access  Public
 */
router.get(
  '/filters',
  asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const options = await getFilterOptions();
    sendSuccess(res, options);
  })
);

/**
 * @route   GET /api/v1/ledger/unmatched
 * @desc    Unmatched entries, optionally for a company pair and period
 * @access  Public
 *
 * Query params: lender_company, borrower_company (together), month, year
 */
router.get(
  '/unmatched',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const scope = companyScopeSchema.parse(req.query);
    const entries = await getUnmatchedEntries(scope);
    sendList(res, 'entries', entries);
  })
);

/**
 * @route   GET /api/v1/ledger/company-pairs
 * @desc    Company pairs with entry counts per statement month and year.
 *          Each pair is a scope for POST /reconciliation/reconcile.
 * @access  Public
 *
 * Query params: status = unreconciled (default) | matched | all
 */
router.get(
  '/company-pairs',
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { status } = companyPairQuerySchema.parse(req.query);
    const pairs = await getCompanyPairs(status);
    sendList(res, 'pairs', pairs, { status });
  })
);

/**
 * @route   GET /api/v1/ledger/pairs
 * @desc    Upload pairs with record counts
 * @access  Public
 */
router.get(
  '/pairs',
  asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const pairs = await getUploadPairs();
    sendList(res, 'pairs', pairs);
  })
);

router.get(
  '/pairs/:pairId/entries',
  validateRequest({ params: pairIdParamsSchema }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const entries = await getEntriesByPair(req.params.pairId);
    sendList(res, 'entries', entries, { pairId: req.params.pairId });
  })
);

router.get(
  '/pairs/:pairId/unmatched',
  validateRequest({ params: pairIdParamsSchema }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const entries = await getUnmatchedEntriesByPair(req.params.pairId);
    sendList(res, 'entries', entries, { pairId: req.params.pairId });
  })
);

export default router;
