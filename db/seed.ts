/**
 * Seed Script for Interunit Loan Reconciliation
 *
 * Applies db/schema.sql and loads a small demo ledger pair from
 * db/seed-ledger.csv. Existing demo rows are replaced.
 *
 * Usage:
 *   DATABASE_URL=postgres://... npm run seed
 */

import { createReadStream, readFileSync } from 'fs';
import { resolve } from 'path';
import { insertLedgerEntries } from '../src/services/ledger.service';
import { parseLedgerCsv } from '../src/utils/csv';
import { disconnectDatabase, query } from '../src/utils/db';

// ============================================
// Configuration
// ============================================

const SCHEMA_PATH = resolve(__dirname, 'schema.sql');
const CSV_FILE_PATH = resolve(__dirname, 'seed-ledger.csv');
const DEMO_PAIR_ID = 'demo-2024-03';

function log(message: string): void {
  console.log(`[${new Date().toISOString()}] ${message}`);
}

// ============================================
// Main Seeding Logic
// ============================================

async function main(): Promise<void> {
  log('='.repeat(50));
  log('Interunit Loan Reconciliation - Database Seeder');
  log('='.repeat(50));

  try {
    log('Applying schema...');
    await query(readFileSync(SCHEMA_PATH, 'utf8'));

    log('Reading CSV file...');
    const { rows, errors, stats } = await parseLedgerCsv(createReadStream(CSV_FILE_PATH));
    if (errors.length > 0) {
      throw new Error(
        `Seed file has invalid rows: ${errors.map((e) => `row ${e.rowNumber}: ${e.error}`).join('; ')}`
      );
    }
    log(`Parsed ${stats.valid} ledger entries`);

    log('Clearing existing demo entries...');
    const uids = rows.map((row) => row.uid);
    await query('DELETE FROM match_audit_log WHERE uid = ANY($1)', [uids]);
    const deleted = await query<{ uid: string }>(
      'DELETE FROM ledger_entries WHERE pair_id = $1 RETURNING uid',
      [DEMO_PAIR_ID]
    );
    log(`Deleted ${deleted.length} existing entries`);

    const result = await insertLedgerEntries(rows);
    log('='.repeat(50));
    log(`✅ Seeding complete! Inserted ${result.inserted}, skipped ${result.skipped}`);
    log('='.repeat(50));
  } catch (error) {
    console.error('❌ Seeding failed:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  } finally {
    await disconnectDatabase();
  }
}

void main();
