import { Pool, QueryResultRow } from 'pg';
import { env } from '../config';
import { createModuleLogger } from './logger';

const logger = createModuleLogger('db');

/**
 * Anything that can run a query: the pool itself or a checked-out client
 * inside a transaction.
 */
export interface DbClient {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: R[]; rowCount: number | null }>;
}

// Pool connects lazily on the first query
export const pool = new Pool({
  connectionString: env.DATABASE_URL,
  max: env.DATABASE_POOL_MAX,
});

pool.on('error', (error: Error) => {
  logger.error(`Idle database client error: ${error.message}`);
});

/**
 * Run a query and return its rows
 */
export const query = async <R extends QueryResultRow = QueryResultRow>(
  text: string,
  values: unknown[] = [],
  client: DbClient = pool
): Promise<R[]> => {
  const result = await client.query<R>(text, values);
  return result.rows;
};

/**
 * Run work inside BEGIN / COMMIT, rolling back on any error
 */
export const withTransaction = async <T>(work: (client: DbClient) => Promise<T>): Promise<T> => {
  const client = await pool.connect();

  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logger.error('❌ Transaction rollback failed:', rollbackError);
    }
    throw error;
  } finally {
    client.release();
  }
};

/**
 * Connect to database
 */
export const connectDatabase = async (): Promise<void> => {
  try {
    const client = await pool.connect();
    client.release();
    logger.info('📦 Database connected successfully');
  } catch (error) {
    logger.error('❌ Database connection failed:', error);
    throw error;
  }
};

/**
 * Disconnect from database
 */
export const disconnectDatabase = async (): Promise<void> => {
  try {
    await pool.end();
    logger.info('📦 Database disconnected');
  } catch (error) {
    logger.error('❌ Database disconnect failed:', error);
    throw error;
  }
};

/**
 * Check database health
 */
export const checkDatabaseHealth = async (): Promise<boolean> => {
  try {
    await pool.query('SELECT 1');
    return true;
  } catch {
    return false;
  }
};

export default pool;
