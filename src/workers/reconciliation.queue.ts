import { Queue, Worker, Job, ConnectionOptions } from 'bullmq';
import { env } from '../config';
import { createModuleLogger } from '../utils';

const logger = createModuleLogger('queue');

// ============================================
// Types
// ============================================

export interface ReconciliationJobData {
  runId: string;
}

// ============================================
// Redis Connection for BullMQ
// ============================================

function getConnection(): ConnectionOptions {
  return {
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    // BullMQ requires maxRetriesPerRequest to be null
    maxRetriesPerRequest: null,
  };
}

// ============================================
// Queue Definition
// ============================================

export const RECONCILIATION_QUEUE_NAME = 'interunit-reconciliation';

let reconciliationQueue: Queue<ReconciliationJobData> | null = null;

/**
 * Lazily created so that importing this module never opens a connection
 */
export function getReconciliationQueue(): Queue<ReconciliationJobData> {
  if (!reconciliationQueue) {
    reconciliationQueue = new Queue<ReconciliationJobData>(RECONCILIATION_QUEUE_NAME, {
      connection: getConnection(),
      defaultJobOptions: {
        attempts: 3,
        backoff: {
          type: 'exponential',
          delay: 1000,
        },
        removeOnComplete: true,
        removeOnFail: false,
      },
    });
  }
  return reconciliationQueue;
}

export async function closeReconciliationQueue(): Promise<void> {
  if (reconciliationQueue) {
    await reconciliationQueue.close();
    reconciliationQueue = null;
  }
}

// ============================================
// Worker Setup
// ============================================

export function setupReconciliationWorker(
  processor: (job: Job<ReconciliationJobData>) => Promise<void>
): Worker<ReconciliationJobData> {
  const worker = new Worker<ReconciliationJobData>(RECONCILIATION_QUEUE_NAME, processor, {
    connection: getConnection(),
    // One run at a time: runs over overlapping scopes would race for the same legs
    concurrency: 1,
    lockDuration: 60000,
  });

  worker.on('completed', (job) => {
    logger.info(`[Job ${job.id}] Reconciliation run ${job.data.runId} completed`);
  });

  worker.on('failed', (job, err) => {
    logger.error(`[Job ${job?.id}] Reconciliation run failed: ${err.message}`);
  });

  worker.on('error', (err) => {
    logger.error(`Worker error: ${err.message}`);
  });

  return worker;
}
