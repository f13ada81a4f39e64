/**
 * Reconciliation Background Worker
 *
 * Executes queued reconciliation runs:
 * 1. Marks the run as processing (database + Redis mirror)
 * 2. Runs the matching engine over the run's scope
 * 3. Stores the summary, or the failure reason
 *
 * With Redis enabled runs go through BullMQ for retries; without it they run
 * in-process in the background.
 */

import { Job } from 'bullmq';
import { env } from '../config';
import {
  getRun,
  markRunCompleted,
  markRunFailed,
  markRunProcessing,
  runReconciliation,
  type RunSummary,
} from '../services/reconciliation.service';
import { AppError, createModuleLogger } from '../utils';
import { getReconciliationQueue, type ReconciliationJobData } from './reconciliation.queue';

const logger = createModuleLogger('worker');

/**
 * Executes one run end to end
 */
export async function processRun(runId: string): Promise<RunSummary> {
  const run = await getRun(runId, false);
  if (!run) {
    throw AppError.notFound(`Reconciliation run ${runId} not found`);
  }

  try {
    await markRunProcessing(runId);
    logger.info(`[${runId}] Starting reconciliation run`);

    const summary = await runReconciliation(run.scope, runId);
    await markRunCompleted(runId, summary);

    logger.info(`[${runId}] ✅ Run complete: ${summary.matchesFound} matches in ${summary.durationMs}ms`);
    return summary;
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    logger.error(`[${runId}] ❌ Run failed: ${message}`);

    try {
      await markRunFailed(runId, message);
    } catch (markError) {
      logger.error(
        `[${runId}] Could not record run failure: ${
          markError instanceof Error ? markError.message : 'Unknown error'
        }`
      );
    }
    throw error;
  }
}

/**
 * BullMQ processor
 */
export async function processRunJob(job: Job<ReconciliationJobData>): Promise<void> {
  logger.debug(`[Job ${job.id}] Picked up run ${job.data.runId}`);
  await processRun(job.data.runId);
}

/**
 * Runs in the current process without waiting for the result
 */
export function startBackgroundRun(runId: string): void {
  processRun(runId).catch((error: unknown) => {
    logger.error(
      `[${runId}] Background run error: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  });
}

/**
 * Hands a run to the queue, or to the in-process fallback when Redis is disabled
 *
 * @returns How the run was dispatched
 */
export async function dispatchRun(runId: string): Promise<'queued' | 'in-process'> {
  if (!env.REDIS_ENABLED) {
    startBackgroundRun(runId);
    return 'in-process';
  }

  await getReconciliationQueue().add('reconcile', { runId }, { jobId: runId });
  return 'queued';
}

export default {
  processRun,
  processRunJob,
  startBackgroundRun,
  dispatchRun,
};
