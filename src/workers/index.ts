/**
 * Workers Module
 *
 * Exports background workers for async processing tasks.
 */

export { processRun, processRunJob, startBackgroundRun, dispatchRun } from './reconciliationWorker';
export {
  RECONCILIATION_QUEUE_NAME,
  getReconciliationQueue,
  closeReconciliationQueue,
  setupReconciliationWorker,
  type ReconciliationJobData,
} from './reconciliation.queue';
