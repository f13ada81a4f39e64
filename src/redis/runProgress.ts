/**
 * Run Progress Module
 *
 * Redis hash mirroring a background reconciliation run so that status polls
 * do not hit PostgreSQL while the run is processing. Writes happen after
 * the reconciliation_runs row is updated; reads return null on any miss.
 *
 * KEY FORMAT: run:{runId}:progress
 */

import { env } from '../config';
import { safeRedisOperation, safeRedisWrite } from './client';

// ============================================
// Key Generation
// ============================================

const CACHE_KEY_PREFIX = 'run:';
const CACHE_KEY_SUFFIX = ':progress';

export function getRunProgressKey(runId: string): string {
  return `${CACHE_KEY_PREFIX}${runId}${CACHE_KEY_SUFFIX}`;
}

// ============================================
// Data Structure
// ============================================

export type RunStatus = 'queued' | 'processing' | 'completed' | 'failed';

/**
 * Run progress data stored in Redis
 */
export interface RunProgress {
  status: RunStatus;
  totalRecords: number;
  matchesFound: number;
  autoConfirmed: number;
  needsReview: number;
  pendingVerification: number;
}

const RUN_STATUSES: readonly RunStatus[] = ['queued', 'processing', 'completed', 'failed'];

function isRunStatus(value: string | undefined): value is RunStatus {
  return RUN_STATUSES.some((status) => status === value);
}

function toCount(value: string | undefined): number {
  const parsed = parseInt(value ?? '0', 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}

// ============================================
// Cache Operations
// ============================================

/**
 * Gets cached run progress
 *
 * @returns Cached progress or null if not in cache
 */
export async function getCachedRunProgress(runId: string): Promise<RunProgress | null> {
  const cacheKey = getRunProgressKey(runId);

  return safeRedisOperation<RunProgress | null>(
    async (client) => {
      const data = await client.hgetall(cacheKey);

      if (!isRunStatus(data.status)) {
        return null;
      }

      return {
        status: data.status,
        totalRecords: toCount(data.totalRecords),
        matchesFound: toCount(data.matchesFound),
        autoConfirmed: toCount(data.autoConfirmed),
        needsReview: toCount(data.needsReview),
        pendingVerification: toCount(data.pendingVerification),
      };
    },
    null,
    `Run progress GET (${runId})`
  );
}

/**
 * Sets the full run progress in cache
 */
export async function setCachedRunProgress(runId: string, progress: RunProgress): Promise<void> {
  const cacheKey = getRunProgressKey(runId);

  await safeRedisWrite(async (client) => {
    const multi = client.multi();

    multi.hset(cacheKey, {
      status: progress.status,
      totalRecords: progress.totalRecords.toString(),
      matchesFound: progress.matchesFound.toString(),
      autoConfirmed: progress.autoConfirmed.toString(),
      needsReview: progress.needsReview.toString(),
      pendingVerification: progress.pendingVerification.toString(),
    });

    multi.expire(cacheKey, env.RUN_CACHE_TTL_SECONDS);

    await multi.exec();
  }, `Run progress SET (${runId})`);
}

/**
 * Updates only the status field of cached progress
 */
export async function setCachedRunStatus(runId: string, status: RunStatus): Promise<void> {
  const cacheKey = getRunProgressKey(runId);

  await safeRedisWrite(async (client) => {
    const multi = client.multi();
    multi.hset(cacheKey, 'status', status);
    multi.expire(cacheKey, env.RUN_CACHE_TTL_SECONDS);
    await multi.exec();
  }, `Run status SET (${runId})`);
}
