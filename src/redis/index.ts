/**
 * Redis Module
 *
 * Optional Redis layer: the shared client and the run progress mirror.
 */

// Client exports
export {
  getRedisClient,
  isRedisAvailable,
  disconnectRedis,
  safeRedisOperation,
  safeRedisWrite,
} from './client';

// Run progress exports
export {
  getRunProgressKey,
  getCachedRunProgress,
  setCachedRunProgress,
  setCachedRunStatus,
  type RunProgress,
  type RunStatus,
} from './runProgress';
