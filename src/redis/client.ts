/**
 * Shared ioredis client.
 *
 * Redis only mirrors run progress and backs the BullMQ queue; PostgreSQL is
 * the source of truth. Every helper here degrades to a fallback instead of
 * throwing, and REDIS_ENABLED=false keeps the client from ever being created.
 */

import Redis, { RedisOptions } from 'ioredis';
import { env } from '../config';
import { createModuleLogger } from '../utils/logger';

const logger = createModuleLogger('redis');

const MAX_RECONNECT_ATTEMPTS = 3;

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';

function getRedisOptions(): RedisOptions {
  return {
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    maxRetriesPerRequest: 1,
    // 100ms, 200ms, 300ms, then give up
    retryStrategy: (times: number) =>
      times > MAX_RECONNECT_ATTEMPTS ? null : Math.min(times * 100, 400),
    lazyConnect: true,
  };
}

let redisClient: Redis | null = null;
let isConnected = false;
let connectionAttempted = false;

function createRedisClient(): Redis {
  const client = new Redis(getRedisOptions());

  client.on('ready', () => {
    isConnected = true;
    logger.info('📦 Redis connected successfully');
  });

  client.on('error', (error: Error) => {
    isConnected = false;
    logger.warn(`Redis error (non-fatal): ${error.message}`);
  });

  client.on('close', () => {
    isConnected = false;
    logger.debug('Redis connection closed');
  });

  client.on('reconnecting', () => {
    logger.debug('Redis reconnecting...');
  });

  return client;
}

/**
 * Returns the shared client, connecting on first use.
 * Null when Redis is disabled.
 */
export function getRedisClient(): Redis | null {
  if (!env.REDIS_ENABLED) {
    return null;
  }

  if (!connectionAttempted) {
    connectionAttempted = true;
    redisClient = createRedisClient();
    redisClient.connect().catch((error: unknown) => {
      isConnected = false;
      logger.warn(`Redis initial connection failed (non-fatal): ${errorMessage(error)}`);
    });
  }

  return redisClient;
}

export function isRedisAvailable(): boolean {
  return isConnected && redisClient !== null;
}

/**
 * Quits the client during shutdown; errors are logged only
 */
export async function disconnectRedis(): Promise<void> {
  if (!redisClient) {
    return;
  }

  try {
    await redisClient.quit();
    logger.info('Redis disconnected');
  } catch (error) {
    logger.warn(`Redis disconnect error (non-fatal): ${errorMessage(error)}`);
  } finally {
    redisClient = null;
    isConnected = false;
    connectionAttempted = false;
  }
}

/**
 * Runs a read against Redis, answering `fallback` when Redis is
 * unavailable or the command fails
 *
 * @example
 * const alive = await safeRedisOperation(async (c) => (await c.ping()) === 'PONG', false);
 */
export async function safeRedisOperation<T>(
  operation: (client: Redis) => Promise<T>,
  fallback: T,
  operationName = 'Redis operation'
): Promise<T> {
  const client = getRedisClient();

  if (!client || !isConnected) {
    logger.debug(`${operationName}: Redis unavailable, using fallback`);
    return fallback;
  }

  try {
    return await operation(client);
  } catch (error) {
    logger.warn(`${operationName} failed (non-fatal): ${errorMessage(error)}`);
    return fallback;
  }
}

/**
 * Fire-and-forget write; skipped when Redis is unavailable
 */
export async function safeRedisWrite(
  operation: (client: Redis) => Promise<unknown>,
  operationName = 'Redis write'
): Promise<void> {
  await safeRedisOperation(
    async (client) => {
      await operation(client);
    },
    undefined,
    operationName
  );
}

export default {
  getRedisClient,
  isRedisAvailable,
  disconnectRedis,
  safeRedisOperation,
  safeRedisWrite,
};
