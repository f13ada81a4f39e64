import { HealthCheckResponse, ReadinessResult } from '../types';
import { env } from '../config';
import { checkDatabaseHealth } from '../utils';
import { safeRedisOperation } from '../redis';

/**
 * PING through the shared client; false when Redis is unreachable
 */
async function checkRedisHealth(): Promise<boolean> {
  return safeRedisOperation(async (client) => (await client.ping()) === 'PONG', false, 'Redis ping');
}

/**
 * Health check service
 */
export class HealthService {
  private readonly startTime: number;
  private readonly version: string;

  constructor() {
    this.startTime = Date.now();
    this.version = process.env.npm_package_version || '1.0.0';
  }

  /**
   * Get health status
   */
  getHealthStatus(): HealthCheckResponse {
    return {
      status: 'healthy',
      service: 'interunit-loan-recon',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      environment: env.NODE_ENV,
      version: this.version,
    };
  }

  /**
   * Check if the service is ready
   * Checks all dependencies including database, and Redis when it is enabled
   */
  async checkReadiness(): Promise<ReadinessResult> {
    const checks: Record<string, boolean> = {
      server: true,
      database: await checkDatabaseHealth(),
    };

    if (env.REDIS_ENABLED) {
      checks.redis = await checkRedisHealth();
    }

    const ready = Object.values(checks).every((check) => check);

    return { ready, checks };
  }
}

// Singleton instance
export const healthService = new HealthService();

export default healthService;
