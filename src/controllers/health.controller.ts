import { Request, Response } from 'express';
import { healthService } from '../services';
import { sendSuccess, sendError, asyncHandler } from '../utils';

/**
 * Health check controller
 */
export class HealthController {
  /**
   * GET /health
   * Basic health check endpoint
   */
  getHealth = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const health = healthService.getHealthStatus();
    sendSuccess(res, health, 'Service is healthy');
  });

  /**
   * GET /health/ready
   * Database, and Redis when enabled; 503 names the failing checks
   */
  getReadiness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const readiness = await healthService.checkReadiness();

    if (readiness.ready) {
      sendSuccess(res, readiness, 'Service is ready');
    } else {
      const failed = Object.keys(readiness.checks).filter((name) => !readiness.checks[name]);
      sendError(res, `Service is not ready: ${failed.join(', ')} unavailable`, 503, readiness);
    }
  });

  /**
   * GET /health/live
   * Liveness check endpoint
   */
  getLiveness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    sendSuccess(res, { alive: true }, 'Service is alive');
  });
}

export const healthController = new HealthController();

export default healthController;
