import { Router } from 'express';
import { healthController } from '../controllers';

const router = Router();

/**
 * @route   GET /health
 * @desc    Service name, uptime and environment
 * @access  Public
 */
router.get('/', healthController.getHealth);

/**
 * @route   GET /health/ready
 * @desc    Readiness: PostgreSQL must answer, and Redis too when REDIS_ENABLED.
 *          503 names the failing checks.
 * @access  Public
 */
router.get('/ready', healthController.getReadiness);

/**
 * @route   GET /health/live
 * @desc    Liveness only, no dependency checks
 * @access  Public
 */
router.get('/live', healthController.getLiveness);

export default router;
