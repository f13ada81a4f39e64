import { Router } from 'express';
import healthRoutes from './health.routes';
import ledgerRoutes from './ledger.routes';
import reconciliationRoutes from './reconciliation.routes';

const router = Router();

// Health check routes
router.use('/health', healthRoutes);

// Ledger import and read routes
router.use('/ledger', ledgerRoutes);

// Matching runs and match review
router.use('/reconciliation', reconciliationRoutes);

export default router;
