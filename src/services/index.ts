export { healthService, HealthService } from './health.service';
export { ledgerService } from './ledger.service';
export * from './ledger.service';
export { reconciliationService } from './reconciliation.service';
export * from './reconciliation.service';
export { matchService } from './match.service';
export * from './match.service';
export { auditService } from './audit.service';
export * from './audit.service';
