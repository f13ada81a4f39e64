export { healthController, HealthController } from './health.controller';
