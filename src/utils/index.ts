export { default as logger, Logging, createModuleLogger } from './logger';
export { sendSuccess, sendList, sendError } from './response';
export { asyncHandler } from './asyncHandler';
export { AppError } from './AppError';
export {
  pool,
  query,
  withTransaction,
  connectDatabase,
  disconnectDatabase,
  checkDatabaseHealth,
  type DbClient,
} from './db';
