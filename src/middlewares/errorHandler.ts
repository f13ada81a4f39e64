import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { ZodError } from 'zod';
import { AppError, logger } from '../utils';
import { env } from '../config';

const toAppError = (err: Error): AppError | null => {
  if (err instanceof AppError) {
    return err;
  }
  // Query strings parsed inside handlers
  if (err instanceof ZodError) {
    return AppError.fromZodError(err);
  }
  // File size limit, unexpected field name
  if (err instanceof MulterError) {
    return AppError.badRequest(`Upload rejected: ${err.message}`);
  }
  return null;
};

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const appError = toAppError(err);
  const statusCode = appError ? appError.statusCode : 500;
  const message = appError ? appError.message : 'Internal Server Error';

  if (appError && appError.isOperational) {
    logger.warn(`${req.method} ${req.originalUrl} -> ${statusCode}: ${message}`);
  } else {
    logger.error(`Unhandled error on ${req.method} ${req.originalUrl}:`, err);
  }

  res.status(statusCode).json({
    success: false,
    error: message,
    ...(appError?.details && { details: appError.details }),
    ...(env.NODE_ENV === 'development' && {
      stack: err.stack,
    }),
    timestamp: new Date().toISOString(),
  });
};

export default errorHandler;
