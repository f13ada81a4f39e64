import type { ZodError } from 'zod';

/**
 * One rejected input field, as returned to API clients
 */
export interface FieldIssue {
  field: string;
  message: string;
}

/**
 * Operational error carrying the HTTP status to answer with
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly details?: FieldIssue[];

  constructor(message: string, statusCode: number, isOperational = true, details?: FieldIssue[]) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, AppError.prototype);
  }

  static badRequest(message: string, details?: FieldIssue[]): AppError {
    return new AppError(message, 400, true, details);
  }

  static notFound(message = 'Resource not found'): AppError {
    return new AppError(message, 404);
  }

  /**
   * Lost race on a ledger entry (already matched, already decided)
   */
  static conflict(message: string): AppError {
    return new AppError(message, 409);
  }

  /**
   * 400 listing every zod issue; an empty path is reported as "request"
   *
   * @example
   * AppError.fromZodError(err).message
   * // 'Validation failed: entries.0.debit: Expected number, received string'
   */
  static fromZodError(error: ZodError): AppError {
    const details = error.errors.map((issue) => ({
      field: issue.path.join('.') || 'request',
      message: issue.message,
    }));
    const summary = details.map(({ field, message }) => `${field}: ${message}`).join('; ');
    return AppError.badRequest(`Validation failed: ${summary}`, details);
  }
}

export default AppError;
