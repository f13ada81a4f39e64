import { Response } from 'express';
import { ApiResponse } from '../types';

/**
 * Send a success response
 */
export const sendSuccess = <T>(
  res: Response,
  data: T,
  message?: string,
  statusCode = 200
): Response => {
  const response: ApiResponse<T> = {
    success: true,
    data,
    message,
    timestamp: new Date().toISOString(),
  };

  return res.status(statusCode).json(response);
};

/**
 * Send a list under a named key together with its count
 *
 * @example
 * sendList(res, 'entries', rows, { pairId: 'demo-2024-03' })
 * // data: { entries: [...], count: 3, pairId: 'demo-2024-03' }
 */
export const sendList = <T>(
  res: Response,
  key: string,
  items: T[],
  extra: Record<string, unknown> = {},
  message?: string
): Response => sendSuccess(res, { [key]: items, count: items.length, ...extra }, message);

/**
 * Send an error response; `data` carries diagnostics such as failed readiness checks
 */
export const sendError = <T = undefined>(
  res: Response,
  error: string,
  statusCode = 500,
  data?: T
): Response => {
  const response: ApiResponse<T> = {
    success: false,
    error,
    data,
    timestamp: new Date().toISOString(),
  };

  return res.status(statusCode).json(response);
};
