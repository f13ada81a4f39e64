import { Request, Response } from 'express';
import { sendError } from '../utils';

/**
 * 404 for anything no router claimed, echoing the method and path
 */
export const notFound = (req: Request, res: Response): void => {
  sendError(res, `Route not found: ${req.method} ${req.originalUrl}`, 404);
};

export default notFound;
