import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodSchema } from 'zod';
import { AppError } from '../utils';

interface ValidationSchemas {
  body?: ZodSchema;
  params?: ZodSchema;
}

/**
 * Validates and replaces req.body / req.params with the parsed values.
 * Query strings are parsed inside the handlers, where their types are needed.
 */
export const validateRequest = (schemas: ValidationSchemas) => {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      if (schemas.body) {
        req.body = await schemas.body.parseAsync(req.body);
      }
      if (schemas.params) {
        req.params = await schemas.params.parseAsync(req.params);
      }
      next();
    } catch (error) {
      next(error instanceof ZodError ? AppError.fromZodError(error) : error);
    }
  };
};

export default validateRequest;
