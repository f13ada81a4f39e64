import { Request, Response, NextFunction, RequestHandler } from 'express';

type AsyncRoute<P> = (req: Request<P>, res: Response, next: NextFunction) => Promise<void>;

/**
 * Forwards a rejected route promise to the error handler
 *
 * @example
 * router.get('/runs/:runId', asyncHandler<{ runId: string }>(async (req, res) => { ... }))
 */
export const asyncHandler = <P = Record<string, string>>(fn: AsyncRoute<P>): RequestHandler<P> => {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
};

export default asyncHandler;
