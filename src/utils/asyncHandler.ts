import type { Request, Response, NextFunction, RequestHandler } from 'express';

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/** Forwards a rejected handler promise to the central error handler. */
export function asyncHandler(fn: AsyncRoute): RequestHandler {
  return function wrapped(req, res, next) {
    fn(req, res, next).catch(next);
  };
}
