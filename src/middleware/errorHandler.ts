import type { Request, Response, NextFunction } from 'express';
import { ResponseUtils } from '../shared/utils/response.utils.js';
import { logger } from '../utils/logger.js';

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null) {
    const s = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
    if (typeof s === 'number' && s >= 400 && s < 600) return s;
  }
  return 500;
}

/** 404 handler placed after all route mounts */
export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json(ResponseUtils.notFound('endpoint'));
}

/** Central error handler - MUST have 4 args to be recognized by Express */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  const status = statusOf(err);
  const e = err instanceof Error ? err : new Error(String(err));

  // Avoid leaking internal details on server errors
  const response = status >= 500
    ? ResponseUtils.internalError()
    : ResponseUtils.error(e.message || 'Request failed');

  logger.error({
    err: { message: e.message, name: e.name, stack: e.stack, status },
    url: req.originalUrl,
    method: req.method
  }, 'request_error');

  // A response already under way can only be aborted; Express's default handler does that
  if (res.headersSent) return next(err);
  res.status(status).json(response);
}
