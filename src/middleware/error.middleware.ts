import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { errorMessage } from '@/services/errors';
import { logger } from '@/services/logger';
import { ApiError, errorBody } from '@/utils/errorResponse';

/** Lets async route handlers hand rejections to the error middleware. */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

export function notFoundMiddleware(req: Request, res: Response): void {
  res.status(404).json(errorBody('NOT_FOUND', `Route ${req.method} ${req.path} not found`));
}

/** body-parser marks unreadable JSON bodies with `type: 'entity.parse.failed'`. */
function isMalformedBody(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function errorMiddleware(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ApiError) {
    logger.debug('http:api_error', { method: req.method, path: req.path, code: err.code });
    res.status(err.status).json(err.toResponse());
    return;
  }
  if (isMalformedBody(err)) {
    res.status(400).json(errorBody('VALIDATION_ERROR', 'Request body is not valid JSON'));
    return;
  }
  logger.error('http:unhandled_error', { method: req.method, path: req.path, error: errorMessage(err) });
  res.status(500).json(errorBody('INTERNAL_ERROR', 'Internal Server Error'));
}
