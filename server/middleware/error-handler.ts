/**
 * ERROR HANDLING MIDDLEWARE
 * =========================
 *
 * Centralized error handling for Express routes. AppErrors map to their
 * status code; anything else is a 500 and is logged as a programming error.
 *
 * USAGE:
 * ```ts
 * router.post('/api/control/check', asyncHandler(async (req, res) => {
 *   sendSuccess(res, await loop.runOnce());
 * }));
 *
 * app.use(notFoundHandler);
 * app.use(errorHandler);
 * ```
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { ApiErrorBody } from '../../shared/schema';
import { AppError, isOperationalError, getErrorMessage } from '../errors/app-errors';
import { reqLog } from '../utils/logger';

/**
 * Async route handler wrapper - forwards rejections to next()
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

/**
 * Global error handler middleware. Register AFTER all routes.
 */
export function errorHandler(
  error: unknown,
  req: Request,
  res: Response,
  // Express recognizes error middleware by its four parameters
  _next: NextFunction,
): void {
  const statusCode = error instanceof AppError ? error.statusCode : 500;
  const code = error instanceof AppError ? error.code : 'INTERNAL_ERROR';
  const context = error instanceof AppError ? error.context : undefined;
  const message = statusCode >= 500 && !(error instanceof AppError)
    ? 'Internal server error'
    : getErrorMessage(error);
  const logger = reqLog(req);

  if (statusCode >= 500) {
    logger.error({ statusCode, code, context, error: getErrorMessage(error) }, 'Request failed');
  } else {
    logger.warn({ statusCode, code, message }, 'Request failed');
  }

  if (!isOperationalError(error)) {
    logger.fatal({ error: getErrorMessage(error) }, 'Programming error detected - investigate immediately');
  }

  if (res.headersSent) {
    return;
  }

  const body: ApiErrorBody = { error: { code, message, ...(context && { context }) } };
  res.status(statusCode).json(body);
}

/**
 * 404 Not Found handler. Register AFTER all routes but BEFORE errorHandler.
 */
export function notFoundHandler(req: Request, res: Response): void {
  const body: ApiErrorBody = {
    error: {
      code: 'NOT_FOUND',
      message: `Route not found: ${req.method} ${req.path}`,
    },
  };
  res.status(404).json(body);
}
