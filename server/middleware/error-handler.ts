/**
 * ERROR HANDLING MIDDLEWARE
 * =========================
 *
 * USAGE:
 * ```ts
 * router.get('/conversations/:id/turns', asyncHandler(async (req, res) => {
 *   const conversation = await storage.getConversation(id);
 *   if (!conversation) throw new NotFoundError('Conversation not found');
 *   sendSuccess(res, turns);
 * }));
 *
 * app.use(notFoundHandler);
 * app.use(errorHandler);
 * ```
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';
import { AppError, isOperationalError, getErrorMessage } from '../errors/app-errors';
import { log as baseLog } from '../utils/logger';
import { sendError } from '../utils/response';

const log = baseLog.child({ component: 'ErrorHandler' });

/**
 * Async route handler wrapper - forwards rejections to the error handler
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

/**
 * Global error handler. Must be registered AFTER all routes.
 */
export function errorHandler(
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (error instanceof ZodError) {
    const message = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    log.warn({ rid: req.requestId, method: req.method, path: req.path, message }, 'Request validation failed');
    sendError(res, 400, message, 'VALIDATION_ERROR');
    return;
  }

  const statusCode = error instanceof AppError ? error.statusCode : 500;
  const code = error instanceof AppError ? error.code : 'INTERNAL_ERROR';
  const message = getErrorMessage(error);

  if (statusCode >= 500) {
    log.error({
      rid: req.requestId,
      method: req.method,
      path: req.path,
      statusCode,
      code,
      err: error,
    }, 'Request failed');
  } else {
    log.warn({
      rid: req.requestId,
      method: req.method,
      path: req.path,
      statusCode,
      code,
      message,
    }, 'Request failed');
  }

  if (!isOperationalError(error)) {
    log.fatal({ rid: req.requestId, method: req.method, path: req.path }, 'Programming error detected - investigate immediately');
  }

  // Non-operational errors never leak their message
  const publicMessage = isOperationalError(error) ? message : 'Internal server error';
  const isDev = process.env.NODE_ENV !== 'production';
  const metadata = isDev && error instanceof Error && error.stack ? { stack: error.stack } : undefined;

  sendError(res, statusCode, publicMessage, code, metadata);
}

/**
 * 404 handler. Register AFTER all routes but BEFORE errorHandler.
 */
export function notFoundHandler(req: Request, res: Response): void {
  sendError(res, 404, `Route not found: ${req.method} ${req.path}`, 'NOT_FOUND');
}
