/**
 * =============================================================================
 * ERROR HANDLING MIDDLEWARE
 * =============================================================================
 *
 * Centralized error handling for all routes.
 *
 * SECURITY:
 * - Stack traces never reach clients
 * - Internal error messages are hidden in production
 * - All errors are logged server-side
 * =============================================================================
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../services/logger.service';
import { AppError, ErrorCode, ValidationError } from '../types/error.types';
import { config } from '../../config/environment';

/**
 * 4xx status carried by errors from express.json() (http-errors style)
 */
function clientErrorStatus(error: Error): number | null {
  if (!('status' in error) || typeof error.status !== 'number') return null;
  return error.status >= 400 && error.status < 500 ? error.status : null;
}

/**
 * Body parser failures become client errors; everything else passes through
 */
function normalizeError(error: Error): Error {
  if (error instanceof AppError) return error;

  const status = clientErrorStatus(error);
  if (status === null) return error;

  if (error instanceof SyntaxError && status === 400) {
    return new ValidationError('Request body is not valid JSON');
  }
  if (status === 413) {
    return new AppError(413, ErrorCode.PAYLOAD_TOO_LARGE, 'Request body is too large');
  }
  return new AppError(status, ErrorCode.BAD_REQUEST, error.message);
}

/**
 * Global error handler middleware
 * Must be the last middleware in the chain
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const known = normalizeError(error);

  if (known instanceof AppError) {
    const level = known.statusCode >= 500 ? 'error' : 'warn';
    logger.log(level, 'Request error', {
      code: known.code,
      error: known.message,
      path: req.path,
      method: req.method,
      userId: req.caller?.userId ?? 'anonymous'
    });

    res.status(known.statusCode).json({
      success: false,
      error: {
        code: known.code,
        message: known.message,
        ...(known.details && { details: known.details })
      }
    });
    return;
  }

  logger.error('Unhandled request error', {
    error: known.message,
    stack: known.stack,
    path: req.path,
    method: req.method,
    ip: req.ip,
    userId: req.caller?.userId ?? 'anonymous'
  });

  res.status(500).json({
    success: false,
    error: {
      code: ErrorCode.INTERNAL_ERROR,
      message: config.isProduction
        ? 'An unexpected error occurred. Please try again later.'
        : known.message
    }
  });
}

/**
 * Async route wrapper to catch async errors
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Not found error handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    error: {
      code: ErrorCode.NOT_FOUND,
      message: `Cannot ${req.method} ${req.path}`
    }
  });
}
