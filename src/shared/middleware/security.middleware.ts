/**
 * =============================================================================
 * SECURITY MIDDLEWARE
 * =============================================================================
 *
 * - Request ID tracking
 * - Helmet security headers
 * - Query parameter pollution guard
 * =============================================================================
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import helmet from 'helmet';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../../config/environment';

function headerValue(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Generate and attach request ID for tracking
 */
export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const requestId = headerValue(req, 'x-request-id') ?? uuidv4();

  req.headers['x-request-id'] = requestId;
  res.setHeader('X-Request-ID', requestId);

  next();
}

const helmetHeaders = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginResourcePolicy: { policy: 'same-origin' },
  frameguard: { action: 'deny' },
  hidePoweredBy: true,
  hsts: {
    maxAge: 31536000, // 1 year
    includeSubDomains: true,
  },
  noSniff: true,
  referrerPolicy: { policy: 'no-referrer' },
});

const passThrough: RequestHandler = (_req, _res, next) => next();

/**
 * Security headers using Helmet (JSON API: nothing is ever framed or embedded)
 */
export const securityHeaders: RequestHandler = config.security.enableHeaders ? helmetHeaders : passThrough;

/**
 * Prevent parameter pollution: a repeated query key keeps its first value
 */
export function preventParamPollution(
  req: Request,
  _res: Response,
  next: NextFunction
): void {
  for (const [key, value] of Object.entries(req.query)) {
    if (Array.isArray(value)) {
      req.query[key] = value[0];
    }
  }
  next();
}
