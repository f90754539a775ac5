/**
 * =============================================================================
 * RATE LIMITER MIDDLEWARE
 * =============================================================================
 *
 * Per-IP request limit over a fixed window, held in process memory
 * (express-rate-limit's default MemoryStore). Counters reset on restart.
 * =============================================================================
 */

import { Request, Response } from 'express';
import rateLimit from 'express-rate-limit';
import { config } from '../../config/environment';
import { ErrorCode } from '../types/error.types';
import { logger } from '../services/logger.service';

/**
 * Default rate limiter for all /api routes
 */
export const rateLimiter = rateLimit({
  windowMs: config.rateLimit.windowMs,
  max: config.rateLimit.maxRequests,
  standardHeaders: true,
  legacyHeaders: false,
  skip: () => !config.security.enableRateLimiting,
  handler: (req: Request, res: Response) => {
    logger.warn('Rate limit exceeded', { ip: req.ip, path: req.path });
    res.status(429).json({
      success: false,
      error: {
        code: ErrorCode.RATE_LIMIT_EXCEEDED,
        message: 'Too many requests. Please try again later.'
      }
    });
  }
});
