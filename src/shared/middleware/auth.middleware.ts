/**
 * =============================================================================
 * AUTH MIDDLEWARE
 * =============================================================================
 *
 * Authentication (bearer JWT -> caller) and the Access Gate as middleware.
 *
 * SECURITY:
 * - Token validation on every request
 * - The caller's role is read from the store, not trusted from the token
 * - Deactivated or deleted users are unauthenticated
 * - The gate runs before any resource lookup, so a 401/403 never reveals
 *   whether a resource exists
 * =============================================================================
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { config } from '../../config/environment';
import { AppError, AuthenticationError, AuthorizationError, ErrorCode } from '../types/error.types';
import { logger, logError } from '../services/logger.service';
import { db } from '../database/db';
import { IUserRepository } from '../database/repository.interface';
import {
  AccessPolicy,
  Caller,
  accessModeForMethod,
  authorize
} from '../security/access-gate';

/**
 * Extended Request type with the authenticated caller
 */
declare global {
  namespace Express {
    interface Request {
      caller?: Caller;
    }
  }
}

const tokenPayloadSchema = z.object({
  userId: z.string().min(1)
});

function extractBearerToken(req: Request): string {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    throw new AuthenticationError();
  }
  return authHeader.substring(7);
}

/**
 * Build the authentication middleware over a user repository
 */
export function createAuthMiddleware(users: IUserRepository, secret: string = config.jwt.secret): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      const token = extractBearerToken(req);
      const payload = tokenPayloadSchema.safeParse(jwt.verify(token, secret));
      if (!payload.success) {
        throw new AuthenticationError('Invalid token', ErrorCode.INVALID_TOKEN);
      }

      const user = await users.findById(payload.data.userId);
      if (!user || !user.isActive) {
        throw new AuthenticationError('User inactive or not found');
      }

      req.caller = { userId: user.id, role: user.role, email: user.email };
      next();
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        next(new AuthenticationError('Token has expired', ErrorCode.TOKEN_EXPIRED));
      } else if (error instanceof jwt.JsonWebTokenError) {
        next(new AuthenticationError('Invalid token', ErrorCode.INVALID_TOKEN));
      } else if (error instanceof AppError) {
        next(error);
      } else {
        logError('Auth middleware error', error);
        next(new AuthenticationError('Authentication failed'));
      }
    }
  };
}

export const authenticate = createAuthMiddleware(db.users);

/**
 * Access Gate middleware. GET/HEAD/OPTIONS are reads, everything else writes.
 * Must be used after authenticate.
 */
export function accessGate(policy: AccessPolicy): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const mode = accessModeForMethod(req.method);
    const decision = authorize(req.caller, policy, mode);

    if (decision.allowed) {
      next();
      return;
    }

    if (decision.reason === 'unauthenticated') {
      next(new AuthenticationError());
      return;
    }

    logger.warn('Access denied - insufficient role', {
      userId: req.caller?.userId,
      role: req.caller?.role,
      policy,
      mode,
      path: req.path
    });
    next(new AuthorizationError('Insufficient permissions'));
  };
}

/**
 * The authenticated caller of a request that passed authenticate
 */
export function requireCaller(req: Request): Caller {
  if (!req.caller) {
    throw new AuthenticationError();
  }
  return req.caller;
}
