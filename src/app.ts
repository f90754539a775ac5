/**
 * =============================================================================
 * EXPRESS APPLICATION
 * =============================================================================
 *
 * Builds the app without listening, so tests can drive it in-process.
 * =============================================================================
 */

import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';

import { config } from './config/environment';
import { db } from './shared/database/db';
import { errorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { requestLogger } from './shared/middleware/request-logger.middleware';
import { rateLimiter } from './shared/middleware/rate-limiter.middleware';
import {
  preventParamPollution,
  requestIdMiddleware,
  securityHeaders
} from './shared/middleware/security.middleware';

import { authRouter } from './modules/auth/auth.routes';
import { userRouter } from './modules/user/user.routes';
import { rideRouter } from './modules/ride/ride.routes';
import { rideEventRouter } from './modules/ride-event/ride-event.routes';

export const API_PREFIX = '/api/v1';

export function createApp(): Express {
  const app = express();

  // Behind one reverse proxy: req.ip is the client, not the proxy
  app.set('trust proxy', 1);

  // =============================================================================
  // MIDDLEWARE - Security & Performance
  // =============================================================================

  // Request ID for tracking (must be first)
  app.use(requestIdMiddleware);

  app.use(compression({
    level: 6,
    threshold: 1024
  }));

  app.use(securityHeaders);

  app.use(cors({
    origin: config.cors.origin,
    methods: ['GET', 'POST', 'PATCH', 'DELETE'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
    maxAge: 86400 // 24 hours preflight cache
  }));

  app.use(express.json({ limit: '100kb' }));

  app.use(preventParamPollution);

  if (config.security.enableRequestLogging) {
    app.use(requestLogger);
  }

  // =============================================================================
  // HEALTH CHECK
  // =============================================================================

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      environment: config.nodeEnv,
      database: db.getStats()
    });
  });

  // =============================================================================
  // API ROUTES
  // =============================================================================

  app.use(API_PREFIX, rateLimiter);
  app.use(`${API_PREFIX}/auth`, authRouter);
  app.use(`${API_PREFIX}/users`, userRouter);
  app.use(`${API_PREFIX}/rides`, rideRouter);
  app.use(`${API_PREFIX}/ride-events`, rideEventRouter);

  // =============================================================================
  // ERROR HANDLING
  // =============================================================================

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
