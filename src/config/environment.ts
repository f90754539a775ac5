/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * SECURITY:
 * - No secrets are logged or exposed in error messages
 * - Production requires a proper JWT secret (validated at startup)
 * - Development uses an auto-generated secret if not provided
 *
 * FOR BACKEND DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Use getRequired() for mandatory production values
 * - Use getOptional() for values with sensible defaults
 * =============================================================================
 */

import dotenv from 'dotenv';
import path from 'path';
import { randomBytes } from 'crypto';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get required environment variable (throws if missing in production)
 */
function getRequired(key: string, devDefault?: string): string {
  const value = process.env[key];

  if (value && value.trim() !== '') {
    return value;
  }

  if (process.env.NODE_ENV !== 'production') {
    if (devDefault) {
      console.warn(`⚠️  [CONFIG] ${key} not set, using development default`);
      return devDefault;
    }
    const generated = randomBytes(32).toString('hex');
    console.warn(`⚠️  [CONFIG] ${key} not set, auto-generated for development`);
    return generated;
  }

  throw new Error(
    `❌ FATAL: ${key} is required in production!\n` +
    `   Generate a secure value with: node -e "console.log(require('crypto').randomBytes(64).toString('hex'))"\n` +
    `   Then set it in your environment variables or .env file.`
  );
}

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get boolean environment variable
 */
function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Get number environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

/**
 * Parse CORS origins from comma-separated string
 */
function parseCorsOrigins(value: string): string | string[] {
  if (value === '*') return '*';
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

const nodeEnv = getOptional('NODE_ENV', 'development');

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

export const config = {
  // Server
  nodeEnv,
  port: getNumber('PORT', 3000),
  host: getOptional('HOST', '0.0.0.0'),

  // JSON-file store. Persistence is off under test so every suite starts empty.
  database: {
    file: path.resolve(getOptional('DATA_FILE', path.join(process.cwd(), 'data', 'dispatch-db.json'))),
    persist: getBoolean('DATA_PERSIST', nodeEnv !== 'test'),
  },

  // JWT - verification only, tokens are issued elsewhere
  jwt: {
    secret: getRequired('JWT_SECRET'),
  },

  // Query engine defaults
  query: {
    nearbyDefaultRadiusKm: getNumber('NEARBY_DEFAULT_RADIUS_KM', 10),
    topEventTypesLimit: getNumber('TOP_EVENT_TYPES_LIMIT', 5),
    defaultPageSize: getNumber('DEFAULT_PAGE_SIZE', 20),
  },

  // Rate Limiting
  rateLimit: {
    windowMs: getNumber('RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000), // 15 minutes
    maxRequests: getNumber('RATE_LIMIT_MAX_REQUESTS', 300),
  },

  // Logging
  logLevel: getOptional('LOG_LEVEL', nodeEnv === 'test' ? 'error' : 'debug'),

  cors: {
    origin: parseCorsOrigins(getOptional('CORS_ORIGIN', '*')),
  },

  // Helpers
  isProduction: nodeEnv === 'production',
  isDevelopment: nodeEnv === 'development',
  isTest: nodeEnv === 'test',

  security: {
    enableHeaders: getBoolean('ENABLE_SECURITY_HEADERS', true),
    enableRateLimiting: getBoolean('ENABLE_RATE_LIMITING', true),
    enableRequestLogging: getBoolean('ENABLE_REQUEST_LOGGING', true),
  },
} as const;

// =============================================================================
// STARTUP VALIDATION
// =============================================================================

/**
 * Validate configuration at startup
 * Fails fast if critical config is invalid
 */
function validateConfig(): void {
  const warnings: string[] = [];
  const errors: string[] = [];

  if (config.query.nearbyDefaultRadiusKm <= 0) {
    errors.push('NEARBY_DEFAULT_RADIUS_KM must be a positive number');
  }

  if (config.query.topEventTypesLimit < 1) {
    errors.push('TOP_EVENT_TYPES_LIMIT must be at least 1');
  }

  if (config.isProduction) {
    if (config.cors.origin === '*') {
      warnings.push('CORS_ORIGIN is set to "*" - this should be restricted in production');
    }

    if (!config.database.persist) {
      warnings.push('DATA_PERSIST is false - records are lost on restart');
    }
  }

  if (warnings.length > 0) {
    console.warn('\n⚠️  Configuration Warnings:');
    warnings.forEach(w => console.warn(`   - ${w}`));
    console.warn('');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration Errors:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }
}

validateConfig();
