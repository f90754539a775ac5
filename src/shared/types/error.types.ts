/**
 * =============================================================================
 * ERROR TYPES
 * =============================================================================
 *
 * Custom error classes for consistent error handling.
 * All operational errors should use AppError.
 *
 * Unparseable optional query values (filters, GPS, dates) are NOT errors:
 * the query layer drops them and carries on without that constraint.
 * =============================================================================
 */

/**
 * Error codes enum for consistent error identification
 */
export enum ErrorCode {
  UNAUTHORIZED = 'UNAUTHORIZED',
  TOKEN_EXPIRED = 'TOKEN_EXPIRED',
  INVALID_TOKEN = 'INVALID_TOKEN',
  FORBIDDEN = 'FORBIDDEN',

  USER_NOT_FOUND = 'USER_NOT_FOUND',
  RIDE_NOT_FOUND = 'RIDE_NOT_FOUND',
  RIDE_EVENT_NOT_FOUND = 'RIDE_EVENT_NOT_FOUND',
  EMAIL_TAKEN = 'EMAIL_TAKEN',

  VALIDATION_ERROR = 'VALIDATION_ERROR',
  BAD_REQUEST = 'BAD_REQUEST',
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED'
}

/**
 * Application Error class
 * Use this for all known/expected errors
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode | string;
  public readonly details?: Record<string, unknown>;
  public readonly isOperational: boolean = true;

  constructor(
    statusCode: number,
    code: ErrorCode | string,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Validation Error - 400
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(400, ErrorCode.VALIDATION_ERROR, message, details);
  }
}

/**
 * Authentication Error - 401 (no valid caller identity)
 */
export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication required', code: ErrorCode = ErrorCode.UNAUTHORIZED) {
    super(401, code, message);
  }
}

/**
 * Authorization Error - 403 (authenticated, role not allowed)
 */
export class AuthorizationError extends AppError {
  constructor(message: string = 'Permission denied') {
    super(403, ErrorCode.FORBIDDEN, message);
  }
}

/**
 * Not Found Error - 404
 */
export class NotFoundError extends AppError {
  constructor(resource: string, code: ErrorCode = ErrorCode.NOT_FOUND) {
    super(404, code, `${resource} not found`);
  }
}

/**
 * Conflict Error - 409
 */
export class ConflictError extends AppError {
  constructor(message: string, code: ErrorCode | string = 'CONFLICT') {
    super(409, code, message);
  }
}
