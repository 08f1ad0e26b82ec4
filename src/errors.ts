/**
 * Application error hierarchy.
 * Every error a caller can act on is an AppError; the error handler maps
 * these to HTTP responses. Anything else is treated as an internal failure.
 */

import type { ErrorCode } from './types/api.js';

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed input. Nothing was mutated. */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, 400, details);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super('UNAUTHORIZED', message, 401);
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string, code: 'FORBIDDEN' | 'SELF_VERIFICATION' = 'FORBIDDEN') {
    super(code, message, 403);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

export type ConflictCode =
  | 'CONFLICT'
  | 'ALREADY_VERIFIED'
  | 'ALREADY_PENDING_OWN'
  | 'ALREADY_PENDING';

export class ConflictError extends AppError {
  constructor(code: ConflictCode, message: string, details?: Record<string, unknown>) {
    super(code, message, 409, details);
  }
}

export class RateLimitError extends AppError {
  constructor(retryAfter: number) {
    super('RATE_LIMITED', 'Too many requests, slow down', 429, { retryAfter });
  }
}

/**
 * A collaborator (reward computation, embedding service) failed.
 * `cause` keeps the original error for logging.
 */
export class DependencyError extends AppError {
  constructor(
    message: string,
    readonly dependency: string,
    cause?: unknown
  ) {
    super('DEPENDENCY_FAILED', message, 503, { dependency });
    this.cause = cause;
  }
}
