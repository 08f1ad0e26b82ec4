/**
 * Error handler middleware.
 * Catches errors thrown by handlers and maps them to structured JSON responses.
 * AppError subclasses get their status code and details; unknown errors become
 * 500 and, when a logger is supplied, are logged with their message.
 */

import { AppError, DependencyError, RateLimitError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { Handler, Middleware } from './pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

/** Seconds a client should wait before retrying after a dependency failure. */
const DEPENDENCY_RETRY_AFTER = 5;

export function createErrorHandler(logger: ILogProvider | null): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      try {
        return await next(req, ctx);
      } catch (err) {
        if (err instanceof AppError) {
          const body: ApiErrorResponse = {
            error: {
              code: err.code,
              message: err.message,
              ...(err.details && { details: err.details }),
            },
          };

          const headers: Record<string, string> = { ...JSON_HEADERS };

          if (err instanceof RateLimitError && err.details?.retryAfter) {
            headers['Retry-After'] = String(err.details.retryAfter);
          }
          if (err instanceof DependencyError) {
            headers['Retry-After'] = String(DEPENDENCY_RETRY_AFTER);
          }

          return new Response(JSON.stringify(body), {
            status: err.statusCode,
            headers,
          });
        }

        logger?.error('Unhandled error', {
          method: req.method,
          path: new URL(req.url).pathname,
          error: err instanceof Error ? err.message : String(err),
          ...(err instanceof Error && err.stack && { stack: err.stack }),
        });

        // Don't leak internals
        const body: ApiErrorResponse = {
          error: {
            code: 'INTERNAL_ERROR',
            message: 'An unexpected error occurred',
          },
        };

        return new Response(JSON.stringify(body), {
          status: 500,
          headers: JSON_HEADERS,
        });
      }
    };
  };
}

/** Error handler without logging. */
export const errorHandler: Middleware = createErrorHandler(null);
