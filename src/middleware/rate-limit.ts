/**
 * Rate limiting middleware.
 * Composable with the pipeline — each endpoint can have its own config.
 * Uses an IRateLimitStore for persistence (in-memory for tests, Supabase for prod).
 */

import type { IRateLimitStore } from '../stores/IRateLimitStore.js';
import type { HandlerContext, Middleware, Handler } from './pipeline.js';
import { RateLimitError } from '../errors.js';

export interface RateLimitConfig {
  /** Extract the rate limit key from the request/context. */
  key: (req: Request, ctx: HandlerContext) => string;
  /** Maximum requests allowed within the window. */
  limit: number;
  /** Window duration in seconds. */
  windowSeconds: number;
}

export function createRateLimitMiddleware(
  store: IRateLimitStore,
  config: RateLimitConfig
): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const key = config.key(req, ctx);
      const { count, resetAt } = await store.increment(key, config.windowSeconds);

      if (count > config.limit) {
        const now = Math.floor(Date.now() / 1000);
        const retryAfter = Math.max(1, resetAt - now);
        throw new RateLimitError(retryAfter);
      }

      const response = await next(req, ctx);

      // Attach rate limit headers to successful responses
      const headers = new Headers(response.headers);
      headers.set('X-RateLimit-Limit', String(config.limit));
      headers.set('X-RateLimit-Remaining', String(Math.max(0, config.limit - count)));
      headers.set('X-RateLimit-Reset', String(resetAt));

      return new Response(response.body, {
        status: response.status,
        statusText: response.statusText,
        headers,
      });
    };
  };
}

// ── Key extraction helpers ──

/** Per-user key; falls back to the client IP when nobody is signed in. */
export function userKey(action: string) {
  return (req: Request, ctx: HandlerContext): string => {
    return ctx.user ? `user:${ctx.user.id}:${action}` : ipKey(action)(req);
  };
}

/** IP-based key: for unauthenticated endpoints. */
export function ipKey(action: string) {
  return (req: Request): string => {
    const forwarded = req.headers.get('X-Forwarded-For');
    const ip = forwarded?.split(',')[0]?.trim() || 'unknown';
    return `ip:${ip}:${action}`;
  };
}

/** Global key: shared budget across all users. */
export function globalKey(action: string) {
  return (): string => `global:${action}`;
}

// ── Pre-built rate limit configs ──

const ONE_HOUR = 3600;
const ONE_DAY = 86400;

export const RATE_LIMITS = {
  /** POST /entries */
  submitEntry: { key: userKey('submit'), limit: 20, windowSeconds: ONE_HOUR },
  /** PUT /entries/:id */
  updateEntry: { key: userKey('update'), limit: 30, windowSeconds: ONE_HOUR },
  /** DELETE /entries/:id */
  deleteEntry: { key: userKey('delete'), limit: 20, windowSeconds: ONE_HOUR },
  /** POST /entries/:id/vote */
  vote: { key: userKey('vote'), limit: 120, windowSeconds: ONE_HOUR },
  /** POST /entries/:id/verify */
  verify: { key: userKey('verify'), limit: 60, windowSeconds: ONE_HOUR },
  /** GET /search, by IP */
  search: { key: ipKey('search'), limit: 120, windowSeconds: ONE_HOUR },
  /** Global embedding budget for query embeddings */
  embeddingBudget: { key: globalKey('embeddings'), limit: 2000, windowSeconds: ONE_DAY },
} as const satisfies Record<string, RateLimitConfig>;
