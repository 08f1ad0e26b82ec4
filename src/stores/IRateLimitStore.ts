/**
 * Fixed-window request counter backing the rate-limit middleware.
 */

export interface RateLimitResult {
  /** Requests counted in the current window, including this one. */
  count: number;
  /** Unix time (seconds) at which the current window ends. */
  resetAt: number;
}

export interface IRateLimitStore {
  increment(key: string, windowSeconds: number): Promise<RateLimitResult>;
}

/** Start of the window containing `nowSeconds`. */
export function windowStart(nowSeconds: number, windowSeconds: number): number {
  return Math.floor(nowSeconds / windowSeconds) * windowSeconds;
}
