/**
 * In-process rate-limit store for tests and local runs.
 */

import { windowStart, type IRateLimitStore, type RateLimitResult } from './IRateLimitStore.js';

export class InMemoryRateLimitStore implements IRateLimitStore {
  private readonly windows = new Map<string, { start: number; count: number }>();

  async increment(key: string, windowSeconds: number): Promise<RateLimitResult> {
    const now = Math.floor(Date.now() / 1000);
    const start = windowStart(now, windowSeconds);
    const current = this.windows.get(key);

    const count = current && current.start === start ? current.count + 1 : 1;
    this.windows.set(key, { start, count });

    return { count, resetAt: start + windowSeconds };
  }

  reset(): void {
    this.windows.clear();
  }
}
