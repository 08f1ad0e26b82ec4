/**
 * Supabase-backed rate-limit store.
 * Counting happens in the `increment_rate_limit` RPC so concurrent function
 * instances share one counter per window.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { windowStart, type IRateLimitStore, type RateLimitResult } from './IRateLimitStore.js';

export class SupabaseRateLimitStore implements IRateLimitStore {
  constructor(private readonly db: SupabaseClient) {}

  async increment(key: string, windowSeconds: number): Promise<RateLimitResult> {
    const now = Math.floor(Date.now() / 1000);
    const start = windowStart(now, windowSeconds);

    const { data, error } = await this.db.rpc('increment_rate_limit', {
      p_key: key,
      p_window_key: String(start),
    });

    if (error) throw new Error(`Failed to increment rate limit: ${error.message}`);
    if (typeof data !== 'number') {
      throw new Error('increment_rate_limit returned a non-numeric count');
    }

    return { count: data, resetAt: start + windowSeconds };
  }
}
