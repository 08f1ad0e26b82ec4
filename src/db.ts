/**
 * Database clients.
 * Supabase serves the read models and the rate-limit store; the ledgers
 * write through a pg pool so each operation runs in one transaction.
 * Both are created lazily and shared across warm invocations.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import pg from 'pg';

const { Pool } = pg;

// Row types carry timestamps and calendar days as strings, the way Supabase
// returns them.
const TIMESTAMPTZ_OID = 1184;
const DATE_OID = 1082;
pg.types.setTypeParser(TIMESTAMPTZ_OID, (value: string) => new Date(value).toISOString());
pg.types.setTypeParser(DATE_OID, (value: string) => value);

let supabase: SupabaseClient | null = null;
let pool: pg.Pool | null = null;

export function getSupabaseClient(url: string, serviceRoleKey: string): SupabaseClient {
  if (!supabase) {
    supabase = createClient(url, serviceRoleKey, {
      auth: { persistSession: false, autoRefreshToken: false },
    });
  }
  return supabase;
}

export function getPgPool(connectionString: string): pg.Pool {
  if (!pool) {
    pool = new Pool({
      connectionString,
      max: 5,
      idleTimeoutMillis: 10_000,
    });
  }
  return pool;
}
