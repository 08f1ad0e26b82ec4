/**
 * Shared plumbing for the pg repositories.
 */

import type pg from 'pg';

/** Anything that can run a parameterized query: a pool or a checked-out client. */
export type Queryable = Pick<pg.PoolClient, 'query'>;

/**
 * Build a `SET a = $n, b = $n+1` clause from the defined keys of `data`.
 * Keys come from typed row shapes, never from request input.
 */
export function setClause(
  data: Record<string, unknown>,
  firstIndex: number
): { sql: string; values: unknown[] } {
  const columns: string[] = [];
  const values: unknown[] = [];

  for (const [column, value] of Object.entries(data)) {
    if (value === undefined) continue;
    values.push(value);
    columns.push(`${column} = $${firstIndex + values.length - 1}`);
  }

  return { sql: columns.join(', '), values };
}

export function firstOrNull<T extends pg.QueryResultRow>(result: pg.QueryResult<T>): T | null {
  return result.rows[0] ?? null;
}

export function firstOrThrow<T extends pg.QueryResultRow>(result: pg.QueryResult<T>, what: string): T {
  const row = result.rows[0];
  if (!row) throw new Error(`${what}: no row returned`);
  return row;
}
