/**
 * pg implementation of IPointTransactionRepository.
 */

import type { IPointTransactionRepository } from './IPointTransactionRepository.js';
import type { PointTransactionRow } from '../types/database.js';
import type { PaginationOptions } from '../types/common.js';
import { firstOrNull, type Queryable } from './pg-helpers.js';

export class PgPointTransactionRepository implements IPointTransactionRepository {
  constructor(private readonly db: Queryable) {}

  async insert(
    row: Omit<PointTransactionRow, 'id' | 'created_at'>
  ): Promise<PointTransactionRow | null> {
    // NULL keys never conflict, so keyless grants always insert.
    const result = await this.db.query<PointTransactionRow>(
      `INSERT INTO point_transactions (user_id, points, kind, description, idempotency_key)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (idempotency_key) DO NOTHING
       RETURNING *`,
      [row.user_id, row.points, row.kind, row.description, row.idempotency_key]
    );
    return firstOrNull(result);
  }

  async existsByKey(idempotencyKey: string): Promise<boolean> {
    const result = await this.db.query<{ exists: boolean }>(
      'SELECT EXISTS (SELECT 1 FROM point_transactions WHERE idempotency_key = $1) AS exists',
      [idempotencyKey]
    );
    return result.rows[0]?.exists ?? false;
  }

  async sumByUser(userId: string): Promise<number> {
    const result = await this.db.query<{ total: number }>(
      'SELECT COALESCE(SUM(points), 0)::int AS total FROM point_transactions WHERE user_id = $1',
      [userId]
    );
    return result.rows[0]?.total ?? 0;
  }

  async findByUser(userId: string, options: PaginationOptions): Promise<PointTransactionRow[]> {
    const result = await this.db.query<PointTransactionRow>(
      `SELECT * FROM point_transactions
       WHERE user_id = $1
       ORDER BY created_at DESC, id DESC
       LIMIT $2 OFFSET $3`,
      [userId, options.limit, options.offset]
    );
    return result.rows;
  }
}
