/**
 * pg implementation of IUserRepository.
 */

import type { CounterDelta, IUserRepository } from './IUserRepository.js';
import type { UserRow } from '../types/database.js';
import type { PaginationOptions } from '../types/common.js';
import { firstOrNull, firstOrThrow, setClause, type Queryable } from './pg-helpers.js';

export class PgUserRepository implements IUserRepository {
  constructor(private readonly db: Queryable) {}

  async findById(id: string): Promise<UserRow | null> {
    const result = await this.db.query<UserRow>('SELECT * FROM users WHERE id = $1', [id]);
    return firstOrNull(result);
  }

  async findByIdForUpdate(id: string): Promise<UserRow | null> {
    const result = await this.db.query<UserRow>(
      'SELECT * FROM users WHERE id = $1 FOR UPDATE',
      [id]
    );
    return firstOrNull(result);
  }

  async findByApiKeyHash(hash: string): Promise<UserRow | null> {
    const result = await this.db.query<UserRow>(
      'SELECT * FROM users WHERE api_key_hash = $1',
      [hash]
    );
    return firstOrNull(result);
  }

  async adjustPoints(id: string, delta: number): Promise<UserRow> {
    const result = await this.db.query<UserRow>(
      'UPDATE users SET points = points + $2 WHERE id = $1 RETURNING *',
      [id, delta]
    );
    return firstOrThrow(result, `Failed to adjust points for user ${id}`);
  }

  async adjustCounters(id: string, delta: CounterDelta): Promise<UserRow> {
    const result = await this.db.query<UserRow>(
      `UPDATE users
       SET contributions_count = GREATEST(contributions_count + $2, 0),
           verifications_count = GREATEST(verifications_count + $3, 0)
       WHERE id = $1
       RETURNING *`,
      [id, delta.contributions ?? 0, delta.verifications ?? 0]
    );
    return firstOrThrow(result, `Failed to adjust counters for user ${id}`);
  }

  async update(
    id: string,
    data: Partial<Pick<UserRow, 'points' | 'level' | 'contributions_count' | 'verifications_count'>>
  ): Promise<UserRow> {
    const set = setClause(data, 2);
    if (!set.sql) {
      const existing = await this.findById(id);
      if (!existing) throw new Error(`Failed to update user ${id}: not found`);
      return existing;
    }

    const result = await this.db.query<UserRow>(
      `UPDATE users SET ${set.sql} WHERE id = $1 RETURNING *`,
      [id, ...set.values]
    );
    return firstOrThrow(result, `Failed to update user ${id}`);
  }

  async list(options: PaginationOptions): Promise<UserRow[]> {
    const result = await this.db.query<UserRow>(
      'SELECT * FROM users ORDER BY id LIMIT $1 OFFSET $2',
      [options.limit, options.offset]
    );
    return result.rows;
  }
}
