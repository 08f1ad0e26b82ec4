/**
 * pg implementation of IVoteRepository.
 */

import type { IVoteRepository } from './IVoteRepository.js';
import type { VoteRow } from '../types/database.js';
import type { VotePolarity } from '../types/models.js';
import { firstOrNull, firstOrThrow, type Queryable } from './pg-helpers.js';

export class PgVoteRepository implements IVoteRepository {
  constructor(private readonly db: Queryable) {}

  async find(entryId: string, voterId: string): Promise<VoteRow | null> {
    const result = await this.db.query<VoteRow>(
      'SELECT * FROM votes WHERE entry_id = $1 AND voter_id = $2',
      [entryId, voterId]
    );
    return firstOrNull(result);
  }

  async insert(row: { entry_id: string; voter_id: string; polarity: VotePolarity }): Promise<VoteRow> {
    const result = await this.db.query<VoteRow>(
      `INSERT INTO votes (entry_id, voter_id, polarity)
       VALUES ($1, $2, $3)
       RETURNING *`,
      [row.entry_id, row.voter_id, row.polarity]
    );
    return firstOrThrow(result, 'Failed to insert vote');
  }

  async updatePolarity(id: string, polarity: VotePolarity): Promise<VoteRow> {
    const result = await this.db.query<VoteRow>(
      'UPDATE votes SET polarity = $2, updated_at = now() WHERE id = $1 RETURNING *',
      [id, polarity]
    );
    return firstOrThrow(result, `Failed to update vote ${id}`);
  }

  async delete(id: string): Promise<void> {
    await this.db.query('DELETE FROM votes WHERE id = $1', [id]);
  }

  async countByPolarity(entryId: string): Promise<{ upvotes: number; downvotes: number }> {
    const result = await this.db.query<{ upvotes: number; downvotes: number }>(
      `SELECT count(*) FILTER (WHERE polarity = 1)::int AS upvotes,
              count(*) FILTER (WHERE polarity = -1)::int AS downvotes
       FROM votes WHERE entry_id = $1`,
      [entryId]
    );
    return result.rows[0] ?? { upvotes: 0, downvotes: 0 };
  }
}
