/**
 * pg implementation of IStreakRepository.
 */

import type { IStreakRepository } from './IStreakRepository.js';
import type { UserStreakRow } from '../types/database.js';
import { firstOrNull, firstOrThrow, type Queryable } from './pg-helpers.js';

export class PgStreakRepository implements IStreakRepository {
  constructor(private readonly db: Queryable) {}

  async find(userId: string): Promise<UserStreakRow | null> {
    const result = await this.db.query<UserStreakRow>(
      'SELECT * FROM user_streaks WHERE user_id = $1 FOR UPDATE',
      [userId]
    );
    return firstOrNull(result);
  }

  async save(row: UserStreakRow): Promise<UserStreakRow> {
    const result = await this.db.query<UserStreakRow>(
      `INSERT INTO user_streaks (
         user_id, current_streak, longest_streak, last_contribution_date,
         accepted_challenge_id, accepted_challenge_date,
         completed_challenge_id, completed_challenge_date
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (user_id) DO UPDATE SET
         current_streak = EXCLUDED.current_streak,
         longest_streak = EXCLUDED.longest_streak,
         last_contribution_date = EXCLUDED.last_contribution_date,
         accepted_challenge_id = EXCLUDED.accepted_challenge_id,
         accepted_challenge_date = EXCLUDED.accepted_challenge_date,
         completed_challenge_id = EXCLUDED.completed_challenge_id,
         completed_challenge_date = EXCLUDED.completed_challenge_date
       RETURNING *`,
      [
        row.user_id,
        row.current_streak,
        row.longest_streak,
        row.last_contribution_date,
        row.accepted_challenge_id,
        row.accepted_challenge_date,
        row.completed_challenge_id,
        row.completed_challenge_date,
      ]
    );
    return firstOrThrow(result, `Failed to save streak for user ${row.user_id}`);
  }
}
