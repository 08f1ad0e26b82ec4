/**
 * pg implementation of IChallengeRepository.
 */

import type { IChallengeRepository } from './IChallengeRepository.js';
import type { DailyChallengeRow } from '../types/database.js';
import { firstOrNull, type Queryable } from './pg-helpers.js';

export class PgChallengeRepository implements IChallengeRepository {
  constructor(private readonly db: Queryable) {}

  async findById(id: string): Promise<DailyChallengeRow | null> {
    const result = await this.db.query<DailyChallengeRow>(
      'SELECT * FROM daily_challenges WHERE id = $1',
      [id]
    );
    return firstOrNull(result);
  }

  async findActiveByDate(day: string): Promise<DailyChallengeRow | null> {
    const result = await this.db.query<DailyChallengeRow>(
      `SELECT * FROM daily_challenges
       WHERE challenge_date = $1 AND is_active
       ORDER BY id
       LIMIT 1`,
      [day]
    );
    return firstOrNull(result);
  }
}
