/**
 * pg implementation of IBadgeRepository.
 */

import type { IBadgeRepository } from './IBadgeRepository.js';
import type { BadgeRow } from '../types/database.js';
import type { Queryable } from './pg-helpers.js';

export class PgBadgeRepository implements IBadgeRepository {
  constructor(private readonly db: Queryable) {}

  async findUnearned(userId: string): Promise<BadgeRow[]> {
    const result = await this.db.query<BadgeRow>(
      `SELECT b.* FROM badges b
       WHERE NOT EXISTS (
         SELECT 1 FROM user_badges ub WHERE ub.badge_id = b.id AND ub.user_id = $1
       )
       ORDER BY b.points_required, b.name`,
      [userId]
    );
    return result.rows;
  }

  async grant(userId: string, badgeId: string): Promise<boolean> {
    const result = await this.db.query(
      `INSERT INTO user_badges (user_id, badge_id)
       VALUES ($1, $2)
       ON CONFLICT (user_id, badge_id) DO NOTHING`,
      [userId, badgeId]
    );
    return result.rowCount === 1;
  }
}
