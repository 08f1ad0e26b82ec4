/**
 * In-memory IBadgeRepository over MockDatabase.
 */

import type { IBadgeRepository } from '../../src/repositories/IBadgeRepository.js';
import type { BadgeRow } from '../../src/types/database.js';
import type { MockDatabase } from './MockDatabase.js';

export class MockBadgeRepository implements IBadgeRepository {
  constructor(private readonly db: MockDatabase) {}

  async findUnearned(userId: string): Promise<BadgeRow[]> {
    const held = new Set(
      this.db.tables.userBadges.filter((ub) => ub.user_id === userId).map((ub) => ub.badge_id)
    );
    return [...this.db.tables.badges.values()]
      .filter((b) => !held.has(b.id))
      .sort((a, b) => a.points_required - b.points_required || a.name.localeCompare(b.name))
      .map((b) => ({ ...b }));
  }

  async grant(userId: string, badgeId: string): Promise<boolean> {
    const held = this.db.tables.userBadges.some(
      (ub) => ub.user_id === userId && ub.badge_id === badgeId
    );
    if (held) return false;

    this.db.tables.userBadges.push({
      user_id: userId,
      badge_id: badgeId,
      earned_at: new Date().toISOString(),
    });
    return true;
  }
}
