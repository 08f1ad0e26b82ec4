/**
 * Badge catalogue and grants.
 */

import type { BadgeRow } from '../types/database.js';

export interface IBadgeRepository {
  /** Badges the user has not earned yet, ordered by points_required. */
  findUnearned(userId: string): Promise<BadgeRow[]>;

  /** Record a grant. Returns false if the user already holds the badge. */
  grant(userId: string, badgeId: string): Promise<boolean>;
}
