/**
 * Badge evaluator.
 * One pass checks every badge the user does not hold against a stats
 * snapshot taken at the start of the pass, grants the ones that qualify, and
 * returns them. Bonus points for the new badges are issued by the caller
 * (PointLedgerService), tagged `achievement`, which never re-enters here.
 */

import type { UnitOfWork } from '../repositories/IUnitOfWork.js';
import type { BadgeRow } from '../types/database.js';
import type { EngineConfig } from '../config.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { needsPopularity, qualifies, type BadgeStats } from '../gamification/badges.js';
import { NotFoundError } from '../errors.js';

export class BadgeService {
  constructor(
    private readonly config: EngineConfig,
    private readonly logger: ILogProvider
  ) {}

  async evaluate(uow: UnitOfWork, userId: string): Promise<BadgeRow[]> {
    const candidates = await uow.badges.findUnearned(userId);
    if (candidates.length === 0) return [];

    const stats = await this.snapshot(uow, userId, candidates);
    const now = new Date();
    const earned: BadgeRow[] = [];

    for (const badge of candidates) {
      if (!qualifies(badge, stats, this.config, now)) continue;

      // grant() is false when a concurrent pass got there first
      if (await uow.badges.grant(userId, badge.id)) {
        earned.push(badge);
        this.logger.info('Badge granted', { userId, badgeId: badge.id, badge: badge.name });
      }
    }

    return earned;
  }

  private async snapshot(
    uow: UnitOfWork,
    userId: string,
    candidates: BadgeRow[]
  ): Promise<BadgeStats> {
    const user = await uow.users.findById(userId);
    if (!user) throw new NotFoundError(`User "${userId}" not found`);

    const streak = await uow.streaks.find(userId);
    const popularEntries = needsPopularity(candidates)
      ? await uow.entries.countPopularByContributor(userId, this.config.popularEntryUpvotes)
      : 0;

    return {
      points: user.points,
      contributionsCount: user.contributions_count,
      verificationsCount: user.verifications_count,
      longestStreak: streak?.longest_streak ?? 0,
      joinedAt: new Date(user.joined_at),
      popularEntries,
    };
  }
}
