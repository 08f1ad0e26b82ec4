/**
 * Streak tracker.
 * Advances a user's daily streak on qualifying activity and pays the
 * periodic streak bonus through the point ledger.
 */

import type { UnitOfWork } from '../repositories/IUnitOfWork.js';
import type { UserStreakRow } from '../types/database.js';
import type { EngineConfig } from '../config.js';
import type { PointLedgerService } from './PointLedgerService.js';
import { advanceStreak, streakBonusDue, toDay, type StreakState } from '../gamification/streaks.js';

export function emptyStreak(userId: string): UserStreakRow {
  return {
    user_id: userId,
    current_streak: 0,
    longest_streak: 0,
    last_contribution_date: null,
    accepted_challenge_id: null,
    accepted_challenge_date: null,
    completed_challenge_id: null,
    completed_challenge_date: null,
  };
}

export class StreakService {
  constructor(
    private readonly ledger: PointLedgerService,
    private readonly config: EngineConfig
  ) {}

  /** Returns the new state, or null if today was already counted. */
  async touch(uow: UnitOfWork, userId: string): Promise<StreakState | null> {
    const today = toDay(new Date());
    const row = (await uow.streaks.find(userId)) ?? emptyStreak(userId);

    const next = advanceStreak(
      {
        current: row.current_streak,
        longest: row.longest_streak,
        lastDay: row.last_contribution_date,
      },
      today
    );
    if (!next) return null;

    await uow.streaks.save({
      ...row,
      current_streak: next.current,
      longest_streak: next.longest,
      last_contribution_date: today,
    });

    if (streakBonusDue(next.current, this.config.streakBonusEvery)) {
      await this.ledger.award(uow, userId, {
        kind: 'achievement',
        source: { type: 'streak', days: next.current, day: today },
      });
    }

    return next;
  }
}
