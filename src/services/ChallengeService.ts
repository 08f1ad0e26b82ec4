/**
 * Daily challenges.
 * A user accepts today's challenge, then completes it for a one-time
 * `daily_bonus`. Completing also counts toward the user's streak.
 */

import type { ITransactionManager, UnitOfWork } from '../repositories/IUnitOfWork.js';
import type { DailyChallengeRow, UserStreakRow } from '../types/database.js';
import type { ChallengeCompletion, ChallengeResponse } from '../types/api.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { PointLedgerService } from './PointLedgerService.js';
import { emptyStreak, type StreakService } from './StreakService.js';
import { toDay } from '../gamification/streaks.js';
import { ConflictError, NotFoundError, ValidationError } from '../errors.js';

function toChallengeResponse(
  challenge: DailyChallengeRow,
  streak: UserStreakRow | null,
  today: string
): ChallengeResponse {
  return {
    id: challenge.id,
    title: challenge.title,
    description: challenge.description,
    pointsReward: challenge.points_reward,
    challengeDate: challenge.challenge_date,
    accepted:
      streak?.accepted_challenge_id === challenge.id && streak.accepted_challenge_date === today,
    completed:
      streak?.completed_challenge_id === challenge.id && streak.completed_challenge_date === today,
  };
}

export class ChallengeService {
  constructor(
    private readonly tx: ITransactionManager,
    private readonly ledger: PointLedgerService,
    private readonly streaks: StreakService,
    private readonly logger: ILogProvider
  ) {}

  async today(userId: string): Promise<ChallengeResponse> {
    const today = toDay(new Date());

    return this.tx.run(async (uow) => {
      const challenge = await uow.challenges.findActiveByDate(today);
      if (!challenge) {
        throw new NotFoundError('No challenge available for today');
      }
      const streak = await uow.streaks.find(userId);
      return toChallengeResponse(challenge, streak, today);
    });
  }

  async accept(challengeId: string, userId: string): Promise<ChallengeResponse> {
    const today = toDay(new Date());

    return this.tx.run(async (uow) => {
      const challenge = await this.findTodays(uow, challengeId, today);
      const streak = (await uow.streaks.find(userId)) ?? emptyStreak(userId);

      if (streak.accepted_challenge_id === challenge.id && streak.accepted_challenge_date === today) {
        throw new ConflictError('CONFLICT', 'You have already accepted this challenge today.');
      }

      const saved = await uow.streaks.save({
        ...streak,
        accepted_challenge_id: challenge.id,
        accepted_challenge_date: today,
      });
      return toChallengeResponse(challenge, saved, today);
    });
  }

  async complete(challengeId: string, userId: string): Promise<ChallengeCompletion> {
    const today = toDay(new Date());

    const result = await this.tx.run(async (uow) => {
      const challenge = await this.findTodays(uow, challengeId, today);
      const streak = (await uow.streaks.find(userId)) ?? emptyStreak(userId);

      if (streak.accepted_challenge_id !== challenge.id || streak.accepted_challenge_date !== today) {
        throw new ValidationError('You have not accepted this challenge today.');
      }
      if (streak.completed_challenge_id === challenge.id && streak.completed_challenge_date === today) {
        throw new ConflictError('CONFLICT', 'You have already completed this challenge today.');
      }

      await uow.streaks.save({
        ...streak,
        completed_challenge_id: challenge.id,
        completed_challenge_date: today,
      });
      await this.streaks.touch(uow, userId);
      const transaction = await this.ledger.award(uow, userId, {
        kind: 'daily_bonus',
        challenge: {
          id: challenge.id,
          title: challenge.title,
          pointsReward: challenge.points_reward,
        },
      });

      const saved = await uow.streaks.find(userId);
      return {
        challenge: toChallengeResponse(challenge, saved, today),
        pointsAwarded: transaction?.points ?? 0,
      };
    });

    this.logger.info('Challenge completed', {
      challengeId,
      userId,
      pointsAwarded: result.pointsAwarded,
    });

    return {
      ...result,
      message: `Challenge "${result.challenge.title}" completed! Points awarded.`,
    };
  }

  private async findTodays(
    uow: UnitOfWork,
    challengeId: string,
    today: string
  ): Promise<DailyChallengeRow> {
    const challenge = await uow.challenges.findById(challengeId);
    if (!challenge || !challenge.is_active) {
      throw new NotFoundError(`Challenge "${challengeId}" not found`);
    }
    if (challenge.challenge_date !== today) {
      throw new ValidationError('This challenge is not available today.');
    }
    return challenge;
  }
}
