/**
 * User service.
 * Resolves API keys to users and builds profiles. Accounts themselves are
 * provisioned by the external auth component.
 */

import { createHash } from 'node:crypto';
import type { IDictionaryRepository } from '../repositories/IDictionaryRepository.js';
import type { User } from '../types/models.js';
import type { UserProfileResponse } from '../types/api.js';
import { NotFoundError, UnauthorizedError } from '../errors.js';
import { levelInfo } from '../gamification/levels.js';
import { toUser } from './mappers.js';

export function hashApiKey(apiKey: string): string {
  return createHash('sha256').update(apiKey).digest('hex');
}

export class UserService {
  constructor(private readonly dictionary: IDictionaryRepository) {}

  async authenticate(apiKey: string): Promise<User> {
    if (!apiKey) {
      throw new UnauthorizedError();
    }

    const row = await this.dictionary.findUserByApiKeyHash(hashApiKey(apiKey));
    if (!row) {
      throw new UnauthorizedError('Invalid API key');
    }
    return toUser(row);
  }

  async getProfile(userId: string): Promise<UserProfileResponse> {
    const user = await this.dictionary.findUser(userId);
    if (!user) {
      throw new NotFoundError(`User "${userId}" not found`);
    }

    const [streak, badges] = await Promise.all([
      this.dictionary.findStreak(userId),
      this.dictionary.findEarnedBadges(userId),
    ]);

    return {
      id: user.id,
      displayName: user.display_name,
      points: user.points,
      level: levelInfo(user.points),
      contributionsCount: user.contributions_count,
      verificationsCount: user.verifications_count,
      streak: {
        current: streak?.current_streak ?? 0,
        longest: streak?.longest_streak ?? 0,
        lastContributionDate: streak?.last_contribution_date ?? null,
      },
      badges: badges.map(({ badge, earned_at }) => ({
        id: badge.id,
        name: badge.name,
        description: badge.description,
        earnedAt: earned_at,
      })),
      joinedAt: user.joined_at,
    };
  }
}
