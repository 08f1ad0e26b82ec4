/**
 * Badge qualification rules.
 * Threshold badges are checked first (points, contributions, verifications);
 * badges with a `special_rule` fall through to the predicate table below.
 */

import type { EngineConfig } from '../config.js';
import type { BadgeRow } from '../types/database.js';
import type { SpecialBadgeRule } from '../types/models.js';

export interface BadgeStats {
  points: number;
  contributionsCount: number;
  verificationsCount: number;
  longestStreak: number;
  joinedAt: Date;
  /** Entries by this user with at least `popularEntryUpvotes` upvotes. */
  popularEntries: number;
}

type SpecialPredicate = (stats: BadgeStats, config: EngineConfig, now: Date) => boolean;

const ONE_YEAR_MS = 365 * 86_400_000;

const SPECIAL_RULES: Record<SpecialBadgeRule, SpecialPredicate> = {
  first_contribution: (s) => s.contributionsCount >= 1,
  helpful_verifier: (s) => s.verificationsCount >= 10,
  community_hero: (s) => s.contributionsCount >= 5 && s.verificationsCount >= 20,
  streak_master: (s) => s.longestStreak >= 30,
  early_adopter: (s, config, now) => {
    const cutoff = config.earlyAdopterCutoff ?? new Date(now.getTime() - ONE_YEAR_MS);
    return s.joinedAt.getTime() <= cutoff.getTime();
  },
  popular_contributor: (s, config) => s.popularEntries >= config.popularEntryCount,
};

export function qualifies(
  badge: BadgeRow,
  stats: BadgeStats,
  config: EngineConfig,
  now: Date
): boolean {
  if (badge.points_required > 0 && stats.points >= badge.points_required) return true;
  if (badge.contributions_required > 0 && stats.contributionsCount >= badge.contributions_required) {
    return true;
  }
  if (badge.verifications_required > 0 && stats.verificationsCount >= badge.verifications_required) {
    return true;
  }
  if (badge.special_rule) {
    return SPECIAL_RULES[badge.special_rule](stats, config, now);
  }
  return false;
}

export function needsPopularity(badges: BadgeRow[]): boolean {
  return badges.some((b) => b.special_rule === 'popular_contributor');
}
