/**
 * Domain models — core entities as the application understands them.
 * Decoupled from both API shapes and database row shapes.
 */

// ── Dictionary ──

export type EntryType = 'word' | 'phrase' | 'idiom' | 'proverb';

export const ENTRY_TYPES: readonly EntryType[] = ['word', 'phrase', 'idiom', 'proverb'];

export type EntryStatus = 'pending' | 'verified' | 'rejected' | 'needs_revision';

export type VotePolarity = 1 | -1;

export type VerificationClassification = 'accurate' | 'needs_revision' | 'incorrect';

export const VERIFICATION_CLASSIFICATIONS: readonly VerificationClassification[] = [
  'accurate',
  'needs_revision',
  'incorrect',
];

// ── Gamification ──

/** Closed set of point transaction kinds. See gamification/rewards.ts for amounts. */
export type TransactionKind =
  | 'contribution'
  | 'verification'
  | 'vote'
  | 'vote_received'
  | 'vote_changed'
  | 'vote_removed'
  | 'daily_bonus'
  | 'achievement'
  | 'penalty'
  | 'contribution_verified'
  | 'verification_received';

export type UserLevel =
  | 'beginner'
  | 'contributor'
  | 'expert'
  | 'master'
  | 'legend'
  | 'champion';

export type BadgeType = 'contribution' | 'verification' | 'streak' | 'special';

/** Custom predicates for badges that are not plain thresholds. */
export type SpecialBadgeRule =
  | 'first_contribution'
  | 'helpful_verifier'
  | 'community_hero'
  | 'streak_master'
  | 'early_adopter'
  | 'popular_contributor';

// ── Users ──

/**
 * The authenticated caller. Owned by the external auth component;
 * the counters are denormalized from the ledgers.
 */
export interface User {
  id: string;
  displayName: string;
  isModerator: boolean;
  points: number;
  level: UserLevel;
  contributionsCount: number;
  verificationsCount: number;
  joinedAt: Date;
}
