/**
 * Database row types — mirror the Postgres table schemas in db/migrations.
 * Kept separate so the database can evolve independently of domain models.
 * Column names use snake_case to match PostgreSQL conventions.
 */

import type {
  BadgeType,
  EntryStatus,
  EntryType,
  SpecialBadgeRule,
  TransactionKind,
  UserLevel,
  VerificationClassification,
  VotePolarity,
} from './models.js';

// ── Dictionary ──

export interface EntryRow {
  id: string;
  kolokwa_text: string;
  english_translation: string;
  literal_translation: string | null;
  entry_type: EntryType;
  context_explanation: string | null;
  example_kolokwa: string | null;
  example_english: string | null;
  cultural_notes: string | null;
  pronunciation_guide: string | null;
  region: string | null;
  tags: string[];
  status: EntryStatus;
  upvotes: number;
  downvotes: number;
  /** Count of `accurate` verifications only. */
  verification_count: number;
  contributor_id: string | null;
  created_at: string;
  updated_at: string;
  verified_at: string | null;
  deleted_at: string | null;
}

/** Columns a contributor supplies. Everything else is owned by the engine. */
export type EntryContent = Pick<
  EntryRow,
  | 'kolokwa_text'
  | 'english_translation'
  | 'literal_translation'
  | 'entry_type'
  | 'context_explanation'
  | 'example_kolokwa'
  | 'example_english'
  | 'cultural_notes'
  | 'pronunciation_guide'
  | 'region'
  | 'tags'
>;

export interface ScoredEntryRow extends EntryRow {
  similarity: number;
}

export interface VoteRow {
  id: string;
  entry_id: string;
  voter_id: string;
  polarity: VotePolarity;
  created_at: string;
  updated_at: string;
}

export interface VerificationRow {
  id: string;
  entry_id: string;
  verifier_id: string;
  classification: VerificationClassification;
  comment: string;
  created_at: string;
  updated_at: string;
}

// ── Users & Gamification ──

export interface UserRow {
  id: string;
  display_name: string;
  api_key_hash: string;
  is_moderator: boolean;
  points: number;
  level: UserLevel;
  contributions_count: number;
  verifications_count: number;
  joined_at: string;
}

export interface PointTransactionRow {
  id: string;
  user_id: string;
  points: number;
  kind: TransactionKind;
  description: string;
  /** Unique when present; a second grant with the same key is dropped. */
  idempotency_key: string | null;
  created_at: string;
}

export interface BadgeRow {
  id: string;
  name: string;
  description: string;
  badge_type: BadgeType;
  special_rule: SpecialBadgeRule | null;
  points_required: number;
  contributions_required: number;
  verifications_required: number;
}

export interface UserBadgeRow {
  user_id: string;
  badge_id: string;
  earned_at: string;
}

export interface UserStreakRow {
  user_id: string;
  current_streak: number;
  longest_streak: number;
  /** Calendar day (UTC) in YYYY-MM-DD form. */
  last_contribution_date: string | null;
  accepted_challenge_id: string | null;
  accepted_challenge_date: string | null;
  completed_challenge_id: string | null;
  completed_challenge_date: string | null;
}

export interface DailyChallengeRow {
  id: string;
  title: string;
  description: string;
  points_reward: number;
  target_count: number;
  challenge_date: string;
  is_active: boolean;
}
