/**
 * API types — shapes for request/response payloads.
 * Decoupled from domain models so the API can evolve independently.
 */

import type {
  EntryStatus,
  EntryType,
  UserLevel,
  VotePolarity,
} from './models.js';

// ── Requests ──

export interface SubmitEntryRequest {
  kolokwaText: string;
  englishTranslation: string;
  literalTranslation?: string;
  entryType?: EntryType;
  contextExplanation?: string;
  exampleKolokwa?: string;
  exampleEnglish?: string;
  culturalNotes?: string;
  pronunciationGuide?: string;
  region?: string;
  tags?: string[];
}

export type UpdateEntryRequest = Partial<SubmitEntryRequest>;

export type SearchLanguage = 'en' | 'ko' | 'auto';

export interface SearchRequest {
  query: string;
  language?: SearchLanguage;
  limit?: number;
}

// ── Responses ──

export interface ContributorSummary {
  id: string;
  displayName: string;
  level: UserLevel;
}

export interface EntryResponse {
  id: string;
  kolokwaText: string;
  englishTranslation: string;
  literalTranslation: string | null;
  entryType: EntryType;
  contextExplanation: string | null;
  exampleKolokwa: string | null;
  exampleEnglish: string | null;
  culturalNotes: string | null;
  pronunciationGuide: string | null;
  region: string | null;
  tags: string[];
  status: EntryStatus;
  upvotes: number;
  downvotes: number;
  verificationCount: number;
  score: number;
  contributor: ContributorSummary | null;
  createdAt: string;
  updatedAt: string;
  verifiedAt: string | null;
}

export type VoteAction = 'recorded' | 'removed' | 'changed';

export interface VoteResult {
  upvotes: number;
  downvotes: number;
  /** The caller's vote after this call; null after a toggle-off. */
  userVote: VotePolarity | null;
  action: VoteAction;
  message: string;
}

export interface VerificationResult {
  verificationCount: number;
  entryStatus: EntryStatus;
  message: string;
}

export interface SearchResponse {
  query: string;
  language: SearchLanguage;
  mode: 'semantic' | 'text';
  count: number;
  results: EntryResponse[];
}

export interface LevelInfo {
  current: { key: UserLevel; name: string; threshold: number };
  next: { key: UserLevel; name: string; threshold: number } | null;
  /** Percentage (0-100) of the way to the next level. */
  progress: number;
}

export interface EarnedBadge {
  id: string;
  name: string;
  description: string;
  earnedAt: string;
}

export interface UserProfileResponse {
  id: string;
  displayName: string;
  points: number;
  level: LevelInfo;
  contributionsCount: number;
  verificationsCount: number;
  streak: { current: number; longest: number; lastContributionDate: string | null };
  badges: EarnedBadge[];
  joinedAt: string;
}

export interface LeaderboardRow {
  rank: number;
  userId: string;
  displayName: string;
  points: number;
  level: UserLevel;
  verifiedContributions: number;
  badgesCount: number;
}

export interface ChallengeResponse {
  id: string;
  title: string;
  description: string;
  pointsReward: number;
  challengeDate: string;
  accepted: boolean;
  completed: boolean;
}

export interface ChallengeCompletion {
  challenge: ChallengeResponse;
  pointsAwarded: number;
  message: string;
}

export interface PenaltyResult {
  userId: string;
  pointsDeducted: number;
  balance: number;
  level: UserLevel;
}

// ── Errors ──

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'SELF_VERIFICATION'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'ALREADY_VERIFIED'
  | 'ALREADY_PENDING_OWN'
  | 'ALREADY_PENDING'
  | 'RATE_LIMITED'
  | 'DEPENDENCY_FAILED'
  | 'INTERNAL_ERROR';

export interface ApiErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}
