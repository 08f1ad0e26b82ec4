/**
 * Dictionary read models and the embedding index.
 * Reads here are not transactional and may trail the write side slightly.
 */

import type {
  BadgeRow,
  EntryRow,
  ScoredEntryRow,
  UserRow,
  UserStreakRow,
} from '../types/database.js';
import type { EntryStatus } from '../types/models.js';
import type { PaginationOptions } from '../types/common.js';
import type { SearchLanguage } from '../types/api.js';

export type UserSummaryRow = Pick<UserRow, 'id' | 'display_name' | 'level'>;

export interface LeaderboardSourceRow {
  user_id: string;
  display_name: string;
  points: number;
  level: UserRow['level'];
  verified_contributions: number;
  badges_count: number;
}

export interface EarnedBadgeRow {
  badge: BadgeRow;
  earned_at: string;
}

export interface IDictionaryRepository {
  /** Non-deleted entry by id. */
  findEntry(id: string): Promise<EntryRow | null>;

  findUserSummaries(ids: string[]): Promise<UserSummaryRow[]>;

  /** Substring search over verified entries. */
  searchText(query: string, language: SearchLanguage, limit: number): Promise<EntryRow[]>;

  /** Nearest verified entries by embedding similarity. */
  matchEntries(embedding: number[], threshold: number, limit: number): Promise<ScoredEntryRow[]>;

  listByStatus(status: EntryStatus, options: PaginationOptions): Promise<EntryRow[]>;

  countByStatus(status: EntryStatus): Promise<number>;

  /** Users ordered by points, highest first. */
  leaderboard(limit: number): Promise<LeaderboardSourceRow[]>;

  findUser(id: string): Promise<UserRow | null>;

  findUserByApiKeyHash(hash: string): Promise<UserRow | null>;

  findStreak(userId: string): Promise<UserStreakRow | null>;

  findEarnedBadges(userId: string): Promise<EarnedBadgeRow[]>;

  saveEmbedding(entryId: string, embedding: number[]): Promise<void>;
}
