/**
 * Supabase implementation of IDictionaryRepository.
 * Uses pgvector (through the `match_entries` RPC) for semantic search.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  EarnedBadgeRow,
  IDictionaryRepository,
  LeaderboardSourceRow,
  UserSummaryRow,
} from './IDictionaryRepository.js';
import type {
  EntryRow,
  ScoredEntryRow,
  UserRow,
  UserStreakRow,
} from '../types/database.js';
import type { EntryStatus } from '../types/models.js';
import type { PaginationOptions } from '../types/common.js';
import type { SearchLanguage } from '../types/api.js';

export class SupabaseDictionaryRepository implements IDictionaryRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findEntry(id: string): Promise<EntryRow | null> {
    const { data, error } = await this.db
      .from('entries')
      .select('*')
      .eq('id', id)
      .is('deleted_at', null)
      .maybeSingle();

    if (error) throw new Error(`Failed to find entry: ${error.message}`);
    return data as EntryRow | null;
  }

  async findUserSummaries(ids: string[]): Promise<UserSummaryRow[]> {
    if (ids.length === 0) return [];

    const { data, error } = await this.db
      .from('users')
      .select('id, display_name, level')
      .in('id', ids);

    if (error) throw new Error(`Failed to find users: ${error.message}`);
    return (data ?? []) as UserSummaryRow[];
  }

  async searchText(
    query: string,
    language: SearchLanguage,
    limit: number
  ): Promise<EntryRow[]> {
    const pattern = `%${escapePattern(query)}%`;

    let builder = this.db
      .from('entries')
      .select('*')
      .eq('status', 'verified')
      .is('deleted_at', null);

    if (language === 'ko') {
      builder = builder.ilike('kolokwa_text', pattern);
    } else if (language === 'en') {
      builder = builder.ilike('english_translation', pattern);
    } else {
      builder = builder.or(
        `kolokwa_text.ilike.${pattern},english_translation.ilike.${pattern}`
      );
    }

    const { data, error } = await builder
      .order('verification_count', { ascending: false })
      .order('upvotes', { ascending: false })
      .limit(limit);

    if (error) throw new Error(`Failed to search entries: ${error.message}`);
    return (data ?? []) as EntryRow[];
  }

  async matchEntries(
    embedding: number[],
    threshold: number,
    limit: number
  ): Promise<ScoredEntryRow[]> {
    const { data, error } = await this.db.rpc('match_entries', {
      query_embedding: JSON.stringify(embedding),
      match_threshold: threshold,
      match_count: limit,
    });

    if (error) throw new Error(`Failed to match entries: ${error.message}`);
    return (data ?? []) as ScoredEntryRow[];
  }

  async listByStatus(
    status: EntryStatus,
    options: PaginationOptions
  ): Promise<EntryRow[]> {
    const { data, error } = await this.db
      .from('entries')
      .select('*')
      .eq('status', status)
      .is('deleted_at', null)
      .order('created_at', { ascending: true })
      .range(options.offset, options.offset + options.limit - 1);

    if (error) throw new Error(`Failed to list entries: ${error.message}`);
    return (data ?? []) as EntryRow[];
  }

  async countByStatus(status: EntryStatus): Promise<number> {
    const { count, error } = await this.db
      .from('entries')
      .select('*', { count: 'exact', head: true })
      .eq('status', status)
      .is('deleted_at', null);

    if (error) throw new Error(`Failed to count entries: ${error.message}`);
    return count ?? 0;
  }

  async leaderboard(limit: number): Promise<LeaderboardSourceRow[]> {
    const { data, error } = await this.db.rpc('leaderboard', { p_limit: limit });

    if (error) throw new Error(`Failed to load leaderboard: ${error.message}`);
    return (data ?? []) as LeaderboardSourceRow[];
  }

  async findUser(id: string): Promise<UserRow | null> {
    const { data, error } = await this.db
      .from('users')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find user: ${error.message}`);
    return data as UserRow | null;
  }

  async findUserByApiKeyHash(hash: string): Promise<UserRow | null> {
    const { data, error } = await this.db
      .from('users')
      .select('*')
      .eq('api_key_hash', hash)
      .maybeSingle();

    if (error) throw new Error(`Failed to find user: ${error.message}`);
    return data as UserRow | null;
  }

  async findStreak(userId: string): Promise<UserStreakRow | null> {
    const { data, error } = await this.db
      .from('user_streaks')
      .select('*')
      .eq('user_id', userId)
      .maybeSingle();

    if (error) throw new Error(`Failed to find streak: ${error.message}`);
    return data as UserStreakRow | null;
  }

  async findEarnedBadges(userId: string): Promise<EarnedBadgeRow[]> {
    const { data, error } = await this.db
      .from('user_badges')
      .select('earned_at, badge:badges(*)')
      .eq('user_id', userId)
      .order('earned_at', { ascending: true });

    if (error) throw new Error(`Failed to find badges: ${error.message}`);
    return (data ?? []) as EarnedBadgeRow[];
  }

  async saveEmbedding(entryId: string, embedding: number[]): Promise<void> {
    const { error } = await this.db.from('entry_embeddings').upsert(
      {
        entry_id: entryId,
        embedding: JSON.stringify(embedding),
        updated_at: new Date().toISOString(),
      },
      { onConflict: 'entry_id' }
    );

    if (error) throw new Error(`Failed to save embedding: ${error.message}`);
  }
}

/** Neutralize LIKE wildcards and PostgREST filter syntax in user input. */
export function escapePattern(input: string): string {
  return input.replace(/[%_\\]/g, (c) => `\\${c}`).replace(/[,()]/g, ' ');
}
