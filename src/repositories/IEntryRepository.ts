/**
 * Dictionary entry data access (write side).
 * Methods run inside the caller's transaction; `findByIdForUpdate` takes a row
 * lock so concurrent votes and verifications on one entry serialize.
 */

import type { EntryContent, EntryRow } from '../types/database.js';
import type { PaginationOptions } from '../types/common.js';

export interface VoteCounterDelta {
  upvotes: number;
  downvotes: number;
}

/** Columns callers may set through `update`. Vote counters have their own method. */
export type EntryChanges = Partial<Omit<EntryRow, 'id' | 'created_at' | 'upvotes' | 'downvotes'>>;

export interface IEntryRepository {
  insert(row: EntryContent & { contributor_id: string }): Promise<EntryRow>;

  /** Includes soft-deleted rows; callers decide visibility. */
  findById(id: string): Promise<EntryRow | null>;

  /** Same as findById, but locks the row until the transaction ends. */
  findByIdForUpdate(id: string): Promise<EntryRow | null>;

  /** Case-insensitive match on kolokwa_text among non-rejected, non-deleted entries. */
  findActiveByText(kolokwaText: string): Promise<EntryRow[]>;

  update(id: string, data: EntryChanges): Promise<EntryRow>;

  /** Apply counter deltas atomically. Counters never go below zero. */
  adjustVoteCounters(id: string, delta: VoteCounterDelta): Promise<EntryRow>;

  /** Non-deleted entries contributed by a user. */
  countByContributor(userId: string): Promise<number>;

  /** Non-deleted entries by a user with at least `minUpvotes` upvotes. */
  countPopularByContributor(userId: string, minUpvotes: number): Promise<number>;

  /** Stable ordering by id, for batch jobs. */
  list(options: PaginationOptions): Promise<EntryRow[]>;
}
