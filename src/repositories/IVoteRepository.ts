/**
 * Vote ledger data access. One row per (entry, voter).
 */

import type { VoteRow } from '../types/database.js';
import type { VotePolarity } from '../types/models.js';

export interface IVoteRepository {
  find(entryId: string, voterId: string): Promise<VoteRow | null>;

  insert(row: { entry_id: string; voter_id: string; polarity: VotePolarity }): Promise<VoteRow>;

  updatePolarity(id: string, polarity: VotePolarity): Promise<VoteRow>;

  delete(id: string): Promise<void>;

  /** Ledger truth for an entry's denormalized counters. */
  countByPolarity(entryId: string): Promise<{ upvotes: number; downvotes: number }>;
}
