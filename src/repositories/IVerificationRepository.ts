/**
 * Verification ledger data access. One row per (entry, verifier).
 */

import type { VerificationRow } from '../types/database.js';
import type { VerificationClassification } from '../types/models.js';
import type { VerificationTally } from '../gamification/entry-state.js';

export interface UpsertVerificationInput {
  entry_id: string;
  verifier_id: string;
  classification: VerificationClassification;
  comment: string;
}

export interface IVerificationRepository {
  find(entryId: string, verifierId: string): Promise<VerificationRow | null>;

  /** Insert or overwrite classification/comment. `created` is false on overwrite. */
  upsert(input: UpsertVerificationInput): Promise<{ row: VerificationRow; created: boolean }>;

  /** Count of rows per classification for an entry. */
  tally(entryId: string): Promise<VerificationTally>;

  countByVerifier(userId: string): Promise<number>;

  findByEntry(entryId: string): Promise<VerificationRow[]>;
}
