/**
 * pg implementation of IVerificationRepository.
 */

import type {
  IVerificationRepository,
  UpsertVerificationInput,
} from './IVerificationRepository.js';
import type { VerificationRow } from '../types/database.js';
import type { VerificationTally } from '../gamification/entry-state.js';
import { firstOrNull, firstOrThrow, type Queryable } from './pg-helpers.js';

export class PgVerificationRepository implements IVerificationRepository {
  constructor(private readonly db: Queryable) {}

  async find(entryId: string, verifierId: string): Promise<VerificationRow | null> {
    const result = await this.db.query<VerificationRow>(
      'SELECT * FROM verifications WHERE entry_id = $1 AND verifier_id = $2',
      [entryId, verifierId]
    );
    return firstOrNull(result);
  }

  async upsert(
    input: UpsertVerificationInput
  ): Promise<{ row: VerificationRow; created: boolean }> {
    // xmax = 0 only for a freshly inserted tuple
    const result = await this.db.query<VerificationRow & { inserted: boolean }>(
      `INSERT INTO verifications (entry_id, verifier_id, classification, comment)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (entry_id, verifier_id) DO UPDATE
         SET classification = EXCLUDED.classification,
             comment = EXCLUDED.comment,
             updated_at = now()
       RETURNING *, (xmax = 0) AS inserted`,
      [input.entry_id, input.verifier_id, input.classification, input.comment]
    );
    const { inserted, ...row } = firstOrThrow(result, 'Failed to upsert verification');
    return { row, created: inserted };
  }

  async tally(entryId: string): Promise<VerificationTally> {
    const result = await this.db.query<VerificationTally>(
      `SELECT count(*) FILTER (WHERE classification = 'accurate')::int AS accurate,
              count(*) FILTER (WHERE classification = 'needs_revision')::int AS needs_revision,
              count(*) FILTER (WHERE classification = 'incorrect')::int AS incorrect
       FROM verifications WHERE entry_id = $1`,
      [entryId]
    );
    return result.rows[0] ?? { accurate: 0, needs_revision: 0, incorrect: 0 };
  }

  async countByVerifier(userId: string): Promise<number> {
    const result = await this.db.query<{ count: number }>(
      'SELECT count(*)::int AS count FROM verifications WHERE verifier_id = $1',
      [userId]
    );
    return result.rows[0]?.count ?? 0;
  }

  async findByEntry(entryId: string): Promise<VerificationRow[]> {
    const result = await this.db.query<VerificationRow>(
      'SELECT * FROM verifications WHERE entry_id = $1 ORDER BY created_at',
      [entryId]
    );
    return result.rows;
  }
}
