/**
 * pg implementation of IEntryRepository.
 */

import type { EntryChanges, IEntryRepository, VoteCounterDelta } from './IEntryRepository.js';
import type { EntryContent, EntryRow } from '../types/database.js';
import type { PaginationOptions } from '../types/common.js';
import { firstOrNull, firstOrThrow, setClause, type Queryable } from './pg-helpers.js';

export class PgEntryRepository implements IEntryRepository {
  constructor(private readonly db: Queryable) {}

  async insert(row: EntryContent & { contributor_id: string }): Promise<EntryRow> {
    const result = await this.db.query<EntryRow>(
      `INSERT INTO entries (
         kolokwa_text, english_translation, literal_translation, entry_type,
         context_explanation, example_kolokwa, example_english, cultural_notes,
         pronunciation_guide, region, tags, contributor_id
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
       RETURNING *`,
      [
        row.kolokwa_text,
        row.english_translation,
        row.literal_translation,
        row.entry_type,
        row.context_explanation,
        row.example_kolokwa,
        row.example_english,
        row.cultural_notes,
        row.pronunciation_guide,
        row.region,
        row.tags,
        row.contributor_id,
      ]
    );
    return firstOrThrow(result, 'Failed to insert entry');
  }

  async findById(id: string): Promise<EntryRow | null> {
    const result = await this.db.query<EntryRow>('SELECT * FROM entries WHERE id = $1', [id]);
    return firstOrNull(result);
  }

  async findByIdForUpdate(id: string): Promise<EntryRow | null> {
    const result = await this.db.query<EntryRow>(
      'SELECT * FROM entries WHERE id = $1 FOR UPDATE',
      [id]
    );
    return firstOrNull(result);
  }

  /**
   * Also takes a transaction-scoped advisory lock on the normalized text, so
   * two submissions of the same word serialize on the duplicate check.
   */
  async findActiveByText(kolokwaText: string): Promise<EntryRow[]> {
    await this.db.query('SELECT pg_advisory_xact_lock(hashtext(lower($1)))', [kolokwaText]);
    const result = await this.db.query<EntryRow>(
      `SELECT * FROM entries
       WHERE lower(kolokwa_text) = lower($1)
         AND status <> 'rejected'
         AND deleted_at IS NULL
       ORDER BY created_at`,
      [kolokwaText]
    );
    return result.rows;
  }

  async update(id: string, data: EntryChanges): Promise<EntryRow> {
    const set = setClause(data, 2);
    const assignments = set.sql ? `${set.sql}, updated_at = now()` : 'updated_at = now()';

    const result = await this.db.query<EntryRow>(
      `UPDATE entries SET ${assignments} WHERE id = $1 RETURNING *`,
      [id, ...set.values]
    );
    return firstOrThrow(result, `Failed to update entry ${id}`);
  }

  async adjustVoteCounters(id: string, delta: VoteCounterDelta): Promise<EntryRow> {
    const result = await this.db.query<EntryRow>(
      `UPDATE entries
       SET upvotes = GREATEST(upvotes + $2, 0),
           downvotes = GREATEST(downvotes + $3, 0)
       WHERE id = $1
       RETURNING *`,
      [id, delta.upvotes, delta.downvotes]
    );
    return firstOrThrow(result, `Failed to adjust votes on entry ${id}`);
  }

  async countByContributor(userId: string): Promise<number> {
    const result = await this.db.query<{ count: number }>(
      `SELECT count(*)::int AS count FROM entries
       WHERE contributor_id = $1 AND deleted_at IS NULL`,
      [userId]
    );
    return result.rows[0]?.count ?? 0;
  }

  async countPopularByContributor(userId: string, minUpvotes: number): Promise<number> {
    const result = await this.db.query<{ count: number }>(
      `SELECT count(*)::int AS count FROM entries
       WHERE contributor_id = $1 AND deleted_at IS NULL AND upvotes >= $2`,
      [userId, minUpvotes]
    );
    return result.rows[0]?.count ?? 0;
  }

  async list(options: PaginationOptions): Promise<EntryRow[]> {
    const result = await this.db.query<EntryRow>(
      'SELECT * FROM entries ORDER BY id LIMIT $1 OFFSET $2',
      [options.limit, options.offset]
    );
    return result.rows;
  }
}
