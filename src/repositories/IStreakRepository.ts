/**
 * Per-user streak and daily challenge state.
 */

import type { UserStreakRow } from '../types/database.js';

export interface IStreakRepository {
  find(userId: string): Promise<UserStreakRow | null>;

  /** Insert or replace the user's streak row. */
  save(row: UserStreakRow): Promise<UserStreakRow>;
}
