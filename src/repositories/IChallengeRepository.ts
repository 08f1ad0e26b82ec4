/**
 * Daily challenges.
 */

import type { DailyChallengeRow } from '../types/database.js';

export interface IChallengeRepository {
  findById(id: string): Promise<DailyChallengeRow | null>;

  /** The active challenge for a calendar day (YYYY-MM-DD), if any. */
  findActiveByDate(day: string): Promise<DailyChallengeRow | null>;
}
