/**
 * User data access. Users are provisioned by the auth component; this
 * repository only reads them and maintains their denormalized counters.
 */

import type { UserRow } from '../types/database.js';
import type { PaginationOptions } from '../types/common.js';

export interface CounterDelta {
  contributions?: number;
  verifications?: number;
}

export interface IUserRepository {
  findById(id: string): Promise<UserRow | null>;

  /** Locks the user row until the transaction ends. */
  findByIdForUpdate(id: string): Promise<UserRow | null>;

  findByApiKeyHash(hash: string): Promise<UserRow | null>;

  /** Atomically add `delta` to the stored balance and return the new row. */
  adjustPoints(id: string, delta: number): Promise<UserRow>;

  adjustCounters(id: string, delta: CounterDelta): Promise<UserRow>;

  update(
    id: string,
    data: Partial<Pick<UserRow, 'points' | 'level' | 'contributions_count' | 'verifications_count'>>
  ): Promise<UserRow>;

  /** Stable ordering by id, for batch jobs. */
  list(options: PaginationOptions): Promise<UserRow[]>;
}
