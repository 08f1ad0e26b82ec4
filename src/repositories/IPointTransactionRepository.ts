/**
 * Point ledger data access. Rows are immutable once written.
 */

import type { PointTransactionRow } from '../types/database.js';
import type { PaginationOptions } from '../types/common.js';

export interface IPointTransactionRepository {
  /**
   * Append a transaction. Returns null, writing nothing, when
   * `idempotency_key` is already taken.
   */
  insert(
    row: Omit<PointTransactionRow, 'id' | 'created_at'>
  ): Promise<PointTransactionRow | null>;

  existsByKey(idempotencyKey: string): Promise<boolean>;

  /** Ledger truth for a user's point balance. */
  sumByUser(userId: string): Promise<number>;

  findByUser(userId: string, options: PaginationOptions): Promise<PointTransactionRow[]>;
}
