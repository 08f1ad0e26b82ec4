/**
 * In-memory IUserRepository over MockDatabase.
 */

import type { CounterDelta, IUserRepository } from '../../src/repositories/IUserRepository.js';
import type { UserRow } from '../../src/types/database.js';
import type { PaginationOptions } from '../../src/types/common.js';
import type { MockDatabase } from './MockDatabase.js';

export class MockUserRepository implements IUserRepository {
  constructor(private readonly db: MockDatabase) {}

  async findById(id: string): Promise<UserRow | null> {
    const row = this.db.tables.users.get(id);
    return row ? { ...row } : null;
  }

  async findByIdForUpdate(id: string): Promise<UserRow | null> {
    return this.findById(id);
  }

  async findByApiKeyHash(hash: string): Promise<UserRow | null> {
    const row = [...this.db.tables.users.values()].find((u) => u.api_key_hash === hash);
    return row ? { ...row } : null;
  }

  async adjustPoints(id: string, delta: number): Promise<UserRow> {
    const user = this.require(id);
    return this.save({ ...user, points: user.points + delta });
  }

  async adjustCounters(id: string, delta: CounterDelta): Promise<UserRow> {
    const user = this.require(id);
    return this.save({
      ...user,
      contributions_count: Math.max(user.contributions_count + (delta.contributions ?? 0), 0),
      verifications_count: Math.max(user.verifications_count + (delta.verifications ?? 0), 0),
    });
  }

  async update(
    id: string,
    data: Partial<Pick<UserRow, 'points' | 'level' | 'contributions_count' | 'verifications_count'>>
  ): Promise<UserRow> {
    return this.save({ ...this.require(id), ...data });
  }

  async list(options: PaginationOptions): Promise<UserRow[]> {
    return [...this.db.tables.users.values()]
      .sort((a, b) => a.id.localeCompare(b.id))
      .slice(options.offset, options.offset + options.limit)
      .map((u) => ({ ...u }));
  }

  private require(id: string): UserRow {
    const row = this.db.tables.users.get(id);
    if (!row) throw new Error(`User ${id} not found`);
    return row;
  }

  private save(row: UserRow): UserRow {
    this.db.tables.users.set(row.id, row);
    return { ...row };
  }
}
