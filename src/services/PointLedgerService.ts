/**
 * Point ledger.
 * The only writer of point_transactions and users.points. Each award appends
 * one immutable row and moves the stored balance by the same amount inside the
 * caller's transaction, so the balance always equals the ledger sum.
 */

import type { UnitOfWork } from '../repositories/IUnitOfWork.js';
import type { BadgeRow, PointTransactionRow, UserRow } from '../types/database.js';
import type { EngineConfig } from '../config.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { BadgeService } from './BadgeService.js';
import { evaluatesBadges, priceGrant, type Grant } from '../gamification/rewards.js';
import { levelForPoints } from '../gamification/levels.js';

export class PointLedgerService {
  constructor(
    private readonly badges: BadgeService,
    private readonly config: EngineConfig,
    private readonly logger: ILogProvider
  ) {}

  /**
   * Issue a grant. Returns the ledger row, or null when the grant is worth
   * nothing or its idempotency key was already spent.
   */
  async award(uow: UnitOfWork, userId: string, grant: Grant): Promise<PointTransactionRow | null> {
    const priced = priceGrant(userId, grant, this.config);
    if (priced.points === 0) return null;

    const transaction = await uow.points.insert({
      user_id: userId,
      points: priced.points,
      kind: priced.kind,
      description: priced.description,
      idempotency_key: priced.idempotencyKey,
    });

    if (!transaction) {
      this.logger.debug('Duplicate grant skipped', {
        userId,
        kind: priced.kind,
        idempotencyKey: priced.idempotencyKey,
      });
      return null;
    }

    const user = await uow.users.adjustPoints(userId, priced.points);
    await this.relevel(uow, user);

    if (evaluatesBadges(priced.kind)) {
      await this.grantBadges(uow, userId);
    }

    return transaction;
  }

  /**
   * Run one badge pass and pay the bonus for each new badge. The bonuses are
   * `achievement` grants, so they do not start another pass.
   */
  async grantBadges(uow: UnitOfWork, userId: string): Promise<BadgeRow[]> {
    const earned = await this.badges.evaluate(uow, userId);
    for (const badge of earned) {
      await this.award(uow, userId, {
        kind: 'achievement',
        source: {
          type: 'badge',
          badgeId: badge.id,
          name: badge.name,
          pointsRequired: badge.points_required,
        },
      });
    }
    return earned;
  }

  /** Persist the level derived from the user's current balance, if it moved. */
  async relevel(uow: UnitOfWork, user: UserRow): Promise<UserRow> {
    const level = levelForPoints(user.points);
    if (level === user.level) return user;

    this.logger.info('Level changed', { userId: user.id, from: user.level, to: level });
    return uow.users.update(user.id, { level });
  }
}
