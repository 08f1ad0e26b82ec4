/**
 * Moderator actions: sending entries back for revision and point penalties.
 */

import type { ITransactionManager } from '../repositories/IUnitOfWork.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { User } from '../types/models.js';
import type { EntryResponse, PenaltyResult } from '../types/api.js';
import type { PointLedgerService } from './PointLedgerService.js';
import { nextStatus } from '../gamification/entry-state.js';
import { ConflictError, ForbiddenError, NotFoundError, ValidationError } from '../errors.js';
import { toEntryResponse } from './mappers.js';

const MAX_REASON_LENGTH = 500;

function assertModerator(user: User): void {
  if (!user.isModerator) {
    throw new ForbiddenError('Moderator access required');
  }
}

export class ModerationService {
  constructor(
    private readonly tx: ITransactionManager,
    private readonly ledger: PointLedgerService,
    private readonly logger: ILogProvider
  ) {}

  async requestRevision(entryId: string, moderator: User, note: string): Promise<EntryResponse> {
    assertModerator(moderator);

    const updated = await this.tx.run(async (uow) => {
      const entry = await uow.entries.findByIdForUpdate(entryId);
      if (!entry || entry.deleted_at) {
        throw new NotFoundError(`Entry "${entryId}" not found`);
      }

      const status = nextStatus(entry.status, 'request_revision');
      if (!status) {
        throw new ConflictError(
          'CONFLICT',
          `Only pending entries can be sent back for revision; this one is ${entry.status}`
        );
      }
      return uow.entries.update(entry.id, { status });
    });

    this.logger.info('Entry status changed', {
      entryId,
      event: 'request_revision',
      status: updated.status,
      moderatorId: moderator.id,
      note,
    });
    return toEntryResponse(updated, null);
  }

  async penalize(
    userId: string,
    moderator: User,
    points: unknown,
    reason: unknown
  ): Promise<PenaltyResult> {
    assertModerator(moderator);

    if (typeof points !== 'number' || !Number.isInteger(points) || points <= 0) {
      throw new ValidationError('points must be a positive integer');
    }
    if (typeof reason !== 'string' || reason.trim() === '') {
      throw new ValidationError('reason is required');
    }
    if (reason.length > MAX_REASON_LENGTH) {
      throw new ValidationError(`reason must be ${MAX_REASON_LENGTH} characters or less`);
    }
    const why = reason.trim();

    const user = await this.tx.run(async (uow) => {
      const target = await uow.users.findByIdForUpdate(userId);
      if (!target) {
        throw new NotFoundError(`User "${userId}" not found`);
      }
      await this.ledger.award(uow, userId, { kind: 'penalty', points, reason: why });

      const updated = await uow.users.findById(userId);
      if (!updated) throw new NotFoundError(`User "${userId}" not found`);
      return updated;
    });

    this.logger.warn('User penalized', {
      userId,
      moderatorId: moderator.id,
      points,
      reason: why,
    });

    return {
      userId,
      pointsDeducted: points,
      balance: user.points,
      level: user.level,
    };
  }
}
