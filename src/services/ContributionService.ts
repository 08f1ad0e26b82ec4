/**
 * Contribution orchestrator.
 * Every user action that touches the ledgers runs here, in one transaction:
 * the domain mutation first (entry, vote, verification, counters), then the
 * reward stage (points, badges, streaks). A reward-stage failure is reported
 * as a DependencyError and rolls back the whole unit, so callers can retry.
 * Embedding updates are scheduled only after commit.
 */

import type { ITransactionManager, UnitOfWork } from '../repositories/IUnitOfWork.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { EntryRow } from '../types/database.js';
import type { User, VerificationClassification, VotePolarity } from '../types/models.js';
import { VERIFICATION_CLASSIFICATIONS } from '../types/models.js';
import type {
  EntryResponse,
  SubmitEntryRequest,
  UpdateEntryRequest,
  VerificationResult,
  VoteResult,
} from '../types/api.js';
import type { VoteService } from './VoteService.js';
import type { Reevaluation, VerificationService } from './VerificationService.js';
import type { PointLedgerService } from './PointLedgerService.js';
import type { StreakService } from './StreakService.js';
import type { EmbeddingSyncService } from './EmbeddingSyncService.js';
import { voteMessage } from './VoteService.js';
import { duplicateConflict, normalizeSubmission, normalizeUpdate } from './entry-input.js';
import { toEntryResponse } from './mappers.js';
import { entryRef, type PendingGrant } from '../gamification/rewards.js';
import { nextStatus } from '../gamification/entry-state.js';
import {
  AppError,
  DependencyError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from '../errors.js';

const MAX_COMMENT_LENGTH = 2000;

export class ContributionService {
  constructor(
    private readonly tx: ITransactionManager,
    private readonly votes: VoteService,
    private readonly verifications: VerificationService,
    private readonly ledger: PointLedgerService,
    private readonly streaks: StreakService,
    private readonly embeddings: EmbeddingSyncService,
    private readonly logger: ILogProvider
  ) {}

  async submitEntry(input: SubmitEntryRequest, user: User): Promise<EntryResponse> {
    const content = normalizeSubmission(input);

    const entry = await this.tx.run(async (uow) => {
      const existing = await uow.entries.findActiveByText(content.kolokwa_text);
      const conflict = duplicateConflict(existing, content.kolokwa_text, user.id);
      if (conflict) throw conflict;

      const created = await uow.entries.insert({ ...content, contributor_id: user.id });
      await uow.users.adjustCounters(user.id, { contributions: 1 });

      await this.rewardStage('submit_entry', created.id, async () => {
        await this.streaks.touch(uow, user.id);
        await this.ledger.award(uow, user.id, { kind: 'contribution', entry: entryRef(created) });
      });

      return created;
    });

    this.logger.info('Entry submitted', { entryId: entry.id, userId: user.id });

    return toEntryResponse(entry, {
      id: user.id,
      displayName: user.displayName,
      level: user.level,
    });
  }

  async castVote(entryId: string, user: User, polarity: unknown): Promise<VoteResult> {
    if (polarity !== 1 && polarity !== -1) {
      throw new ValidationError('polarity must be 1 or -1');
    }
    const vote: VotePolarity = polarity;

    const outcome = await this.tx.run(async (uow) => {
      const entry = await this.lockEntry(uow, entryId);
      if (entry.status === 'rejected') {
        throw new NotFoundError(`Entry "${entryId}" is not open for voting`);
      }

      const result = await this.votes.cast(uow, entry, user.id, vote);
      await this.rewardStage('cast_vote', entryId, () => this.issue(uow, result.grants));
      return result;
    });

    return {
      upvotes: outcome.entry.upvotes,
      downvotes: outcome.entry.downvotes,
      userVote: outcome.userVote,
      action: outcome.action,
      message: voteMessage(outcome.action),
    };
  }

  async submitVerification(
    entryId: string,
    user: User,
    classification: unknown,
    comment: unknown
  ): Promise<VerificationResult> {
    const kind = VERIFICATION_CLASSIFICATIONS.find((c) => c === classification);
    if (!kind) {
      throw new ValidationError(
        `classification must be one of: ${VERIFICATION_CLASSIFICATIONS.join(', ')}`
      );
    }
    const note = normalizeComment(comment);

    const record = await this.tx.run(async (uow) => {
      const entry = await this.lockEntry(uow, entryId);
      const result = await this.verifications.submit(uow, entry, user.id, kind, note);

      await this.rewardStage('submit_verification', entryId, async () => {
        await this.issue(uow, result.grants);
        if (result.decision.event === 'verify' && result.entry.contributor_id) {
          await this.streaks.touch(uow, result.entry.contributor_id);
        }
      });

      return result;
    });

    if (record.decision.event) {
      this.logger.info('Entry status changed', {
        entryId,
        event: record.decision.event,
        status: record.entry.status,
        verifierId: user.id,
      });
    }
    if (record.decision.event === 'verify') {
      this.embeddings.schedule(record.entry);
    }

    return {
      verificationCount: record.entry.verification_count,
      entryStatus: record.entry.status,
      message: record.message,
    };
  }

  async updateEntry(
    entryId: string,
    user: User,
    input: UpdateEntryRequest
  ): Promise<EntryResponse> {
    const changes = normalizeUpdate(input);

    const { entry: updated, event } = await this.tx.run(async (uow): Promise<Reevaluation> => {
      const entry = await this.lockEntry(uow, entryId);
      assertCanModify(entry, user);

      if (changes.kolokwa_text !== undefined) {
        const others = (await uow.entries.findActiveByText(changes.kolokwa_text)).filter(
          (e) => e.id !== entry.id
        );
        const conflict = duplicateConflict(others, changes.kolokwa_text, user.id);
        if (conflict) throw conflict;
      }

      const resubmitted = nextStatus(entry.status, 'resubmit');
      const saved = await uow.entries.update(entry.id, {
        ...changes,
        ...(resubmitted && { status: resubmitted }),
      });
      if (!resubmitted) return { entry: saved, event: null, grants: [] };

      // Verifications collected before and during revision still count.
      const review = await this.verifications.reevaluate(uow, saved);
      if (review.event === 'verify') {
        await this.rewardStage('update_entry', entryId, async () => {
          await this.issue(uow, review.grants);
          if (review.entry.contributor_id) {
            await this.streaks.touch(uow, review.entry.contributor_id);
          }
        });
      }
      return review;
    });

    this.logger.info('Entry updated', { entryId, userId: user.id, status: updated.status });
    if (event) {
      this.logger.info('Entry status changed', { entryId, event, status: updated.status });
    }
    if (updated.status === 'verified') {
      this.embeddings.schedule(updated);
    }

    const contributor =
      updated.contributor_id === user.id
        ? { id: user.id, displayName: user.displayName, level: user.level }
        : null;
    return toEntryResponse(updated, contributor);
  }

  async deleteEntry(entryId: string, user: User): Promise<void> {
    await this.tx.run(async (uow) => {
      const entry = await this.lockEntry(uow, entryId);
      assertCanModify(entry, user);

      await uow.entries.update(entry.id, { deleted_at: new Date().toISOString() });
      if (entry.contributor_id) {
        await uow.users.adjustCounters(entry.contributor_id, { contributions: -1 });
      }
    });

    this.logger.info('Entry deleted', { entryId, userId: user.id });
  }

  /** Load and lock a visible entry. */
  private async lockEntry(uow: UnitOfWork, entryId: string): Promise<EntryRow> {
    const entry = await uow.entries.findByIdForUpdate(entryId);
    if (!entry || entry.deleted_at) {
      throw new NotFoundError(`Entry "${entryId}" not found`);
    }
    return entry;
  }

  private async issue(uow: UnitOfWork, grants: PendingGrant[]): Promise<void> {
    for (const { userId, grant } of grants) {
      await this.ledger.award(uow, userId, grant);
    }
  }

  private async rewardStage(
    operation: string,
    entryId: string,
    stage: () => Promise<void>
  ): Promise<void> {
    try {
      await stage();
    } catch (err) {
      if (err instanceof AppError) throw err;

      const failure = new DependencyError(
        'Rewards could not be applied; nothing was saved. Please retry.',
        'rewards',
        err
      );
      this.logger.error('Reward stage failed', {
        operation,
        entryId,
        code: failure.code,
        error: err instanceof Error ? err.message : String(err),
      });
      throw failure;
    }
  }
}

function normalizeComment(comment: unknown): string {
  if (comment === undefined || comment === null) return '';
  if (typeof comment !== 'string') throw new ValidationError('comment must be a string');
  const trimmed = comment.trim();
  if (trimmed.length > MAX_COMMENT_LENGTH) {
    throw new ValidationError(`comment must be ${MAX_COMMENT_LENGTH} characters or less`);
  }
  return trimmed;
}

function assertCanModify(entry: EntryRow, user: User): void {
  if (entry.contributor_id !== user.id && !user.isModerator) {
    throw new ForbiddenError('Only the contributor or a moderator can change this entry');
  }
}
