/**
 * Reconciliation.
 * Recomputes every denormalized value from ledger truth and repairs drift:
 * entry vote and verification counters, contributor rewards for verified
 * entries that never got them, user contribution/verification counters
 * (followed by a badge pass), and point balances against the ledger sum.
 * Each entry and each user is repaired in its own transaction.
 */

import type { ITransactionManager, UnitOfWork } from '../repositories/IUnitOfWork.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { EntryRow, UserRow } from '../types/database.js';
import type { PaginationOptions } from '../types/common.js';
import type { EngineConfig } from '../config.js';
import type { PointLedgerService } from './PointLedgerService.js';
import { entryRef, priceGrant, type Grant } from '../gamification/rewards.js';

export interface ReconciliationOptions {
  /** Report drift without writing anything. */
  dryRun?: boolean;
  batchSize?: number;
}

export interface CounterDrift {
  id: string;
  field: string;
  stored: number;
  actual: number;
}

export interface MissingGrant {
  entryId: string;
  userId: string;
  kind: Grant['kind'];
}

export interface ReconciliationReport {
  dryRun: boolean;
  entriesChecked: number;
  usersChecked: number;
  entryCounters: CounterDrift[];
  missingGrants: MissingGrant[];
  userCounters: CounterDrift[];
  pointBalances: CounterDrift[];
  badgesGranted: number;
}

const DEFAULT_BATCH_SIZE = 100;

export class ReconciliationService {
  constructor(
    private readonly tx: ITransactionManager,
    private readonly ledger: PointLedgerService,
    private readonly config: EngineConfig,
    private readonly logger: ILogProvider
  ) {}

  async run(options: ReconciliationOptions = {}): Promise<ReconciliationReport> {
    const dryRun = options.dryRun ?? false;
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    const report: ReconciliationReport = {
      dryRun,
      entriesChecked: 0,
      usersChecked: 0,
      entryCounters: [],
      missingGrants: [],
      userCounters: [],
      pointBalances: [],
      badgesGranted: 0,
    };

    // Entries first: missing grants move balances, which the user pass then checks.
    await this.eachPage(batchSize, (uow, page) => uow.entries.list(page), async (entry) => {
      report.entriesChecked++;
      await this.tx.run((uow) => this.reconcileEntry(uow, entry.id, dryRun, report));
    });

    await this.eachPage(batchSize, (uow, page) => uow.users.list(page), async (user) => {
      report.usersChecked++;
      await this.tx.run((uow) => this.reconcileUser(uow, user.id, dryRun, report));
    });

    const drift =
      report.entryCounters.length +
      report.missingGrants.length +
      report.userCounters.length +
      report.pointBalances.length;
    this.logger.info('Reconciliation finished', {
      dryRun,
      entriesChecked: report.entriesChecked,
      usersChecked: report.usersChecked,
      drift,
      badgesGranted: report.badgesGranted,
    });

    return report;
  }

  private async reconcileEntry(
    uow: UnitOfWork,
    entryId: string,
    dryRun: boolean,
    report: ReconciliationReport
  ): Promise<void> {
    const entry = await uow.entries.findByIdForUpdate(entryId);
    if (!entry) return;

    const votes = await uow.votes.countByPolarity(entry.id);
    const tally = await uow.verifications.tally(entry.id);
    const drift = [
      counter(entry.id, 'upvotes', entry.upvotes, votes.upvotes),
      counter(entry.id, 'downvotes', entry.downvotes, votes.downvotes),
      counter(entry.id, 'verification_count', entry.verification_count, tally.accurate),
    ].filter((d): d is CounterDrift => d !== null);

    for (const d of drift) {
      this.logger.warn('Entry counter drift', { entryId: entry.id, ...d });
    }
    report.entryCounters.push(...drift);

    if (!dryRun && drift.length > 0) {
      await uow.entries.adjustVoteCounters(entry.id, {
        upvotes: votes.upvotes - entry.upvotes,
        downvotes: votes.downvotes - entry.downvotes,
      });
      if (tally.accurate !== entry.verification_count) {
        await uow.entries.update(entry.id, { verification_count: tally.accurate });
      }
    }

    await this.reconcileVerifiedReward(uow, entry, dryRun, report);
  }

  private async reconcileVerifiedReward(
    uow: UnitOfWork,
    entry: EntryRow,
    dryRun: boolean,
    report: ReconciliationReport
  ): Promise<void> {
    if (entry.status !== 'verified' || !entry.contributor_id || entry.deleted_at) return;

    const grant: Grant = { kind: 'contribution_verified', entry: entryRef(entry) };
    const key = priceGrant(entry.contributor_id, grant, this.config).idempotencyKey;
    if (key === null || (await uow.points.existsByKey(key))) return;

    report.missingGrants.push({ entryId: entry.id, userId: entry.contributor_id, kind: grant.kind });
    this.logger.warn('Missing verified-entry reward', {
      entryId: entry.id,
      userId: entry.contributor_id,
    });

    if (!dryRun) {
      await this.ledger.award(uow, entry.contributor_id, grant);
    }
  }

  private async reconcileUser(
    uow: UnitOfWork,
    userId: string,
    dryRun: boolean,
    report: ReconciliationReport
  ): Promise<void> {
    const user = await uow.users.findByIdForUpdate(userId);
    if (!user) return;

    const ledgerTotal = await uow.points.sumByUser(user.id);
    const balance = counter(user.id, 'points', user.points, ledgerTotal);
    if (balance) {
      report.pointBalances.push(balance);
      this.logger.warn('Point balance drift', { userId: user.id, ...balance });
    }

    const contributions = await uow.entries.countByContributor(user.id);
    const verifications = await uow.verifications.countByVerifier(user.id);
    const counters = [
      counter(user.id, 'contributions_count', user.contributions_count, contributions),
      counter(user.id, 'verifications_count', user.verifications_count, verifications),
    ].filter((d): d is CounterDrift => d !== null);

    for (const d of counters) {
      this.logger.warn('User counter drift', { userId: user.id, ...d });
    }
    report.userCounters.push(...counters);

    if (dryRun || (!balance && counters.length === 0)) return;

    let current: UserRow = user;
    if (balance) {
      current = await uow.users.update(user.id, { points: ledgerTotal });
      current = await this.ledger.relevel(uow, current);
    }
    if (counters.length > 0) {
      await uow.users.update(user.id, {
        contributions_count: contributions,
        verifications_count: verifications,
      });
      const earned = await this.ledger.grantBadges(uow, current.id);
      report.badgesGranted += earned.length;
    }
  }

  private async eachPage<T>(
    batchSize: number,
    load: (uow: UnitOfWork, page: PaginationOptions) => Promise<T[]>,
    visit: (row: T) => Promise<void>
  ): Promise<void> {
    for (let offset = 0; ; offset += batchSize) {
      const rows = await this.tx.run((uow) => load(uow, { limit: batchSize, offset }));
      for (const row of rows) {
        await visit(row);
      }
      if (rows.length < batchSize) return;
    }
  }
}

function counter(id: string, field: string, stored: number, actual: number): CounterDrift | null {
  return stored === actual ? null : { id, field, stored, actual };
}
