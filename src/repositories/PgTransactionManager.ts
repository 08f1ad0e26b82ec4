/**
 * Runs units of work in a Postgres transaction on a pooled client.
 * Serialization failures and deadlocks are retried with a short backoff;
 * everything else rolls back and propagates.
 */

import type pg from 'pg';
import type { ITransactionManager, UnitOfWork } from './IUnitOfWork.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { PgEntryRepository } from './PgEntryRepository.js';
import { PgVoteRepository } from './PgVoteRepository.js';
import { PgVerificationRepository } from './PgVerificationRepository.js';
import { PgPointTransactionRepository } from './PgPointTransactionRepository.js';
import { PgUserRepository } from './PgUserRepository.js';
import { PgBadgeRepository } from './PgBadgeRepository.js';
import { PgStreakRepository } from './PgStreakRepository.js';
import { PgChallengeRepository } from './PgChallengeRepository.js';

const RETRYABLE_CODES = new Set([
  '40001', // serialization_failure
  '40P01', // deadlock_detected
]);

export interface PgTransactionManagerOptions {
  maxAttempts?: number;
  /** Base backoff in ms; attempt n waits n × base. */
  retryDelayMs?: number;
}

export class PgTransactionManager implements ITransactionManager {
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;

  constructor(
    private readonly pool: pg.Pool,
    private readonly logger: ILogProvider,
    options?: PgTransactionManagerOptions
  ) {
    this.maxAttempts = options?.maxAttempts ?? 3;
    this.retryDelayMs = options?.retryDelayMs ?? 25;
  }

  async run<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.runOnce(work);
      } catch (err) {
        if (attempt >= this.maxAttempts || !isRetryable(err)) throw err;

        this.logger.warn('Retrying transaction after conflict', {
          attempt,
          code: sqlState(err),
        });
        await sleep(this.retryDelayMs * attempt);
      }
    }
  }

  private async runOnce<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(createUnitOfWork(client));
      await client.query('COMMIT');
      return result;
    } catch (err) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackErr) {
        this.logger.error('Rollback failed', {
          error: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr),
        });
      }
      throw err;
    } finally {
      client.release();
    }
  }
}

export function createUnitOfWork(client: pg.PoolClient): UnitOfWork {
  return {
    entries: new PgEntryRepository(client),
    votes: new PgVoteRepository(client),
    verifications: new PgVerificationRepository(client),
    points: new PgPointTransactionRepository(client),
    users: new PgUserRepository(client),
    badges: new PgBadgeRepository(client),
    streaks: new PgStreakRepository(client),
    challenges: new PgChallengeRepository(client),
  };
}

function sqlState(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Checks the error and its `cause` chain, since services wrap driver errors. */
function isRetryable(err: unknown): boolean {
  for (let current = err, depth = 0; current && depth < 5; depth++) {
    const code = sqlState(current);
    if (code !== undefined && RETRYABLE_CODES.has(code)) return true;
    current = current instanceof Error ? current.cause : undefined;
  }
  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
