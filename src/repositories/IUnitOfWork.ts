/**
 * Transaction boundary for the ledgers.
 * Everything a single vote, verification or submission touches goes through
 * one UnitOfWork: either all of it commits or none of it does.
 */

import type { IEntryRepository } from './IEntryRepository.js';
import type { IVoteRepository } from './IVoteRepository.js';
import type { IVerificationRepository } from './IVerificationRepository.js';
import type { IPointTransactionRepository } from './IPointTransactionRepository.js';
import type { IUserRepository } from './IUserRepository.js';
import type { IBadgeRepository } from './IBadgeRepository.js';
import type { IStreakRepository } from './IStreakRepository.js';
import type { IChallengeRepository } from './IChallengeRepository.js';

export interface UnitOfWork {
  entries: IEntryRepository;
  votes: IVoteRepository;
  verifications: IVerificationRepository;
  points: IPointTransactionRepository;
  users: IUserRepository;
  badges: IBadgeRepository;
  streaks: IStreakRepository;
  challenges: IChallengeRepository;
}

export interface ITransactionManager {
  /**
   * Run `work` in a transaction. Commits when it resolves, rolls back when it
   * throws (and rethrows). Implementations may re-run `work` after a
   * serialization failure, so it must not have effects outside the UnitOfWork.
   */
  run<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T>;
}
