/**
 * Reward catalogue.
 * Every point movement is described by a `Grant`: a tagged union with one
 * variant per transaction kind. `priceGrant` is the single place that turns a
 * grant into an amount, a description and (for one-shot rewards) an
 * idempotency key.
 */

import type { EngineConfig } from '../config.js';
import type {
  TransactionKind,
  VerificationClassification,
  VotePolarity,
} from '../types/models.js';

export interface EntryRef {
  id: string;
  kolokwaText: string;
}

/**
 * How a verification played out for the verifier:
 *   counted  — accurate, entry not (yet) verified by it
 *   verified — accurate, and it verified the entry
 *   reviewed — incorrect or needs_revision without a transition
 *   rejected — incorrect, and it rejected the entry
 */
export type VerificationOutcome = 'counted' | 'verified' | 'reviewed' | 'rejected';

export type AchievementSource =
  | { type: 'badge'; badgeId: string; name: string; pointsRequired: number }
  | { type: 'streak'; days: number; day: string };

export type Grant =
  | { kind: 'contribution'; entry: EntryRef }
  | { kind: 'contribution_verified'; entry: EntryRef }
  | {
      kind: 'verification';
      entry: EntryRef;
      classification: VerificationClassification;
      outcome: VerificationOutcome;
    }
  | { kind: 'verification_received'; entry: EntryRef; verifierId: string }
  | { kind: 'vote'; entry: EntryRef }
  | { kind: 'vote_received'; entry: EntryRef; polarity: VotePolarity }
  | { kind: 'vote_changed'; entry: EntryRef; polarity: VotePolarity }
  | { kind: 'vote_removed'; entry: EntryRef; polarity: VotePolarity }
  | { kind: 'daily_bonus'; challenge: { id: string; title: string; pointsReward: number } }
  | { kind: 'achievement'; source: AchievementSource }
  | { kind: 'penalty'; points: number; reason: string };

export interface PricedGrant {
  kind: TransactionKind;
  points: number;
  description: string;
  idempotencyKey: string | null;
}

/** Achievement grants never re-enter badge evaluation. */
export function evaluatesBadges(kind: TransactionKind): boolean {
  return kind !== 'achievement';
}

export function badgeBonus(pointsRequired: number, config: EngineConfig): number {
  return Math.max(
    Math.floor(pointsRequired / config.badgeBonus.divisor),
    config.badgeBonus.minimum
  );
}

/** Key of the verifier's grant for one classification of one entry. */
export function verificationKey(
  entryId: string,
  verifierId: string,
  classification: VerificationClassification
): string {
  return `verification:${entryId}:${verifierId}:${classification}`;
}

export function priceGrant(userId: string, grant: Grant, config: EngineConfig): PricedGrant {
  const amounts = config.points;

  switch (grant.kind) {
    case 'contribution':
      return {
        kind: grant.kind,
        points: amounts.contribution,
        description: `Contributed new entry: ${grant.entry.kolokwaText}`,
        idempotencyKey: `contribution:${grant.entry.id}`,
      };

    case 'contribution_verified':
      return {
        kind: grant.kind,
        points: amounts.contributionVerified,
        description: `Entry verified: ${grant.entry.kolokwaText}`,
        idempotencyKey: `contribution_verified:${grant.entry.id}`,
      };

    case 'verification': {
      const counted = grant.outcome === 'counted' || grant.outcome === 'verified';
      return {
        kind: grant.kind,
        points:
          grant.outcome === 'verified'
            ? amounts.verificationTransition
            : grant.outcome === 'counted'
              ? amounts.verification
              : amounts.review,
        description: `${counted ? 'Verified' : 'Reviewed'} entry: ${grant.entry.kolokwaText}`,
        idempotencyKey: verificationKey(grant.entry.id, userId, grant.classification),
      };
    }

    case 'verification_received':
      return {
        kind: grant.kind,
        points: amounts.verificationReceived,
        description: `Your entry received verification: ${grant.entry.kolokwaText}`,
        idempotencyKey: `verification_received:${grant.entry.id}:${grant.verifierId}`,
      };

    case 'vote':
      return {
        kind: grant.kind,
        points: amounts.vote,
        description: `Voted on entry: ${grant.entry.kolokwaText}`,
        idempotencyKey: `vote:${grant.entry.id}:${userId}`,
      };

    case 'vote_received':
      return {
        kind: grant.kind,
        points: grant.polarity,
        description: `Your entry received a vote: ${grant.entry.kolokwaText}`,
        idempotencyKey: null,
      };

    case 'vote_changed':
      // Undoes the previous grant (-polarity) and applies the new one (+polarity).
      return {
        kind: grant.kind,
        points: 2 * grant.polarity,
        description: `Vote changed for your entry: ${grant.entry.kolokwaText}`,
        idempotencyKey: null,
      };

    case 'vote_removed':
      return {
        kind: grant.kind,
        points: -grant.polarity,
        description: `Vote removed for your entry: ${grant.entry.kolokwaText}`,
        idempotencyKey: null,
      };

    case 'daily_bonus':
      return {
        kind: grant.kind,
        points: grant.challenge.pointsReward,
        description: `Completed daily challenge: ${grant.challenge.title}`,
        idempotencyKey: `daily_bonus:${grant.challenge.id}:${userId}`,
      };

    case 'achievement':
      if (grant.source.type === 'badge') {
        return {
          kind: grant.kind,
          points: badgeBonus(grant.source.pointsRequired, config),
          description: `Earned badge: ${grant.source.name}`,
          idempotencyKey: `achievement:badge:${grant.source.badgeId}:${userId}`,
        };
      }
      return {
        kind: grant.kind,
        points: grant.source.days * config.streakBonusMultiplier,
        description: `${grant.source.days} day streak bonus!`,
        idempotencyKey: `achievement:streak:${userId}:${grant.source.day}`,
      };

    case 'penalty':
      return {
        kind: grant.kind,
        points: -Math.abs(grant.points),
        description: `Penalty: ${grant.reason}`,
        idempotencyKey: null,
      };
  }
}

/** A grant decided by a ledger, issued later in the reward stage. */
export interface PendingGrant {
  userId: string;
  grant: Grant;
}

export function entryRef(entry: { id: string; kolokwa_text: string }): EntryRef {
  return { id: entry.id, kolokwaText: entry.kolokwa_text };
}
