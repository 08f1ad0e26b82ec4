/**
 * Entry lifecycle.
 *
 *   pending ──verify──────────▶ verified   (terminal)
 *   pending ──reject──────────▶ rejected   (terminal)
 *   pending ──request_revision▶ needs_revision
 *   needs_revision ──resubmit─▶ pending
 *
 * Anything not in the table is not a transition; terminal states are sticky.
 */

import type { EntryStatus, VerificationClassification } from '../types/models.js';
import type { VerificationOutcome } from './rewards.js';

export type EntryEvent = 'verify' | 'reject' | 'request_revision' | 'resubmit';

const TRANSITIONS: Record<EntryStatus, Partial<Record<EntryEvent, EntryStatus>>> = {
  pending: { verify: 'verified', reject: 'rejected', request_revision: 'needs_revision' },
  needs_revision: { resubmit: 'pending' },
  verified: {},
  rejected: {},
};

export function nextStatus(from: EntryStatus, event: EntryEvent): EntryStatus | null {
  return TRANSITIONS[from][event] ?? null;
}

export function isTerminal(status: EntryStatus): boolean {
  return status === 'verified' || status === 'rejected';
}

/** Ranking score. Derived on read, never stored. */
export function entryScore(counters: {
  upvotes: number;
  downvotes: number;
  verification_count: number;
}): number {
  return counters.upvotes - counters.downvotes + counters.verification_count * 2;
}

export type VerificationTally = Record<VerificationClassification, number>;

export interface VerificationDecision {
  event: Extract<EntryEvent, 'verify' | 'reject'> | null;
  outcome: VerificationOutcome;
}

/**
 * Decide what a verification does to an entry, given the tally that already
 * includes it.
 */
export function decideVerification(
  status: EntryStatus,
  classification: VerificationClassification,
  tally: VerificationTally,
  thresholds: { verifyThreshold: number; rejectThreshold: number }
): VerificationDecision {
  switch (classification) {
    case 'accurate':
      if (tally.accurate >= thresholds.verifyThreshold && nextStatus(status, 'verify')) {
        return { event: 'verify', outcome: 'verified' };
      }
      return { event: null, outcome: 'counted' };

    case 'incorrect':
      if (tally.incorrect >= thresholds.rejectThreshold && nextStatus(status, 'reject')) {
        return { event: 'reject', outcome: 'rejected' };
      }
      return { event: null, outcome: 'reviewed' };

    case 'needs_revision':
      return { event: null, outcome: 'reviewed' };
  }
}
