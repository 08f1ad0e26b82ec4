/**
 * Vote ledger.
 * One vote per (entry, voter). Casting the same polarity twice toggles the
 * vote off; casting the other polarity flips it. Counters on the entry move
 * with the ledger row in the same transaction. Rewards are returned as
 * pending grants for the orchestrator to issue.
 */

import type { UnitOfWork } from '../repositories/IUnitOfWork.js';
import type { EntryRow } from '../types/database.js';
import type { VotePolarity } from '../types/models.js';
import type { VoteAction } from '../types/api.js';
import { entryRef, type PendingGrant } from '../gamification/rewards.js';

export interface VoteOutcome {
  entry: EntryRow;
  action: VoteAction;
  userVote: VotePolarity | null;
  grants: PendingGrant[];
}

const MESSAGES: Record<VoteAction, string> = {
  recorded: 'Vote recorded',
  removed: 'Vote removed',
  changed: 'Vote changed',
};

export function voteMessage(action: VoteAction): string {
  return MESSAGES[action];
}

function counterDelta(polarity: VotePolarity, step: number) {
  return polarity === 1
    ? { upvotes: step, downvotes: 0 }
    : { upvotes: 0, downvotes: step };
}

export class VoteService {
  /** `entry` must already be locked by the caller. */
  async cast(
    uow: UnitOfWork,
    entry: EntryRow,
    voterId: string,
    polarity: VotePolarity
  ): Promise<VoteOutcome> {
    const ref = entryRef(entry);
    // Contributors never earn from their own entries.
    const contributorId =
      entry.contributor_id && entry.contributor_id !== voterId ? entry.contributor_id : null;
    const existing = await uow.votes.find(entry.id, voterId);

    if (!existing) {
      await uow.votes.insert({ entry_id: entry.id, voter_id: voterId, polarity });
      const updated = await uow.entries.adjustVoteCounters(entry.id, counterDelta(polarity, 1));

      const grants: PendingGrant[] = [{ userId: voterId, grant: { kind: 'vote', entry: ref } }];
      if (contributorId) {
        grants.push({ userId: contributorId, grant: { kind: 'vote_received', entry: ref, polarity } });
      }
      return { entry: updated, action: 'recorded', userVote: polarity, grants };
    }

    if (existing.polarity === polarity) {
      await uow.votes.delete(existing.id);
      const updated = await uow.entries.adjustVoteCounters(entry.id, counterDelta(polarity, -1));

      return {
        entry: updated,
        action: 'removed',
        userVote: null,
        grants: contributorId
          ? [{ userId: contributorId, grant: { kind: 'vote_removed', entry: ref, polarity } }]
          : [],
      };
    }

    await uow.votes.updatePolarity(existing.id, polarity);
    const previous = counterDelta(existing.polarity, -1);
    const next = counterDelta(polarity, 1);
    const updated = await uow.entries.adjustVoteCounters(entry.id, {
      upvotes: previous.upvotes + next.upvotes,
      downvotes: previous.downvotes + next.downvotes,
    });

    return {
      entry: updated,
      action: 'changed',
      userVote: polarity,
      grants: contributorId
        ? [{ userId: contributorId, grant: { kind: 'vote_changed', entry: ref, polarity } }]
        : [],
    };
  }
}
