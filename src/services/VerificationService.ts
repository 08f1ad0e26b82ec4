/**
 * Verification ledger.
 * One verification per (entry, verifier), upserted. The entry's
 * verification_count is recomputed from the ledger on every call, and the
 * tally decides whether the entry moves to verified or rejected.
 */

import type { UnitOfWork } from '../repositories/IUnitOfWork.js';
import type { EntryRow } from '../types/database.js';
import type { EntryChanges } from '../repositories/IEntryRepository.js';
import type { VerificationClassification } from '../types/models.js';
import type { EngineConfig } from '../config.js';
import {
  decideVerification,
  nextStatus,
  type VerificationDecision,
  type VerificationTally,
} from '../gamification/entry-state.js';
import { entryRef, verificationKey, type PendingGrant } from '../gamification/rewards.js';
import { ForbiddenError } from '../errors.js';

export interface VerificationRecord {
  entry: EntryRow;
  /** False when an earlier verification by the same user was overwritten. */
  created: boolean;
  decision: VerificationDecision;
  grants: PendingGrant[];
  message: string;
}

export interface Reevaluation {
  entry: EntryRow;
  event: VerificationDecision['event'];
  grants: PendingGrant[];
}

export class VerificationService {
  constructor(private readonly config: EngineConfig) {}

  /** `entry` must already be locked by the caller. */
  async submit(
    uow: UnitOfWork,
    entry: EntryRow,
    verifierId: string,
    classification: VerificationClassification,
    comment: string
  ): Promise<VerificationRecord> {
    if (entry.contributor_id === verifierId) {
      throw new ForbiddenError('You cannot verify your own entry', 'SELF_VERIFICATION');
    }

    const { created } = await uow.verifications.upsert({
      entry_id: entry.id,
      verifier_id: verifierId,
      classification,
      comment,
    });
    if (created) {
      await uow.users.adjustCounters(verifierId, { verifications: 1 });
    }

    const tally = await uow.verifications.tally(entry.id);
    const decision = decideVerification(entry.status, classification, tally, this.config);

    const updated = await applyTally(uow, entry, tally, decision.event);
    // Read before this call's grants are issued: an existing key means the
    // verifier already confirmed this entry once.
    const confirmedBefore = await uow.points.existsByKey(
      verificationKey(entry.id, verifierId, 'accurate')
    );

    return {
      entry: updated,
      created,
      decision,
      grants: this.grantsFor(updated, verifierId, classification, decision, confirmedBefore),
      message: messageFor(decision),
    };
  }

  /**
   * Apply the thresholds to an entry that has just returned to pending, using
   * the verifications it already holds. `entry` must already be locked.
   */
  async reevaluate(uow: UnitOfWork, entry: EntryRow): Promise<Reevaluation> {
    const tally = await uow.verifications.tally(entry.id);
    const event =
      tally.accurate >= this.config.verifyThreshold
        ? 'verify'
        : tally.incorrect >= this.config.rejectThreshold
          ? 'reject'
          : null;
    const applied = event && nextStatus(entry.status, event) ? event : null;
    const updated = await applyTally(uow, entry, tally, applied);

    const grants: PendingGrant[] =
      applied === 'verify' && updated.contributor_id
        ? [
            {
              userId: updated.contributor_id,
              grant: { kind: 'contribution_verified', entry: entryRef(updated) },
            },
          ]
        : [];

    return { entry: updated, event: applied, grants };
  }

  private grantsFor(
    entry: EntryRow,
    verifierId: string,
    classification: VerificationClassification,
    decision: VerificationDecision,
    confirmedBefore: boolean
  ): PendingGrant[] {
    const ref = entryRef(entry);
    const grants: PendingGrant[] = [
      {
        userId: verifierId,
        grant: { kind: 'verification', entry: ref, classification, outcome: decision.outcome },
      },
    ];

    const contributorId = entry.contributor_id;
    if (!contributorId) return grants;

    if (decision.outcome === 'verified') {
      grants.push({ userId: contributorId, grant: { kind: 'contribution_verified', entry: ref } });
    } else if (decision.outcome === 'counted' && !confirmedBefore) {
      grants.push({
        userId: contributorId,
        grant: { kind: 'verification_received', entry: ref, verifierId },
      });
    }

    return grants;
  }
}

/** Write the recounted verification_count and any status change. */
async function applyTally(
  uow: UnitOfWork,
  entry: EntryRow,
  tally: VerificationTally,
  event: VerificationDecision['event']
): Promise<EntryRow> {
  const changes: EntryChanges = {};
  if (tally.accurate !== entry.verification_count) {
    changes.verification_count = tally.accurate;
  }
  if (event) {
    const status = nextStatus(entry.status, event);
    if (status) changes.status = status;
    if (status === 'verified') changes.verified_at = new Date().toISOString();
  }

  return Object.keys(changes).length > 0 ? uow.entries.update(entry.id, changes) : entry;
}

function messageFor(decision: VerificationDecision): string {
  switch (decision.event) {
    case 'verify':
      return 'Entry has been verified!';
    case 'reject':
      return 'Entry has been rejected due to multiple negative verifications.';
    case null:
      return 'Thank you for your verification!';
  }
}
