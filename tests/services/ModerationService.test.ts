import { describe, it, expect, beforeEach } from 'vitest';
import { createHarness, type Harness } from '../mocks/harness.js';
import type { ModerationService } from '../../src/services/ModerationService.js';
import { ConflictError, ForbiddenError, NotFoundError, ValidationError } from '../../src/errors.js';

describe('ModerationService', () => {
  let h: Harness;
  let moderation: ModerationService;

  beforeEach(() => {
    h = createHarness();
    moderation = h.container.moderationService;
    h.db.addUser({ id: 'alice', points: 120, level: 'contributor' });
    h.db.addUser({ id: 'mod', is_moderator: true });
  });

  describe('requestRevision', () => {
    it('should move a pending entry to needs_revision', async () => {
      h.db.addEntry({ id: 'e1', kolokwa_text: 'Kpanda', contributor_id: 'alice' });

      const result = await moderation.requestRevision('e1', h.as('mod'), 'Add an example');

      expect(result.status).toBe('needs_revision');
      expect(h.db.entry('e1').status).toBe('needs_revision');
      const logged = h.logs.events.find((e) => e.message === 'Entry status changed');
      expect(logged?.fields).toMatchObject({ event: 'request_revision', note: 'Add an example' });
    });

    it('should require a moderator', async () => {
      h.db.addEntry({ id: 'e1', kolokwa_text: 'Kpanda' });

      await expect(moderation.requestRevision('e1', h.as('alice'), '')).rejects.toThrow(
        'Moderator access required'
      );
    });

    it('should refuse terminal entries', async () => {
      h.db.addEntry({ id: 'e1', kolokwa_text: 'Kpanda', status: 'verified' });

      const attempt = moderation.requestRevision('e1', h.as('mod'), '');
      await expect(attempt).rejects.toBeInstanceOf(ConflictError);
      await expect(moderation.requestRevision('e1', h.as('mod'), '')).rejects.toThrow(
        'Only pending entries can be sent back for revision; this one is verified'
      );
    });

    it('should 404 a deleted entry', async () => {
      h.db.addEntry({ id: 'e1', kolokwa_text: 'Kpanda', deleted_at: '2026-01-01T00:00:00Z' });

      await expect(moderation.requestRevision('e1', h.as('mod'), '')).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });

  describe('penalize', () => {
    it('should deduct points through the ledger and relevel', async () => {
      const result = await moderation.penalize('alice', h.as('mod'), 30, '  spam ');

      expect(result).toEqual({
        userId: 'alice',
        pointsDeducted: 30,
        balance: 90,
        level: 'beginner',
      });

      const [tx] = h.db.transactionsFor('alice');
      expect(tx.kind).toBe('penalty');
      expect(tx.points).toBe(-30);
      expect(tx.description).toBe('Penalty: spam');
      expect(tx.idempotency_key).toBeNull();
    });

    it('should allow the balance to go negative', async () => {
      h.db.addUser({ id: 'bob' });

      const result = await moderation.penalize('bob', h.as('mod'), 10, 'abuse');

      expect(result.balance).toBe(-10);
      expect(result.level).toBe('beginner');
    });

    it('should apply repeated penalties independently', async () => {
      await moderation.penalize('alice', h.as('mod'), 5, 'spam');
      await moderation.penalize('alice', h.as('mod'), 5, 'spam');

      expect(h.db.user('alice').points).toBe(110);
      expect(h.db.transactionsFor('alice')).toHaveLength(2);
    });

    it('should require a moderator', async () => {
      await expect(moderation.penalize('mod', h.as('alice'), 5, 'x')).rejects.toBeInstanceOf(
        ForbiddenError
      );
    });

    it.each([0, -5, 1.5, '5'])('should reject points = %s', async (points) => {
      await expect(moderation.penalize('alice', h.as('mod'), points, 'spam')).rejects.toThrow(
        'points must be a positive integer'
      );
    });

    it('should require a reason', async () => {
      await expect(moderation.penalize('alice', h.as('mod'), 5, '  ')).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it('should 404 an unknown user', async () => {
      await expect(moderation.penalize('ghost', h.as('mod'), 5, 'spam')).rejects.toThrow(
        'User "ghost" not found'
      );
    });
  });
});
