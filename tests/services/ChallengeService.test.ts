import { describe, it, expect, beforeEach } from 'vitest';
import { createHarness, type Harness } from '../mocks/harness.js';
import type { ChallengeService } from '../../src/services/ChallengeService.js';
import { ConflictError, NotFoundError, ValidationError } from '../../src/errors.js';

describe('ChallengeService', () => {
  let h: Harness;
  let challenges: ChallengeService;

  beforeEach(() => {
    h = createHarness();
    challenges = h.container.challengeService;
    h.db.addUser({ id: 'alice' });
  });

  describe('today', () => {
    it('should return today\'s challenge with the user\'s progress', async () => {
      h.db.addChallenge({ id: 'ch-1', title: 'Add a proverb' });

      const challenge = await challenges.today('alice');

      expect(challenge).toEqual({
        id: 'ch-1',
        title: 'Add a proverb',
        description: 'Do the thing',
        pointsReward: 15,
        challengeDate: new Date().toISOString().slice(0, 10),
        accepted: false,
        completed: false,
      });
    });

    it('should 404 when no challenge is scheduled', async () => {
      h.db.addChallenge({ id: 'old', challenge_date: '2020-01-01' });

      await expect(challenges.today('alice')).rejects.toThrow('No challenge available for today');
    });

    it('should skip inactive challenges', async () => {
      h.db.addChallenge({ id: 'off', is_active: false });

      await expect(challenges.today('alice')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('accept', () => {
    beforeEach(() => {
      h.db.addChallenge({ id: 'ch-1' });
    });

    it('should mark the challenge accepted', async () => {
      const challenge = await challenges.accept('ch-1', 'alice');

      expect(challenge.accepted).toBe(true);
      expect(challenge.completed).toBe(false);
      expect(h.db.tables.streaks.get('alice')?.accepted_challenge_id).toBe('ch-1');
    });

    it('should refuse a second accept on the same day', async () => {
      await challenges.accept('ch-1', 'alice');

      const attempt = challenges.accept('ch-1', 'alice');
      await expect(attempt).rejects.toBeInstanceOf(ConflictError);
      await expect(challenges.accept('ch-1', 'alice')).rejects.toThrow(
        'You have already accepted this challenge today.'
      );
    });

    it('should refuse a challenge from another day', async () => {
      h.db.addChallenge({ id: 'old', challenge_date: '2020-01-01' });

      await expect(challenges.accept('old', 'alice')).rejects.toThrow(
        'This challenge is not available today.'
      );
    });

    it('should 404 an unknown challenge', async () => {
      await expect(challenges.accept('nope', 'alice')).rejects.toThrow(
        'Challenge "nope" not found'
      );
    });
  });

  describe('complete', () => {
    beforeEach(() => {
      h.db.addChallenge({ id: 'ch-1', title: 'Verify three entries', points_reward: 20 });
    });

    it('should require accepting first', async () => {
      const attempt = challenges.complete('ch-1', 'alice');

      await expect(attempt).rejects.toBeInstanceOf(ValidationError);
      expect(h.db.user('alice').points).toBe(0);
    });

    it('should pay the daily bonus and count toward the streak', async () => {
      await challenges.accept('ch-1', 'alice');
      const result = await challenges.complete('ch-1', 'alice');

      expect(result.pointsAwarded).toBe(20);
      expect(result.message).toBe('Challenge "Verify three entries" completed! Points awarded.');
      expect(result.challenge.accepted).toBe(true);
      expect(result.challenge.completed).toBe(true);

      expect(h.db.user('alice').points).toBe(20);
      const [tx] = h.db.transactionsFor('alice');
      expect(tx.kind).toBe('daily_bonus');
      expect(tx.idempotency_key).toBe('daily_bonus:ch-1:alice');
      expect(h.db.tables.streaks.get('alice')?.current_streak).toBe(1);
    });

    it('should refuse completing twice', async () => {
      await challenges.accept('ch-1', 'alice');
      await challenges.complete('ch-1', 'alice');

      await expect(challenges.complete('ch-1', 'alice')).rejects.toThrow(
        'You have already completed this challenge today.'
      );
      expect(h.db.user('alice').points).toBe(20);
    });

    it('should not count the streak twice on a day with a submission', async () => {
      await h.container.contributionService.submitEntry(
        { kolokwaText: 'Kpanda', englishTranslation: 'Lizard' },
        h.as('alice')
      );
      await challenges.accept('ch-1', 'alice');
      await challenges.complete('ch-1', 'alice');

      expect(h.db.tables.streaks.get('alice')?.current_streak).toBe(1);
      expect(h.db.user('alice').points).toBe(22);
    });
  });
});
