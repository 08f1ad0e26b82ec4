import { describe, it, expect } from 'vitest';
import { badgeBonus, evaluatesBadges, priceGrant } from '../../src/gamification/rewards.js';
import { DEFAULT_ENGINE_CONFIG } from '../../src/config.js';

const config = DEFAULT_ENGINE_CONFIG;
const entry = { id: 'e1', kolokwaText: 'kpanda' };

describe('priceGrant', () => {
  it('should price a contribution with a per-entry key', () => {
    expect(priceGrant('u1', { kind: 'contribution', entry }, config)).toEqual({
      kind: 'contribution',
      points: 2,
      description: 'Contributed new entry: kpanda',
      idempotencyKey: 'contribution:e1',
    });
  });

  it('should price verifications by outcome', () => {
    const price = (outcome: 'counted' | 'verified' | 'reviewed' | 'rejected') =>
      priceGrant('u1', { kind: 'verification', entry, classification: 'accurate', outcome }, config);

    expect(price('verified').points).toBe(5);
    expect(price('counted').points).toBe(3);
    expect(price('reviewed').points).toBe(2);
    expect(price('rejected').points).toBe(2);
    expect(price('counted').idempotencyKey).toBe('verification:e1:u1:accurate');
    expect(price('reviewed').description).toBe('Reviewed entry: kpanda');
  });

  it('should key verification_received by verifier', () => {
    const priced = priceGrant(
      'owner',
      { kind: 'verification_received', entry, verifierId: 'v9' },
      config
    );
    expect(priced.points).toBe(2);
    expect(priced.idempotencyKey).toBe('verification_received:e1:v9');
  });

  it('should move contributor points by vote polarity without keys', () => {
    expect(priceGrant('o', { kind: 'vote_received', entry, polarity: -1 }, config).points).toBe(-1);
    expect(priceGrant('o', { kind: 'vote_changed', entry, polarity: -1 }, config).points).toBe(-2);
    expect(priceGrant('o', { kind: 'vote_changed', entry, polarity: 1 }, config).points).toBe(2);
    expect(priceGrant('o', { kind: 'vote_removed', entry, polarity: 1 }, config).points).toBe(-1);
    expect(priceGrant('o', { kind: 'vote_removed', entry, polarity: 1 }, config).idempotencyKey).toBeNull();
  });

  it('should always deduct penalties', () => {
    expect(priceGrant('u1', { kind: 'penalty', points: 10, reason: 'spam' }, config)).toEqual({
      kind: 'penalty',
      points: -10,
      description: 'Penalty: spam',
      idempotencyKey: null,
    });
  });

  it('should price badge and streak achievements', () => {
    const badge = priceGrant(
      'u1',
      {
        kind: 'achievement',
        source: { type: 'badge', badgeId: 'b1', name: 'Rising Star', pointsRequired: 500 },
      },
      config
    );
    expect(badge.points).toBe(50);
    expect(badge.idempotencyKey).toBe('achievement:badge:b1:u1');

    const streak = priceGrant(
      'u1',
      { kind: 'achievement', source: { type: 'streak', days: 7, day: '2025-01-10' } },
      config
    );
    expect(streak).toEqual({
      kind: 'achievement',
      points: 14,
      description: '7 day streak bonus!',
      idempotencyKey: 'achievement:streak:u1:2025-01-10',
    });
  });

  it('should key daily bonuses per challenge and user', () => {
    const priced = priceGrant(
      'u1',
      { kind: 'daily_bonus', challenge: { id: 'c1', title: 'Greetings', pointsReward: 15 } },
      config
    );
    expect(priced.points).toBe(15);
    expect(priced.description).toBe('Completed daily challenge: Greetings');
    expect(priced.idempotencyKey).toBe('daily_bonus:c1:u1');
  });
});

describe('badgeBonus', () => {
  it('should pay a tenth of the threshold with a floor of 5', () => {
    expect(badgeBonus(0, config)).toBe(5);
    expect(badgeBonus(40, config)).toBe(5);
    expect(badgeBonus(100, config)).toBe(10);
    expect(badgeBonus(505, config)).toBe(50);
  });
});

describe('evaluatesBadges', () => {
  it('should stop badge evaluation only for achievements', () => {
    expect(evaluatesBadges('achievement')).toBe(false);
    expect(evaluatesBadges('contribution')).toBe(true);
    expect(evaluatesBadges('penalty')).toBe(true);
  });
});
