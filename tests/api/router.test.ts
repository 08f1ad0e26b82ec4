import { describe, it, expect, beforeEach } from 'vitest';
import { createRouter } from '../../src/api/router.js';
import { createHarness, type Harness } from '../mocks/harness.js';
import type { Handler } from '../../src/middleware/pipeline.js';

const BASE = 'http://localhost/api/v1';

describe('API Router', () => {
  let h: Harness;
  let handle: Handler;

  beforeEach(() => {
    h = createHarness({ withEmbeddings: false });
    handle = createRouter(h.container).handle;

    h.db.addUser({ id: 'alice', display_name: 'Alice', points: 30 });
    h.db.addUser({ id: 'bob', display_name: 'Bob', points: 10 });
    h.db.addUser({ id: 'mod', display_name: 'Mod', is_moderator: true });
  });

  function send(method: string, path: string, opts?: { as?: string; body?: unknown }) {
    const headers: Record<string, string> = {};
    if (opts?.as) headers['Authorization'] = `Bearer key-${opts.as}`;
    if (opts?.body !== undefined) headers['Content-Type'] = 'application/json';

    const req = new Request(`${BASE}${path}`, {
      method,
      headers,
      body: opts?.body === undefined ? undefined : JSON.stringify(opts.body),
    });
    return handle(req, { user: null });
  }

  function submitKpanda(as = 'alice') {
    return send('POST', '/entries', {
      as,
      body: { kolokwaText: 'Kpanda', englishTranslation: 'Lizard' },
    });
  }

  // ── Entries ──

  describe('POST /entries', () => {
    it('should create a pending entry', async () => {
      const res = await submitKpanda();

      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({
        id: 'entry-1',
        kolokwaText: 'Kpanda',
        englishTranslation: 'Lizard',
        status: 'pending',
        verificationCount: 0,
        contributor: { id: 'alice', displayName: 'Alice', level: 'beginner' },
      });
      expect(h.db.user('alice').points).toBe(32);
    });

    it('should return 401 without an Authorization header', async () => {
      const res = await send('POST', '/entries', {
        body: { kolokwaText: 'Kpanda', englishTranslation: 'Lizard' },
      });

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        error: {
          code: 'UNAUTHORIZED',
          message: 'Missing or invalid Authorization header. Use: Bearer <api_key>',
        },
      });
    });

    it('should return 401 for an unknown API key', async () => {
      const res = await send('POST', '/entries', {
        as: 'nobody',
        body: { kolokwaText: 'Kpanda', englishTranslation: 'Lizard' },
      });

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        error: { code: 'UNAUTHORIZED', message: 'Invalid API key' },
      });
    });

    it('should return 400 when a required field is missing', async () => {
      const res = await send('POST', '/entries', {
        as: 'alice',
        body: { kolokwaText: 'Kpanda' },
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'INVALID_REQUEST', message: 'englishTranslation is required' },
      });
      expect(h.db.tables.entries.size).toBe(0);
    });

    it('should return 409 when another user already has the word pending', async () => {
      await submitKpanda('alice');
      const res = await submitKpanda('bob');

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        error: {
          code: 'ALREADY_PENDING',
          message:
            'The word "Kpanda" has already been submitted and is pending review. ' +
            'Please check back later.',
          details: { entryId: 'entry-1' },
        },
      });
    });
  });

  describe('GET /entries', () => {
    it('should return an entry by id', async () => {
      await submitKpanda();
      const res = await send('GET', '/entries/entry-1');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        id: 'entry-1',
        contributor: { id: 'alice', displayName: 'Alice' },
      });
    });

    it('should return 404 for an unknown entry', async () => {
      const res = await send('GET', '/entries/missing');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: { code: 'NOT_FOUND', message: 'Entry "missing" not found' },
      });
    });

    it('should route /entries/pending to the review queue', async () => {
      await submitKpanda();
      const res = await send('GET', '/entries/pending');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: [{ id: 'entry-1', status: 'pending' }],
        total: 1,
        limit: 20,
        offset: 0,
      });
    });

    it('should reject an out-of-range page size', async () => {
      const res = await send('GET', '/entries/pending?limit=500');

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { code: 'INVALID_REQUEST', message: 'limit must be an integer between 1 and 100' },
      });
    });
  });

  describe('PUT and DELETE /entries/:id', () => {
    it('should let the contributor edit the entry', async () => {
      await submitKpanda();
      const res = await send('PUT', '/entries/entry-1', {
        as: 'alice',
        body: { englishTranslation: 'Small lizard' },
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ id: 'entry-1', englishTranslation: 'Small lizard' });
    });

    it("should forbid editing another user's entry", async () => {
      await submitKpanda();
      const res = await send('PUT', '/entries/entry-1', {
        as: 'bob',
        body: { englishTranslation: 'Frog' },
      });

      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({
        error: {
          code: 'FORBIDDEN',
          message: 'Only the contributor or a moderator can change this entry',
        },
      });
    });

    it('should delete with 204 and hide the entry afterwards', async () => {
      await submitKpanda();
      const res = await send('DELETE', '/entries/entry-1', { as: 'alice' });

      expect(res.status).toBe(204);
      expect((await send('GET', '/entries/entry-1')).status).toBe(404);
      expect(h.db.user('alice').contributions_count).toBe(0);
    });
  });

  describe('POST /entries/:id/vote', () => {
    it('should record a vote', async () => {
      await submitKpanda();
      const res = await send('POST', '/entries/entry-1/vote', { as: 'bob', body: { polarity: 1 } });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        upvotes: 1,
        downvotes: 0,
        userVote: 1,
        action: 'recorded',
        message: 'Vote recorded',
      });
    });

    it('should reject a polarity other than 1 or -1', async () => {
      await submitKpanda();
      const res = await send('POST', '/entries/entry-1/vote', { as: 'bob', body: { polarity: 2 } });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'INVALID_REQUEST', message: 'polarity must be one of: 1, -1' },
      });
    });
  });

  describe('POST /entries/:id/verify', () => {
    it('should count a verification', async () => {
      await submitKpanda();
      const res = await send('POST', '/entries/entry-1/verify', {
        as: 'bob',
        body: { classification: 'accurate' },
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        verificationCount: 1,
        entryStatus: 'pending',
        message: 'Thank you for your verification!',
      });
    });

    it('should forbid verifying your own entry', async () => {
      await submitKpanda();
      const res = await send('POST', '/entries/entry-1/verify', {
        as: 'alice',
        body: { classification: 'accurate' },
      });

      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({
        error: { code: 'SELF_VERIFICATION', message: 'You cannot verify your own entry' },
      });
    });
  });

  describe('POST /entries/:id/revision', () => {
    it('should let a moderator send a pending entry back', async () => {
      await submitKpanda();
      const res = await send('POST', '/entries/entry-1/revision', {
        as: 'mod',
        body: { note: 'Add an example' },
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ id: 'entry-1', status: 'needs_revision' });
    });

    it('should forbid non-moderators', async () => {
      await submitKpanda();
      const res = await send('POST', '/entries/entry-1/revision', { as: 'bob', body: {} });

      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({
        error: { code: 'FORBIDDEN', message: 'Moderator access required' },
      });
    });
  });

  // ── Search ──

  describe('GET /search', () => {
    it('should fall back to text search without embeddings', async () => {
      h.db.addEntry({ id: 'e-verified', kolokwa_text: 'Kpanda', status: 'verified' });
      const res = await send('GET', '/search?q=kpan&lang=ko');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        query: 'kpan',
        language: 'ko',
        mode: 'text',
        count: 1,
        results: [{ id: 'e-verified', kolokwaText: 'Kpanda', contributor: null }],
      });
    });

    it('should reject an unknown language', async () => {
      const res = await send('GET', '/search?q=kpanda&lang=fr');

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { code: 'INVALID_REQUEST', message: 'lang must be one of: en, ko, auto' },
      });
    });

    it('should reject an empty query', async () => {
      const res = await send('GET', '/search?q=%20');

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { code: 'INVALID_REQUEST', message: 'Search query cannot be empty' },
      });
    });
  });

  // ── Users ──

  describe('users', () => {
    it('should rank the leaderboard by points', async () => {
      const res = await send('GET', '/leaderboard?limit=2');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        data: [
          {
            rank: 1,
            userId: 'alice',
            displayName: 'Alice',
            points: 30,
            level: 'beginner',
            verifiedContributions: 0,
            badgesCount: 0,
          },
          {
            rank: 2,
            userId: 'bob',
            displayName: 'Bob',
            points: 10,
            level: 'beginner',
            verifiedContributions: 0,
            badgesCount: 0,
          },
        ],
      });
    });

    it('should return a public profile', async () => {
      const res = await send('GET', '/users/alice');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        id: 'alice',
        displayName: 'Alice',
        points: 30,
        contributionsCount: 0,
        verificationsCount: 0,
        streak: { current: 0, longest: 0, lastContributionDate: null },
        badges: [],
      });
    });

    it('should return 404 for an unknown user', async () => {
      const res = await send('GET', '/users/nobody');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: { code: 'NOT_FOUND', message: 'User "nobody" not found' },
      });
    });

    it('should let a moderator deduct points', async () => {
      const res = await send('POST', '/users/alice/penalty', {
        as: 'mod',
        body: { points: 5, reason: 'Spam' },
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        userId: 'alice',
        pointsDeducted: 5,
        balance: 25,
        level: 'beginner',
      });
      expect(h.db.transactionsFor('alice')[0].description).toBe('Penalty: Spam');
    });

    it('should forbid penalties from non-moderators', async () => {
      const res = await send('POST', '/users/alice/penalty', {
        as: 'bob',
        body: { points: 5, reason: 'Spam' },
      });

      expect(res.status).toBe(403);
      expect(h.db.user('alice').points).toBe(30);
    });
  });

  // ── Challenges ──

  describe('challenges', () => {
    beforeEach(() => {
      h.db.addChallenge({ id: 'ch-1', title: 'Add a proverb', points_reward: 15 });
    });

    it("should return today's challenge", async () => {
      const res = await send('GET', '/challenges/today', { as: 'bob' });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        id: 'ch-1',
        title: 'Add a proverb',
        pointsReward: 15,
        accepted: false,
        completed: false,
      });
    });

    it('should accept then complete a challenge', async () => {
      const accepted = await send('POST', '/challenges/ch-1/accept', { as: 'bob' });
      expect(accepted.status).toBe(200);
      expect(await accepted.json()).toMatchObject({ id: 'ch-1', accepted: true });

      const completed = await send('POST', '/challenges/ch-1/complete', { as: 'bob' });
      expect(completed.status).toBe(200);
      expect(await completed.json()).toMatchObject({
        challenge: { id: 'ch-1', accepted: true, completed: true },
        pointsAwarded: 15,
        message: 'Challenge "Add a proverb" completed! Points awarded.',
      });
    });

    it('should require authentication', async () => {
      const res = await send('GET', '/challenges/today');
      expect(res.status).toBe(401);
    });
  });

  // ── Routing ──

  describe('routing', () => {
    it('should answer CORS preflight with 204', async () => {
      const res = await send('OPTIONS', '/entries');

      expect(res.status).toBe(204);
      expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
    });

    it('should add CORS headers to handled responses', async () => {
      const res = await send('GET', '/leaderboard');
      expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
    });

    it('should return 405 with Allow for a known path', async () => {
      const res = await send('PATCH', '/entries/entry-1');

      expect(res.status).toBe(405);
      expect(res.headers.get('Allow')).toBe('GET, PUT, DELETE');
      expect(await res.json()).toEqual({
        error: { code: 'INVALID_REQUEST', message: 'Method PATCH not allowed' },
      });
    });

    it('should return 404 for an unknown path', async () => {
      const res = await send('GET', '/nowhere');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: { code: 'NOT_FOUND', message: 'No route matches GET /api/v1/nowhere' },
      });
    });
  });
});
