/**
 * Small builders for middleware and handler tests.
 */

import type { User } from '../../src/types/models.js';
import type { HandlerContext } from '../../src/middleware/pipeline.js';

export function testUser(overrides: Partial<User> = {}): User {
  return {
    id: 'user-1',
    displayName: 'Tester',
    isModerator: false,
    points: 0,
    level: 'beginner',
    contributionsCount: 0,
    verificationsCount: 0,
    joinedAt: new Date('2026-01-01T00:00:00.000Z'),
    ...overrides,
  };
}

export function anonymous(): HandlerContext {
  return { user: null };
}

export function signedIn(overrides: Partial<User> = {}): HandlerContext {
  return { user: testUser(overrides) };
}
