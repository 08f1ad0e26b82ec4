import { describe, it, expect } from 'vitest';
import { createErrorHandler, errorHandler } from '../../src/middleware/error-handler.js';
import {
  NotFoundError,
  UnauthorizedError,
  ValidationError,
  RateLimitError,
  ConflictError,
  DependencyError,
  ForbiddenError,
} from '../../src/errors.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { Handler } from '../../src/middleware/pipeline.js';
import { anonymous } from '../mocks/fixtures.js';

function failing(err: unknown): Handler {
  return async () => {
    throw err;
  };
}

describe('errorHandler', () => {
  const req = new Request('http://test/api/v1/entries');

  it('should pass through successful responses', async () => {
    const handler: Handler = async () =>
      new Response(JSON.stringify({ ok: true }), { status: 200 });

    const res = await errorHandler(handler)(req, anonymous());

    expect(res.status).toBe(200);
  });

  it('should map NotFoundError to 404', async () => {
    const res = await errorHandler(failing(new NotFoundError('Thing not found')))(req, anonymous());

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: 'NOT_FOUND', message: 'Thing not found' },
    });
  });

  it('should map UnauthorizedError to 401', async () => {
    const res = await errorHandler(failing(new UnauthorizedError()))(req, anonymous());

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: { code: 'UNAUTHORIZED', message: 'Authentication required' },
    });
  });

  it('should map self-verification to 403 with its own code', async () => {
    const err = new ForbiddenError('You cannot verify your own entry', 'SELF_VERIFICATION');
    const res = await errorHandler(failing(err))(req, anonymous());

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({
      error: { code: 'SELF_VERIFICATION', message: 'You cannot verify your own entry' },
    });
  });

  it('should map ValidationError to 400 with details', async () => {
    const err = new ValidationError('Bad input', { field: 'kolokwaText' });
    const res = await errorHandler(failing(err))(req, anonymous());

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: 'INVALID_REQUEST', message: 'Bad input', details: { field: 'kolokwaText' } },
    });
  });

  it('should map RateLimitError to 429 with Retry-After', async () => {
    const res = await errorHandler(failing(new RateLimitError(30)))(req, anonymous());

    expect(res.status).toBe(429);
    expect(res.headers.get('Retry-After')).toBe('30');
    expect(await res.json()).toEqual({
      error: {
        code: 'RATE_LIMITED',
        message: 'Too many requests, slow down',
        details: { retryAfter: 30 },
      },
    });
  });

  it('should map duplicate submissions to 409 with the existing entry', async () => {
    const err = new ConflictError('ALREADY_VERIFIED', 'Already in the dictionary', {
      entryId: 'e1',
    });
    const res = await errorHandler(failing(err))(req, anonymous());

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: {
        code: 'ALREADY_VERIFIED',
        message: 'Already in the dictionary',
        details: { entryId: 'e1' },
      },
    });
  });

  it('should map DependencyError to 503 with a retry hint', async () => {
    const err = new DependencyError('Rewards could not be applied', 'rewards', new Error('boom'));
    const res = await errorHandler(failing(err))(req, anonymous());

    expect(res.status).toBe(503);
    expect(res.headers.get('Retry-After')).toBe('5');
    expect(await res.json()).toEqual({
      error: {
        code: 'DEPENDENCY_FAILED',
        message: 'Rewards could not be applied',
        details: { dependency: 'rewards' },
      },
    });
  });

  it('should map unknown errors to 500 without exposing internals', async () => {
    const err = new Error('password=test-secret rejected by database');
    const res = await errorHandler(failing(err))(req, anonymous());

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
    });
  });

  it('should log unknown errors when given a logger', async () => {
    const logs = new ConsoleLogProvider();
    const handler = createErrorHandler(logs)(failing(new Error('socket hang up')));

    await handler(new Request('http://test/api/v1/search?q=x', { method: 'GET' }), anonymous());

    expect(logs.events).toHaveLength(1);
    expect(logs.events[0].level).toBe('error');
    expect(logs.events[0].message).toBe('Unhandled error');
    expect(logs.events[0].fields).toMatchObject({
      method: 'GET',
      path: '/api/v1/search',
      error: 'socket hang up',
    });
  });

  it('should not log errors the caller can act on', async () => {
    const logs = new ConsoleLogProvider();
    const handler = createErrorHandler(logs)(failing(new NotFoundError('gone')));

    await handler(req, anonymous());

    expect(logs.events).toEqual([]);
  });

  it('should set Content-Type to application/json', async () => {
    const res = await errorHandler(failing(new NotFoundError('gone')))(req, anonymous());

    expect(res.headers.get('Content-Type')).toBe('application/json');
  });
});
