/**
 * Authentication middleware.
 * Extracts the Bearer token from the Authorization header, resolves it to a
 * user via UserService, and attaches the user to context.
 */

import type { UserService } from '../services/UserService.js';
import type { Handler, Middleware } from './pipeline.js';
import { UnauthorizedError } from '../errors.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function createAuthMiddleware(userService: UserService): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const authHeader = req.headers.get('Authorization');

      if (!authHeader || !authHeader.startsWith('Bearer ')) {
        return unauthorized('Missing or invalid Authorization header. Use: Bearer <api_key>');
      }

      const apiKey = authHeader.slice(7).trim();

      if (!apiKey) {
        return unauthorized('API key is empty');
      }

      try {
        ctx.user = await userService.authenticate(apiKey);
      } catch (err) {
        // Lookup failures other than a bad key are real errors
        if (!(err instanceof UnauthorizedError)) throw err;
        return unauthorized('Invalid API key');
      }

      return next(req, ctx);
    };
  };
}

function unauthorized(message: string): Response {
  return new Response(
    JSON.stringify({ error: { code: 'UNAUTHORIZED', message } }),
    { status: 401, headers: JSON_HEADERS }
  );
}
