/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Works with any runtime built on the fetch Request/Response types.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { createEntryHandlers } from './entries.js';
import { createSearchHandlers } from './search.js';
import { createUserHandlers } from './users.js';
import { createChallengeHandlers } from './challenges.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

const ID = '[^/]+';

function route(method: string, path: string, handler: Handler): Route {
  return { method, pattern: new RegExp(`^/api/v1${path}/?$`), handler };
}

export function createRouter(container: Container) {
  const entries = createEntryHandlers(container);
  const search = createSearchHandlers(container);
  const users = createUserHandlers(container);
  const challenges = createChallengeHandlers(container);

  // First match wins: /entries/pending must precede /entries/:id.
  const routes: Route[] = [
    // Entries
    route('POST', '/entries', entries.create),
    route('GET', '/entries/pending', entries.pending),
    route('GET', `/entries/${ID}`, entries.getById),
    route('PUT', `/entries/${ID}`, entries.update),
    route('DELETE', `/entries/${ID}`, entries.delete),
    route('POST', `/entries/${ID}/vote`, entries.vote),
    route('POST', `/entries/${ID}/verify`, entries.verify),
    route('POST', `/entries/${ID}/revision`, entries.requestRevision),

    // Search
    route('GET', '/search', search.search),

    // Users
    route('GET', '/leaderboard', users.leaderboard),
    route('GET', `/users/${ID}`, users.getProfile),
    route('POST', `/users/${ID}/penalty`, users.penalize),

    // Challenges
    route('GET', '/challenges/today', challenges.today),
    route('POST', `/challenges/${ID}/accept`, challenges.accept),
    route('POST', `/challenges/${ID}/complete`, challenges.complete),
  ];

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
    const url = new URL(req.url);
    const method = req.method;

    // CORS preflight
    if (method === 'OPTIONS') {
      return new Response(null, {
        status: 204,
        headers: corsHeaders(),
      });
    }

    for (const route of routes) {
      if (route.method === method && route.pattern.test(url.pathname)) {
        const response = await route.handler(req, ctx);
        return addCorsHeaders(response);
      }
    }

    // Check if path matches but method doesn't
    const pathMatches = routes.some((r) => r.pattern.test(url.pathname));
    if (pathMatches) {
      const allowed = [
        ...new Set(routes.filter((r) => r.pattern.test(url.pathname)).map((r) => r.method)),
      ].join(', ');

      return new Response(
        JSON.stringify({
          error: {
            code: 'INVALID_REQUEST',
            message: `Method ${method} not allowed`,
          },
        }),
        {
          status: 405,
          headers: {
            'Content-Type': 'application/json',
            Allow: allowed,
            ...corsHeaders(),
          },
        }
      );
    }

    return new Response(
      JSON.stringify({
        error: {
          code: 'NOT_FOUND',
          message: `No route matches ${method} ${url.pathname}`,
        },
      }),
      {
        status: 404,
        headers: { 'Content-Type': 'application/json', ...corsHeaders() },
      }
    );
  };

  return { handle, routes };
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, PUT, DELETE, OPTIONS',
    'Access-Control-Allow-Headers': 'Authorization, Content-Type',
    'Access-Control-Max-Age': '86400',
  };
}

function addCorsHeaders(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(corsHeaders())) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
