/**
 * Request body size limit.
 * Rejects bodies over `maxBytes` with 413 before any parsing happens.
 */

import type { Handler, Middleware } from './pipeline.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function bodyLimit(maxBytes: number): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const declared = Number(req.headers.get('Content-Length') ?? '0');
      if (Number.isFinite(declared) && declared > maxBytes) {
        return tooLarge(maxBytes);
      }

      if (req.body === null) return next(req, ctx);

      // Content-Length can be absent or wrong; measure the real body.
      const text = await req.text();
      if (Buffer.byteLength(text, 'utf8') > maxBytes) {
        return tooLarge(maxBytes);
      }

      return next(
        new Request(req.url, { method: req.method, headers: req.headers, body: text }),
        ctx
      );
    };
  };
}

function tooLarge(maxBytes: number): Response {
  return new Response(
    JSON.stringify({
      error: {
        code: 'INVALID_REQUEST',
        message: `Request body must be ${maxBytes} bytes or less`,
      },
    }),
    { status: 413, headers: JSON_HEADERS }
  );
}
