/**
 * Helpers shared by the endpoint handlers: JSON responses, body access and
 * path parameters. Bodies have already passed `validateBody`, so the readers
 * here only narrow types.
 */

import type { HandlerContext } from '../middleware/pipeline.js';
import type { User } from '../types/models.js';
import { isRecord } from '../middleware/validate-body.js';
import { UnauthorizedError, ValidationError } from '../errors.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), { status, headers: JSON_HEADERS });
}

export async function readBody(req: Request): Promise<Record<string, unknown>> {
  let parsed: unknown;
  try {
    parsed = await req.json();
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
  if (!isRecord(parsed)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return parsed;
}

export function optionalString(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  return typeof value === 'string' ? value : undefined;
}

export function optionalStringArray(
  body: Record<string, unknown>,
  key: string
): string[] | undefined {
  const value = body[key];
  if (!Array.isArray(value)) return undefined;
  return value.filter((v): v is string => typeof v === 'string');
}

/** The authenticated caller; handlers behind `authenticate` always have one. */
export function requireUser(ctx: HandlerContext): User {
  if (!ctx.user) throw new UnauthorizedError();
  return ctx.user;
}

/**
 * Path segment at `index` counted from the end of the path, ignoring a
 * trailing slash. `/api/v1/entries/abc/vote` → segment(1) is "abc".
 */
export function pathSegment(req: Request, fromEnd: number): string {
  const parts = new URL(req.url).pathname.split('/').filter(Boolean);
  return decodeURIComponent(parts[parts.length - 1 - fromEnd] ?? '');
}

export function intParam(
  url: URL,
  name: string,
  fallback: number,
  bounds: { min: number; max: number }
): number {
  const raw = url.searchParams.get(name);
  if (raw === null || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < bounds.min || value > bounds.max) {
    throw new ValidationError(`${name} must be an integer between ${bounds.min} and ${bounds.max}`);
  }
  return value;
}
