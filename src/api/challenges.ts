/**
 * Daily challenge endpoints (auth required).
 * GET  /api/v1/challenges/today
 * POST /api/v1/challenges/:id/accept
 * POST /api/v1/challenges/:id/complete
 */

import { pipeline } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { json, pathSegment, requireUser } from './request.js';

export function createChallengeHandlers(container: Container) {
  const { logging, errorHandler, authenticate } = container;
  const authed = pipeline(logging, errorHandler, authenticate);

  const today: Handler = authed(async (_req, ctx) => {
    return json(await container.challengeService.today(requireUser(ctx).id));
  });

  const accept: Handler = authed(async (req, ctx) => {
    return json(await container.challengeService.accept(pathSegment(req, 1), requireUser(ctx).id));
  });

  const complete: Handler = authed(async (req, ctx) => {
    return json(
      await container.challengeService.complete(pathSegment(req, 1), requireUser(ctx).id)
    );
  });

  return { today, accept, complete };
}
