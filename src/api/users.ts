/**
 * User endpoints.
 * GET  /api/v1/users/:id          Public profile with level, streak and badges
 * GET  /api/v1/leaderboard        Ranked by points
 * POST /api/v1/users/:id/penalty  Deduct points (moderator)
 */

import { pipeline, validateBody } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import { intParam, json, pathSegment, readBody, requireUser } from './request.js';

const penaltySchema: BodySchema = {
  points: { type: 'number', required: true },
  reason: { type: 'string', required: true, maxLength: 500 },
};

export function createUserHandlers(container: Container) {
  const { logging, errorHandler, bodyLimit, authenticate } = container;

  const getProfile: Handler = pipeline(logging, errorHandler)(async (req) => {
    const result = await container.userService.getProfile(pathSegment(req, 0));
    return json(result);
  });

  const leaderboard: Handler = pipeline(logging, errorHandler)(async (req) => {
    const url = new URL(req.url);
    const result = await container.dictionaryService.leaderboard(
      intParam(url, 'limit', 10, { min: 1, max: 100 })
    );
    return json({ data: result });
  });

  const penalize: Handler = pipeline(
    logging,
    errorHandler,
    bodyLimit,
    authenticate,
    validateBody(penaltySchema)
  )(async (req, ctx) => {
    const body = await readBody(req);
    const result = await container.moderationService.penalize(
      pathSegment(req, 1),
      requireUser(ctx),
      body.points,
      body.reason
    );
    return json(result);
  });

  return { getProfile, leaderboard, penalize };
}
