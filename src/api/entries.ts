/**
 * Entry endpoints.
 * POST   /api/v1/entries               Submit an entry (auth required)
 * GET    /api/v1/entries/pending       Review queue
 * GET    /api/v1/entries/:id           Entry detail
 * PUT    /api/v1/entries/:id           Edit an entry (owner or moderator)
 * DELETE /api/v1/entries/:id           Delete an entry (owner or moderator)
 * POST   /api/v1/entries/:id/vote      Cast, flip or toggle a vote
 * POST   /api/v1/entries/:id/verify    Submit a verification
 * POST   /api/v1/entries/:id/revision  Send back for revision (moderator)
 */

import { pipeline, validateBody } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { SubmitEntryRequest, UpdateEntryRequest } from '../types/api.js';
import { ENTRY_TYPES, VERIFICATION_CLASSIFICATIONS } from '../types/models.js';
import { ValidationError } from '../errors.js';
import {
  intParam,
  json,
  optionalString,
  optionalStringArray,
  pathSegment,
  readBody,
  requireUser,
} from './request.js';

const contentFields: BodySchema = {
  literalTranslation: { type: 'string', required: false, maxLength: 2000 },
  entryType: { type: 'string', required: false, enum: ENTRY_TYPES },
  contextExplanation: { type: 'string', required: false, maxLength: 2000 },
  exampleKolokwa: { type: 'string', required: false, maxLength: 2000 },
  exampleEnglish: { type: 'string', required: false, maxLength: 2000 },
  culturalNotes: { type: 'string', required: false, maxLength: 2000 },
  pronunciationGuide: { type: 'string', required: false, maxLength: 2000 },
  region: { type: 'string', required: false, maxLength: 2000 },
  tags: { type: 'array', required: false },
};

const submitSchema: BodySchema = {
  kolokwaText: { type: 'string', required: true, maxLength: 200 },
  englishTranslation: { type: 'string', required: true, maxLength: 500 },
  ...contentFields,
};

const updateSchema: BodySchema = {
  kolokwaText: { type: 'string', required: false, maxLength: 200 },
  englishTranslation: { type: 'string', required: false, maxLength: 500 },
  ...contentFields,
};

const voteSchema: BodySchema = {
  polarity: { type: 'number', required: true, enum: [1, -1] },
};

const verifySchema: BodySchema = {
  classification: { type: 'string', required: true, enum: VERIFICATION_CLASSIFICATIONS },
  comment: { type: 'string', required: false, maxLength: 2000 },
};

const revisionSchema: BodySchema = {
  note: { type: 'string', required: false, maxLength: 2000 },
};

function toUpdateRequest(body: Record<string, unknown>): UpdateEntryRequest {
  const entryType = ENTRY_TYPES.find((t) => t === body.entryType);
  return {
    kolokwaText: optionalString(body, 'kolokwaText'),
    englishTranslation: optionalString(body, 'englishTranslation'),
    literalTranslation: optionalString(body, 'literalTranslation'),
    entryType,
    contextExplanation: optionalString(body, 'contextExplanation'),
    exampleKolokwa: optionalString(body, 'exampleKolokwa'),
    exampleEnglish: optionalString(body, 'exampleEnglish'),
    culturalNotes: optionalString(body, 'culturalNotes'),
    pronunciationGuide: optionalString(body, 'pronunciationGuide'),
    region: optionalString(body, 'region'),
    tags: optionalStringArray(body, 'tags'),
  };
}

function toSubmitRequest(body: Record<string, unknown>): SubmitEntryRequest {
  const kolokwaText = optionalString(body, 'kolokwaText');
  const englishTranslation = optionalString(body, 'englishTranslation');
  if (kolokwaText === undefined || englishTranslation === undefined) {
    throw new ValidationError('kolokwaText and englishTranslation are required');
  }
  return { ...toUpdateRequest(body), kolokwaText, englishTranslation };
}

export function createEntryHandlers(container: Container) {
  const { logging, errorHandler, bodyLimit, authenticate, rateLimit } = container;

  const create: Handler = pipeline(
    logging,
    errorHandler,
    bodyLimit,
    authenticate,
    rateLimit.submitEntry,
    validateBody(submitSchema)
  )(async (req, ctx) => {
    const body = await readBody(req);
    const result = await container.contributionService.submitEntry(
      toSubmitRequest(body),
      requireUser(ctx)
    );
    return json(result, 201);
  });

  const getById: Handler = pipeline(logging, errorHandler)(async (req) => {
    const result = await container.dictionaryService.getEntry(pathSegment(req, 0));
    return json(result);
  });

  const pending: Handler = pipeline(logging, errorHandler)(async (req) => {
    const url = new URL(req.url);
    const result = await container.dictionaryService.pendingQueue({
      limit: intParam(url, 'limit', 20, { min: 1, max: 100 }),
      offset: intParam(url, 'offset', 0, { min: 0, max: 100_000 }),
    });
    return json(result);
  });

  const update: Handler = pipeline(
    logging,
    errorHandler,
    bodyLimit,
    authenticate,
    rateLimit.updateEntry,
    validateBody(updateSchema)
  )(async (req, ctx) => {
    const body = await readBody(req);
    const result = await container.contributionService.updateEntry(
      pathSegment(req, 0),
      requireUser(ctx),
      toUpdateRequest(body)
    );
    return json(result);
  });

  const del: Handler = pipeline(
    logging,
    errorHandler,
    authenticate,
    rateLimit.deleteEntry
  )(async (req, ctx) => {
    await container.contributionService.deleteEntry(pathSegment(req, 0), requireUser(ctx));
    return new Response(null, { status: 204 });
  });

  const vote: Handler = pipeline(
    logging,
    errorHandler,
    bodyLimit,
    authenticate,
    rateLimit.vote,
    validateBody(voteSchema)
  )(async (req, ctx) => {
    const body = await readBody(req);
    const result = await container.contributionService.castVote(
      pathSegment(req, 1),
      requireUser(ctx),
      body.polarity
    );
    return json(result);
  });

  const verify: Handler = pipeline(
    logging,
    errorHandler,
    bodyLimit,
    authenticate,
    rateLimit.verify,
    validateBody(verifySchema)
  )(async (req, ctx) => {
    const body = await readBody(req);
    const result = await container.contributionService.submitVerification(
      pathSegment(req, 1),
      requireUser(ctx),
      body.classification,
      body.comment
    );
    return json(result);
  });

  const requestRevision: Handler = pipeline(
    logging,
    errorHandler,
    bodyLimit,
    authenticate,
    validateBody(revisionSchema)
  )(async (req, ctx) => {
    const body = await readBody(req);
    const result = await container.moderationService.requestRevision(
      pathSegment(req, 1),
      requireUser(ctx),
      optionalString(body, 'note') ?? ''
    );
    return json(result);
  });

  return { create, getById, pending, update, delete: del, vote, verify, requestRevision };
}
