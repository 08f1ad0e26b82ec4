/**
 * GET /api/v1/search?q=...&lang=en|ko|auto&limit=N
 * Semantic search when embeddings are available, text search otherwise.
 */

import { pipeline } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { SearchLanguage } from '../types/api.js';
import { ValidationError } from '../errors.js';
import { intParam, json } from './request.js';

const LANGUAGES: readonly SearchLanguage[] = ['en', 'ko', 'auto'];

export function createSearchHandlers(container: Container) {
  const { logging, errorHandler, rateLimit } = container;

  const search: Handler = pipeline(
    logging,
    errorHandler,
    rateLimit.search,
    rateLimit.embeddingBudget
  )(async (req) => {
    const url = new URL(req.url);
    const lang = url.searchParams.get('lang') ?? 'auto';
    const language = LANGUAGES.find((l) => l === lang);
    if (!language) {
      throw new ValidationError(`lang must be one of: ${LANGUAGES.join(', ')}`);
    }

    const result = await container.dictionaryService.search({
      query: url.searchParams.get('q') ?? '',
      language,
      limit: intParam(url, 'limit', 20, { min: 1, max: 50 }),
    });
    return json(result);
  });

  return { search };
}
