/**
 * Dictionary read side: entry detail, search, the review queue and the
 * leaderboard.
 */

import type { IDictionaryRepository } from '../repositories/IDictionaryRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { EmbeddingSyncService } from './EmbeddingSyncService.js';
import type { EntryRow } from '../types/database.js';
import type { PaginatedResult, PaginationOptions } from '../types/common.js';
import type {
  ContributorSummary,
  EntryResponse,
  LeaderboardRow,
  SearchLanguage,
  SearchRequest,
  SearchResponse,
} from '../types/api.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { toContributorSummary, toEntryResponse } from './mappers.js';

const SEARCH_LANGUAGES: readonly SearchLanguage[] = ['en', 'ko', 'auto'];
const DEFAULT_SEARCH_LIMIT = 20;
const MAX_SEARCH_LIMIT = 50;
const MAX_QUERY_LENGTH = 200;
/** Minimum cosine similarity for a semantic match. */
const MATCH_THRESHOLD = 0.5;

export class DictionaryService {
  constructor(
    private readonly dictionary: IDictionaryRepository,
    private readonly embeddings: EmbeddingSyncService,
    private readonly logger: ILogProvider
  ) {}

  async getEntry(id: string): Promise<EntryResponse> {
    const entry = await this.dictionary.findEntry(id);
    if (!entry) {
      throw new NotFoundError(`Entry "${id}" not found`);
    }
    const [response] = await this.withContributors([entry]);
    return response;
  }

  async search(request: SearchRequest): Promise<SearchResponse> {
    const query = request.query.trim();
    if (!query) {
      throw new ValidationError('Search query cannot be empty');
    }
    if (query.length > MAX_QUERY_LENGTH) {
      throw new ValidationError(`Search query must be ${MAX_QUERY_LENGTH} characters or less`);
    }

    const language = SEARCH_LANGUAGES.find((l) => l === (request.language ?? 'auto'));
    if (!language) {
      throw new ValidationError(`language must be one of: ${SEARCH_LANGUAGES.join(', ')}`);
    }
    const limit = clampLimit(request.limit);

    const semantic = await this.semanticMatches(query, limit);
    const rows = semantic ?? (await this.dictionary.searchText(query, language, limit));
    const results = await this.withContributors(rows);

    return {
      query,
      language,
      mode: semantic ? 'semantic' : 'text',
      count: results.length,
      results,
    };
  }

  async pendingQueue(options: PaginationOptions): Promise<PaginatedResult<EntryResponse>> {
    const [rows, total] = await Promise.all([
      this.dictionary.listByStatus('pending', options),
      this.dictionary.countByStatus('pending'),
    ]);

    return {
      data: await this.withContributors(rows),
      total,
      limit: options.limit,
      offset: options.offset,
    };
  }

  async leaderboard(limit: number): Promise<LeaderboardRow[]> {
    const rows = await this.dictionary.leaderboard(limit);
    return rows.map((row, index) => ({
      rank: index + 1,
      userId: row.user_id,
      displayName: row.display_name,
      points: row.points,
      level: row.level,
      verifiedContributions: row.verified_contributions,
      badgesCount: row.badges_count,
    }));
  }

  /** Null means "use text search instead". */
  private async semanticMatches(query: string, limit: number): Promise<EntryRow[] | null> {
    const embedding = await this.embeddings.embed(query);
    if (!embedding) return null;

    try {
      const matches = await this.dictionary.matchEntries(embedding, MATCH_THRESHOLD, limit);
      return matches.length > 0 ? matches : null;
    } catch (err) {
      this.logger.warn('Semantic search failed, falling back to text', {
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }

  private async withContributors(rows: EntryRow[]): Promise<EntryResponse[]> {
    const ids = [
      ...new Set(rows.map((r) => r.contributor_id).filter((id): id is string => id !== null)),
    ];
    const summaries = await this.dictionary.findUserSummaries(ids);
    const byId = new Map<string, ContributorSummary>(
      summaries.map((s) => [s.id, toContributorSummary(s)])
    );

    return rows.map((row) =>
      toEntryResponse(row, row.contributor_id ? byId.get(row.contributor_id) ?? null : null)
    );
  }
}

function clampLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_SEARCH_LIMIT;
  return Math.min(MAX_SEARCH_LIMIT, Math.max(1, Math.floor(limit)));
}
