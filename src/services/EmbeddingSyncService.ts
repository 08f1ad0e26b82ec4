/**
 * Embedding collaborator.
 * Keeps the semantic index in step with verified entries. Calls happen only
 * after the ledger transaction has committed; a failure is logged and puts the
 * provider on a cooldown, and never reaches the caller.
 */

import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IDictionaryRepository } from '../repositories/IDictionaryRepository.js';
import type { EntryRow } from '../types/database.js';
import { DependencyError } from '../errors.js';

const DEFAULT_COOLDOWN_MS = 5 * 60_000;

/** Text that represents an entry in the index. */
export function embeddingText(entry: EntryRow): string {
  return [
    entry.kolokwa_text,
    entry.english_translation,
    entry.literal_translation,
    entry.context_explanation,
    entry.example_kolokwa,
    entry.example_english,
  ]
    .filter((part): part is string => Boolean(part))
    .join('\n');
}

export class EmbeddingSyncService {
  private unavailableUntil = 0;
  private readonly inFlight = new Set<Promise<boolean>>();

  constructor(
    private readonly provider: IEmbeddingProvider | null,
    private readonly dictionary: IDictionaryRepository,
    private readonly logger: ILogProvider,
    private readonly cooldownMs = DEFAULT_COOLDOWN_MS
  ) {}

  isAvailable(): boolean {
    return this.provider !== null && Date.now() >= this.unavailableUntil;
  }

  /** Embed free text (search queries). Null when unavailable or failing. */
  async embed(text: string): Promise<number[] | null> {
    if (!this.provider || !this.isAvailable()) return null;

    try {
      return await this.provider.generate(text);
    } catch (err) {
      this.fail('Query embedding failed', err, {});
      return null;
    }
  }

  /** Embed and store one entry. Resolves false on any failure. */
  async sync(entry: EntryRow): Promise<boolean> {
    if (!this.provider || !this.isAvailable()) return false;

    try {
      const embedding = await this.provider.generate(embeddingText(entry));
      await this.dictionary.saveEmbedding(entry.id, embedding);
      this.logger.debug('Entry embedding updated', { entryId: entry.id });
      return true;
    } catch (err) {
      this.fail('Entry embedding failed', err, { entryId: entry.id });
      return false;
    }
  }

  /** Start a sync without waiting for it. */
  schedule(entry: EntryRow): void {
    const pending = this.sync(entry);
    this.inFlight.add(pending);
    void pending.finally(() => this.inFlight.delete(pending));
  }

  /** Wait for every scheduled sync to settle. */
  async drain(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  private fail(message: string, err: unknown, fields: Record<string, unknown>): void {
    const failure = new DependencyError(message, 'embeddings', err);
    this.unavailableUntil = Date.now() + this.cooldownMs;
    this.logger.error(failure.message, {
      ...fields,
      code: failure.code,
      dependency: failure.dependency,
      error: err instanceof Error ? err.message : String(err),
      retryAfterMs: this.cooldownMs,
    });
  }
}
