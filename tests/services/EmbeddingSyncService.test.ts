import { describe, it, expect, beforeEach } from 'vitest';
import { EmbeddingSyncService, embeddingText } from '../../src/services/EmbeddingSyncService.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { MockDatabase } from '../mocks/MockDatabase.js';
import { MockDictionaryRepository } from '../mocks/MockDictionaryRepository.js';
import { MockEmbeddingProvider } from '../mocks/MockEmbeddingProvider.js';

describe('EmbeddingSyncService', () => {
  let db: MockDatabase;
  let dictionary: MockDictionaryRepository;
  let provider: MockEmbeddingProvider;
  let logs: ConsoleLogProvider;

  beforeEach(() => {
    db = new MockDatabase();
    dictionary = new MockDictionaryRepository(db);
    provider = new MockEmbeddingProvider();
    logs = new ConsoleLogProvider();
  });

  it('should build the index text from the filled-in fields', () => {
    const entry = db.addEntry({
      id: 'e1',
      kolokwa_text: 'Kpanda',
      english_translation: 'Lizard',
      example_english: 'A lizard on the wall',
    });

    expect(embeddingText(entry)).toBe('Kpanda\nLizard\nA lizard on the wall');
  });

  it('should embed and store an entry', async () => {
    const entry = db.addEntry({ id: 'e1', kolokwa_text: 'Kpanda', english_translation: 'Lizard' });
    const sync = new EmbeddingSyncService(provider, dictionary, logs);

    await expect(sync.sync(entry)).resolves.toBe(true);
    expect(db.tables.embeddings.get('e1')).toEqual(provider.vectorFor('Kpanda\nLizard'));
  });

  it('should do nothing without a provider', async () => {
    const entry = db.addEntry({ id: 'e1', kolokwa_text: 'Kpanda' });
    const sync = new EmbeddingSyncService(null, dictionary, logs);

    expect(sync.isAvailable()).toBe(false);
    await expect(sync.sync(entry)).resolves.toBe(false);
    await expect(sync.embed('kpanda')).resolves.toBeNull();
    expect(logs.events).toEqual([]);
  });

  it('should log a provider failure and back off', async () => {
    const entry = db.addEntry({ id: 'e1', kolokwa_text: 'Kpanda' });
    const sync = new EmbeddingSyncService(provider, dictionary, logs, 60_000);
    provider.failWith = new Error('503 from upstream');

    await expect(sync.sync(entry)).resolves.toBe(false);

    expect(sync.isAvailable()).toBe(false);
    const [event] = logs.events;
    expect(event.level).toBe('error');
    expect(event.message).toBe('Entry embedding failed');
    expect(event.fields).toEqual({
      entryId: 'e1',
      code: 'DEPENDENCY_FAILED',
      dependency: 'embeddings',
      error: '503 from upstream',
      retryAfterMs: 60_000,
    });

    provider.failWith = null;
    await expect(sync.sync(entry)).resolves.toBe(false);
    expect(provider.callCount).toBe(1);
  });

  it('should recover once the cooldown has passed', async () => {
    const entry = db.addEntry({ id: 'e1', kolokwa_text: 'Kpanda' });
    const sync = new EmbeddingSyncService(provider, dictionary, logs, 0);
    provider.failWith = new Error('timeout');
    await sync.sync(entry);

    provider.failWith = null;
    await expect(sync.sync(entry)).resolves.toBe(true);
    expect(db.tables.embeddings.has('e1')).toBe(true);
  });

  it('should treat a storage failure like a provider failure', async () => {
    const entry = db.addEntry({ id: 'e1', kolokwa_text: 'Kpanda' });
    const sync = new EmbeddingSyncService(provider, dictionary, logs);
    dictionary.saveError = new Error('connection reset');

    await expect(sync.sync(entry)).resolves.toBe(false);
    expect(logs.events[0].fields?.error).toBe('connection reset');
  });

  it('should let callers wait for scheduled syncs', async () => {
    const a = db.addEntry({ id: 'a', kolokwa_text: 'Chinch' });
    const b = db.addEntry({ id: 'b', kolokwa_text: 'Kpanda' });
    const sync = new EmbeddingSyncService(provider, dictionary, logs);

    sync.schedule(a);
    sync.schedule(b);
    await sync.drain();

    expect([...db.tables.embeddings.keys()].sort()).toEqual(['a', 'b']);
  });

  it('should return null for a query embedding when the provider fails', async () => {
    const sync = new EmbeddingSyncService(provider, dictionary, logs);
    provider.failWith = new Error('bad key');

    await expect(sync.embed('kpanda')).resolves.toBeNull();
    expect(logs.events[0].message).toBe('Query embedding failed');
    expect(logs.events[0].fields).not.toHaveProperty('entryId');
  });
});
