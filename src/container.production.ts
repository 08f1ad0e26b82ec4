/**
 * Production container: pg for the write side, Supabase for reads and rate
 * limits, OpenAI embeddings when a key is configured.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig } from './config.js';
import { getPgPool, getSupabaseClient } from './db.js';
import { PgTransactionManager } from './repositories/PgTransactionManager.js';
import { SupabaseDictionaryRepository } from './repositories/SupabaseDictionaryRepository.js';
import {
  AxiomLogProvider,
  ConsoleLogProvider,
  OpenAIEmbeddingProvider,
} from './providers/index.js';
import { SupabaseRateLimitStore } from './stores/SupabaseRateLimitStore.js';

const BASE_FIELDS = { service: 'kolokwa-core' };

let cached: Container | null = null;

export function getProductionContainer(): Container {
  if (cached) return cached;

  const config = loadConfig();

  if (!config.databaseUrl || !config.supabase) {
    throw new Error(
      'Missing required environment variables: DATABASE_URL, SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY'
    );
  }

  const db = getSupabaseClient(config.supabase.url, config.supabase.serviceRoleKey);

  // Axiom logging when configured, console otherwise.
  const logProvider = config.axiom
    ? new AxiomLogProvider({ ...config.axiom, baseFields: BASE_FIELDS })
    : new ConsoleLogProvider({ outputToConsole: true, baseFields: BASE_FIELDS });

  // Without a key, search runs in text mode only.
  const embeddingProvider = config.openaiApiKey
    ? new OpenAIEmbeddingProvider({ apiKey: config.openaiApiKey })
    : null;

  cached = createContainer({
    tx: new PgTransactionManager(getPgPool(config.databaseUrl), logProvider),
    dictionary: new SupabaseDictionaryRepository(db),
    embeddingProvider,
    logProvider,
    rateLimitStore: new SupabaseRateLimitStore(db),
    config: config.engine,
  });

  return cached;
}
