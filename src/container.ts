/**
 * Dependency wiring.
 * Constructs all services with their dependencies. Production passes the pg
 * transaction manager and Supabase read repository; tests pass in-memory ones.
 */

import type { ITransactionManager } from './repositories/IUnitOfWork.js';
import type { IDictionaryRepository } from './repositories/IDictionaryRepository.js';
import type { IEmbeddingProvider } from './providers/IEmbeddingProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { IRateLimitStore } from './stores/IRateLimitStore.js';
import type { Middleware } from './middleware/pipeline.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config.js';
import { BadgeService } from './services/BadgeService.js';
import { PointLedgerService } from './services/PointLedgerService.js';
import { StreakService } from './services/StreakService.js';
import { VoteService } from './services/VoteService.js';
import { VerificationService } from './services/VerificationService.js';
import { EmbeddingSyncService } from './services/EmbeddingSyncService.js';
import { ContributionService } from './services/ContributionService.js';
import { DictionaryService } from './services/DictionaryService.js';
import { UserService } from './services/UserService.js';
import { ChallengeService } from './services/ChallengeService.js';
import { ModerationService } from './services/ModerationService.js';
import { ReconciliationService } from './services/ReconciliationService.js';
import { createAuthMiddleware } from './middleware/authenticate.js';
import { createRateLimitMiddleware, RATE_LIMITS } from './middleware/rate-limit.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { createErrorHandler } from './middleware/error-handler.js';
import { bodyLimit } from './middleware/body-limit.js';

type RateLimitName = keyof typeof RATE_LIMITS;

export interface Container {
  contributionService: ContributionService;
  dictionaryService: DictionaryService;
  userService: UserService;
  challengeService: ChallengeService;
  moderationService: ModerationService;
  reconciliationService: ReconciliationService;
  embeddings: EmbeddingSyncService;
  logProvider: ILogProvider;
  authenticate: Middleware;
  bodyLimit: Middleware;
  logging: Middleware;
  errorHandler: Middleware;
  rateLimit: Record<RateLimitName, Middleware>;
}

export function createContainer(deps: {
  tx: ITransactionManager;
  dictionary: IDictionaryRepository;
  embeddingProvider: IEmbeddingProvider | null;
  logProvider: ILogProvider;
  rateLimitStore: IRateLimitStore;
  config?: EngineConfig;
  /** How long to stop calling the embedding provider after it fails. */
  embeddingCooldownMs?: number;
}): Container {
  const config = deps.config ?? DEFAULT_ENGINE_CONFIG;
  const logger = deps.logProvider;

  const badges = new BadgeService(config, logger);
  const ledger = new PointLedgerService(badges, config, logger);
  const streaks = new StreakService(ledger, config);
  const embeddings = new EmbeddingSyncService(
    deps.embeddingProvider,
    deps.dictionary,
    logger,
    deps.embeddingCooldownMs
  );

  const contributionService = new ContributionService(
    deps.tx,
    new VoteService(),
    new VerificationService(config),
    ledger,
    streaks,
    embeddings,
    logger
  );
  const dictionaryService = new DictionaryService(deps.dictionary, embeddings, logger);
  const userService = new UserService(deps.dictionary);
  const challengeService = new ChallengeService(deps.tx, ledger, streaks, logger);
  const moderationService = new ModerationService(deps.tx, ledger, logger);
  const reconciliationService = new ReconciliationService(deps.tx, ledger, config, logger);

  const rateLimit = {
    submitEntry: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.submitEntry),
    updateEntry: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.updateEntry),
    deleteEntry: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.deleteEntry),
    vote: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.vote),
    verify: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.verify),
    search: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.search),
    embeddingBudget: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.embeddingBudget),
  };

  return {
    contributionService,
    dictionaryService,
    userService,
    challengeService,
    moderationService,
    reconciliationService,
    embeddings,
    logProvider: logger,
    authenticate: createAuthMiddleware(userService),
    bodyLimit: bodyLimit(50 * 1024), // 50KB max request body
    logging: createLoggingMiddleware(logger),
    errorHandler: createErrorHandler(logger),
    rateLimit,
  };
}
