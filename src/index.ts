// Quizsmith - quiz generation API
// Freemium quotas, document ingestion, billing

// Interfaces
export * from './interfaces';

// Errors and config
export * from './errors/app-errors';
export { AppConfig, AiConfig, BillingConfig, getAppConfig, resetAppConfig, validateAppConfig } from './config/app.config';
export {
  FREE_MONTHLY_QUIZ_LIMIT,
  UPGRADE_URL,
  PLAN_DEFINITIONS,
  getPlanDefinition,
  getMonthlyQuizLimit,
  planHasFeature,
  listPlans,
} from './config/plans';

// Services
export {
  QuotaLedgerService,
  UsageCounterStore,
  InMemoryUsageCounterStore,
  RedisUsageCounterStore,
  periodKeyFor,
  periodBounds,
} from './services/quota-ledger.service';
export { QuestionOrchestratorService, MIN_SOURCE_CHARS, MAX_REQUESTED_QUESTIONS, allocateCounts } from './services/question-orchestrator.service';
export { normalizeQuestion, dedupeQuestions } from './services/question-normalizer';
export { QuizService, toPublicQuizView } from './services/quiz.service';
export { QUIZ_TRANSITIONS, canTransition } from './services/quiz-lifecycle';
export { QuizGenerationService, MAX_GENERATION_ATTEMPTS, validateQuizRequest } from './services/quiz-generation.service';
export { GenerationJobService } from './services/generation-job.service';
export { DocumentService, DocumentOwner } from './services/document.service';
export { TextExtractorService } from './services/text-extractor.service';
export { FileStorage, LocalFileStorage } from './services/file-storage.service';
export { SubscriptionService, effectivePlan, STRIPE_API_VERSION } from './services/subscription.service';
export { RateLimiterService } from './services/rate-limiter.service';

// Generators
export { HeuristicQuestionGenerator } from './services/generators/heuristic.generator';
export { OpenAIQuestionGenerator } from './services/generators/openai.generator';
export { AnthropicQuestionGenerator } from './services/generators/anthropic.generator';

// Auth
export * from './auth';

// HTTP
export { createAppServices, createRequestHandler, createServer, AppServices, ServerOptions } from './server';

// Client
export * from './client/quizsmith-client';
