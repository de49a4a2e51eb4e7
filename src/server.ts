/**
 * Quizsmith API Server
 *
 * Plain http server over the quiz services.
 * Run: npm run build && npm start
 * Test: curl http://localhost:3030/health
 */

import * as http from 'http';
import 'reflect-metadata';

import { AccountService } from './auth/account.service';
import { JwtGuard } from './auth/jwt.guard';
import { AuthContext } from './auth/auth.interface';
import { getJwtConfig, validateJwtConfig } from './auth/jwt.config';
import { RateLimiterService } from './services/rate-limiter.service';
import { QuotaLedgerService } from './services/quota-ledger.service';
import { SubscriptionService } from './services/subscription.service';
import { DocumentService } from './services/document.service';
import { QuestionOrchestratorService } from './services/question-orchestrator.service';
import { QuizService } from './services/quiz.service';
import { GenerationJobService } from './services/generation-job.service';
import { QuizGenerationService } from './services/quiz-generation.service';
import { getAppConfig, validateAppConfig } from './config/app.config';
import { closePool, ensureSchema, healthCheck, isDatabaseEnabled } from './db';
import { NotFoundError, RateLimitedError, UnauthorizedError } from './errors/app-errors';
import {
  isJsonObject,
  optionalString,
  parseBody,
  queryInt,
  readRawBody,
  sendError,
  sendJson,
  sendNoContent,
  clientAddress,
} from './http/request-utils';
import { readUploadedFile } from './http/multipart';
import {
  readGenerateQuizRequest,
  readMetadataUpdate,
  readQuestionOrder,
  readQuizListQuery,
  toDocumentView,
} from './http/quiz-requests';

export interface AppServices {
  accounts: AccountService;
  jwtGuard: JwtGuard;
  rateLimiter: RateLimiterService;
  ledger: QuotaLedgerService;
  subscriptions: SubscriptionService;
  documents: DocumentService;
  orchestrator: QuestionOrchestratorService;
  quizzes: QuizService;
  jobs: GenerationJobService;
  pipeline: QuizGenerationService;
}

export interface ServerOptions {
  corsOrigins?: string[];
  maxUploadBytes?: number;
  trustedProxies?: string[];
}

const WEBHOOK_BODY_LIMIT_BYTES = 512 * 1024;

/**
 * Manual DI - wire up services. Anything passed in replaces the default.
 */
export function createAppServices(overrides: Partial<AppServices> = {}): AppServices {
  const ledger = overrides.ledger || new QuotaLedgerService();
  const subscriptions = overrides.subscriptions || new SubscriptionService();
  const documents = overrides.documents || new DocumentService();
  const orchestrator = overrides.orchestrator || new QuestionOrchestratorService();
  const quizzes = overrides.quizzes || new QuizService();
  const jobs = overrides.jobs || new GenerationJobService();

  return {
    accounts: overrides.accounts || new AccountService(),
    jwtGuard: overrides.jwtGuard || new JwtGuard(),
    rateLimiter: overrides.rateLimiter || new RateLimiterService(),
    ledger,
    subscriptions,
    documents,
    orchestrator,
    quizzes,
    jobs,
    pipeline:
      overrides.pipeline || new QuizGenerationService(ledger, subscriptions, documents, orchestrator, quizzes, jobs),
  };
}

function applyCors(req: http.IncomingMessage, res: http.ServerResponse, origins: string[]): void {
  const origin = req.headers.origin;
  if (origins.includes('*')) {
    res.setHeader('Access-Control-Allow-Origin', '*');
  } else if (origin && origins.includes(origin)) {
    res.setHeader('Access-Control-Allow-Origin', origin);
    res.setHeader('Vary', 'Origin');
  }
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PUT, DELETE, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, Stripe-Signature');
}

/**
 * Request handler
 */
export function createRequestHandler(
  services: AppServices,
  options: ServerOptions = {},
): (req: http.IncomingMessage, res: http.ServerResponse) => Promise<void> {
  const corsOrigins = options.corsOrigins ?? getAppConfig().corsOrigins;
  const maxUploadBytes = options.maxUploadBytes ?? getAppConfig().maxUploadBytes;
  const trustedProxies = options.trustedProxies ?? getAppConfig().trustedProxies;
  const { accounts, jwtGuard, rateLimiter, ledger, subscriptions, documents, quizzes, jobs, pipeline } = services;

  return async (req, res) => {
    const method = req.method || 'GET';
    const url = new URL(req.url || '/', 'http://localhost');
    const pathname = url.pathname.length > 1 ? url.pathname.replace(/\/+$/, '') : url.pathname;

    applyCors(req, res, corsOrigins);

    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const authenticate = (): AuthContext => {
      const result = jwtGuard.validate(req);
      if (!result.authenticated) {
        throw new UnauthorizedError(result.error.message);
      }
      return result.context;
    };

    try {
      // Health check
      if (pathname === '/health' && method === 'GET') {
        const database = isDatabaseEnabled() ? ((await healthCheck()) ? 'ok' : 'unreachable') : 'in-memory';
        sendJson(res, 200, {
          status: 'ok',
          service: 'quizsmith-api',
          database,
          generators: services.orchestrator.availableBackends(),
          activeJobs: jobs.activeCount(),
        });
        return;
      }

      // Billing webhook: raw body for the signature, no rate limit
      if (pathname === '/api/billing/webhook' && method === 'POST') {
        const payload = await readRawBody(req, WEBHOOK_BODY_LIMIT_BYTES);
        const header = req.headers['stripe-signature'];
        const event = subscriptions.verifyWebhook(payload, Array.isArray(header) ? header[0] : header);
        const outcome = await subscriptions.onBillingEvent(event);
        sendJson(res, 200, { received: true, ...outcome });
        return;
      }

      if (pathname.startsWith('/api/')) {
        const limit = await rateLimiter.checkRateLimit(`ip:${clientAddress(req, trustedProxies)}`);
        res.setHeader('X-RateLimit-Remaining', String(limit.remaining));
        if (!limit.allowed) {
          throw new RateLimitedError(limit.retryAfter ?? 1);
        }
      }

      // Auth
      if (pathname === '/api/auth/register' && method === 'POST') {
        const body = await parseBody(req);
        const result = await accounts.register({
          email: optionalString(body, 'email') ?? '',
          password: optionalString(body, 'password') ?? '',
          name: optionalString(body, 'name'),
        });
        sendJson(res, 201, result);
        return;
      }

      if (pathname === '/api/auth/login' && method === 'POST') {
        const body = await parseBody(req);
        const result = await accounts.login({
          email: optionalString(body, 'email') ?? '',
          password: optionalString(body, 'password') ?? '',
        });
        sendJson(res, 200, result);
        return;
      }

      if (pathname === '/api/auth/refresh' && method === 'POST') {
        const body = await parseBody(req);
        const tokens = await accounts.refresh({ refreshToken: optionalString(body, 'refreshToken') ?? '' });
        sendJson(res, 200, tokens);
        return;
      }

      if (pathname === '/api/auth/logout' && method === 'POST') {
        const body = await parseBody(req);
        await accounts.logout({ refreshToken: optionalString(body, 'refreshToken') ?? '' });
        sendNoContent(res);
        return;
      }

      if (pathname === '/api/auth/me' && method === 'GET') {
        const { userId } = authenticate();
        const [user, plan] = await Promise.all([accounts.getProfile(userId), subscriptions.getEffectivePlan(userId)]);
        sendJson(res, 200, { ...user, plan });
        return;
      }

      // Plans and usage
      if (pathname === '/api/plans' && method === 'GET') {
        sendJson(res, 200, { plans: subscriptions.listPlans() });
        return;
      }

      if (pathname === '/api/subscription' && method === 'GET') {
        const { userId } = authenticate();
        sendJson(res, 200, await subscriptions.getSubscription(userId));
        return;
      }

      if (pathname === '/api/subscription/checkout' && method === 'POST') {
        const { userId } = authenticate();
        const body = await parseBody(req);
        sendJson(res, 201, await subscriptions.createCheckoutSession(userId, body.plan));
        return;
      }

      if (pathname === '/api/subscription/cancel' && method === 'POST') {
        const { userId } = authenticate();
        sendJson(res, 200, { subscription: await subscriptions.cancel(userId) });
        return;
      }

      if (pathname === '/api/subscription/reactivate' && method === 'POST') {
        const { userId } = authenticate();
        sendJson(res, 200, { subscription: await subscriptions.reactivate(userId) });
        return;
      }

      if (pathname === '/api/usage' && method === 'GET') {
        const { userId } = authenticate();
        const plan = await subscriptions.getEffectivePlan(userId);
        sendJson(res, 200, await ledger.getUsage(userId, plan));
        return;
      }

      // Files
      if (pathname === '/api/files' && method === 'POST') {
        const { userId } = authenticate();
        const plan = await subscriptions.getEffectivePlan(userId);
        const file = await readUploadedFile(req, maxUploadBytes);
        const document = await documents.upload({ id: userId, plan }, file);
        sendJson(res, 201, toDocumentView(document));
        return;
      }

      if (pathname === '/api/files' && method === 'GET') {
        const { userId } = authenticate();
        const page = await documents.list(userId, queryInt(url.searchParams, 'page'), queryInt(url.searchParams, 'perPage'));
        sendJson(res, 200, { ...page, items: page.items.map(doc => toDocumentView(doc)) });
        return;
      }

      const fileMatch = pathname.match(/^\/api\/files\/([^/]+)$/);
      if (fileMatch && method === 'GET') {
        const { userId } = authenticate();
        sendJson(res, 200, toDocumentView(await documents.get(userId, fileMatch[1]), true));
        return;
      }

      if (fileMatch && method === 'DELETE') {
        const { userId } = authenticate();
        await documents.delete(userId, fileMatch[1]);
        sendNoContent(res);
        return;
      }

      // Quizzes
      if (pathname === '/api/quizzes' && method === 'POST') {
        const { userId } = authenticate();
        const body = await parseBody(req);
        const request = readGenerateQuizRequest(body);

        if (body.async === true) {
          const job = await pipeline.enqueueQuiz(userId, request);
          sendJson(res, 202, { jobId: job.id, status: job.status });
          return;
        }

        sendJson(res, 201, await pipeline.generateQuiz(userId, request));
        return;
      }

      if (pathname === '/api/quizzes' && method === 'GET') {
        const { userId } = authenticate();
        sendJson(res, 200, await quizzes.list(userId, readQuizListQuery(url.searchParams)));
        return;
      }

      const quizMatch = pathname.match(/^\/api\/quizzes\/([^/]+)$/);
      if (quizMatch && method === 'GET') {
        const { userId } = authenticate();
        sendJson(res, 200, await quizzes.getOwned(userId, quizMatch[1]));
        return;
      }

      if (quizMatch && method === 'PUT') {
        const { userId } = authenticate();
        const update = readMetadataUpdate(await parseBody(req));
        sendJson(res, 200, await quizzes.updateMetadata(userId, quizMatch[1], update));
        return;
      }

      // Quizzes are archived, never hard-deleted
      if (quizMatch && method === 'DELETE') {
        const { userId } = authenticate();
        sendJson(res, 200, await quizzes.archive(userId, quizMatch[1]));
        return;
      }

      const actionMatch = pathname.match(/^\/api\/quizzes\/([^/]+)\/(publish|archive)$/);
      if (actionMatch && method === 'POST') {
        const { userId } = authenticate();
        const [, quizId, action] = actionMatch;
        const quiz = action === 'publish' ? await quizzes.publish(userId, quizId) : await quizzes.archive(userId, quizId);
        sendJson(res, 200, quiz);
        return;
      }

      const questionsMatch = pathname.match(/^\/api\/quizzes\/([^/]+)\/questions$/);
      if (questionsMatch && method === 'PUT') {
        const { userId } = authenticate();
        const order = readQuestionOrder(await parseBody(req));
        sendJson(res, 200, await quizzes.reorderQuestions(userId, questionsMatch[1], order));
        return;
      }

      if (questionsMatch && method === 'POST') {
        const { userId } = authenticate();
        const body = await parseBody(req);
        const raw = isJsonObject(body.question) ? body.question : body;
        sendJson(res, 201, await quizzes.addQuestion(userId, questionsMatch[1], raw));
        return;
      }

      const questionMatch = pathname.match(/^\/api\/quizzes\/([^/]+)\/questions\/([^/]+)$/);
      if (questionMatch && method === 'PUT') {
        const { userId } = authenticate();
        const body = await parseBody(req);
        const patch = isJsonObject(body.question) ? body.question : body;
        sendJson(res, 200, await quizzes.updateQuestion(userId, questionMatch[1], questionMatch[2], patch));
        return;
      }

      if (questionMatch && method === 'DELETE') {
        const { userId } = authenticate();
        sendJson(res, 200, await quizzes.removeQuestion(userId, questionMatch[1], questionMatch[2]));
        return;
      }

      // Background jobs
      const jobMatch = pathname.match(/^\/api\/jobs\/([^/]+)$/);
      if (jobMatch && method === 'GET') {
        const { userId } = authenticate();
        sendJson(res, 200, jobs.get(userId, jobMatch[1]));
        return;
      }

      // Public share link
      const shareMatch = pathname.match(/^\/api\/quiz\/([^/]+)$/);
      if (shareMatch && method === 'GET') {
        sendJson(res, 200, await quizzes.getShared(shareMatch[1]));
        return;
      }

      throw new NotFoundError(`Route ${method} ${pathname}`);
    } catch (error) {
      sendError(res, error);
    }
  };
}

export function createServer(services: AppServices = createAppServices(), options: ServerOptions = {}): http.Server {
  const handler = createRequestHandler(services, options);
  return http.createServer((req, res) => {
    handler(req, res).catch(error => {
      console.error('[Server] Unhandled error:', error);
      if (!res.headersSent) {
        sendError(res, error);
      }
    });
  });
}

async function main(): Promise<void> {
  const config = getAppConfig();
  const problems = [...validateAppConfig(config), ...(process.env.NODE_ENV === 'production' ? validateJwtConfig(getJwtConfig()) : [])];
  if (problems.length > 0) {
    problems.forEach(problem => console.error(`[Server] Config error: ${problem}`));
    process.exit(1);
  }

  if (isDatabaseEnabled()) {
    await ensureSchema();
  }

  const services = createAppServices();
  const server = createServer(services);

  server.listen(config.port, () => {
    console.log(`[Server] Quizsmith API listening on http://localhost:${config.port}`);
    console.log(`[Server] Generators: ${services.orchestrator.availableBackends().join(', ')}`);
    console.log(`[Server] Storage: ${isDatabaseEnabled() ? 'PostgreSQL' : 'in-memory'}`);
  });

  // Graceful shutdown
  process.on('SIGTERM', () => {
    console.log('\n[Server] Shutting down...');
    server.close(() => {
      closePool()
        .catch(error => console.error('[Server] Failed to close the database pool:', error))
        .finally(() => process.exit(0));
    });
  });
}

if (require.main === module) {
  main().catch(error => {
    console.error('[Server] Failed to start:', error);
    process.exit(1);
  });
}
