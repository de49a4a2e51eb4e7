/**
 * Quizsmith API client
 *
 * Typed wrapper over the HTTP API. An expired access token gets exactly one
 * refresh-token exchange and one replay of the request; the refresh call is
 * never retried itself, and a second 401 reaches the caller. Concurrent
 * requests that hit 401 together share one refresh.
 */

import { AuthResponse, PublicUser, TokenPair } from '../auth/auth.interface';
import {
  CheckoutSession,
  GenerateQuizRequest,
  GenerationJob,
  Page,
  Plan,
  PlanDefinition,
  PublicQuizView,
  Quiz,
  QuizListQuery,
  QuizMetadataUpdate,
  SubscriptionState,
  UsageSnapshot,
} from '../interfaces';
import { DocumentView } from '../http/quiz-requests';

/**
 * The part of a fetch Response the client reads
 */
export interface ResponseLike {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<ResponseLike>;

export interface TokenStore {
  getAccessToken(): string | null;
  getRefreshToken(): string | null;
  setTokens(tokens: TokenPair): void;
  clear(): void;
}

export class MemoryTokenStore implements TokenStore {
  private tokens: TokenPair | null = null;

  getAccessToken(): string | null {
    return this.tokens?.accessToken ?? null;
  }

  getRefreshToken(): string | null {
    return this.tokens?.refreshToken ?? null;
  }

  setTokens(tokens: TokenPair): void {
    this.tokens = { ...tokens };
  }

  clear(): void {
    this.tokens = null;
  }
}

export class QuizsmithApiError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
    readonly body: unknown = null,
  ) {
    super(message);
    this.name = 'QuizsmithApiError';
  }
}

export interface QuizsmithClientOptions {
  baseUrl?: string;
  fetchImpl?: FetchLike;
  tokens?: TokenStore;
  /** Called when a refresh fails and the stored tokens are dropped */
  onSessionExpired?: () => void;
}

export interface UploadInput {
  filename: string;
  data: Blob;
}

interface RequestOptions {
  body?: unknown;
  auth?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function buildQuery(params: Record<string, string | number | undefined>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) search.set(key, String(value));
  }
  const query = search.toString();
  return query ? `?${query}` : '';
}

export class QuizsmithClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly tokens: TokenStore;
  private readonly onSessionExpired?: () => void;
  private refreshing: Promise<boolean> | null = null;

  constructor(options: QuizsmithClientOptions = {}) {
    this.baseUrl = (options.baseUrl || process.env.QUIZSMITH_URL || 'http://localhost:3030').replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl || fetch;
    this.tokens = options.tokens || new MemoryTokenStore();
    this.onSessionExpired = options.onSessionExpired;
  }

  // Auth

  async register(email: string, password: string, name?: string): Promise<AuthResponse> {
    const result = await this.json<AuthResponse>('POST', '/api/auth/register', {
      body: { email, password, name },
      auth: false,
    });
    this.tokens.setTokens(result.tokens);
    return result;
  }

  async login(email: string, password: string): Promise<AuthResponse> {
    const result = await this.json<AuthResponse>('POST', '/api/auth/login', { body: { email, password }, auth: false });
    this.tokens.setTokens(result.tokens);
    return result;
  }

  async logout(): Promise<void> {
    const refreshToken = this.tokens.getRefreshToken();
    this.tokens.clear();
    if (refreshToken) {
      await this.call('POST', '/api/auth/logout', { body: { refreshToken }, auth: false });
    }
  }

  me(): Promise<PublicUser> {
    return this.json('GET', '/api/auth/me');
  }

  // Plans, usage, billing

  async listPlans(): Promise<PlanDefinition[]> {
    const result = await this.json<{ plans: PlanDefinition[] }>('GET', '/api/plans', { auth: false });
    return result.plans;
  }

  getUsage(): Promise<UsageSnapshot> {
    return this.json('GET', '/api/usage');
  }

  getSubscription(): Promise<{ plan: PlanDefinition; subscription: SubscriptionState | null }> {
    return this.json('GET', '/api/subscription');
  }

  /**
   * Redirect the user to `url` to pay
   */
  createCheckoutSession(plan: Exclude<Plan, 'free'>): Promise<CheckoutSession> {
    return this.json('POST', '/api/subscription/checkout', { body: { plan } });
  }

  async cancelSubscription(): Promise<SubscriptionState> {
    const result = await this.json<{ subscription: SubscriptionState }>('POST', '/api/subscription/cancel');
    return result.subscription;
  }

  async reactivateSubscription(): Promise<SubscriptionState> {
    const result = await this.json<{ subscription: SubscriptionState }>('POST', '/api/subscription/reactivate');
    return result.subscription;
  }

  // Files

  async uploadFile(file: UploadInput): Promise<DocumentView> {
    const form = new FormData();
    form.append('file', file.data, file.filename);
    return this.json('POST', '/api/files', { body: form });
  }

  listFiles(page?: number, perPage?: number): Promise<Page<DocumentView>> {
    return this.json('GET', `/api/files${buildQuery({ page, perPage })}`);
  }

  getFile(id: string): Promise<DocumentView> {
    return this.json('GET', `/api/files/${encodeURIComponent(id)}`);
  }

  async deleteFile(id: string): Promise<void> {
    await this.call('DELETE', `/api/files/${encodeURIComponent(id)}`);
  }

  // Quizzes

  generateQuiz(request: Omit<GenerateQuizRequest, 'documentId'> & { fileId?: string }): Promise<Quiz> {
    return this.json('POST', '/api/quizzes', { body: request });
  }

  /**
   * Queue generation; poll `getJob` for the quiz id
   */
  generateQuizAsync(
    request: Omit<GenerateQuizRequest, 'documentId'> & { fileId?: string },
  ): Promise<{ jobId: string; status: GenerationJob['status'] }> {
    return this.json('POST', '/api/quizzes', { body: { ...request, async: true } });
  }

  getJob(jobId: string): Promise<GenerationJob> {
    return this.json('GET', `/api/jobs/${encodeURIComponent(jobId)}`);
  }

  listQuizzes(query: Partial<QuizListQuery> = {}): Promise<Page<Quiz>> {
    return this.json('GET', `/api/quizzes${buildQuery({ ...query })}`);
  }

  getQuiz(id: string): Promise<Quiz> {
    return this.json('GET', `/api/quizzes/${encodeURIComponent(id)}`);
  }

  updateQuiz(id: string, update: QuizMetadataUpdate): Promise<Quiz> {
    return this.json('PUT', `/api/quizzes/${encodeURIComponent(id)}`, { body: update });
  }

  /**
   * Archives; the owner can still read the quiz
   */
  deleteQuiz(id: string): Promise<Quiz> {
    return this.json('DELETE', `/api/quizzes/${encodeURIComponent(id)}`);
  }

  publishQuiz(id: string): Promise<Quiz> {
    return this.json('POST', `/api/quizzes/${encodeURIComponent(id)}/publish`);
  }

  archiveQuiz(id: string): Promise<Quiz> {
    return this.json('POST', `/api/quizzes/${encodeURIComponent(id)}/archive`);
  }

  reorderQuestions(id: string, questionIds: string[]): Promise<Quiz> {
    return this.json('PUT', `/api/quizzes/${encodeURIComponent(id)}/questions`, { body: { questionIds } });
  }

  addQuestion(id: string, question: Record<string, unknown>): Promise<Quiz> {
    return this.json('POST', `/api/quizzes/${encodeURIComponent(id)}/questions`, { body: { question } });
  }

  updateQuestion(id: string, questionId: string, patch: Record<string, unknown>): Promise<Quiz> {
    const path = `/api/quizzes/${encodeURIComponent(id)}/questions/${encodeURIComponent(questionId)}`;
    return this.json('PUT', path, { body: { question: patch } });
  }

  removeQuestion(id: string, questionId: string): Promise<Quiz> {
    const path = `/api/quizzes/${encodeURIComponent(id)}/questions/${encodeURIComponent(questionId)}`;
    return this.json('DELETE', path);
  }

  getSharedQuiz(shareToken: string): Promise<PublicQuizView> {
    return this.json('GET', `/api/quiz/${encodeURIComponent(shareToken)}`, { auth: false });
  }

  // Transport

  private async json<T>(method: string, path: string, options: RequestOptions = {}): Promise<T> {
    const response = await this.call(method, path, options);
    return response.json() as Promise<T>;
  }

  /**
   * Send, refreshing once on 401. Throws QuizsmithApiError for non-2xx.
   */
  private async call(method: string, path: string, options: RequestOptions = {}): Promise<ResponseLike> {
    const auth = options.auth ?? true;
    let response = await this.send(method, path, options.body, auth);

    if (response.status === 401 && auth && this.tokens.getRefreshToken()) {
      if (await this.refreshTokens()) {
        response = await this.send(method, path, options.body, auth);
      }
    }

    if (!response.ok) {
      throw await this.toError(response);
    }
    return response;
  }

  private send(method: string, path: string, body: unknown, auth: boolean): Promise<ResponseLike> {
    const headers: Record<string, string> = {};
    const init: RequestInit = { method, headers };

    if (typeof FormData !== 'undefined' && body instanceof FormData) {
      init.body = body;
    } else if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(body);
    }

    const accessToken = auth ? this.tokens.getAccessToken() : null;
    if (accessToken) {
      headers.Authorization = `Bearer ${accessToken}`;
    }

    return this.fetchImpl(`${this.baseUrl}${path}`, init);
  }

  /**
   * One refresh at a time; callers waiting on 401 share its outcome
   */
  private refreshTokens(): Promise<boolean> {
    if (!this.refreshing) {
      this.refreshing = this.exchangeRefreshToken().finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  private async exchangeRefreshToken(): Promise<boolean> {
    const refreshToken = this.tokens.getRefreshToken();
    if (!refreshToken) return false;

    const response = await this.send('POST', '/api/auth/refresh', { refreshToken }, false);
    if (!response.ok) {
      this.tokens.clear();
      this.onSessionExpired?.();
      return false;
    }

    const tokens = await response.json();
    if (!isRecord(tokens) || typeof tokens.accessToken !== 'string' || typeof tokens.refreshToken !== 'string') {
      this.tokens.clear();
      this.onSessionExpired?.();
      return false;
    }

    this.tokens.setTokens({
      accessToken: tokens.accessToken,
      refreshToken: tokens.refreshToken,
      expiresIn: typeof tokens.expiresIn === 'number' ? tokens.expiresIn : 0,
      tokenType: 'Bearer',
    });
    return true;
  }

  private async toError(response: ResponseLike): Promise<QuizsmithApiError> {
    const text = await response.text();

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      // Non-JSON error page
      body = text;
    }

    if (isRecord(body) && typeof body.message === 'string') {
      const code = typeof body.code === 'string' ? body.code : `HTTP_${response.status}`;
      return new QuizsmithApiError(response.status, code, body.message, body);
    }
    return new QuizsmithApiError(response.status, `HTTP_${response.status}`, `HTTP ${response.status}: ${text}`, body);
  }
}
