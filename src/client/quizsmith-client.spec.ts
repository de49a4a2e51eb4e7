import { MemoryTokenStore, QuizsmithApiError, QuizsmithClient, ResponseLike } from './quizsmith-client';

function reply(status: number, body?: unknown): ResponseLike {
  const text = body === undefined ? '' : JSON.stringify(body);
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => JSON.parse(text),
    text: async () => text,
  };
}

const EXPIRED = reply(401, { statusCode: 401, error: 'UNAUTHORIZED', code: 'UNAUTHORIZED', message: 'Token expired' });

const pair = (suffix: string) => ({
  accessToken: `access-${suffix}`,
  refreshToken: `refresh-${suffix}`,
  expiresIn: 3600,
  tokenType: 'Bearer' as const,
});

function authHeader(init: RequestInit): string | undefined {
  const headers: unknown = init.headers;
  if (typeof headers !== 'object' || headers === null || !('Authorization' in headers)) return undefined;
  return typeof headers.Authorization === 'string' ? headers.Authorization : undefined;
}

describe('QuizsmithClient', () => {
  let fetchImpl: jest.Mock<Promise<ResponseLike>, [string, RequestInit]>;
  let tokens: MemoryTokenStore;
  let onSessionExpired: jest.Mock;
  let client: QuizsmithClient;

  beforeEach(() => {
    fetchImpl = jest.fn<Promise<ResponseLike>, [string, RequestInit]>();
    tokens = new MemoryTokenStore();
    tokens.setTokens(pair('1'));
    onSessionExpired = jest.fn();
    client = new QuizsmithClient({ baseUrl: 'http://api.test/', fetchImpl, tokens, onSessionExpired });
  });

  it('should send the bearer token and parse the body', async () => {
    fetchImpl.mockResolvedValueOnce(reply(200, { used: 2, limit: 5 }));

    const usage = await client.getUsage();

    expect(usage).toEqual({ used: 2, limit: 5 });
    expect(fetchImpl).toHaveBeenCalledWith('http://api.test/api/usage', {
      method: 'GET',
      headers: { Authorization: 'Bearer access-1' },
    });
  });

  it('should refresh once on 401 and replay the request', async () => {
    fetchImpl
      .mockResolvedValueOnce(EXPIRED)
      .mockResolvedValueOnce(reply(200, pair('2')))
      .mockResolvedValueOnce(reply(200, { id: 'quiz-1' }));

    const quiz = await client.getQuiz('quiz-1');

    expect(quiz).toEqual({ id: 'quiz-1' });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(fetchImpl.mock.calls[1][0]).toBe('http://api.test/api/auth/refresh');
    expect(fetchImpl.mock.calls[1][1].body).toBe(JSON.stringify({ refreshToken: 'refresh-1' }));
    expect(authHeader(fetchImpl.mock.calls[1][1])).toBeUndefined();
    expect(authHeader(fetchImpl.mock.calls[2][1])).toBe('Bearer access-2');
    expect(tokens.getRefreshToken()).toBe('refresh-2');
  });

  it('should surface a second 401 without refreshing again', async () => {
    fetchImpl
      .mockResolvedValueOnce(EXPIRED)
      .mockResolvedValueOnce(reply(200, pair('2')))
      .mockResolvedValueOnce(EXPIRED);

    const error = await client.getQuiz('quiz-1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(QuizsmithApiError);
    expect(error).toMatchObject({ status: 401, code: 'UNAUTHORIZED', message: 'Token expired' });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it('should drop the session when the refresh is rejected', async () => {
    fetchImpl
      .mockResolvedValueOnce(EXPIRED)
      .mockResolvedValueOnce(reply(401, { code: 'UNAUTHORIZED', message: 'Refresh token has been revoked' }));

    await expect(client.me()).rejects.toMatchObject({ status: 401, message: 'Token expired' });

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(tokens.getAccessToken()).toBeNull();
    expect(onSessionExpired).toHaveBeenCalledTimes(1);
  });

  it('should share one refresh between concurrent requests', async () => {
    fetchImpl.mockImplementation(async (url, init) => {
      if (url.endsWith('/api/auth/refresh')) return reply(200, pair('2'));
      return authHeader(init) === 'Bearer access-2' ? reply(200, { ok: url }) : EXPIRED;
    });

    const [first, second] = await Promise.all([client.getQuiz('a'), client.getQuiz('b')]);

    expect(first).toEqual({ ok: 'http://api.test/api/quizzes/a' });
    expect(second).toEqual({ ok: 'http://api.test/api/quizzes/b' });
    const refreshCalls = fetchImpl.mock.calls.filter(([url]) => url.endsWith('/api/auth/refresh'));
    expect(refreshCalls).toHaveLength(1);
  });

  it('should not refresh for unauthenticated calls', async () => {
    fetchImpl.mockResolvedValueOnce(
      reply(401, { code: 'UNAUTHORIZED', message: 'Invalid email or password' }),
    );

    await expect(client.login('teacher@example.com', 'wrong')).rejects.toMatchObject({
      status: 401,
      message: 'Invalid email or password',
    });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('should store tokens after login', async () => {
    tokens.clear();
    fetchImpl.mockResolvedValueOnce(reply(200, { user: { id: 'user-1' }, tokens: pair('9') }));

    await client.login('teacher@example.com', 'Passw0rd!');

    expect(tokens.getAccessToken()).toBe('access-9');
  });

  it('should map error bodies to QuizsmithApiError', async () => {
    fetchImpl.mockResolvedValueOnce(
      reply(403, {
        statusCode: 403,
        error: 'LIMIT_EXCEEDED',
        code: 'LIMIT_EXCEEDED',
        message: 'Monthly quiz limit reached (5/5). Upgrade your plan to generate more quizzes.',
        upgradeUrl: '/pricing',
      }),
    );

    const error = await client
      .generateQuiz({ title: 'Cells', text: 'x', requestedCount: 5, types: ['essay'], difficulty: 'easy' })
      .catch((e: unknown) => e);

    expect(error).toMatchObject({ status: 403, code: 'LIMIT_EXCEEDED' });
    expect(error instanceof QuizsmithApiError && error.body).toMatchObject({ upgradeUrl: '/pricing' });
  });

  it('should keep plain-text error bodies', async () => {
    fetchImpl.mockResolvedValueOnce({
      ok: false,
      status: 502,
      json: async () => null,
      text: async () => 'Bad Gateway',
    });

    await expect(client.listPlans()).rejects.toMatchObject({
      status: 502,
      code: 'HTTP_502',
      message: 'HTTP 502: Bad Gateway',
    });
  });

  it('should build list queries from the set parameters only', async () => {
    fetchImpl.mockResolvedValueOnce(reply(200, { items: [] }));

    await client.listQuizzes({ page: 2, status: 'published' });

    expect(fetchImpl.mock.calls[0][0]).toBe('http://api.test/api/quizzes?page=2&status=published');
  });

  it('should start a checkout and unwrap subscription changes', async () => {
    fetchImpl
      .mockResolvedValueOnce(reply(201, { sessionId: 'cs_1', url: 'https://checkout.example.com/cs_1', plan: 'premium' }))
      .mockResolvedValueOnce(reply(200, { subscription: { plan: 'premium', cancelAtPeriodEnd: true } }));

    const session = await client.createCheckoutSession('premium');
    const state = await client.cancelSubscription();

    expect(session.url).toBe('https://checkout.example.com/cs_1');
    expect(fetchImpl.mock.calls[0]).toEqual([
      'http://api.test/api/subscription/checkout',
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Authorization: 'Bearer access-1' },
        body: JSON.stringify({ plan: 'premium' }),
      },
    ]);
    expect(fetchImpl.mock.calls[1][0]).toBe('http://api.test/api/subscription/cancel');
    expect(state).toEqual({ plan: 'premium', cancelAtPeriodEnd: true });
  });

  it('should revoke the refresh token on logout', async () => {
    fetchImpl.mockResolvedValueOnce(reply(204));

    await client.logout();

    expect(fetchImpl).toHaveBeenCalledWith('http://api.test/api/auth/logout', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ refreshToken: 'refresh-1' }),
    });
    expect(tokens.getRefreshToken()).toBeNull();
  });
});
