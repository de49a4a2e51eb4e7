/**
 * Upstash Redis Service
 *
 * Serverless Redis over the REST API. Holds the monthly quota counters,
 * the refresh token denylist and rate limit windows, so every API instance
 * sees the same state.
 *
 * When UPSTASH_REDIS_REST_URL / UPSTASH_REDIS_REST_TOKEN are not set the
 * callers fall back to in-memory state (single instance only).
 */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  retryAfter?: number;
}

export class UpstashRedisService {
  private readonly url: string;
  private readonly token: string;
  private readonly enabled: boolean;

  constructor(
    url: string = process.env.UPSTASH_REDIS_REST_URL || '',
    token: string = process.env.UPSTASH_REDIS_REST_TOKEN || '',
  ) {
    this.url = url.replace(/\/+$/, '');
    this.token = token;
    this.enabled = !!(this.url && this.token);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    const response = await fetch(`${this.url}${path}`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.token}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
    });

    if (!response.ok && response.status >= 500) {
      throw new Error(`Upstash responded with HTTP ${response.status}`);
    }

    return response.json();
  }

  private unwrap(data: unknown): unknown {
    if (!isRecord(data)) {
      throw new Error('Malformed Upstash response');
    }
    if (typeof data.error === 'string') {
      throw new Error(`Upstash error: ${data.error}`);
    }
    return data.result ?? null;
  }

  /**
   * Run one command. Throws on transport or command errors.
   * Use where a silent failure would let state drift (quota counters).
   */
  async command(command: string[]): Promise<unknown> {
    if (!this.enabled) {
      throw new Error('Upstash Redis is not configured');
    }
    return this.unwrap(await this.post('', command));
  }

  /**
   * Run one command, logging failures and returning null instead of throwing
   */
  async execute(command: string[]): Promise<unknown> {
    if (!this.enabled) return null;

    try {
      return await this.command(command);
    } catch (error) {
      console.error('[UpstashRedis] Command failed:', command[0], error);
      return null;
    }
  }

  /**
   * Pipeline multiple commands. Null when Redis is unavailable.
   */
  async pipeline(commands: string[][]): Promise<unknown[] | null> {
    if (!this.enabled) return null;

    try {
      const data = await this.post('/pipeline', commands);
      if (!Array.isArray(data)) {
        throw new Error('Malformed Upstash pipeline response');
      }
      return data.map(entry => this.unwrap(entry));
    } catch (error) {
      console.error('[UpstashRedis] Pipeline failed:', error);
      return null;
    }
  }

  /**
   * Run a Lua script atomically on the server
   */
  async evalScript(script: string, keys: string[], args: string[]): Promise<unknown> {
    return this.command(['EVAL', script, keys.length.toString(), ...keys, ...args]);
  }

  async get(key: string): Promise<string | null> {
    const result = await this.execute(['GET', key]);
    return typeof result === 'string' ? result : null;
  }

  async setWithTtl(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    const result = await this.execute(['SET', key, value, 'EX', Math.max(1, ttlSeconds).toString()]);
    return result === 'OK';
  }

  /**
   * Sliding window rate limit on a sorted set. Allows the request when
   * Redis is down.
   */
  async checkRateLimit(key: string, maxRequests: number, windowMs: number): Promise<RateLimitResult> {
    const now = Date.now();
    const redisKey = `ratelimit:${key}`;

    const results = await this.pipeline([
      ['ZREMRANGEBYSCORE', redisKey, '0', (now - windowMs).toString()],
      ['ZCARD', redisKey],
      ['ZADD', redisKey, now.toString(), `${now}-${Math.random()}`],
      ['PEXPIRE', redisKey, windowMs.toString()],
    ]);

    if (!results) {
      return { allowed: true, remaining: maxRequests };
    }

    const count = typeof results[1] === 'number' ? results[1] : 0;

    if (count >= maxRequests) {
      const oldest = await this.execute(['ZRANGE', redisKey, '0', '0', 'WITHSCORES']);
      const oldestScore = Array.isArray(oldest) && typeof oldest[1] === 'string' ? parseInt(oldest[1], 10) : now;
      const retryAfter = Math.ceil((oldestScore + windowMs - now) / 1000);

      return { allowed: false, remaining: 0, retryAfter: Math.max(1, retryAfter) };
    }

    return { allowed: true, remaining: maxRequests - count - 1 };
  }

  async ping(): Promise<boolean> {
    return (await this.execute(['PING'])) === 'PONG';
  }
}

// Singleton export
export const upstashRedis = new UpstashRedisService();
export default upstashRedis;
