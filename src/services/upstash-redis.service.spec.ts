import { UpstashRedisService } from './upstash-redis.service';

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('UpstashRedisService', () => {
  let fetchSpy: jest.SpyInstance;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should be disabled without credentials', async () => {
    const redis = new UpstashRedisService('', '');

    expect(redis.isEnabled()).toBe(false);
    expect(await redis.get('key')).toBeNull();
    await expect(redis.command(['GET', 'key'])).rejects.toThrow('Upstash Redis is not configured');
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('should post commands with the bearer token', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse(200, { result: 'OK' }));
    const redis = new UpstashRedisService('https://redis.test/', 'test-secret');

    expect(await redis.setWithTtl('revoked:1', '1', 30)).toBe(true);
    expect(fetchSpy).toHaveBeenCalledWith('https://redis.test', {
      method: 'POST',
      headers: { Authorization: 'Bearer test-secret', 'Content-Type': 'application/json' },
      body: JSON.stringify(['SET', 'revoked:1', '1', 'EX', '30']),
    });
  });

  it('should raise command errors from command()', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse(200, { error: 'WRONGTYPE' }));
    const redis = new UpstashRedisService('https://redis.test', 'test-secret');

    await expect(redis.command(['INCR', 'key'])).rejects.toThrow('Upstash error: WRONGTYPE');
  });

  it('should log and return null from execute()', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    fetchSpy.mockResolvedValueOnce(jsonResponse(503, {}));
    const redis = new UpstashRedisService('https://redis.test', 'test-secret');

    expect(await redis.execute(['GET', 'key'])).toBeNull();
    expect(errorSpy).toHaveBeenCalled();
    errorSpy.mockRestore();
  });

  it('should allow requests when the rate limit pipeline fails', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    fetchSpy.mockRejectedValueOnce(new Error('network down'));
    const redis = new UpstashRedisService('https://redis.test', 'test-secret');

    expect(await redis.checkRateLimit('ip:1', 5, 1000)).toEqual({ allowed: true, remaining: 5 });
  });

  it('should count the window from the pipeline result', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse(200, [{ result: 0 }, { result: 2 }, { result: 1 }, { result: 1 }]));
    const redis = new UpstashRedisService('https://redis.test', 'test-secret');

    expect(await redis.checkRateLimit('ip:1', 5, 1000)).toEqual({ allowed: true, remaining: 2 });
  });
});
