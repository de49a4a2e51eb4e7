/**
 * Refresh token denylist
 *
 * Rotated and logged-out refresh tokens are remembered by jti until they
 * would have expired anyway.
 */

import { upstashRedis, UpstashRedisService } from '../services/upstash-redis.service';

export class TokenDenylistService {
  private readonly redis: UpstashRedisService;
  // jti -> expiry (ms since epoch)
  private readonly revoked = new Map<string, number>();

  constructor(redis?: UpstashRedisService) {
    this.redis = redis || upstashRedis;
  }

  async revoke(jti: string, ttlSeconds: number): Promise<void> {
    if (ttlSeconds <= 0) return;

    if (this.redis.isEnabled()) {
      await this.redis.setWithTtl(this.key(jti), '1', ttlSeconds);
      return;
    }

    this.prune();
    this.revoked.set(jti, Date.now() + ttlSeconds * 1000);
  }

  async isRevoked(jti: string): Promise<boolean> {
    if (this.redis.isEnabled()) {
      return (await this.redis.get(this.key(jti))) !== null;
    }

    const expiresAt = this.revoked.get(jti);
    return expiresAt !== undefined && expiresAt > Date.now();
  }

  private key(jti: string): string {
    return `revoked:refresh:${jti}`;
  }

  private prune(): void {
    const now = Date.now();
    for (const [jti, expiresAt] of this.revoked) {
      if (expiresAt <= now) this.revoked.delete(jti);
    }
  }
}
