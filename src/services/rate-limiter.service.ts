/**
 * Rate Limiter Service
 *
 * Sliding window rate limiting per caller key (user id or client address).
 * Uses Upstash Redis when available for shared state across instances and
 * falls back to in-memory for development and tests.
 */

import { Injectable } from '@nestjs/common';
import { upstashRedis, UpstashRedisService, RateLimitResult } from './upstash-redis.service';

interface RateLimitWindow {
  timestamps: number[];
}

@Injectable()
export class RateLimiterService {
  private readonly windowMs: number;
  private readonly maxRequests: number;
  private readonly redis: UpstashRedisService;
  // In-memory fallback when Redis is not available
  private readonly windows: Map<string, RateLimitWindow> = new Map();

  constructor(maxRequests: number = 100, windowMs: number = 60000, redis?: UpstashRedisService) {
    this.maxRequests = maxRequests;
    this.windowMs = windowMs;
    this.redis = redis || upstashRedis;
  }

  /**
   * Check and consume one request for `key`
   */
  async checkRateLimit(key: string): Promise<RateLimitResult> {
    if (this.redis.isEnabled()) {
      return this.redis.checkRateLimit(key, this.maxRequests, this.windowMs);
    }

    return this.checkRateLimitInMemory(key);
  }

  private checkRateLimitInMemory(key: string): RateLimitResult {
    const now = Date.now();
    const windowStart = now - this.windowMs;

    let window = this.windows.get(key);
    if (!window) {
      window = { timestamps: [] };
      this.windows.set(key, window);
    }

    window.timestamps = window.timestamps.filter(ts => ts > windowStart);

    if (window.timestamps.length >= this.maxRequests) {
      const retryAfter = Math.ceil((window.timestamps[0] + this.windowMs - now) / 1000);
      return {
        allowed: false,
        remaining: 0,
        retryAfter: Math.max(1, retryAfter),
      };
    }

    window.timestamps.push(now);

    return {
      allowed: true,
      remaining: this.maxRequests - window.timestamps.length,
    };
  }

  reset(key: string): void {
    this.windows.delete(key);
  }

  getConfig(): { maxRequests: number; windowMs: number } {
    return {
      maxRequests: this.maxRequests,
      windowMs: this.windowMs,
    };
  }
}
