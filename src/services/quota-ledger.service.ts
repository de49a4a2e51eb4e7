/**
 * Quota Ledger Service
 *
 * Counts generated quizzes per user per calendar month (UTC) and enforces
 * the plan's monthly limit. The check and the increment are one atomic step:
 * a Lua script on Upstash Redis, or a synchronous Map update in memory.
 *
 * Counters are keyed by month, so rollover needs no reset job. The first
 * read in a new month finds no key and sees zero.
 */

import { Injectable, Logger } from '@nestjs/common';
import { upstashRedis, UpstashRedisService } from './upstash-redis.service';
import { getMonthlyQuizLimit, UPGRADE_URL } from '../config/plans';
import { Plan, QuotaDecision, QuotaReservation, UsageSnapshot } from '../interfaces';

// Counters outlive their month long enough for late refunds and reporting
const COUNTER_TTL_SECONDS = 62 * 24 * 60 * 60;

export interface CounterReservation {
  allowed: boolean;
  /** Count after the call (unchanged when not allowed) */
  count: number;
}

/**
 * Backing store for monthly counters
 */
export interface UsageCounterStore {
  /** Increment unless the counter is already at `limit` (null = no limit) */
  reserve(key: string, limit: number | null, ttlSeconds: number): Promise<CounterReservation>;
  /** Decrement, never below zero. Returns the new count. */
  release(key: string): Promise<number>;
  read(key: string): Promise<number>;
}

const RESERVE_SCRIPT = `
local current = tonumber(redis.call('GET', KEYS[1]) or '0')
local limit = tonumber(ARGV[1])
if limit >= 0 and current >= limit then
  return {0, current}
end
local updated = redis.call('INCR', KEYS[1])
redis.call('EXPIRE', KEYS[1], ARGV[2])
return {1, updated}
`;

const RELEASE_SCRIPT = `
local current = tonumber(redis.call('GET', KEYS[1]) or '0')
if current <= 0 then
  return 0
end
return redis.call('DECR', KEYS[1])
`;

function toCount(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return 0;
}

export class RedisUsageCounterStore implements UsageCounterStore {
  constructor(private readonly redis: UpstashRedisService = upstashRedis) {}

  async reserve(key: string, limit: number | null, ttlSeconds: number): Promise<CounterReservation> {
    const result = await this.redis.evalScript(
      RESERVE_SCRIPT,
      [key],
      [(limit ?? -1).toString(), ttlSeconds.toString()],
    );

    if (!Array.isArray(result) || result.length < 2) {
      throw new Error('Unexpected reply from quota reserve script');
    }
    return { allowed: toCount(result[0]) === 1, count: toCount(result[1]) };
  }

  async release(key: string): Promise<number> {
    return toCount(await this.redis.evalScript(RELEASE_SCRIPT, [key], []));
  }

  async read(key: string): Promise<number> {
    return toCount(await this.redis.command(['GET', key]));
  }
}

/**
 * Single-process counters. Every method does its check and write without
 * awaiting in between, which is what makes reserve atomic here.
 */
export class InMemoryUsageCounterStore implements UsageCounterStore {
  private readonly counters = new Map<string, number>();

  async reserve(key: string, limit: number | null): Promise<CounterReservation> {
    const current = this.counters.get(key) ?? 0;
    if (limit !== null && current >= limit) {
      return { allowed: false, count: current };
    }
    this.counters.set(key, current + 1);
    return { allowed: true, count: current + 1 };
  }

  async release(key: string): Promise<number> {
    const next = Math.max(0, (this.counters.get(key) ?? 0) - 1);
    this.counters.set(key, next);
    return next;
  }

  async read(key: string): Promise<number> {
    return this.counters.get(key) ?? 0;
  }
}

/**
 * Calendar month key in UTC, e.g. "2026-03"
 */
export function periodKeyFor(date: Date): string {
  return `${date.getUTCFullYear()}-${String(date.getUTCMonth() + 1).padStart(2, '0')}`;
}

export function periodBounds(periodKey: string): { start: Date; end: Date } {
  const [year, month] = periodKey.split('-').map(part => parseInt(part, 10));
  return {
    start: new Date(Date.UTC(year, month - 1, 1)),
    end: new Date(Date.UTC(year, month, 1)),
  };
}

@Injectable()
export class QuotaLedgerService {
  private readonly logger = new Logger(QuotaLedgerService.name);
  private readonly store: UsageCounterStore;
  private readonly clock: () => Date;

  constructor(store?: UsageCounterStore, clock?: () => Date) {
    this.store = store || (upstashRedis.isEnabled() ? new RedisUsageCounterStore() : new InMemoryUsageCounterStore());
    this.clock = clock || (() => new Date());
  }

  private counterKey(userId: string, periodKey: string): string {
    return `usage:${userId}:quizzes:${periodKey}`;
  }

  /**
   * Take one quota unit if the plan allows it.
   * Unlimited plans always succeed but are still counted.
   */
  async checkAndReserve(userId: string, plan: Plan): Promise<QuotaDecision> {
    const now = this.clock();
    const periodKey = periodKeyFor(now);
    const limit = getMonthlyQuizLimit(plan);

    const { allowed, count } = await this.store.reserve(this.counterKey(userId, periodKey), limit, COUNTER_TTL_SECONDS);

    if (!allowed) {
      this.logger.log(`Quota exhausted for ${userId} (${plan}) in ${periodKey}: ${count}/${limit}`);
      return {
        allowed: false,
        reason: 'LimitExceeded',
        periodKey,
        used: count,
        limit: limit ?? count,
        upgradeUrl: UPGRADE_URL,
      };
    }

    return {
      allowed: true,
      reservation: {
        userId,
        plan,
        periodKey,
        countAfter: count,
        reservedAt: now.toISOString(),
      },
      used: count,
      limit,
      remaining: limit === null ? null : limit - count,
    };
  }

  /**
   * Give a reserved unit back after a failed generation.
   * No-op once the month of the reservation has passed.
   */
  async refund(reservation: QuotaReservation): Promise<boolean> {
    if (periodKeyFor(this.clock()) !== reservation.periodKey) {
      this.logger.debug(`Skipping refund for ${reservation.userId}: period ${reservation.periodKey} has closed`);
      return false;
    }

    const remaining = await this.store.release(this.counterKey(reservation.userId, reservation.periodKey));
    this.logger.debug(`Refunded quota unit for ${reservation.userId}, now ${remaining}`);
    return true;
  }

  async getUsage(userId: string, plan: Plan): Promise<UsageSnapshot> {
    const periodKey = periodKeyFor(this.clock());
    const { start, end } = periodBounds(periodKey);
    const limit = getMonthlyQuizLimit(plan);
    const used = await this.store.read(this.counterKey(userId, periodKey));

    return {
      userId,
      plan,
      periodKey,
      periodStart: start.toISOString(),
      periodEnd: end.toISOString(),
      used,
      limit,
      remaining: limit === null ? null : Math.max(0, limit - used),
    };
  }
}
