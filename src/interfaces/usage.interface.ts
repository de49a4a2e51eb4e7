/**
 * Monthly quota accounting
 */

import { Plan } from './billing.interface';

/**
 * Proof that one quota unit was taken. Hand it back to refund the unit.
 */
export interface QuotaReservation {
  userId: string;
  plan: Plan;
  periodKey: string;
  countAfter: number;
  reservedAt: string;
}

export type QuotaDecision =
  | {
      allowed: true;
      reservation: QuotaReservation;
      used: number;
      limit: number | null;
      remaining: number | null;
    }
  | {
      allowed: false;
      reason: 'LimitExceeded';
      periodKey: string;
      used: number;
      limit: number;
      upgradeUrl: string;
    };

export interface UsageSnapshot {
  userId: string;
  plan: Plan;
  periodKey: string;
  periodStart: string;
  periodEnd: string;
  used: number;
  limit: number | null;
  remaining: number | null;
}
