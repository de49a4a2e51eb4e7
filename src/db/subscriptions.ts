/**
 * Subscriptions Repository
 *
 * Billing state per user and webhook idempotency. An event id is recorded
 * in the same transaction that writes the state it produced.
 */

import { query, transaction } from './index';
import { SubscriptionState, SubscriptionStatus } from '../interfaces';
import { isPlan } from '../config/plans';
import { SubscriptionStore } from './stores';

/**
 * Subscription as stored in the database
 */
export interface DbSubscription {
  user_id: string;
  plan: string;
  status: string;
  customer_id: string | null;
  subscription_id: string | null;
  current_period_end: Date | null;
  cancel_at_period_end: boolean;
  last_event_id: string | null;
  updated_at: Date;
}

/**
 * Processed billing event, for idempotency
 */
export interface DbBillingEvent {
  id: string;
  type: string;
  processed_at: Date;
}

function toStatus(value: string): SubscriptionStatus {
  return value === 'past_due' || value === 'canceled' ? value : 'active';
}

export function toSubscriptionState(row: DbSubscription): SubscriptionState {
  return {
    userId: row.user_id,
    plan: isPlan(row.plan) ? row.plan : 'free',
    status: toStatus(row.status),
    customerId: row.customer_id,
    subscriptionId: row.subscription_id,
    currentPeriodEnd: row.current_period_end ? row.current_period_end.toISOString() : null,
    cancelAtPeriodEnd: row.cancel_at_period_end,
    lastEventId: row.last_event_id,
    updatedAt: row.updated_at.toISOString(),
  };
}

export async function get(userId: string): Promise<SubscriptionState | null> {
  const result = await query<DbSubscription>('SELECT * FROM subscriptions WHERE user_id = $1', [userId]);
  return result.rows[0] ? toSubscriptionState(result.rows[0]) : null;
}

export async function findByCustomerId(customerId: string): Promise<SubscriptionState | null> {
  const result = await query<DbSubscription>(
    'SELECT * FROM subscriptions WHERE customer_id = $1',
    [customerId]
  );
  return result.rows[0] ? toSubscriptionState(result.rows[0]) : null;
}

export async function isEventProcessed(eventId: string): Promise<boolean> {
  const result = await query<{ id: string }>('SELECT id FROM billing_events WHERE id = $1', [eventId]);
  return result.rows.length > 0;
}

export async function applyEvent(
  eventId: string,
  eventType: string,
  state: SubscriptionState
): Promise<boolean> {
  return transaction(async (client) => {
    // Claim the event first; a concurrent delivery gets zero rows back
    const claimed = await client.query(
      'INSERT INTO billing_events (id, type) VALUES ($1, $2) ON CONFLICT (id) DO NOTHING RETURNING id',
      [eventId, eventType]
    );

    if (claimed.rowCount === 0) {
      console.log(`[DB:Subscriptions] Event ${eventId} already processed, skipping`);
      return false;
    }

    await client.query(
      `INSERT INTO subscriptions (
         user_id, plan, status, customer_id, subscription_id,
         current_period_end, cancel_at_period_end, last_event_id, updated_at
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       ON CONFLICT (user_id) DO UPDATE SET
         plan = $2,
         status = $3,
         customer_id = $4,
         subscription_id = $5,
         current_period_end = $6,
         cancel_at_period_end = $7,
         last_event_id = $8,
         updated_at = $9`,
      [
        state.userId,
        state.plan,
        state.status,
        state.customerId,
        state.subscriptionId,
        state.currentPeriodEnd,
        state.cancelAtPeriodEnd,
        state.lastEventId,
        state.updatedAt,
      ]
    );

    console.log(`[DB:Subscriptions] Applied ${eventType} (${eventId}) for user ${state.userId}: ${state.plan}/${state.status}`);
    return true;
  });
}

export const postgresSubscriptionStore: SubscriptionStore = {
  get,
  findByCustomerId,
  isEventProcessed,
  applyEvent,
};
