import { Injectable, Logger } from '@nestjs/common';
import Stripe from 'stripe';
import {
  BillingEvent,
  BillingEventOutcome,
  CheckoutSession,
  Plan,
  PlanDefinition,
  SubscriptionState,
  SubscriptionStatus,
} from '../interfaces';
import { SubscriptionStore, UserStore } from '../db/stores';
import { getRepositories } from '../db/repositories';
import { BillingConfig, getAppConfig } from '../config/app.config';
import { getPlanDefinition, isPlan, listPlans } from '../config/plans';
import { ConflictError, NotFoundError, ValidationError } from '../errors/app-errors';

export const STRIPE_API_VERSION = '2023-10-16';

export const HANDLED_EVENT_TYPES = [
  'checkout.session.completed',
  'customer.subscription.created',
  'customer.subscription.updated',
  'customer.subscription.deleted',
  'invoice.payment_failed',
  'invoice.payment_succeeded',
] as const;

type HandledEventType = (typeof HANDLED_EVENT_TYPES)[number];

type Payload = Record<string, unknown>;

/**
 * State change derived from one event, before it is merged
 */
interface StateChange {
  userId: string | null;
  customerId: string | null;
  subscriptionId?: string | null;
  plan?: Plan;
  status?: SubscriptionStatus;
  currentPeriodEnd?: string | null;
  cancelAtPeriodEnd?: boolean;
}

function isHandledEventType(type: string): type is HandledEventType {
  return HANDLED_EVENT_TYPES.some(handled => handled === type);
}

function isRecord(value: unknown): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(payload: Payload, key: string): string | null {
  const value = payload[key];
  return typeof value === 'string' && value !== '' ? value : null;
}

/**
 * Stripe sends ids either as strings or as expanded objects
 */
function idField(payload: Payload, key: string): string | null {
  const value = payload[key];
  if (typeof value === 'string' && value !== '') return value;
  return isRecord(value) ? stringField(value, 'id') : null;
}

function metadataField(payload: Payload, key: string): string | null {
  const metadata = payload.metadata;
  return isRecord(metadata) ? stringField(metadata, key) : null;
}

function firstPriceId(subscription: Payload): string | null {
  const items = subscription.items;
  if (!isRecord(items) || !Array.isArray(items.data)) return null;
  const first: unknown = items.data[0];
  return isRecord(first) ? idField(first, 'price') : null;
}

function toIsoFromUnix(value: unknown): string | null {
  return typeof value === 'number' && Number.isFinite(value) ? new Date(value * 1000).toISOString() : null;
}

/**
 * Stripe subscription status onto the three states the app tracks
 */
export function mapSubscriptionStatus(status: string | null): SubscriptionStatus {
  switch (status) {
    case 'active':
    case 'trialing':
      return 'active';
    case 'canceled':
    case 'incomplete_expired':
      return 'canceled';
    default:
      return 'past_due';
  }
}

/**
 * Plan the user is entitled to right now. Canceled subscriptions fall back
 * to free; past_due keeps the paid plan until the processor cancels.
 */
export function effectivePlan(state: SubscriptionState | null): Plan {
  if (!state || state.status === 'canceled') return 'free';
  return state.plan;
}

/**
 * Subscription Controller
 *
 * Applies verified billing events to the per-user subscription state.
 * Each event id is applied at most once: the store records the id and the
 * new state in one step, and a replay comes back as `duplicate`.
 */
@Injectable()
export class SubscriptionService {
  private readonly logger = new Logger(SubscriptionService.name);
  private readonly store: SubscriptionStore;
  private readonly users: UserStore;
  private readonly stripe: Stripe;
  private readonly billing: BillingConfig;

  constructor(store?: SubscriptionStore, users?: UserStore, stripe?: Stripe, billing?: BillingConfig) {
    this.store = store || getRepositories().subscriptions;
    this.users = users || getRepositories().users;
    this.billing = billing || getAppConfig().billing;
    this.stripe = stripe || new Stripe(this.billing.stripeSecretKey ?? '', { apiVersion: STRIPE_API_VERSION });
  }

  listPlans(): PlanDefinition[] {
    return listPlans();
  }

  async getSubscription(userId: string): Promise<{ plan: PlanDefinition; subscription: SubscriptionState | null }> {
    const subscription = await this.store.get(userId);
    return { plan: getPlanDefinition(effectivePlan(subscription)), subscription };
  }

  async getEffectivePlan(userId: string): Promise<Plan> {
    return effectivePlan(await this.store.get(userId));
  }

  /**
   * Start a hosted checkout for a paid plan. The completed session comes
   * back through the webhook carrying `client_reference_id` and `metadata.plan`.
   */
  async createCheckoutSession(userId: string, plan: unknown): Promise<CheckoutSession> {
    if (!isPlan(plan)) {
      throw new ValidationError('Invalid subscription plan', { field: 'plan' });
    }
    if (plan === 'free') {
      throw new ValidationError('Cannot create checkout for free plan', { field: 'plan' });
    }

    const priceId = this.priceForPlan(plan);
    if (!priceId) {
      throw new Error(`No Stripe price is configured for the ${plan} plan`);
    }

    const user = await this.users.findById(userId);
    if (!user) {
      throw new NotFoundError('User');
    }

    const current = await this.store.get(userId);
    if (current && effectivePlan(current) === plan && current.status === 'active') {
      throw new ConflictError(`Already subscribed to the ${plan} plan`);
    }

    const session = await this.stripe.checkout.sessions.create({
      mode: 'subscription',
      line_items: [{ price: priceId, quantity: 1 }],
      success_url: this.billing.checkoutSuccessUrl,
      cancel_url: this.billing.checkoutCancelUrl,
      client_reference_id: userId,
      customer: current?.customerId ?? undefined,
      customer_email: current?.customerId ? undefined : user.email,
      metadata: { userId, plan, price_id: priceId },
      subscription_data: { metadata: { userId, plan } },
    });

    this.logger.log(`Created checkout session ${session.id} for user ${userId} (${plan})`);
    return { sessionId: session.id, url: session.url, plan };
  }

  /**
   * Cancel at the end of the paid period. The stored state follows when
   * Stripe sends `customer.subscription.updated`.
   */
  async cancel(userId: string): Promise<SubscriptionState> {
    const current = await this.store.get(userId);
    if (effectivePlan(current) === 'free') {
      throw new ValidationError('Cannot cancel free plan');
    }
    if (!current || !current.subscriptionId) {
      throw new NotFoundError('Active subscription');
    }
    return this.setCancelAtPeriodEnd(current, current.subscriptionId, true);
  }

  async reactivate(userId: string): Promise<SubscriptionState> {
    const current = await this.store.get(userId);
    if (!current || !current.subscriptionId || current.status === 'canceled') {
      throw new NotFoundError('Subscription');
    }
    if (!current.cancelAtPeriodEnd) {
      throw new ValidationError('Subscription is not canceled');
    }
    return this.setCancelAtPeriodEnd(current, current.subscriptionId, false);
  }

  private async setCancelAtPeriodEnd(
    current: SubscriptionState,
    subscriptionId: string,
    cancelAtPeriodEnd: boolean,
  ): Promise<SubscriptionState> {
    const updated = await this.stripe.subscriptions.update(subscriptionId, {
      cancel_at_period_end: cancelAtPeriodEnd,
    });

    this.logger.log(
      `${cancelAtPeriodEnd ? 'Scheduled cancellation of' : 'Reactivated'} ${subscriptionId} for user ${current.userId}`,
    );
    return {
      ...current,
      cancelAtPeriodEnd: updated.cancel_at_period_end,
      currentPeriodEnd: toIsoFromUnix(updated.current_period_end) ?? current.currentPeriodEnd,
    };
  }

  /**
   * Check the Stripe-Signature header against the raw body
   */
  verifyWebhook(payload: Buffer | string, signature: string | undefined): BillingEvent {
    const secret = this.billing.stripeWebhookSecret;
    if (!secret) {
      throw new Error('STRIPE_WEBHOOK_SECRET is not configured');
    }
    if (!signature) {
      throw new ValidationError('Missing Stripe-Signature header');
    }

    let event: Stripe.Event;
    try {
      event = this.stripe.webhooks.constructEvent(payload, signature, secret);
    } catch (error) {
      this.logger.warn(`Webhook signature verification failed: ${error instanceof Error ? error.message : String(error)}`);
      throw new ValidationError('Webhook signature verification failed');
    }

    return { id: event.id, type: event.type, data: { object: event.data.object } };
  }

  async onBillingEvent(event: BillingEvent): Promise<BillingEventOutcome> {
    if (!isHandledEventType(event.type)) {
      this.logger.log(`Ignoring unhandled billing event ${event.type}`);
      return { outcome: 'ignored', eventId: event.id, reason: 'UnrecognizedEvent' };
    }

    const payload = isRecord(event.data.object) ? event.data.object : {};
    const change = this.toStateChange(event.type, payload);
    const current = await this.findCurrentState(change);
    const userId = change.userId ?? current?.userId ?? null;

    if (await this.store.isEventProcessed(event.id)) {
      this.logger.log(`Billing event ${event.id} already applied`);
      return { outcome: 'duplicate', eventId: event.id, state: userId ? await this.store.get(userId) : null };
    }

    if (!userId) {
      this.logger.warn(`Billing event ${event.id} (${event.type}) has no known customer`);
      return { outcome: 'ignored', eventId: event.id, reason: 'UnknownCustomer' };
    }

    const next = this.merge(userId, current, change, event.id);
    const applied = await this.store.applyEvent(event.id, event.type, next);
    if (!applied) {
      return { outcome: 'duplicate', eventId: event.id, state: await this.store.get(userId) };
    }

    this.logger.log(`Applied ${event.type} for user ${userId}: ${next.plan}/${next.status}`);
    await this.syncUserPlan(userId, effectivePlan(next));

    return { outcome: 'applied', eventId: event.id, state: next };
  }

  private toStateChange(type: HandledEventType, payload: Payload): StateChange {
    const customerId = idField(payload, 'customer');

    switch (type) {
      case 'checkout.session.completed': {
        const priceId = metadataField(payload, 'price_id');
        const metadataPlan = metadataField(payload, 'plan');
        return {
          userId: stringField(payload, 'client_reference_id') ?? metadataField(payload, 'userId'),
          customerId,
          subscriptionId: idField(payload, 'subscription'),
          plan: isPlan(metadataPlan) ? metadataPlan : this.planForPrice(priceId) ?? 'premium',
          status: 'active',
          cancelAtPeriodEnd: false,
        };
      }
      case 'customer.subscription.created':
      case 'customer.subscription.updated': {
        const status = mapSubscriptionStatus(stringField(payload, 'status'));
        // An unknown price keeps the plan already on record
        const plan: Plan | undefined =
          status === 'canceled' ? 'free' : this.planForPrice(firstPriceId(payload)) ?? undefined;
        return {
          userId: metadataField(payload, 'userId'),
          customerId,
          subscriptionId: stringField(payload, 'id'),
          status,
          plan,
          currentPeriodEnd: toIsoFromUnix(payload.current_period_end),
          cancelAtPeriodEnd: payload.cancel_at_period_end === true,
        };
      }
      case 'customer.subscription.deleted':
        return {
          userId: metadataField(payload, 'userId'),
          customerId,
          subscriptionId: null,
          plan: 'free',
          status: 'canceled',
          currentPeriodEnd: null,
          cancelAtPeriodEnd: false,
        };
      case 'invoice.payment_failed':
        return { userId: null, customerId, status: 'past_due' };
      case 'invoice.payment_succeeded':
        return { userId: null, customerId, status: 'active' };
    }
  }

  private planForPrice(priceId: string | null): Plan | null {
    if (!priceId || !Object.hasOwn(this.billing.priceToPlan, priceId)) return null;
    return this.billing.priceToPlan[priceId];
  }

  private priceForPlan(plan: Plan): string | null {
    const entry = Object.entries(this.billing.priceToPlan).find(([, mapped]) => mapped === plan);
    return entry ? entry[0] : null;
  }

  private async findCurrentState(change: StateChange): Promise<SubscriptionState | null> {
    if (change.userId) {
      const byUser = await this.store.get(change.userId);
      if (byUser) return byUser;
    }
    return change.customerId ? this.store.findByCustomerId(change.customerId) : null;
  }

  private merge(
    userId: string,
    current: SubscriptionState | null,
    change: StateChange,
    eventId: string,
  ): SubscriptionState {
    const base: SubscriptionState = current ?? {
      userId,
      plan: 'free',
      status: 'active',
      customerId: null,
      subscriptionId: null,
      currentPeriodEnd: null,
      cancelAtPeriodEnd: false,
      lastEventId: null,
      updatedAt: new Date().toISOString(),
    };

    return {
      userId,
      plan: change.plan ?? base.plan,
      status: change.status ?? base.status,
      customerId: change.customerId ?? base.customerId,
      subscriptionId: change.subscriptionId !== undefined ? change.subscriptionId : base.subscriptionId,
      currentPeriodEnd: change.currentPeriodEnd !== undefined ? change.currentPeriodEnd : base.currentPeriodEnd,
      cancelAtPeriodEnd: change.cancelAtPeriodEnd ?? base.cancelAtPeriodEnd,
      lastEventId: eventId,
      updatedAt: new Date().toISOString(),
    };
  }

  /**
   * users.plan mirrors the entitlement for display. The subscription state
   * stays authoritative, so a failed mirror write is logged and not retried.
   */
  private async syncUserPlan(userId: string, plan: Plan): Promise<void> {
    try {
      await this.users.updatePlan(userId, plan);
    } catch (error) {
      this.logger.error(
        `Failed to mirror plan ${plan} onto user ${userId}`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }
}
