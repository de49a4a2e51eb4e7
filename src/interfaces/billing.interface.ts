/**
 * Plans, entitlements and subscription state
 */

export type Plan = 'free' | 'premium' | 'school';

export const PLANS: readonly Plan[] = ['free', 'premium', 'school'];

export type PlanFeature =
  | 'text_generation'
  | 'document_upload'
  | 'advanced_question_types'
  | 'pdf_export'
  | 'analytics'
  | 'multi_user';

export interface PlanDefinition {
  id: Plan;
  name: string;
  priceUsd: number;
  /** null means unlimited */
  monthlyQuizLimit: number | null;
  features: PlanFeature[];
}

export type SubscriptionStatus = 'active' | 'past_due' | 'canceled';

export interface SubscriptionState {
  userId: string;
  plan: Plan;
  status: SubscriptionStatus;
  customerId: string | null;
  subscriptionId: string | null;
  currentPeriodEnd: string | null;
  cancelAtPeriodEnd: boolean;
  lastEventId: string | null;
  updatedAt: string;
}

/**
 * Payment processor webhook event. Only the envelope is trusted; the payload
 * is read field by field.
 */
export interface BillingEvent {
  id: string;
  type: string;
  data: {
    object: unknown;
  };
}

export type BillingEventOutcome =
  | { outcome: 'applied'; eventId: string; state: SubscriptionState }
  | { outcome: 'duplicate'; eventId: string; state: SubscriptionState | null }
  | { outcome: 'ignored'; eventId: string; reason: 'UnrecognizedEvent' | 'UnknownCustomer' };

/**
 * Hosted checkout page the client redirects to
 */
export interface CheckoutSession {
  sessionId: string;
  url: string | null;
  plan: Plan;
}
