/**
 * Plan catalog and entitlement lookups
 */

import { Plan, PlanDefinition, PlanFeature, PLANS } from '../interfaces';

export const FREE_MONTHLY_QUIZ_LIMIT = 5;

export const UPGRADE_URL = '/pricing';

export const PLAN_DEFINITIONS: Record<Plan, PlanDefinition> = {
  free: {
    id: 'free',
    name: 'Free',
    priceUsd: 0,
    monthlyQuizLimit: FREE_MONTHLY_QUIZ_LIMIT,
    features: ['text_generation'],
  },
  premium: {
    id: 'premium',
    name: 'Premium',
    priceUsd: 9.99,
    monthlyQuizLimit: null,
    features: ['text_generation', 'document_upload', 'advanced_question_types', 'pdf_export', 'analytics'],
  },
  school: {
    id: 'school',
    name: 'School',
    priceUsd: 49.99,
    monthlyQuizLimit: null,
    features: [
      'text_generation',
      'document_upload',
      'advanced_question_types',
      'pdf_export',
      'analytics',
      'multi_user',
    ],
  },
};

export function isPlan(value: unknown): value is Plan {
  return typeof value === 'string' && PLANS.some(plan => plan === value);
}

export function getPlanDefinition(plan: Plan): PlanDefinition {
  return PLAN_DEFINITIONS[plan];
}

/**
 * Monthly quiz limit, or null when unlimited
 */
export function getMonthlyQuizLimit(plan: Plan): number | null {
  return PLAN_DEFINITIONS[plan].monthlyQuizLimit;
}

export function planHasFeature(plan: Plan, feature: PlanFeature): boolean {
  return PLAN_DEFINITIONS[plan].features.includes(feature);
}

export function listPlans(): PlanDefinition[] {
  return PLANS.map(plan => PLAN_DEFINITIONS[plan]);
}
