/**
 * Application configuration.
 *
 * Everything is read from the environment once and cached. Tests call
 * `resetAppConfig()` after changing process.env.
 */

import { Plan } from '../interfaces';

export interface AiConfig {
  openaiApiKey: string | null;
  openaiModel: string;
  anthropicApiKey: string | null;
  anthropicModel: string;
}

export interface BillingConfig {
  stripeSecretKey: string | null;
  stripeWebhookSecret: string | null;
  /** Processor price id -> plan */
  priceToPlan: Record<string, Plan>;
  /** `{CHECKOUT_SESSION_ID}` is filled in by Stripe */
  checkoutSuccessUrl: string;
  checkoutCancelUrl: string;
}

export interface AppConfig {
  port: number;
  databaseUrl: string | null;
  uploadDir: string;
  maxUploadBytes: number;
  generationTimeoutMs: number;
  bcryptRounds: number;
  corsOrigins: string[];
  /** Peers whose X-Forwarded-For header is believed */
  trustedProxies: string[];
  ai: AiConfig;
  billing: BillingConfig;
}

const DEFAULT_MAX_UPLOAD_BYTES = 16 * 1024 * 1024;
const DEFAULT_GENERATION_TIMEOUT_MS = 60_000;

/**
 * Parse a positive integer env var, falling back when unset or malformed
 */
export function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    console.warn(`[Config] Ignoring invalid value "${value}", using ${fallback}`);
    return fallback;
  }
  return parsed;
}

function optional(value: string | undefined): string | null {
  return value && value.trim() !== '' ? value.trim() : null;
}

function list(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const priceToPlan: Record<string, Plan> = {};
  const premiumPrice = optional(env.STRIPE_PRICE_PREMIUM);
  const schoolPrice = optional(env.STRIPE_PRICE_SCHOOL);
  if (premiumPrice) priceToPlan[premiumPrice] = 'premium';
  if (schoolPrice) priceToPlan[schoolPrice] = 'school';
  const appUrl = (optional(env.APP_URL) ?? 'http://localhost:3000').replace(/\/+$/, '');

  return {
    port: parsePositiveInt(env.PORT, 3030),
    databaseUrl: optional(env.DATABASE_URL),
    uploadDir: optional(env.UPLOAD_DIR) ?? 'uploads',
    maxUploadBytes: parsePositiveInt(env.MAX_UPLOAD_BYTES, DEFAULT_MAX_UPLOAD_BYTES),
    generationTimeoutMs: parsePositiveInt(env.GENERATION_TIMEOUT_MS, DEFAULT_GENERATION_TIMEOUT_MS),
    bcryptRounds: parsePositiveInt(env.BCRYPT_ROUNDS, 12),
    corsOrigins: list(env.CORS_ORIGINS || '*'),
    trustedProxies: list(env.TRUSTED_PROXIES),
    ai: {
      openaiApiKey: optional(env.OPENAI_API_KEY),
      openaiModel: optional(env.OPENAI_MODEL) ?? 'gpt-4o-mini',
      anthropicApiKey: optional(env.ANTHROPIC_API_KEY),
      anthropicModel: optional(env.ANTHROPIC_MODEL) ?? 'claude-3-5-haiku-latest',
    },
    billing: {
      stripeSecretKey: optional(env.STRIPE_SECRET_KEY),
      stripeWebhookSecret: optional(env.STRIPE_WEBHOOK_SECRET),
      priceToPlan,
      checkoutSuccessUrl: `${appUrl}/billing/success?session_id={CHECKOUT_SESSION_ID}`,
      checkoutCancelUrl: `${appUrl}/pricing`,
    },
  };
}

/**
 * Returns a list of problems. Empty means the config is usable.
 */
export function validateAppConfig(config: AppConfig, env: NodeJS.ProcessEnv = process.env): string[] {
  const errors: string[] = [];

  if (config.bcryptRounds < 4 || config.bcryptRounds > 15) {
    errors.push('BCRYPT_ROUNDS must be between 4 and 15');
  }

  if (config.generationTimeoutMs < 1000) {
    errors.push('GENERATION_TIMEOUT_MS must be at least 1000');
  }

  if (config.billing.stripeSecretKey && !config.billing.stripeWebhookSecret) {
    errors.push('STRIPE_WEBHOOK_SECRET must be set when STRIPE_SECRET_KEY is set');
  }

  if (env.NODE_ENV === 'production') {
    if (!config.databaseUrl) {
      errors.push('DATABASE_URL must be set in production');
    }
    if (config.corsOrigins.includes('*')) {
      errors.push('CORS_ORIGINS must list explicit origins in production');
    }
  }

  return errors;
}

let configInstance: AppConfig | null = null;

export function getAppConfig(): AppConfig {
  if (!configInstance) {
    configInstance = loadAppConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetAppConfig(): void {
  configInstance = null;
}
