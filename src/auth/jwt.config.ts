/**
 * JWT configuration
 *
 * Secrets come from the environment. Development falls back to
 * deterministic secrets and says so loudly.
 */

import * as crypto from 'crypto';

export interface JwtConfig {
  /** Secret for signing access tokens */
  accessSecret: string;
  /** Secret for signing refresh tokens */
  refreshSecret: string;
  /** Access token expiration (default: 1 hour) */
  accessExpiresIn: string;
  /** Refresh token expiration (default: 30 days) */
  refreshExpiresIn: string;
  issuer: string;
  audience: string;
}

export function loadJwtConfig(): JwtConfig {
  const accessSecret = process.env.JWT_ACCESS_SECRET;
  const refreshSecret = process.env.JWT_REFRESH_SECRET;

  if (!accessSecret || !refreshSecret) {
    console.warn('[Auth] WARNING: JWT secrets not configured in environment.');
    console.warn('[Auth] Using development secrets. DO NOT USE IN PRODUCTION.');
  }

  return {
    accessSecret: accessSecret || generateDevSecret('access'),
    refreshSecret: refreshSecret || generateDevSecret('refresh'),
    accessExpiresIn: process.env.JWT_ACCESS_EXPIRES_IN || '1h',
    refreshExpiresIn: process.env.JWT_REFRESH_EXPIRES_IN || '30d',
    issuer: process.env.JWT_ISSUER || 'quizsmith-api',
    audience: process.env.JWT_AUDIENCE || 'quizsmith-app',
  };
}

/**
 * Same secret across restarts so dev sessions survive a reload
 */
function generateDevSecret(type: string): string {
  const devSeed = `quizsmith-dev-${type}-secret-DO-NOT-USE-IN-PRODUCTION`;
  return crypto.createHash('sha256').update(devSeed).digest('hex');
}

export function validateJwtConfig(config: JwtConfig): string[] {
  const errors: string[] = [];

  if (!config.accessSecret || config.accessSecret.length < 32) {
    errors.push('JWT_ACCESS_SECRET must be at least 32 characters');
  }

  if (!config.refreshSecret || config.refreshSecret.length < 32) {
    errors.push('JWT_REFRESH_SECRET must be at least 32 characters');
  }

  if (config.accessSecret === config.refreshSecret) {
    errors.push('JWT_ACCESS_SECRET and JWT_REFRESH_SECRET must be different');
  }

  for (const [name, value] of [
    ['JWT_ACCESS_EXPIRES_IN', config.accessExpiresIn],
    ['JWT_REFRESH_EXPIRES_IN', config.refreshExpiresIn],
  ]) {
    if (!DURATION_PATTERN.test(value)) {
      errors.push(`${name} must look like "30m", "1h" or "30d"`);
    }
  }

  if (process.env.NODE_ENV === 'production') {
    if (!process.env.JWT_ACCESS_SECRET) {
      errors.push('JWT_ACCESS_SECRET must be set in production');
    }
    if (!process.env.JWT_REFRESH_SECRET) {
      errors.push('JWT_REFRESH_SECRET must be set in production');
    }
  }

  return errors;
}

const DURATION_PATTERN = /^(\d+)([smhd])$/;

const DURATION_MULTIPLIERS: Record<string, number> = {
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
};

/**
 * Parse duration string ("90s", "15m", "1h", "30d") to milliseconds
 */
export function parseDuration(duration: string): number {
  const match = duration.match(DURATION_PATTERN);
  if (!match) {
    throw new Error(`Invalid duration format: ${duration}. Use format like "1h", "30m", "30d"`);
  }

  return parseInt(match[1], 10) * DURATION_MULTIPLIERS[match[2]];
}

export function parseDurationSeconds(duration: string): number {
  return Math.floor(parseDuration(duration) / 1000);
}

let configInstance: JwtConfig | null = null;

export function getJwtConfig(): JwtConfig {
  if (!configInstance) {
    configInstance = loadJwtConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetJwtConfig(): void {
  configInstance = null;
}
