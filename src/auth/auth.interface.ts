/**
 * Authentication interfaces
 */

import { Plan } from '../interfaces';

/**
 * JWT token payload
 */
export interface JwtPayload {
  /** User unique identifier */
  sub: string;
  email: string;
  /** Token type: access or refresh */
  type: 'access' | 'refresh';
  /** Token id, used to revoke refresh tokens */
  jti?: string;
  iat?: number;
  exp?: number;
}

/**
 * User record as seen by the services
 */
export interface UserRecord {
  id: string;
  email: string;
  name: string | null;
  passwordHash: string;
  /** Mirror of the billing plan, kept for display */
  plan: Plan;
  isActive: boolean;
  createdAt: string;
  lastLoginAt: string | null;
}

export interface NewUser {
  email: string;
  name: string | null;
  passwordHash: string;
}

/**
 * User without credentials, safe to return to clients
 */
export interface PublicUser {
  id: string;
  email: string;
  name: string | null;
  plan: Plan;
  createdAt: string;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  /** Access token lifetime in seconds */
  expiresIn: number;
  tokenType: 'Bearer';
}

/**
 * Authenticated caller, attached to the request by the guard
 */
export interface AuthContext {
  userId: string;
  email: string;
}

export interface RegisterRequest {
  email: string;
  password: string;
  name?: string;
}

export interface LoginRequest {
  email: string;
  password: string;
}

export interface RefreshRequest {
  refreshToken: string;
}

export interface AuthResponse {
  user: PublicUser;
  tokens: TokenPair;
}
