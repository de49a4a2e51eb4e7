/**
 * Account Service
 *
 * Registration, login, refresh token rotation and logout.
 */

import { Logger } from '@nestjs/common';
import { AuthService } from './auth.service';
import { TokenDenylistService } from './token-denylist.service';
import {
  AuthResponse,
  LoginRequest,
  PublicUser,
  RefreshRequest,
  RegisterRequest,
  TokenPair,
  UserRecord,
} from './auth.interface';
import { UserStore } from '../db/stores';
import { getRepositories } from '../db/repositories';
import { ConflictError, NotFoundError, UnauthorizedError, ValidationError } from '../errors/app-errors';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/**
 * Password rules: 8+ characters with an uppercase letter, a lowercase
 * letter and a digit. Returns the first failed rule, or null.
 */
export function checkPasswordStrength(password: string): string | null {
  if (password.length < 8) return 'Password must be at least 8 characters long';
  if (!/[A-Z]/.test(password)) return 'Password must contain at least one uppercase letter';
  if (!/[a-z]/.test(password)) return 'Password must contain at least one lowercase letter';
  if (!/\d/.test(password)) return 'Password must contain at least one number';
  return null;
}

export function toPublicUser(user: UserRecord): PublicUser {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    plan: user.plan,
    createdAt: user.createdAt,
  };
}

export class AccountService {
  private readonly logger = new Logger(AccountService.name);
  private readonly users: UserStore;
  private readonly authService: AuthService;
  private readonly denylist: TokenDenylistService;

  constructor(users?: UserStore, authService?: AuthService, denylist?: TokenDenylistService) {
    this.users = users || getRepositories().users;
    this.authService = authService || new AuthService();
    this.denylist = denylist || new TokenDenylistService();
  }

  async register(request: RegisterRequest): Promise<AuthResponse> {
    const email = typeof request.email === 'string' ? request.email.trim().toLowerCase() : '';
    if (!EMAIL_PATTERN.test(email)) {
      throw new ValidationError('A valid email address is required');
    }

    if (typeof request.password !== 'string') {
      throw new ValidationError('Password is required');
    }
    const weakness = checkPasswordStrength(request.password);
    if (weakness) {
      throw new ValidationError(weakness);
    }

    if (await this.users.findByEmail(email)) {
      throw new ConflictError('Email is already registered');
    }

    const name = typeof request.name === 'string' && request.name.trim() ? request.name.trim() : null;
    const user = await this.users.create({
      email,
      name,
      passwordHash: await this.authService.hashPassword(request.password),
    });

    this.logger.log(`Registered user ${user.id}`);
    return { user: toPublicUser(user), tokens: this.authService.generateTokenPair(user) };
  }

  async login(request: LoginRequest): Promise<AuthResponse> {
    const email = typeof request.email === 'string' ? request.email.trim().toLowerCase() : '';
    const password = typeof request.password === 'string' ? request.password : '';
    if (!email || !password) {
      throw new ValidationError('Email and password are required');
    }

    const user = await this.users.findByEmail(email);
    // Same message for unknown email and wrong password
    if (!user || !(await this.authService.verifyPassword(password, user.passwordHash))) {
      throw new UnauthorizedError('Invalid email or password');
    }
    if (!user.isActive) {
      throw new UnauthorizedError('Account is disabled');
    }

    await this.users.touchLogin(user.id);
    return { user: toPublicUser(user), tokens: this.authService.generateTokenPair(user) };
  }

  /**
   * Exchange a refresh token for a new pair. The presented token is
   * revoked, so each refresh token works once.
   */
  async refresh(request: RefreshRequest): Promise<TokenPair> {
    const token = typeof request.refreshToken === 'string' ? request.refreshToken : '';
    const payload = token ? this.authService.verifyRefreshToken(token) : null;

    if (!payload || !payload.jti) {
      throw new UnauthorizedError('Invalid refresh token');
    }
    if (await this.denylist.isRevoked(payload.jti)) {
      this.logger.warn(`Revoked refresh token presented for user ${payload.sub}`);
      throw new UnauthorizedError('Refresh token has been revoked');
    }

    const user = await this.users.findById(payload.sub);
    if (!user || !user.isActive) {
      throw new UnauthorizedError('Invalid refresh token');
    }

    await this.denylist.revoke(payload.jti, this.authService.getTokenTTL(token));
    return this.authService.generateTokenPair(user);
  }

  /**
   * Revoke a refresh token. Unknown or invalid tokens are ignored.
   */
  async logout(request: RefreshRequest): Promise<void> {
    const token = typeof request.refreshToken === 'string' ? request.refreshToken : '';
    const payload = token ? this.authService.verifyRefreshToken(token) : null;
    if (payload?.jti) {
      await this.denylist.revoke(payload.jti, this.authService.getTokenTTL(token));
    }
  }

  async getProfile(userId: string): Promise<PublicUser> {
    const user = await this.users.findById(userId);
    if (!user) {
      throw new NotFoundError('User');
    }
    return toPublicUser(user);
  }
}
