/**
 * Authentication service
 *
 * Token generation and verification, password hashing.
 */

import * as jwt from 'jsonwebtoken';
import * as bcrypt from 'bcrypt';
import { randomUUID } from 'crypto';
import { JwtPayload, TokenPair, UserRecord, AuthContext } from './auth.interface';
import { getJwtConfig, parseDurationSeconds, JwtConfig } from './jwt.config';
import { getAppConfig } from '../config/app.config';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Narrow a decoded token to our payload shape
 */
function toPayload(decoded: unknown): JwtPayload | null {
  if (!isRecord(decoded)) return null;

  const { sub, email, type, jti, iat, exp } = decoded;
  if (typeof sub !== 'string' || typeof email !== 'string') return null;
  if (type !== 'access' && type !== 'refresh') return null;

  return {
    sub,
    email,
    type,
    jti: typeof jti === 'string' ? jti : undefined,
    iat: typeof iat === 'number' ? iat : undefined,
    exp: typeof exp === 'number' ? exp : undefined,
  };
}

export class AuthService {
  private config: JwtConfig;
  private readonly bcryptRounds: number;

  constructor(config?: JwtConfig, bcryptRounds?: number) {
    this.config = config || getJwtConfig();
    this.bcryptRounds = bcryptRounds || getAppConfig().bcryptRounds;
  }

  /**
   * Generate access and refresh token pair.
   * Refresh tokens carry a jti so they can be revoked on rotation.
   */
  generateTokenPair(user: Pick<UserRecord, 'id' | 'email'>): TokenPair {
    const accessPayload: JwtPayload = {
      sub: user.id,
      email: user.email,
      type: 'access',
    };

    const refreshPayload: JwtPayload = {
      sub: user.id,
      email: user.email,
      type: 'refresh',
    };

    const accessToken = jwt.sign(accessPayload, this.config.accessSecret, {
      expiresIn: parseDurationSeconds(this.config.accessExpiresIn),
      issuer: this.config.issuer,
      audience: this.config.audience,
    });

    const refreshToken = jwt.sign(refreshPayload, this.config.refreshSecret, {
      expiresIn: parseDurationSeconds(this.config.refreshExpiresIn),
      issuer: this.config.issuer,
      audience: this.config.audience,
      jwtid: randomUUID(),
    });

    return {
      accessToken,
      refreshToken,
      expiresIn: parseDurationSeconds(this.config.accessExpiresIn),
      tokenType: 'Bearer',
    };
  }

  verifyAccessToken(token: string): JwtPayload | null {
    const payload = this.verify(token, this.config.accessSecret);
    return payload && payload.type === 'access' ? payload : null;
  }

  verifyRefreshToken(token: string): JwtPayload | null {
    const payload = this.verify(token, this.config.refreshSecret);
    return payload && payload.type === 'refresh' ? payload : null;
  }

  private verify(token: string, secret: string): JwtPayload | null {
    try {
      return toPayload(
        jwt.verify(token, secret, {
          issuer: this.config.issuer,
          audience: this.config.audience,
        }),
      );
    } catch {
      return null;
    }
  }

  payloadToAuthContext(payload: JwtPayload): AuthContext {
    return {
      userId: payload.sub,
      email: payload.email,
    };
  }

  async hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, this.bcryptRounds);
  }

  async verifyPassword(password: string, hash: string): Promise<boolean> {
    return bcrypt.compare(password, hash);
  }

  /**
   * Decode token without verification (for expiry checks only)
   */
  decodeToken(token: string): JwtPayload | null {
    return toPayload(jwt.decode(token));
  }

  isTokenExpired(token: string): boolean {
    const decoded = this.decodeToken(token);
    if (!decoded || !decoded.exp) {
      return true;
    }
    return decoded.exp * 1000 < Date.now();
  }

  /**
   * Seconds until the token expires, 0 if expired or unreadable
   */
  getTokenTTL(token: string): number {
    const decoded = this.decodeToken(token);
    if (!decoded || !decoded.exp) {
      return 0;
    }
    return Math.max(0, decoded.exp - Math.floor(Date.now() / 1000));
  }
}
