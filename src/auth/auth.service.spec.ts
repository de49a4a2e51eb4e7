/**
 * AuthService Tests
 */

import * as jwt from 'jsonwebtoken';
import { AuthService } from './auth.service';
import { JwtConfig } from './jwt.config';

const config: JwtConfig = {
  accessSecret: 'test-access-secret-0123456789abcdef',
  refreshSecret: 'test-refresh-secret-0123456789abcdef',
  accessExpiresIn: '1h',
  refreshExpiresIn: '30d',
  issuer: 'quizsmith-api',
  audience: 'quizsmith-app',
};

const user = { id: 'user-123', email: 'teacher@example.com' };

describe('AuthService', () => {
  let authService: AuthService;

  beforeEach(() => {
    authService = new AuthService(config, 4);
  });

  describe('Token Generation', () => {
    it('should generate access and refresh tokens', () => {
      const tokens = authService.generateTokenPair(user);

      expect(tokens.tokenType).toBe('Bearer');
      expect(tokens.expiresIn).toBe(3600);
      expect(tokens.accessToken).not.toBe(tokens.refreshToken);
    });

    it('should give every refresh token its own jti', () => {
      const first = authService.verifyRefreshToken(authService.generateTokenPair(user).refreshToken);
      const second = authService.verifyRefreshToken(authService.generateTokenPair(user).refreshToken);

      expect(typeof first?.jti).toBe('string');
      expect(first?.jti).not.toBe(second?.jti);
    });
  });

  describe('Token Verification', () => {
    it('should verify valid access token', () => {
      const { accessToken } = authService.generateTokenPair(user);
      const payload = authService.verifyAccessToken(accessToken);

      expect(payload).toMatchObject({ sub: 'user-123', email: 'teacher@example.com', type: 'access' });
    });

    it('should map the payload to an auth context', () => {
      const payload = authService.verifyAccessToken(authService.generateTokenPair(user).accessToken);

      expect(payload && authService.payloadToAuthContext(payload)).toEqual({
        userId: 'user-123',
        email: 'teacher@example.com',
      });
    });

    it('should reject access token as refresh token', () => {
      const { accessToken } = authService.generateTokenPair(user);

      expect(authService.verifyRefreshToken(accessToken)).toBeNull();
    });

    it('should reject refresh token as access token', () => {
      const { refreshToken } = authService.generateTokenPair(user);

      expect(authService.verifyAccessToken(refreshToken)).toBeNull();
    });

    it('should reject tokens from another issuer', () => {
      const other = new AuthService({ ...config, issuer: 'someone-else' }, 4);
      const { accessToken } = other.generateTokenPair(user);

      expect(authService.verifyAccessToken(accessToken)).toBeNull();
    });

    it('should reject tampered token', () => {
      const { accessToken } = authService.generateTokenPair(user);
      const [header, , signature] = accessToken.split('.');
      const forged = Buffer.from(JSON.stringify({ sub: 'user-999', email: 'x@example.com', type: 'access' })).toString(
        'base64url',
      );

      expect(authService.verifyAccessToken(`${header}.${forged}.${signature}`)).toBeNull();
    });

    it('should reject garbage', () => {
      expect(authService.verifyAccessToken('not-a-token')).toBeNull();
    });
  });

  describe('Password Hashing', () => {
    it('should verify correct password', async () => {
      const hash = await authService.hashPassword('Passw0rd1');

      expect(hash).not.toBe('Passw0rd1');
      expect(await authService.verifyPassword('Passw0rd1', hash)).toBe(true);
    });

    it('should reject incorrect password', async () => {
      const hash = await authService.hashPassword('Passw0rd1');

      expect(await authService.verifyPassword('Passw0rd2', hash)).toBe(false);
    });
  });

  describe('Token Utilities', () => {
    const expiredToken = () =>
      jwt.sign(
        { sub: 'user-123', email: 'teacher@example.com', type: 'access', exp: Math.floor(Date.now() / 1000) - 60 },
        config.accessSecret,
        { issuer: config.issuer, audience: config.audience },
      );

    it('should report a fresh token as not expired', () => {
      const { accessToken } = authService.generateTokenPair(user);

      expect(authService.isTokenExpired(accessToken)).toBe(false);
      expect(authService.getTokenTTL(accessToken)).toBeGreaterThan(3500);
    });

    it('should detect expired tokens', () => {
      const token = expiredToken();

      expect(authService.verifyAccessToken(token)).toBeNull();
      expect(authService.isTokenExpired(token)).toBe(true);
      expect(authService.getTokenTTL(token)).toBe(0);
    });

    it('should treat unreadable tokens as expired', () => {
      expect(authService.isTokenExpired('not-a-token')).toBe(true);
      expect(authService.decodeToken('not-a-token')).toBeNull();
    });
  });
});
