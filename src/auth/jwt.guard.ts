/**
 * JWT guard
 *
 * Validates Bearer tokens in the Authorization header and attaches the
 * caller's context to the request.
 */

import { IncomingMessage, ServerResponse } from 'http';
import { AuthService } from './auth.service';
import { AuthContext } from './auth.interface';

export interface AuthenticatedRequest extends IncomingMessage {
  auth?: AuthContext;
}

export interface AuthError {
  statusCode: number;
  error: 'UNAUTHORIZED';
  code: 'UNAUTHORIZED';
  message: string;
}

export type GuardResult =
  | { authenticated: true; context: AuthContext }
  | { authenticated: false; error: AuthError };

function unauthorized(message: string): GuardResult {
  return {
    authenticated: false,
    error: { statusCode: 401, error: 'UNAUTHORIZED', code: 'UNAUTHORIZED', message },
  };
}

export class JwtGuard {
  private authService: AuthService;

  constructor(authService?: AuthService) {
    this.authService = authService || new AuthService();
  }

  validate(req: IncomingMessage): GuardResult {
    const authHeader = req.headers.authorization;

    if (!authHeader) {
      return unauthorized('Missing Authorization header');
    }

    if (!authHeader.startsWith('Bearer ')) {
      return unauthorized('Invalid authorization scheme. Use Bearer token.');
    }

    const token = authHeader.substring(7);

    if (!token) {
      return unauthorized('Missing token');
    }

    const payload = this.authService.verifyAccessToken(token);

    if (!payload) {
      // Expired tokens get their own message so clients know to refresh
      if (this.authService.isTokenExpired(token)) {
        return unauthorized('Token expired');
      }
      return unauthorized('Invalid token');
    }

    return {
      authenticated: true,
      context: this.authService.payloadToAuthContext(payload),
    };
  }

  /**
   * Returns true if authenticated, otherwise writes a 401 and returns false.
   * Usage: if (!jwtGuard.protect(req, res)) return;
   */
  protect(req: AuthenticatedRequest, res: ServerResponse): boolean {
    const result = this.validate(req);

    if (!result.authenticated) {
      res.writeHead(result.error.statusCode, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify(result.error));
      return false;
    }

    req.auth = result.context;
    return true;
  }
}

export function extractBearerToken(req: IncomingMessage): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return null;
  }
  return authHeader.substring(7) || null;
}

/**
 * Auth context from a guarded request. Throws if the guard did not run.
 */
export function getAuthContext(req: AuthenticatedRequest): AuthContext {
  if (!req.auth) {
    throw new Error('Request is not authenticated');
  }
  return req.auth;
}
