/**
 * Authentication module
 */

export {
  JwtPayload,
  UserRecord,
  NewUser,
  PublicUser,
  TokenPair,
  AuthContext,
  RegisterRequest,
  LoginRequest,
  RefreshRequest,
  AuthResponse,
} from './auth.interface';

export {
  JwtConfig,
  loadJwtConfig,
  validateJwtConfig,
  getJwtConfig,
  resetJwtConfig,
  parseDuration,
  parseDurationSeconds,
} from './jwt.config';

export { AuthService } from './auth.service';
export { AccountService, checkPasswordStrength, toPublicUser } from './account.service';
export { TokenDenylistService } from './token-denylist.service';

export {
  JwtGuard,
  AuthenticatedRequest,
  GuardResult,
  AuthError,
  extractBearerToken,
  getAuthContext,
} from './jwt.guard';
