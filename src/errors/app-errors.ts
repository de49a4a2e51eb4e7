/**
 * Application error taxonomy.
 *
 * Every failure a caller can act on is an HttpException carrying a stable
 * `code`. Anything else is reported as a generic 500 by `toErrorResponse`.
 */

import { HttpException, HttpStatus } from '@nestjs/common';
import { BackendFailure } from '../interfaces/generation.interface';

export type ErrorCode =
  | 'LIMIT_EXCEEDED'
  | 'UNSUPPORTED_FORMAT'
  | 'EXTRACTION_FAILED'
  | 'GENERATION_FAILED'
  | 'TIMEOUT'
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'FORBIDDEN'
  | 'UNAUTHORIZED'
  | 'CONFLICT'
  | 'RATE_LIMITED';

export interface ErrorBody {
  statusCode: number;
  error: string;
  code: string;
  message: string;
  [detail: string]: unknown;
}

export class AppError extends HttpException {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, status: HttpStatus, details: Record<string, unknown> = {}) {
    const body: ErrorBody = { ...details, statusCode: status, error: code, code, message };
    super(body, status);
    this.code = code;
    this.details = details;
  }
}

export class LimitExceededError extends AppError {
  constructor(used: number, limit: number, periodKey: string, upgradeUrl: string) {
    super(
      'LIMIT_EXCEEDED',
      `Monthly quiz limit reached (${used}/${limit}). Upgrade your plan to generate more quizzes.`,
      HttpStatus.FORBIDDEN,
      { used, limit, periodKey, upgradeUrl },
    );
  }
}

export class UnsupportedFormatError extends AppError {
  constructor(extension: string, allowed: readonly string[]) {
    super(
      'UNSUPPORTED_FORMAT',
      `Unsupported file format: ${extension || '(none)'}. Allowed: ${allowed.join(', ')}`,
      HttpStatus.UNSUPPORTED_MEDIA_TYPE,
      { allowed: [...allowed] },
    );
  }
}

export class ExtractionFailedError extends AppError {
  constructor(message: string) {
    super('EXTRACTION_FAILED', message, HttpStatus.UNPROCESSABLE_ENTITY);
  }
}

/**
 * Backend messages stay on `failures` for logging. The response only names
 * which backend failed for which type.
 */
export class GenerationFailedError extends AppError {
  readonly failures: BackendFailure[];

  constructor(message: string, failures: BackendFailure[] = []) {
    super(
      'GENERATION_FAILED',
      message,
      HttpStatus.BAD_GATEWAY,
      failures.length > 0 ? { failedBackends: failures.map(({ backend, type }) => ({ backend, type })) } : {},
    );
    this.failures = failures;
  }
}

export class GenerationTimeoutError extends AppError {
  constructor(timeoutMs: number) {
    super('TIMEOUT', `Question generation timed out after ${timeoutMs}ms`, HttpStatus.GATEWAY_TIMEOUT, { timeoutMs });
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('VALIDATION_ERROR', message, HttpStatus.BAD_REQUEST, details);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super('NOT_FOUND', `${resource} not found`, HttpStatus.NOT_FOUND);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'You do not have access to this resource') {
    super('FORBIDDEN', message, HttpStatus.FORBIDDEN);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super('UNAUTHORIZED', message, HttpStatus.UNAUTHORIZED);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super('CONFLICT', message, HttpStatus.CONFLICT);
  }
}

export class RateLimitedError extends AppError {
  constructor(retryAfter: number) {
    super('RATE_LIMITED', 'Too many requests', HttpStatus.TOO_MANY_REQUESTS, { retryAfter });
  }
}

/**
 * Map any thrown value to a status and JSON body.
 * Unknown errors never leak their message.
 */
export function toErrorResponse(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof AppError) {
    const status = error.getStatus();
    return {
      status,
      body: { ...error.details, statusCode: status, error: error.code, code: error.code, message: error.message },
    };
  }

  if (error instanceof HttpException) {
    return {
      status: error.getStatus(),
      body: { statusCode: error.getStatus(), error: error.name, code: error.name, message: error.message },
    };
  }

  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    body: { statusCode: HttpStatus.INTERNAL_SERVER_ERROR, error: 'INTERNAL_ERROR', code: 'INTERNAL_ERROR', message: 'Internal server error' },
  };
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
