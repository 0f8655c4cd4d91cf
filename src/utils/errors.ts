// Standardized error handling utilities
// Every non-2xx response body goes through formatErrorResponse

import { ZodError } from 'zod';

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  UNAUTHORIZED = 'unauthorized',
  BAD_REQUEST = 'bad_request',
  INTERNAL_ERROR = 'internal_error',
  RATE_LIMITED = 'rate_limited',
  INVALID_TOKEN = 'invalid_token',
  TOKEN_EXPIRED = 'token_expired',
  VALIDATION_ERROR = 'validation_error',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static notFound(message: string = 'Resource not found', details?: unknown): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404, details);
  }

  static unauthorized(message: string = 'Unauthorized', details?: unknown): AppError {
    return new AppError(ErrorCode.UNAUTHORIZED, message, 401, details);
  }

  static rateLimited(retryAfter: number, message: string = 'Too many requests'): AppError {
    return new AppError(ErrorCode.RATE_LIMITED, message, 429, { retryAfter });
  }

  static invalidToken(message: string = 'Invalid token'): AppError {
    return new AppError(ErrorCode.INVALID_TOKEN, message, 401);
  }

  static tokenExpired(message: string = 'Token expired'): AppError {
    return new AppError(ErrorCode.TOKEN_EXPIRED, message, 401);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
  retry_after_seconds?: number;
}

function retryAfterOf(details: unknown): number | undefined {
  if (typeof details !== 'object' || details === null || !('retryAfter' in details)) {
    return undefined;
  }
  const { retryAfter } = details;
  return typeof retryAfter === 'number' ? retryAfter : undefined;
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (includeDetails && error.details) {
    response.details = error.details;
  }

  if (error.code === ErrorCode.RATE_LIMITED) {
    const retryAfter = retryAfterOf(error.details);
    if (retryAfter) {
      response.retry_after_seconds = retryAfter;
    }
  }

  return response;
}

function statusCodeOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('statusCode' in err)) {
    return undefined;
  }
  const { statusCode } = err;
  return typeof statusCode === 'number' ? statusCode : undefined;
}

// Fastify raises plain errors with a statusCode for malformed bodies and the like
export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) return err;

  if (err instanceof ZodError) {
    return AppError.validationError('Invalid request body', err.issues);
  }

  const statusCode = statusCodeOf(err);
  const message = err instanceof Error ? err.message : String(err);

  if (statusCode === 404) return AppError.notFound(message);
  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
    return new AppError(ErrorCode.BAD_REQUEST, message, statusCode);
  }

  return AppError.internal();
}
