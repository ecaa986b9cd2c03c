// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLER — API Error Types and Central Express Error Middleware
// ═══════════════════════════════════════════════════════════════════════════════
//
// Routes throw (or pass to next) an ApiError, a ZodError or a personalization
// error; this middleware turns each into a JSON body:
//
//   { error, code, details?, requestId?, timestamp }
//
// 5xx messages are replaced with a generic one in production.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';

import { loadConfig } from '../../config/index.js';
import { getLogger, toError } from '../../logging/index.js';
import {
  StoreError,
  ValidationError as DomainValidationError,
  type OperationFailure,
} from '../../core/personalization/index.js';

const logger = getLogger({ component: 'api' });

const GENERIC_MESSAGE = 'An unexpected error occurred';

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR CLASSES
// ─────────────────────────────────────────────────────────────────────────────────

export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: Record<string, unknown>;
  readonly isOperational: boolean = true;

  constructor(
    message: string,
    statusCode: number = 400,
    code: string = 'BAD_REQUEST',
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export class NotFoundError extends ApiError {
  constructor(resource: string, id?: string) {
    super(id ? `${resource} not found: ${id}` : `${resource} not found`, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class ServiceUnavailableError extends ApiError {
  readonly retryAfter?: number;

  constructor(message: string = 'Service temporarily unavailable', code: string = 'SERVICE_UNAVAILABLE', retryAfter?: number) {
    super(message, 503, code, retryAfter !== undefined ? { retryAfter } : undefined);
    this.name = 'ServiceUnavailableError';
    this.retryAfter = retryAfter;
  }
}

export class InternalError extends ApiError {
  readonly isOperational: boolean = false;

  constructor(message: string = GENERIC_MESSAGE) {
    super(message, 500, 'INTERNAL_ERROR');
    this.name = 'InternalError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// MAPPING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Seconds a client should wait after a lock timeout before retrying.
 */
const LOCK_RETRY_AFTER_SECONDS = 1;

/**
 * Turn a failed service result into the matching ApiError.
 */
export function toApiError(failure: OperationFailure): ApiError {
  switch (failure.code) {
    case 'VALIDATION_ERROR':
      return new ValidationError(failure.message);
    case 'LOCK_TIMEOUT':
      return new ServiceUnavailableError(failure.message, failure.code, LOCK_RETRY_AFTER_SECONDS);
    case 'READ_FAILED':
    case 'WRITE_FAILED':
      return new ServiceUnavailableError(failure.message, failure.code);
    case 'INTERNAL_ERROR':
      return new InternalError(failure.message);
  }
}

function isJsonSyntaxError(error: unknown): error is SyntaxError {
  return error instanceof SyntaxError && 'body' in error;
}

function normalizeError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }

  if (error instanceof ZodError) {
    return new ValidationError('Invalid request', {
      issues: error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }

  if (error instanceof DomainValidationError) {
    return new ValidationError(error.message, error.field ? { field: error.field } : undefined);
  }

  if (error instanceof StoreError) {
    return toApiError({ status: 'error', code: error.code, message: error.message });
  }

  if (isJsonSyntaxError(error)) {
    return new ApiError('Invalid JSON in request body', 400, 'INVALID_JSON');
  }

  return new InternalError(toError(error).message);
}

// ─────────────────────────────────────────────────────────────────────────────────
// MIDDLEWARE
// ─────────────────────────────────────────────────────────────────────────────────

export interface ErrorResponseBody {
  error: string;
  code: string;
  details?: Record<string, unknown>;
  requestId?: string;
  timestamp: string;
}

/**
 * Express error middleware. Must be registered after all routes.
 */
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  const apiError = normalizeError(error);
  const hideInternals = apiError.statusCode >= 500 && loadConfig().env.isProduction;

  if (apiError.statusCode >= 500) {
    logger.error(`${req.method} ${req.path} failed`, toError(error), {
      requestId: req.requestId,
      code: apiError.code,
    });
  } else {
    logger.warn(`${req.method} ${req.path} rejected`, {
      requestId: req.requestId,
      code: apiError.code,
      error: apiError.message,
    });
  }

  if (apiError instanceof ServiceUnavailableError && apiError.retryAfter !== undefined) {
    res.setHeader('Retry-After', String(apiError.retryAfter));
  }

  const body: ErrorResponseBody = {
    error: hideInternals ? GENERIC_MESSAGE : apiError.message,
    code: apiError.code,
    timestamp: new Date().toISOString(),
  };
  if (apiError.details && !hideInternals) {
    body.details = apiError.details;
  }
  if (req.requestId) {
    body.requestId = req.requestId;
  }

  res.status(apiError.statusCode).json(body);
}

/**
 * Fallback for unmatched routes.
 */
export function notFoundHandler(req: Request, res: Response, next: NextFunction): void {
  next(new NotFoundError('Route', `${req.method} ${req.path}`));
}

/**
 * Forward rejections from async route handlers to the error middleware.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): (req: Request, res: Response, next: NextFunction) => Promise<void> {
  return async (req, res, next) => {
    try {
      await fn(req, res, next);
    } catch (error) {
      next(error);
    }
  };
}
