// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLER TESTS — Error Classes, Mapping and Middleware
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi, afterEach } from 'vitest';
import { z } from 'zod';

import { reloadConfig } from '../../config/index.js';
import { StoreError, ValidationError as DomainValidationError } from '../../core/personalization/index.js';
import {
  errorHandler,
  notFoundHandler,
  asyncHandler,
  toApiError,
  ApiError,
  NotFoundError,
  ValidationError,
  ServiceUnavailableError,
  InternalError,
} from '../middleware/error-handler.js';
import { bodyOf, createMockRequest, createMockResponse } from './mocks.js';

function handle(error: unknown, requestId?: string) {
  const { res, recorded } = createMockResponse();
  errorHandler(error, createMockRequest({ path: '/api/v1/users/u1/profile', requestId }), res, vi.fn());
  const { timestamp, ...body } = bodyOf(recorded);
  return { recorded, body, timestamp };
}

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR CLASSES
// ─────────────────────────────────────────────────────────────────────────────────

describe('Error Classes', () => {
  it('should create an ApiError with defaults', () => {
    const error = new ApiError('Something went wrong');

    expect(error.statusCode).toBe(400);
    expect(error.code).toBe('BAD_REQUEST');
    expect(error.isOperational).toBe(true);
    expect(error.details).toBeUndefined();
  });

  it('should name the missing resource', () => {
    expect(new NotFoundError('Route').message).toBe('Route not found');
    expect(new NotFoundError('Route', 'GET /nope').message).toBe('Route not found: GET /nope');
    expect(new NotFoundError('Route').statusCode).toBe(404);
  });

  it('should create a 400 validation error with details', () => {
    const error = new ValidationError('Invalid input', { field: 'limit' });

    expect(error.statusCode).toBe(400);
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.details).toEqual({ field: 'limit' });
  });

  it('should carry retryAfter on a 503', () => {
    const error = new ServiceUnavailableError('Busy', 'LOCK_TIMEOUT', 1);

    expect(error.statusCode).toBe(503);
    expect(error.code).toBe('LOCK_TIMEOUT');
    expect(error.retryAfter).toBe(1);
    expect(error.details).toEqual({ retryAfter: 1 });
  });

  it('should mark internal errors as non-operational', () => {
    const error = new InternalError();

    expect(error.statusCode).toBe(500);
    expect(error.message).toBe('An unexpected error occurred');
    expect(error.isOperational).toBe(false);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// SERVICE FAILURE MAPPING
// ─────────────────────────────────────────────────────────────────────────────────

describe('toApiError', () => {
  it('should map each failure code to a status', () => {
    const statuses = (['VALIDATION_ERROR', 'LOCK_TIMEOUT', 'READ_FAILED', 'WRITE_FAILED', 'INTERNAL_ERROR'] as const).map(
      code => toApiError({ status: 'error', code, message: 'x' }).statusCode
    );

    expect(statuses).toEqual([400, 503, 503, 503, 500]);
  });

  it('should only ask for a retry on lock timeouts', () => {
    const lock = toApiError({ status: 'error', code: 'LOCK_TIMEOUT', message: 'busy' });
    const write = toApiError({ status: 'error', code: 'WRITE_FAILED', message: 'disk full' });

    expect(lock instanceof ServiceUnavailableError && lock.retryAfter).toBe(1);
    expect(write instanceof ServiceUnavailableError && write.retryAfter).toBeUndefined();
    expect(write.code).toBe('WRITE_FAILED');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// MIDDLEWARE
// ─────────────────────────────────────────────────────────────────────────────────

describe('errorHandler', () => {
  afterEach(() => {
    process.env.NODE_ENV = 'test';
    reloadConfig();
  });

  it('should send an ApiError as is', () => {
    const { recorded, body, timestamp } = handle(new NotFoundError('Route', 'GET /nope'), 'req-1');

    expect(recorded.statusCode).toBe(404);
    expect(body).toEqual({ error: 'Route not found: GET /nope', code: 'NOT_FOUND', requestId: 'req-1' });
    expect(typeof timestamp).toBe('string');
  });

  it('should list zod issues', () => {
    const parsed = z.object({ limit: z.number() }).safeParse({ limit: 'ten' });
    if (parsed.success) throw new Error('expected a parse failure');

    const { recorded, body } = handle(parsed.error);

    expect(recorded.statusCode).toBe(400);
    expect(body).toEqual({
      error: 'Invalid request',
      code: 'VALIDATION_ERROR',
      details: { issues: [{ path: 'limit', message: 'Expected number, received string' }] },
    });
  });

  it('should report the field of a domain validation error', () => {
    const { recorded, body } = handle(new DomainValidationError('limit must be a positive integer, got 0', 'limit'));

    expect(recorded.statusCode).toBe(400);
    expect(body).toEqual({
      error: 'limit must be a positive integer, got 0',
      code: 'VALIDATION_ERROR',
      details: { field: 'limit' },
    });
  });

  it('should answer a lock timeout with 503 and Retry-After', () => {
    const { recorded, body } = handle(new StoreError('LOCK_TIMEOUT', 'Timed out'));

    expect(recorded.statusCode).toBe(503);
    expect(recorded.headers).toEqual({ 'Retry-After': '1' });
    expect(body).toEqual({ error: 'Timed out', code: 'LOCK_TIMEOUT', details: { retryAfter: 1 } });
  });

  it('should answer a storage failure with 503', () => {
    const { recorded, body } = handle(new StoreError('READ_FAILED', 'Failed to read file storage: EACCES'));

    expect(recorded.statusCode).toBe(503);
    expect(recorded.headers).toEqual({});
    expect(body).toEqual({ error: 'Failed to read file storage: EACCES', code: 'READ_FAILED' });
  });

  it('should reject malformed JSON bodies', () => {
    const syntaxError = Object.assign(new SyntaxError('Unexpected token b'), { body: '{bad' });

    const { recorded, body } = handle(syntaxError);

    expect(recorded.statusCode).toBe(400);
    expect(body).toEqual({ error: 'Invalid JSON in request body', code: 'INVALID_JSON' });
  });

  it('should expose unexpected error messages outside production', () => {
    const { recorded, body } = handle(new Error('boom'));

    expect(recorded.statusCode).toBe(500);
    expect(body).toEqual({ error: 'boom', code: 'INTERNAL_ERROR' });
  });

  it('should hide 5xx messages and details in production', () => {
    process.env.NODE_ENV = 'production';
    reloadConfig();

    const internal = handle(new Error('connection string leaked'));
    const unavailable = handle(new StoreError('LOCK_TIMEOUT', 'Timed out'));

    expect(internal.body).toEqual({ error: 'An unexpected error occurred', code: 'INTERNAL_ERROR' });
    expect(unavailable.body).toEqual({ error: 'An unexpected error occurred', code: 'LOCK_TIMEOUT' });
    expect(unavailable.recorded.headers).toEqual({ 'Retry-After': '1' });
  });

  it('should keep 4xx messages in production', () => {
    process.env.NODE_ENV = 'production';
    reloadConfig();

    const { body } = handle(new ValidationError('Name must not be blank'));

    expect(body).toEqual({ error: 'Name must not be blank', code: 'VALIDATION_ERROR' });
  });
});

describe('notFoundHandler', () => {
  it('should pass a NotFoundError naming the route', () => {
    const next = vi.fn();
    const { res } = createMockResponse();

    notFoundHandler(createMockRequest({ method: 'DELETE', path: '/nope' }), res, next);

    expect(next).toHaveBeenCalledTimes(1);
    const error: unknown = next.mock.calls[0]?.[0];
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error instanceof NotFoundError && error.message).toBe('Route not found: DELETE /nope');
  });
});

describe('asyncHandler', () => {
  it('should forward rejections to next', async () => {
    const next = vi.fn();
    const failure = new Error('handler failed');
    const wrapped = asyncHandler(async () => {
      throw failure;
    });

    await wrapped(createMockRequest(), createMockResponse().res, next);

    expect(next).toHaveBeenCalledWith(failure);
  });

  it('should not call next when the handler succeeds', async () => {
    const next = vi.fn();
    const wrapped = asyncHandler(async (_req, res) => {
      res.status(204);
    });

    await wrapped(createMockRequest(), createMockResponse().res, next);

    expect(next).not.toHaveBeenCalled();
  });
});
