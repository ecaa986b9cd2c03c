// ═══════════════════════════════════════════════════════════════════════════════
// PERSONALIZATION ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export type StoreErrorCode = 'READ_FAILED' | 'WRITE_FAILED' | 'LOCK_TIMEOUT';

/**
 * The durable medium could not be read or written, or a caller gave up
 * waiting for its turn. Committed state is unchanged when this is raised.
 */
export class StoreError extends Error {
  readonly name = 'StoreError';
  readonly code: StoreErrorCode;

  constructor(code: StoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
  }
}

/**
 * Input rejected before any mutation.
 */
export class ValidationError extends Error {
  readonly name = 'ValidationError';
  readonly code = 'VALIDATION_ERROR';
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.field = field;
  }
}

export type PersonalizationError = StoreError | ValidationError;

export function isPersonalizationError(error: unknown): error is PersonalizationError {
  return error instanceof StoreError || error instanceof ValidationError;
}
