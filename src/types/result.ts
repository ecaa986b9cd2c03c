// ═══════════════════════════════════════════════════════════════════════════════
// RESULT PATTERN — Type-Safe Error Handling
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// CORE RESULT TYPE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Success variant of Result.
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly error?: never;
}

/**
 * Failure variant of Result.
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
  readonly value?: never;
}

/**
 * Either a value or an expected failure. Used instead of throwing at store
 * and service seams.
 *
 * @example
 * ```typescript
 * const result = await store.update('u1', profile => { profile.name = 'Ada'; });
 * if (!result.ok) {
 *   logger.warn(result.error.message);
 * }
 * ```
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTRUCTORS
// ─────────────────────────────────────────────────────────────────────────────────

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// ─────────────────────────────────────────────────────────────────────────────────
// UNWRAPPING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Unwrap the value from an Ok Result, or throw the error it carries.
 */
export function unwrapOrThrow<T, E extends Error>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}
