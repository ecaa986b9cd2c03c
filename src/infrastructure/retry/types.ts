// ═══════════════════════════════════════════════════════════════════════════════
// RETRY TYPES — Retry Policy Types and Configuration
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// BACKOFF STRATEGIES
// ─────────────────────────────────────────────────────────────────────────────────

export type BackoffStrategy =
  | 'fixed'               // Same delay each time
  | 'linear'              // Delay increases linearly
  | 'exponential'         // Delay doubles each time
  | 'exponential-jitter'; // Exponential with random jitter

export type JitterType =
  | 'none'   // No jitter
  | 'full'   // Random between 0 and delay
  | 'equal'; // Random between delay/2 and delay

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

export interface RetryConfig {
  /** Maximum number of retry attempts (excluding initial attempt) */
  readonly maxAttempts: number;

  /** Initial delay in ms before first retry */
  readonly initialDelayMs: number;

  /** Maximum delay in ms between retries */
  readonly maxDelayMs: number;

  readonly backoffStrategy: BackoffStrategy;
  readonly jitter: JitterType;

  /** Multiplier for exponential/linear backoff */
  readonly backoffMultiplier: number;

  /** Decide whether a failed attempt is worth repeating */
  readonly isRetryable?: (error: Error, attempt: number) => boolean;

  /** Called before each retry */
  readonly onRetry?: (event: RetryEvent) => void;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 2,
  initialDelayMs: 50,
  maxDelayMs: 1000,
  backoffStrategy: 'exponential-jitter',
  jitter: 'full',
  backoffMultiplier: 2,
};

// ─────────────────────────────────────────────────────────────────────────────────
// EVENTS & RESULTS
// ─────────────────────────────────────────────────────────────────────────────────

export interface RetryEvent {
  /** Attempt that just failed (1-based) */
  readonly attempt: number;
  readonly maxAttempts: number;
  readonly error: Error;
  readonly delayMs: number;
}

export type RetryResult<T> =
  | { success: true; value: T; attempts: number; totalTimeMs: number }
  | { success: false; error: Error; attempts: number; totalTimeMs: number; allErrors: Error[] };

// ─────────────────────────────────────────────────────────────────────────────────
// INTERFACES
// ─────────────────────────────────────────────────────────────────────────────────

export interface RetryPolicy {
  /** Execute and return a detailed result; never rejects */
  executeWithResult<T>(fn: () => Promise<T>): Promise<RetryResult<T>>;

  getConfig(): RetryConfig;
}

export interface BackoffCalculator {
  /** Delay before retry number `attempt` (1-based) */
  calculate(attempt: number): number;
}
