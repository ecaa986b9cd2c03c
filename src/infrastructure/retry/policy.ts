// ═══════════════════════════════════════════════════════════════════════════════
// RETRY POLICY — Bounded Retry with Backoff
// ═══════════════════════════════════════════════════════════════════════════════

import {
  type RetryConfig,
  type RetryPolicy,
  type RetryResult,
  type BackoffCalculator,
  DEFAULT_RETRY_CONFIG,
} from './types.js';
import { createBackoffCalculator, sleep, formatDelay } from './backoff.js';
import { getLogger, toError } from '../../logging/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// RETRY POLICY IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

export class RetryPolicyImpl implements RetryPolicy {
  private readonly config: RetryConfig;
  private readonly backoff: BackoffCalculator;
  private readonly logger = getLogger({ component: 'retry' });

  constructor(config: Partial<RetryConfig> = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.backoff = createBackoffCalculator(this.config);
  }

  getConfig(): RetryConfig {
    return this.config;
  }

  async executeWithResult<T>(fn: () => Promise<T>): Promise<RetryResult<T>> {
    const startTime = Date.now();
    const errors: Error[] = [];
    let attempt = 0;

    while (attempt <= this.config.maxAttempts) {
      attempt++;

      try {
        const value = await fn();
        return {
          success: true,
          value,
          attempts: attempt,
          totalTimeMs: Date.now() - startTime,
        };
      } catch (error) {
        const failure = toError(error);
        errors.push(failure);

        const retryable = this.config.isRetryable?.(failure, attempt) ?? true;
        if (!retryable || attempt > this.config.maxAttempts) {
          this.logger.warn(retryable ? 'Retry exhausted' : 'Non-retryable error', {
            attempts: attempt,
            error: failure.message,
          });
          return {
            success: false,
            error: failure,
            attempts: attempt,
            totalTimeMs: Date.now() - startTime,
            allErrors: errors,
          };
        }

        const delayMs = this.backoff.calculate(attempt);
        this.logger.debug('Retrying', {
          attempt,
          maxAttempts: this.config.maxAttempts,
          error: failure.message,
          delay: formatDelay(delayMs),
        });
        this.config.onRetry?.({
          attempt,
          maxAttempts: this.config.maxAttempts,
          error: failure,
          delayMs,
        });

        await sleep(delayMs);
      }
    }

    // Loop always returns; kept for the compiler
    const lastError = errors[errors.length - 1] ?? new Error('Unknown error');
    return {
      success: false,
      error: lastError,
      attempts: attempt,
      totalTimeMs: Date.now() - startTime,
      allErrors: errors,
    };
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// FACTORY FUNCTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export function createRetryPolicy(config?: Partial<RetryConfig>): RetryPolicy {
  return new RetryPolicyImpl(config);
}

/**
 * Fixed-delay policy, the shape used for document writes.
 */
export function retryWithFixedDelay(maxAttempts: number, delayMs: number): RetryPolicy {
  return new RetryPolicyImpl({
    maxAttempts,
    initialDelayMs: delayMs,
    maxDelayMs: delayMs,
    backoffStrategy: 'fixed',
    jitter: 'none',
  });
}
