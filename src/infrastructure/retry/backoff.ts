// ═══════════════════════════════════════════════════════════════════════════════
// BACKOFF — Fixed, Linear and Exponential Delays with Jitter
// ═══════════════════════════════════════════════════════════════════════════════

import type { BackoffCalculator, RetryConfig } from './types.js';

type BackoffSettings = Pick<
  RetryConfig,
  'initialDelayMs' | 'maxDelayMs' | 'backoffStrategy' | 'jitter' | 'backoffMultiplier'
>;

/**
 * Backoff calculator with configurable strategy and jitter.
 */
export class BackoffCalculatorImpl implements BackoffCalculator {
  private readonly settings: BackoffSettings;
  private readonly random: () => number;

  constructor(settings: BackoffSettings, random: () => number = Math.random) {
    this.settings = settings;
    this.random = random;
  }

  calculate(attempt: number): number {
    const delay = this.applyJitter(this.baseDelay(attempt));
    return Math.min(delay, this.settings.maxDelayMs);
  }

  private baseDelay(attempt: number): number {
    const { initialDelayMs, backoffMultiplier } = this.settings;

    switch (this.settings.backoffStrategy) {
      case 'fixed':
        return initialDelayMs;

      case 'linear':
        return initialDelayMs * attempt * backoffMultiplier;

      case 'exponential':
      case 'exponential-jitter':
        // delay = initialDelay * multiplier^(attempt-1)
        return initialDelayMs * Math.pow(backoffMultiplier, attempt - 1);
    }
  }

  private applyJitter(delay: number): number {
    // exponential-jitter always randomizes
    const jitter = this.settings.backoffStrategy === 'exponential-jitter' && this.settings.jitter === 'none'
      ? 'full'
      : this.settings.jitter;

    switch (jitter) {
      case 'none':
        return delay;
      case 'full':
        return this.random() * delay;
      case 'equal':
        return (delay / 2) + (this.random() * delay / 2);
    }
  }
}

export function createBackoffCalculator(settings: BackoffSettings): BackoffCalculator {
  return new BackoffCalculatorImpl(settings);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Format delay for logging.
 */
export function formatDelay(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}
