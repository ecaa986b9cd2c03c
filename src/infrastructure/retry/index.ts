// ═══════════════════════════════════════════════════════════════════════════════
// RETRY MODULE INDEX — Retry Policy Exports
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type BackoffStrategy,
  type JitterType,
  type RetryConfig,
  DEFAULT_RETRY_CONFIG,
  type RetryEvent,
  type RetryResult,
  type RetryPolicy,
  type BackoffCalculator,
} from './types.js';

export {
  BackoffCalculatorImpl,
  createBackoffCalculator,
  sleep,
  formatDelay,
} from './backoff.js';

export {
  RetryPolicyImpl,
  createRetryPolicy,
  retryWithFixedDelay,
} from './policy.js';
