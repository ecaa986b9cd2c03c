// ═══════════════════════════════════════════════════════════════════════════════
// RETRY TESTS — Backoff Calculation and Retry Policy
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi } from 'vitest';

import { BackoffCalculatorImpl, formatDelay } from '../backoff.js';
import { RetryPolicyImpl, retryWithFixedDelay } from '../policy.js';
import type { RetryEvent } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// BACKOFF
// ─────────────────────────────────────────────────────────────────────────────────

describe('BackoffCalculatorImpl', () => {
  const settings = {
    initialDelayMs: 100,
    maxDelayMs: 300,
    backoffMultiplier: 2,
  };

  it('should keep a fixed delay', () => {
    const backoff = new BackoffCalculatorImpl({ ...settings, backoffStrategy: 'fixed', jitter: 'none' });

    expect([1, 2, 3].map(attempt => backoff.calculate(attempt))).toEqual([100, 100, 100]);
  });

  it('should grow linearly', () => {
    const backoff = new BackoffCalculatorImpl({
      ...settings,
      backoffMultiplier: 1,
      backoffStrategy: 'linear',
      jitter: 'none',
    });

    expect([1, 2, 3].map(attempt => backoff.calculate(attempt))).toEqual([100, 200, 300]);
  });

  it('should grow exponentially up to the cap', () => {
    const backoff = new BackoffCalculatorImpl({ ...settings, backoffStrategy: 'exponential', jitter: 'none' });

    expect([1, 2, 3].map(attempt => backoff.calculate(attempt))).toEqual([100, 200, 300]);
  });

  it('should apply full and equal jitter', () => {
    const full = new BackoffCalculatorImpl({ ...settings, backoffStrategy: 'fixed', jitter: 'full' }, () => 0.5);
    const equal = new BackoffCalculatorImpl({ ...settings, backoffStrategy: 'fixed', jitter: 'equal' }, () => 0.5);

    expect(full.calculate(1)).toBe(50);
    expect(equal.calculate(1)).toBe(75);
  });

  it('should always randomize exponential-jitter', () => {
    const backoff = new BackoffCalculatorImpl(
      { ...settings, backoffStrategy: 'exponential-jitter', jitter: 'none' },
      () => 0.25
    );

    expect(backoff.calculate(2)).toBe(50);
  });
});

describe('formatDelay', () => {
  it('should format milliseconds and seconds', () => {
    expect(formatDelay(250)).toBe('250ms');
    expect(formatDelay(1500)).toBe('1.5s');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// POLICY
// ─────────────────────────────────────────────────────────────────────────────────

describe('RetryPolicyImpl', () => {
  it('should return the first successful value', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('written');

    const result = await retryWithFixedDelay(2, 0).executeWithResult(fn);

    expect(result.success).toBe(true);
    expect(result.success && result.value).toBe('written');
    expect(result.attempts).toBe(3);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should give up after the retries and keep every error', async () => {
    let calls = 0;
    const result = await retryWithFixedDelay(2, 0).executeWithResult(async () => {
      calls++;
      throw new Error(`failure ${calls}`);
    });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.attempts).toBe(3);
    expect(result.error.message).toBe('failure 3');
    expect(result.allErrors.map(error => error.message)).toEqual(['failure 1', 'failure 2', 'failure 3']);
  });

  it('should stop at a non-retryable error', async () => {
    const policy = new RetryPolicyImpl({
      maxAttempts: 5,
      initialDelayMs: 0,
      isRetryable: error => error.message !== 'fatal',
    });

    const result = await policy.executeWithResult(async () => {
      throw new Error('fatal');
    });

    expect(result.attempts).toBe(1);
  });

  it('should report each retry', async () => {
    const events: RetryEvent[] = [];
    const policy = new RetryPolicyImpl({
      maxAttempts: 1,
      initialDelayMs: 0,
      backoffStrategy: 'fixed',
      jitter: 'none',
      onRetry: event => events.push(event),
    });

    await policy.executeWithResult(async () => {
      throw new Error('flaky');
    });

    expect(events).toHaveLength(1);
    expect(events[0]?.attempt).toBe(1);
    expect(events[0]?.maxAttempts).toBe(1);
    expect(events[0]?.error.message).toBe('flaky');
    expect(events[0]?.delayMs).toBe(0);
  });

  it('should wrap thrown non-errors', async () => {
    const result = await retryWithFixedDelay(0, 0).executeWithResult(async () => {
      throw 'plain string';
    });

    expect(result.success === false && result.error.message).toBe('plain string');
  });
});
