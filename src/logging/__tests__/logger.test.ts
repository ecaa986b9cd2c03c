// ═══════════════════════════════════════════════════════════════════════════════
// LOGGER TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, afterEach } from 'vitest';
import { Logger, redactPII, redactMetadata, setLogSink, toError, type LogSink } from '../index.js';

describe('redactPII', () => {
  it('should mask e-mail addresses', () => {
    expect(redactPII('reply to ada@example.com soon')).toBe('reply to [EMAIL] soon');
  });

  it('should leave plain text alone', () => {
    expect(redactPII('liked a science article')).toBe('liked a science article');
  });
});

describe('redactMetadata', () => {
  it('should redact sensitive keys and mask nested values', () => {
    expect(redactMetadata({
      password: 'test-secret',
      apiKey: 'test-key',
      note: 'from a@b.io',
      nested: { contact: 'c@d.org', count: 3 },
    })).toEqual({
      password: '[REDACTED]',
      apiKey: '[REDACTED]',
      note: 'from [EMAIL]',
      nested: { contact: '[EMAIL]', count: 3 },
    });
  });
});

describe('Logger', () => {
  let restore: LogSink | null = null;

  afterEach(() => {
    if (restore) {
      setLogSink(restore);
      restore = null;
    }
  });

  it('should drop entries below the test threshold', () => {
    const lines: string[] = [];
    restore = setLogSink(line => lines.push(line));

    const logger = new Logger({ component: 'ledger' });
    logger.debug('debug line');
    logger.info('info line');
    logger.warn('disk nearly full for a@b.io');

    expect(lines).toHaveLength(1);
    expect(lines[0]?.endsWith('[ledger] disk nearly full for [EMAIL]')).toBe(true);
  });

  it('should carry the parent context into child loggers', () => {
    const lines: string[] = [];
    restore = setLogSink(line => lines.push(line));

    new Logger({ component: 'store' }).child({ userId: 'u1' }).warn('slow write');

    expect(lines).toHaveLength(1);
    expect(lines[0]?.endsWith('[store](u1) slow write')).toBe(true);
  });
});

describe('toError', () => {
  it('should pass errors through and wrap other values', () => {
    const original = new Error('boom');
    expect(toError(original)).toBe(original);
    expect(toError('plain').message).toBe('plain');
  });
});
