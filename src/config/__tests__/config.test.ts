// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION TESTS — Environment Loading, Storage Settings, Feedback Links
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { buildFeedbackUrl, loadConfig, reloadConfig } from '../index.js';

const MANAGED_KEYS = [
  'NODE_ENV',
  'DEBUG',
  'REDACT_PII',
  'PORT',
  'HOST',
  'FEEDBACK_BASE_URL',
  'STORAGE_BACKEND',
  'MEMORY_FILE',
  'REDIS_URL',
  'REDIS_DOCUMENT_KEY',
  'REDIS_COMMAND_TIMEOUT_MS',
  'LOCK_TIMEOUT_MS',
  'WRITE_MAX_RETRIES',
  'WRITE_RETRY_DELAY_MS',
];

describe('config', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of MANAGED_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    process.env.NODE_ENV = 'test';
  });

  afterEach(() => {
    for (const key of MANAGED_KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    reloadConfig();
  });

  describe('defaults', () => {
    it('should use file storage with conservative limits', () => {
      expect(reloadConfig().storage).toEqual({
        backend: 'file',
        filePath: 'agent_memory.json',
        redisUrl: 'redis://localhost:6379',
        redisDocumentKey: 'personalization:document',
        redisCommandTimeoutMs: 2000,
        lockTimeoutMs: 5000,
        writeMaxRetries: 2,
        writeRetryDelayMs: 50,
      });
    });

    it('should listen on port 5000 on all interfaces', () => {
      expect(reloadConfig().server).toEqual({
        port: 5000,
        host: '0.0.0.0',
        feedbackBaseUrl: 'http://localhost:5000',
      });
    });

    it('should redact PII and stay out of debug mode', () => {
      expect(reloadConfig().features).toEqual({ debugMode: false, redactPII: true });
    });
  });

  describe('environment', () => {
    it('should recognise the environment', () => {
      process.env.NODE_ENV = 'production';

      const { env } = reloadConfig();

      expect(env.environment).toBe('production');
      expect(env.isProduction).toBe(true);
      expect(env.isTest).toBe(false);
    });

    it('should fall back to development for unknown environments', () => {
      process.env.NODE_ENV = 'qa';

      expect(reloadConfig().env.environment).toBe('development');
    });

    it('should read storage settings', () => {
      process.env.STORAGE_BACKEND = 'REDIS';
      process.env.REDIS_URL = 'redis://cache:6380';
      process.env.LOCK_TIMEOUT_MS = '250';
      process.env.WRITE_MAX_RETRIES = '0';

      const { storage } = reloadConfig();

      expect(storage.backend).toBe('redis');
      expect(storage.redisUrl).toBe('redis://cache:6380');
      expect(storage.lockTimeoutMs).toBe(250);
      expect(storage.writeMaxRetries).toBe(0);
    });

    it('should ignore unknown backends and malformed numbers', () => {
      process.env.STORAGE_BACKEND = 'postgres';
      process.env.LOCK_TIMEOUT_MS = 'soon';

      const { storage } = reloadConfig();

      expect(storage.backend).toBe('file');
      expect(storage.lockTimeoutMs).toBe(5000);
    });

    it('should keep lock waits bounded', () => {
      process.env.LOCK_TIMEOUT_MS = '0';
      expect(reloadConfig().storage.lockTimeoutMs).toBe(5000);

      process.env.LOCK_TIMEOUT_MS = '-100';
      expect(reloadConfig().storage.lockTimeoutMs).toBe(5000);
    });

    it('should parse boolean flags', () => {
      process.env.DEBUG = 'yes';
      process.env.REDACT_PII = '0';

      expect(reloadConfig().features).toEqual({ debugMode: true, redactPII: false });
    });

    it('should derive the feedback URL from the port', () => {
      process.env.PORT = '8080';

      expect(reloadConfig().server.feedbackBaseUrl).toBe('http://localhost:8080');
    });
  });

  describe('caching', () => {
    it('should return the cached config until reloaded', () => {
      const first = reloadConfig();
      process.env.PORT = '9000';

      expect(loadConfig()).toBe(first);
      expect(reloadConfig().server.port).toBe(9000);
    });
  });

  describe('buildFeedbackUrl', () => {
    it('should point at the feedback endpoint', () => {
      process.env.FEEDBACK_BASE_URL = 'https://news.example.com';
      reloadConfig();

      expect(
        buildFeedbackUrl({ userId: 'u1', articleId: 'a42', category: 'science', action: 'dislike' })
      ).toBe('https://news.example.com/feedback?article_id=a42&user_id=u1&action=dislike&category=science');
    });

    it('should encode unsafe characters', () => {
      process.env.FEEDBACK_BASE_URL = 'https://news.example.com';
      reloadConfig();

      expect(
        buildFeedbackUrl({ userId: 'ada@example.com', articleId: 'a&b', category: 'world news', action: 'like' })
      ).toBe('https://news.example.com/feedback?article_id=a%26b&user_id=ada%40example.com&action=like&category=world+news');
    });
  });
});
