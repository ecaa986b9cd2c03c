// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Environment Config, Feature Flags, Storage & Server Settings
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

function envBool(key: string, defaultValue: boolean = false): boolean {
  const value = process.env[key]?.toLowerCase();
  if (value === undefined) return defaultValue;
  return value === 'true' || value === '1' || value === 'yes';
}

function envNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Like envNumber, but zero and negative values fall back to the default.
 */
function envPositiveNumber(key: string, defaultValue: number): number {
  const value = envNumber(key, defaultValue);
  return value > 0 ? value : defaultValue;
}

function envString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function envOneOf<T extends string>(key: string, allowed: readonly T[], defaultValue: T): T {
  const value = process.env[key]?.toLowerCase();
  const match = allowed.find(option => option === value);
  return match ?? defaultValue;
}

// ─────────────────────────────────────────────────────────────────────────────────
// FEATURE FLAGS
// ─────────────────────────────────────────────────────────────────────────────────

export interface FeatureFlags {
  // Logging
  debugMode: boolean;
  redactPII: boolean;
}

export function loadFeatureFlags(): FeatureFlags {
  return {
    debugMode: envBool('DEBUG', false),
    redactPII: envBool('REDACT_PII', true),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT
// ─────────────────────────────────────────────────────────────────────────────────

export const ENVIRONMENTS = ['development', 'staging', 'production', 'test'] as const;

export type Environment = typeof ENVIRONMENTS[number];

export interface EnvironmentConfig {
  environment: Environment;
  isProduction: boolean;
  isStaging: boolean;
  isDevelopment: boolean;
  isTest: boolean;
}

export function loadEnvironmentConfig(): EnvironmentConfig {
  const env = envOneOf('NODE_ENV', ENVIRONMENTS, 'development');

  return {
    environment: env,
    isProduction: env === 'production',
    isStaging: env === 'staging',
    isDevelopment: env === 'development',
    isTest: env === 'test',
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// STORAGE CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export const STORAGE_BACKENDS = ['file', 'redis', 'memory'] as const;

export type StorageBackend = typeof STORAGE_BACKENDS[number];

export interface StorageConfig {
  backend: StorageBackend;

  // File backend
  filePath: string;

  // Redis backend
  redisUrl: string;
  redisDocumentKey: string;
  redisCommandTimeoutMs: number;

  // Concurrency; every lock wait is bounded
  lockTimeoutMs: number;

  // Write retries (excluding the first attempt)
  writeMaxRetries: number;
  writeRetryDelayMs: number;
}

export function loadStorageConfig(): StorageConfig {
  return {
    backend: envOneOf('STORAGE_BACKEND', STORAGE_BACKENDS, 'file'),
    filePath: envString('MEMORY_FILE', 'agent_memory.json'),
    redisUrl: envString('REDIS_URL', 'redis://localhost:6379'),
    redisDocumentKey: envString('REDIS_DOCUMENT_KEY', 'personalization:document'),
    redisCommandTimeoutMs: envPositiveNumber('REDIS_COMMAND_TIMEOUT_MS', 2000),
    lockTimeoutMs: envPositiveNumber('LOCK_TIMEOUT_MS', 5000),
    writeMaxRetries: envNumber('WRITE_MAX_RETRIES', 2),
    writeRetryDelayMs: envNumber('WRITE_RETRY_DELAY_MS', 50),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// SERVER CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export interface ServerConfig {
  port: number;
  host: string;

  // Public URL used in e-mailed feedback links
  feedbackBaseUrl: string;
}

export function loadServerConfig(): ServerConfig {
  const port = envNumber('PORT', 5000);

  return {
    port,
    host: envString('HOST', '0.0.0.0'),
    feedbackBaseUrl: envString('FEEDBACK_BASE_URL', `http://localhost:${port}`),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// COMBINED CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export interface AppConfig {
  env: EnvironmentConfig;
  features: FeatureFlags;
  storage: StorageConfig;
  server: ServerConfig;
}

let cachedConfig: AppConfig | null = null;

export function loadConfig(): AppConfig {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    env: loadEnvironmentConfig(),
    features: loadFeatureFlags(),
    storage: loadStorageConfig(),
    server: loadServerConfig(),
  };

  return cachedConfig;
}

export function reloadConfig(): AppConfig {
  cachedConfig = null;
  return loadConfig();
}

// ─────────────────────────────────────────────────────────────────────────────────
// FEEDBACK LINKS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Build the link an e-mailed digest embeds behind its like/dislike buttons.
 */
export function buildFeedbackUrl(params: {
  userId: string;
  articleId: string;
  category: string;
  action: 'like' | 'dislike';
}): string {
  const config = loadConfig();
  const url = new URL('/feedback', config.server.feedbackBaseUrl);
  url.searchParams.set('article_id', params.articleId);
  url.searchParams.set('user_id', params.userId);
  url.searchParams.set('action', params.action);
  url.searchParams.set('category', params.category);
  return url.toString();
}
