// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING MODULE — Structured Logs with Request Correlation
// ═══════════════════════════════════════════════════════════════════════════════

import { loadConfig } from '../config/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  requestId?: string;
  userId?: string;
  component?: string;
  duration?: number;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export interface LogContext {
  requestId?: string;
  userId?: string;
  component?: string;
}

/**
 * Where formatted lines go. Swapped out in tests.
 */
export type LogSink = (line: string) => void;

// ─────────────────────────────────────────────────────────────────────────────────
// PII REDACTION
// ─────────────────────────────────────────────────────────────────────────────────

const PII_PATTERNS = [
  // Email
  { pattern: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, replacement: '[EMAIL]' },
  // Phone (various formats)
  { pattern: /(\+?1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/g, replacement: '[PHONE]' },
  // Credit card (basic)
  { pattern: /\d{4}[-\s]?\d{4}[-\s]?\d{4}[-\s]?\d{4}/g, replacement: '[CARD]' },
];

const SENSITIVE_FIELDS = ['password', 'secret', 'token', 'authorization', 'apikey'];

export function redactPII(text: string): string {
  let result = text;
  for (const { pattern, replacement } of PII_PATTERNS) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

function redactValue(value: unknown, depth = 0): unknown {
  if (depth > 5) return '[MAX_DEPTH]';

  if (typeof value === 'string') {
    return redactPII(value);
  }

  if (Array.isArray(value)) {
    return value.map(item => redactValue(item, depth + 1));
  }

  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      result[key] = isSensitiveField(key) ? '[REDACTED]' : redactValue(inner, depth + 1);
    }
    return result;
  }

  return value;
}

function isSensitiveField(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_FIELDS.some(field => lowerKey.includes(field));
}

export function redactMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    result[key] = isSensitiveField(key) ? '[REDACTED]' : redactValue(value, 1);
  }
  return result;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOG LEVELS
// ─────────────────────────────────────────────────────────────────────────────────

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLevel];
}

function resolveMinLevel(): LogLevel {
  const config = loadConfig();
  if (config.features.debugMode) return 'debug';
  // Keep test output readable; failures still surface
  if (config.env.isTest) return 'warn';
  return 'info';
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // cyan
  info: '\x1b[32m',  // green
  warn: '\x1b[33m',  // yellow
  error: '\x1b[31m', // red
  fatal: '\x1b[35m', // magenta
};
const RESET = '\x1b[0m';

let sink: LogSink = line => console.log(line);

/**
 * Redirect log output. Returns the previous sink so callers can restore it.
 */
export function setLogSink(next: LogSink): LogSink {
  const previous = sink;
  sink = next;
  return previous;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER CLASS
// ─────────────────────────────────────────────────────────────────────────────────

export class Logger {
  private context: LogContext;
  private readonly minLevel: LogLevel;
  private readonly redact: boolean;
  private readonly jsonFormat: boolean;

  constructor(context: LogContext = {}) {
    this.context = context;
    const config = loadConfig();
    this.minLevel = resolveMinLevel();
    this.redact = config.features.redactPII;
    this.jsonFormat = config.env.isProduction || config.env.isStaging;
  }

  private formatEntry(level: LogLevel, message: string, extra?: Partial<LogEntry>): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: this.redact ? redactPII(message) : message,
      ...this.context,
      ...extra,
    };

    if (this.redact && entry.metadata) {
      entry.metadata = redactMetadata(entry.metadata);
    }

    // Stacks stay out of redacted output
    if (this.redact && entry.error?.stack) {
      entry.error.stack = undefined;
    }

    return entry;
  }

  private output(entry: LogEntry): void {
    if (this.jsonFormat) {
      sink(JSON.stringify(entry));
      return;
    }

    const prefix = entry.requestId ? `[${entry.requestId.slice(0, 8)}]` : '';
    const component = entry.component ? `[${entry.component}]` : '';
    const userId = entry.userId ? `(${entry.userId})` : '';
    const duration = entry.duration !== undefined ? ` ${entry.duration}ms` : '';
    const color = LEVEL_COLORS[entry.level];

    sink(
      `${entry.timestamp} ${color}${entry.level.toUpperCase().padEnd(5)}${RESET} ${prefix}${component}${userId} ${entry.message}${duration}`
    );

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      sink(`   ${JSON.stringify(entry.metadata)}`);
    }

    if (entry.error) {
      sink(`  Error: ${entry.error.name}: ${entry.error.message}`);
      if (entry.error.stack) {
        sink(`   ${entry.error.stack.split('\n').slice(1, 4).join('\n  ')}`);
      }
    }
  }

  private log(level: LogLevel, message: string, extra?: Partial<LogEntry>): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.output(this.formatEntry(level, message, extra));
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // PUBLIC API
  // ─────────────────────────────────────────────────────────────────────────────

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, { metadata });
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, { metadata });
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, { metadata });
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log('error', message, { metadata, error: error ? describeError(error) : undefined });
  }

  fatal(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log('fatal', message, { metadata, error: error ? describeError(error) : undefined });
  }

  time(message: string, startTime: number, metadata?: Record<string, unknown>): void {
    this.log('info', message, { duration: Date.now() - startTime, metadata });
  }

  child(context: Partial<LogContext>): Logger {
    return new Logger({ ...this.context, ...context });
  }
}

function describeError(error: Error): NonNullable<LogEntry['error']> {
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
}

/**
 * Coerce a caught value into an Error for the `error`/`fatal` signatures.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

// ─────────────────────────────────────────────────────────────────────────────────
// REQUEST LOGGER (for HTTP requests)
// ─────────────────────────────────────────────────────────────────────────────────

export interface RequestLogData {
  method: string;
  path: string;
  statusCode: number;
  duration: number;
  requestId: string;
  userId?: string;
  userAgent?: string;
  error?: Error;
}

export function logRequest(data: RequestLogData): void {
  const logger = getLogger({
    requestId: data.requestId,
    userId: data.userId,
    component: 'http',
  });

  const message = `${data.method} ${data.path} ${data.statusCode}`;
  const metadata = { userAgent: data.userAgent };

  if (data.statusCode >= 500) {
    logger.error(message, data.error, metadata);
  } else if (data.statusCode >= 400) {
    logger.warn(message, metadata);
  } else {
    logger.time(message, Date.now() - data.duration, metadata);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// SINGLETON ROOT LOGGER
// ─────────────────────────────────────────────────────────────────────────────────

let rootLogger: Logger | null = null;

export function getLogger(context?: LogContext): Logger {
  if (!rootLogger) {
    rootLogger = new Logger();
  }
  if (context) {
    return rootLogger.child(context);
  }
  return rootLogger;
}
