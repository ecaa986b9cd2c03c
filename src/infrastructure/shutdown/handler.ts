// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN HANDLER — Graceful Shutdown Coordinator
// ═══════════════════════════════════════════════════════════════════════════════
//
// Handles graceful shutdown:
//   - SIGTERM/SIGINT trigger one shutdown; repeated signals are ignored
//   - an overall timeout bounds the whole sequence
//   - the exit code reflects success, failure or timeout
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../logging/index.js';
import {
  executeHooks,
  type ShutdownHook,
  type ShutdownHookFn,
  type ShutdownPriority,
  type ShutdownResult,
} from './hooks.js';

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

export interface ShutdownConfig {
  /** Bound on the whole sequence */
  readonly timeoutMs: number;

  /** Used by hooks registered without their own timeout */
  readonly hookTimeoutMs: number;

  readonly signals: NodeJS.Signals[];

  readonly exitCodeSuccess: number;
  readonly exitCodeFailure: number;
  readonly exitCodeTimeout: number;

  /** Called with the exit code once hooks finish; omit to stay alive */
  readonly exit?: (code: number) => void;
}

export const DEFAULT_SHUTDOWN_CONFIG: ShutdownConfig = {
  timeoutMs: 10000,
  hookTimeoutMs: 5000,
  signals: ['SIGTERM', 'SIGINT'],
  exitCodeSuccess: 0,
  exitCodeFailure: 1,
  exitCodeTimeout: 124,
};

// ─────────────────────────────────────────────────────────────────────────────────
// COORDINATOR
// ─────────────────────────────────────────────────────────────────────────────────

export class ShutdownCoordinator {
  private readonly config: ShutdownConfig;
  private readonly hooks = new Map<string, ShutdownHook>();
  private readonly logger = getLogger({ component: 'shutdown' });
  private readonly signalListeners = new Map<NodeJS.Signals, () => void>();
  private shutdownPromise: Promise<ShutdownResult> | null = null;

  constructor(config: Partial<ShutdownConfig> = {}) {
    this.config = { ...DEFAULT_SHUTDOWN_CONFIG, ...config };
  }

  get isShuttingDown(): boolean {
    return this.shutdownPromise !== null;
  }

  register(
    name: string,
    fn: ShutdownHookFn,
    options: { priority?: ShutdownPriority; timeoutMs?: number } = {}
  ): void {
    if (this.hooks.has(name)) {
      this.logger.warn('Overwriting existing shutdown hook', { name });
    }
    this.hooks.set(name, {
      name,
      fn,
      priority: options.priority ?? 'normal',
      timeoutMs: options.timeoutMs ?? 0,
    });
  }

  installSignalHandlers(): void {
    for (const signal of this.config.signals) {
      if (this.signalListeners.has(signal)) continue;

      const listener = (): void => {
        if (this.isShuttingDown) {
          this.logger.warn('Received signal during shutdown, ignoring', { signal });
          return;
        }
        this.logger.info('Received shutdown signal', { signal });
        void this.shutdown(signal);
      };
      this.signalListeners.set(signal, listener);
      process.on(signal, listener);
    }
  }

  removeSignalHandlers(): void {
    for (const [signal, listener] of this.signalListeners) {
      process.off(signal, listener);
    }
    this.signalListeners.clear();
  }

  /**
   * Run every hook once. Later calls share the first call's result.
   */
  shutdown(reason: string = 'manual'): Promise<ShutdownResult> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.perform(reason);
    }
    return this.shutdownPromise;
  }

  private async perform(reason: string): Promise<ShutdownResult> {
    this.logger.info('Starting graceful shutdown', { reason, hooks: [...this.hooks.keys()] });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<ShutdownResult>(resolve => {
      timer = setTimeout(
        () =>
          resolve({
            success: false,
            totalDurationMs: this.config.timeoutMs,
            hooks: [],
            failed: [],
            timedOut: ['shutdown'],
          }),
        this.config.timeoutMs
      );
    });

    let result: ShutdownResult;
    try {
      result = await Promise.race([executeHooks([...this.hooks.values()], this.config.hookTimeoutMs), timeout]);
    } finally {
      clearTimeout(timer);
    }

    const exitCode = this.exitCodeFor(result);
    this.config.exit?.(exitCode);
    return result;
  }

  private exitCodeFor(result: ShutdownResult): number {
    if (result.timedOut.includes('shutdown')) {
      this.logger.error('Shutdown timed out', undefined, { timeoutMs: this.config.timeoutMs });
      return this.config.exitCodeTimeout;
    }
    if (result.success) {
      this.logger.info('Graceful shutdown completed', {
        totalDurationMs: result.totalDurationMs,
        hooksExecuted: result.hooks.length,
      });
      return this.config.exitCodeSuccess;
    }
    this.logger.warn('Shutdown completed with failures', { failed: result.failed });
    return this.config.exitCodeFailure;
  }
}
