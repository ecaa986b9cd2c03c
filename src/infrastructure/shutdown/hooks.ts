// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN HOOKS — Hook Types and Execution
// ═══════════════════════════════════════════════════════════════════════════════
//
// Hooks run grouped by priority, highest first; hooks within a group run in
// parallel. One hook failing or timing out does not stop the others.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger, toError } from '../../logging/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type ShutdownPriority =
  | 'critical'    // stop accepting requests
  | 'normal'      // flush and close storage
  | 'background'; // best effort

/** Execution order, highest priority first */
export const PRIORITY_ORDER: readonly ShutdownPriority[] = ['critical', 'normal', 'background'];

export type ShutdownHookFn = () => Promise<void> | void;

export interface ShutdownHook {
  readonly name: string;
  readonly fn: ShutdownHookFn;
  readonly priority: ShutdownPriority;

  /** 0 uses the coordinator's default */
  readonly timeoutMs: number;
}

export interface HookResult {
  readonly name: string;
  readonly success: boolean;
  readonly durationMs: number;
  readonly error?: Error;
  readonly timedOut?: boolean;
}

export interface ShutdownResult {
  readonly success: boolean;
  readonly totalDurationMs: number;
  readonly hooks: HookResult[];
  readonly failed: string[];
  readonly timedOut: string[];
}

const logger = getLogger({ component: 'shutdown' });

class HookTimeoutError extends Error {
  readonly name = 'HookTimeoutError';

  constructor(hookName: string, timeoutMs: number) {
    super(`Shutdown hook "${hookName}" timed out after ${timeoutMs}ms`);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// EXECUTION
// ─────────────────────────────────────────────────────────────────────────────────

export async function executeHook(hook: ShutdownHook, defaultTimeoutMs: number): Promise<HookResult> {
  const startTime = Date.now();
  const timeoutMs = hook.timeoutMs > 0 ? hook.timeoutMs : defaultTimeoutMs;
  let timer: NodeJS.Timeout | undefined;

  try {
    await Promise.race([
      Promise.resolve().then(hook.fn),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new HookTimeoutError(hook.name, timeoutMs)), timeoutMs);
      }),
    ]);

    const durationMs = Date.now() - startTime;
    logger.debug('Shutdown hook completed', { name: hook.name, durationMs });
    return { name: hook.name, success: true, durationMs };
  } catch (error) {
    const durationMs = Date.now() - startTime;
    const failure = toError(error);
    const timedOut = failure instanceof HookTimeoutError;

    logger.error('Shutdown hook failed', failure, { name: hook.name, durationMs, timedOut });
    return { name: hook.name, success: false, durationMs, error: failure, timedOut };
  } finally {
    clearTimeout(timer);
  }
}

export async function executeHooks(hooks: readonly ShutdownHook[], defaultTimeoutMs: number): Promise<ShutdownResult> {
  const startTime = Date.now();
  const results: HookResult[] = [];

  for (const priority of PRIORITY_ORDER) {
    const group = hooks.filter(hook => hook.priority === priority);
    if (group.length === 0) continue;

    logger.debug('Executing priority group', { priority, count: group.length });
    results.push(...(await Promise.all(group.map(hook => executeHook(hook, defaultTimeoutMs)))));
  }

  const failed = results.filter(result => !result.success).map(result => result.name);
  const timedOut = results.filter(result => result.timedOut).map(result => result.name);

  return {
    success: failed.length === 0,
    totalDurationMs: Date.now() - startTime,
    hooks: results,
    failed,
    timedOut,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// COMMON HOOKS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Stop accepting connections and wait for in-flight requests.
 */
export function createServerCloseHook(server: {
  close: (callback?: (err?: Error) => void) => unknown;
}): ShutdownHookFn {
  return () =>
    new Promise<void>((resolve, reject) => {
      server.close(err => {
        if (err) reject(err);
        else resolve();
      });
    });
}
