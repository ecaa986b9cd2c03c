// ═══════════════════════════════════════════════════════════════════════════════
// KEYED LOCK — In-Process Mutual Exclusion per Key
// ═══════════════════════════════════════════════════════════════════════════════
//
// Serializes async work that shares a key (a user id) while letting work on
// different keys run side by side.
//
// Features:
//   - FIFO hand-off between waiters on the same key
//   - Bounded wait: a waiter that times out never runs its critical section
//   - Idempotent release
//   - withLock helper that always releases
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Result } from '../../types/result.js';
import { ok, err } from '../../types/result.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface LockError {
  readonly code: 'LOCK_TIMEOUT';
  readonly key: string;
  readonly message: string;
}

export interface KeyedLockConfig {
  /** Maximum time to wait for the key; must be positive */
  waitTimeoutMs: number;
}

export const DEFAULT_KEYED_LOCK_CONFIG: KeyedLockConfig = {
  waitTimeoutMs: 5000,
};

/** Call to hand the key to the next waiter. Safe to call more than once. */
export type ReleaseFn = () => void;

interface Gate {
  readonly promise: Promise<void>;
  readonly open: () => void;
}

function createGate(): Gate {
  let open: () => void = () => undefined;
  const promise = new Promise<void>(resolve => {
    open = resolve;
  });
  return { promise, open };
}

/**
 * Resolve to true once `turn` settles, or false after `timeoutMs`.
 */
async function waitForTurn(turn: Promise<void>, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<boolean>(resolve => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });

  try {
    return await Promise.race([turn.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// KEYED LOCK
// ─────────────────────────────────────────────────────────────────────────────────

export class KeyedLock {
  private readonly config: KeyedLockConfig;

  // Settles when the last queued holder of the key releases
  private readonly tails = new Map<string, Promise<void>>();

  constructor(config?: Partial<KeyedLockConfig>) {
    this.config = { ...DEFAULT_KEYED_LOCK_CONFIG, ...config };
    if (!Number.isFinite(this.config.waitTimeoutMs) || this.config.waitTimeoutMs <= 0) {
      throw new RangeError(`Lock wait timeout must be a positive number of ms, got ${this.config.waitTimeoutMs}`);
    }
  }

  /**
   * Queue for `key` and resolve once it is ours.
   *
   * On timeout the queue position is handed straight on, so later waiters are
   * not stranded behind an abandoned slot.
   */
  async acquire(key: string): Promise<Result<ReleaseFn, LockError>> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const gate = createGate();
    const tail = previous.then(() => gate.promise);
    this.tails.set(key, tail);

    const finish = (): void => {
      gate.open();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };

    const acquired = await waitForTurn(previous, this.config.waitTimeoutMs);
    if (!acquired) {
      void previous.then(finish);
      return err({
        code: 'LOCK_TIMEOUT',
        key,
        message: `Timed out after ${this.config.waitTimeoutMs}ms waiting for lock on "${key}"`,
      });
    }

    let released = false;
    return ok(() => {
      if (released) return;
      released = true;
      finish();
    });
  }

  /**
   * Run `fn` while holding `key`. Errors thrown by `fn` propagate after release.
   */
  async withLock<T>(key: string, fn: () => Promise<T>): Promise<Result<T, LockError>> {
    const acquired = await this.acquire(key);
    if (!acquired.ok) {
      return acquired;
    }

    try {
      return ok(await fn());
    } finally {
      acquired.value();
    }
  }

  /**
   * Whether anyone holds or waits for `key`.
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /**
   * Number of keys currently held or awaited.
   */
  get activeKeys(): number {
    return this.tails.size;
  }
}
