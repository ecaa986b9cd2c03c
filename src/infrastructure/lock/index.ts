// ═══════════════════════════════════════════════════════════════════════════════
// LOCK MODULE INDEX — In-Process Keyed Locks
// ═══════════════════════════════════════════════════════════════════════════════

export {
  KeyedLock,
  DEFAULT_KEYED_LOCK_CONFIG,
  type KeyedLockConfig,
  type LockError,
  type ReleaseFn,
} from './keyed-lock.js';
