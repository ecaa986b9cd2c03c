// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN MODULE INDEX — Graceful Shutdown Exports
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type ShutdownPriority,
  PRIORITY_ORDER,
  type ShutdownHookFn,
  type ShutdownHook,
  type HookResult,
  type ShutdownResult,
  executeHook,
  executeHooks,
  createServerCloseHook,
} from './hooks.js';

export {
  type ShutdownConfig,
  DEFAULT_SHUTDOWN_CONFIG,
  ShutdownCoordinator,
} from './handler.js';
