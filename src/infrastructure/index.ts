// ═══════════════════════════════════════════════════════════════════════════════
// INFRASTRUCTURE MODULE — Locking, Retry and Shutdown
// ═══════════════════════════════════════════════════════════════════════════════
//
// Quick Start:
//   import { KeyedLock, retryWithFixedDelay, ShutdownCoordinator } from './infrastructure/index.js';
//
//   const locks = new KeyedLock({ waitTimeoutMs: 5000 });
//   const result = await locks.withLock(userId, () => updateProfile(userId));
//
//   const policy = retryWithFixedDelay(2, 50);
//   const written = await policy.executeWithResult(() => storage.write(contents));
//
//   const shutdown = new ShutdownCoordinator({ exit: code => process.exit(code) });
//   shutdown.register('http-server', createServerCloseHook(server), { priority: 'critical' });
//   shutdown.installSignalHandlers();
//
// ═══════════════════════════════════════════════════════════════════════════════

export * from './lock/index.js';
export * from './retry/index.js';
export * from './shutdown/index.js';
