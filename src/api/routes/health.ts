// ═══════════════════════════════════════════════════════════════════════════════
// HEALTH ROUTES — /health and /ready endpoints
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';

import type { ProfileStore } from '../../core/personalization/index.js';
import { loadConfig } from '../../config/index.js';
import { getLogger } from '../../logging/index.js';
import { asyncHandler } from '../middleware/error-handler.js';

export const SERVICE_VERSION = '1.0.0';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface ComponentHealth {
  status: 'up' | 'degraded' | 'down';
  latency?: number;
  message?: string;
}

export interface HealthCheck {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  version: string;
  environment: string;
  uptime: number;
  checks: {
    storage: ComponentHealth;
    memory: ComponentHealth;
  };
}

// Storage reads slower than this are reported as degraded
const SLOW_STORAGE_MS = 1000;

const HEAP_WARNING_PERCENT = 90;

// ─────────────────────────────────────────────────────────────────────────────────
// HEALTH CHECK FUNCTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export async function checkStorage(store: ProfileStore): Promise<ComponentHealth> {
  const health = await store.checkHealth();

  if (health.status === 'unhealthy') {
    return { status: 'down', latency: health.latencyMs, message: health.error ?? 'Storage check failed' };
  }

  const backend = health.users !== undefined ? `${health.backend} (${health.users} users)` : health.backend;
  if (health.latencyMs > SLOW_STORAGE_MS) {
    return { status: 'degraded', latency: health.latencyMs, message: `High latency on ${backend}` };
  }
  return { status: 'up', latency: health.latencyMs, message: backend };
}

export function checkMemory(usage: NodeJS.MemoryUsage = process.memoryUsage()): ComponentHealth {
  const heapUsedMB = Math.round(usage.heapUsed / 1024 / 1024);
  const heapTotalMB = Math.round(usage.heapTotal / 1024 / 1024);
  const usagePercent = (usage.heapUsed / usage.heapTotal) * 100;

  if (usagePercent > HEAP_WARNING_PERCENT) {
    return {
      status: 'degraded',
      message: `High memory usage: ${heapUsedMB}MB / ${heapTotalMB}MB (${usagePercent.toFixed(1)}%)`,
    };
  }

  return { status: 'up', message: `${heapUsedMB}MB / ${heapTotalMB}MB` };
}

export async function buildHealthReport(store: ProfileStore): Promise<HealthCheck> {
  const storage = await checkStorage(store);
  const memory = checkMemory();

  const allUp = storage.status === 'up' && memory.status === 'up';

  return {
    status: storage.status === 'down' ? 'unhealthy' : allUp ? 'healthy' : 'degraded',
    timestamp: new Date().toISOString(),
    version: SERVICE_VERSION,
    environment: loadConfig().env.environment,
    uptime: process.uptime(),
    checks: { storage, memory },
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROUTES
// ─────────────────────────────────────────────────────────────────────────────────

export function createHealthRouter(store: ProfileStore): Router {
  const router = Router();
  const logger = getLogger({ component: 'health' });

  // ─── HEALTH CHECK (liveness) ───
  router.get(
    '/health',
    asyncHandler(async (_req: Request, res: Response) => {
      const health = await buildHealthReport(store);

      if (health.status !== 'healthy') {
        logger.warn('Health check degraded', {
          status: health.status,
          storage: health.checks.storage.status,
          memory: health.checks.memory.status,
        });
      }

      res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
    })
  );

  // ─── READINESS CHECK ───
  router.get(
    '/ready',
    asyncHandler(async (_req: Request, res: Response) => {
      const storage = await checkStorage(store);
      const ready = storage.status !== 'down';

      if (!ready) {
        logger.error('Readiness check failed', undefined, { message: storage.message });
      }

      res.status(ready ? 200 : 503).json({
        ready,
        timestamp: new Date().toISOString(),
        checks: { storage: ready },
      });
    })
  );

  return router;
}
