// ═══════════════════════════════════════════════════════════════════════════════
// ROUTES INDEX — API Route Registration
// ═══════════════════════════════════════════════════════════════════════════════
//
// Usage:
//   import { createApiRouter } from './api/routes/index.js';
//   app.use('/api/v1', createApiRouter(service));
//
// The feedback webhook and health routes are mounted at the root by the app,
// since e-mail links and load balancers do not know about /api/v1.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router } from 'express';

import type { PersonalizationService } from '../../core/personalization/index.js';
import { getLogger } from '../../logging/index.js';
import { createUserRouter } from './users.js';

// ─────────────────────────────────────────────────────────────────────────────────
// RE-EXPORTS
// ─────────────────────────────────────────────────────────────────────────────────

export { createUserRouter, createUserHandlers, type UserHandler, type UserHandlers } from './users.js';
export { createFeedbackRouter, createFeedbackHandler } from './feedback.js';
export { createHealthRouter, buildHealthReport, checkStorage, checkMemory, SERVICE_VERSION } from './health.js';

const logger = getLogger({ component: 'api-routes' });

// ─────────────────────────────────────────────────────────────────────────────────
// COMBINED ROUTER FACTORY
// ─────────────────────────────────────────────────────────────────────────────────

export function createApiRouter(service: PersonalizationService): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ routes: getAllRoutes() });
  });

  router.use('/users', createUserRouter(service));
  logger.debug('Mounted users router', { path: '/users' });

  return router;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROUTE MAP (for documentation/introspection)
// ─────────────────────────────────────────────────────────────────────────────────

export const ROUTE_MAP = {
  feedback: {
    'GET /feedback': 'Record a like or dislike from an e-mailed link',
  },
  users: {
    'GET /api/v1': 'List the available routes',
    'GET /api/v1/users/:userId/profile': 'Profile summary',
    'PATCH /api/v1/users/:userId/profile': 'Update name, interests or preferences',
    'GET /api/v1/users/:userId/recommendations': 'Categories to recommend and avoid',
    'GET /api/v1/users/:userId/preferences': 'Feedback ledger',
    'GET /api/v1/users/:userId/conversations': 'Recent conversations',
    'POST /api/v1/users/:userId/conversations': 'Store a conversation exchange',
    'POST /api/v1/users/:userId/views': 'Record an article view',
    'POST /api/v1/users/:userId/saves': 'Record a saved article',
    'POST /api/v1/users/:userId/feedback': 'Record a like or dislike',
    'POST /api/v1/users/:userId/emails': 'Count a digest e-mail and return its feedback links',
  },
  health: {
    'GET /health': 'Liveness with storage and memory checks',
    'GET /ready': 'Readiness',
  },
} as const;

export interface RouteDescription {
  method: string;
  path: string;
  description: string;
}

/**
 * Get all routes as a flat list.
 */
export function getAllRoutes(): RouteDescription[] {
  const routes: RouteDescription[] = [];

  for (const endpoints of Object.values(ROUTE_MAP)) {
    for (const [endpoint, description] of Object.entries(endpoints)) {
      const [method = '', path = ''] = endpoint.split(' ');
      routes.push({ method, path, description });
    }
  }

  return routes;
}
