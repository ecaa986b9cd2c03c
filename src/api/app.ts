// ═══════════════════════════════════════════════════════════════════════════════
// APP — Express Application Wiring
// ═══════════════════════════════════════════════════════════════════════════════

import express, { type Express } from 'express';

import type { PersonalizationService } from '../core/personalization/index.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { requestContext } from './middleware/request-context.js';
import { createApiRouter, createFeedbackRouter, createHealthRouter } from './routes/index.js';

export const JSON_BODY_LIMIT = '100kb';

export function createApp(service: PersonalizationService): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestContext);
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  app.use(createHealthRouter(service.store));
  app.use(createFeedbackRouter(service));
  app.use('/api/v1', createApiRouter(service));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
