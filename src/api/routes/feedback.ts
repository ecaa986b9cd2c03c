// ═══════════════════════════════════════════════════════════════════════════════
// FEEDBACK ROUTE — Like/Dislike Links from News Digests
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints:
//   GET /feedback?user_id&article_id&category&action
//
// Answers with HTML since the caller is a browser following an e-mail link:
//   200  thank-you page
//   400  missing query string or rejected input
//   503  storage unavailable
//   500  anything else
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';

import type { PersonalizationService } from '../../core/personalization/index.js';
import { getLogger } from '../../logging/index.js';
import { asyncHandler, toApiError } from '../middleware/error-handler.js';
import { FeedbackQuerySchema } from '../schemas/index.js';
import { MISSING_PARAMETERS_PAGE, renderErrorPage, renderThankYouPage } from './feedback-pages.js';

const logger = getLogger({ component: 'feedback-routes' });

function sendHtml(res: Response, statusCode: number, html: string): void {
  res.status(statusCode).type('html').send(html);
}

/**
 * Handler for GET /feedback, exported for direct testing.
 */
export function createFeedbackHandler(service: PersonalizationService) {
  return async (req: Request, res: Response): Promise<void> => {
    if (!req.originalUrl.includes('?')) {
      sendHtml(res, 400, MISSING_PARAMETERS_PAGE);
      return;
    }

    const parsed = FeedbackQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      const message = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join(', ');
      sendHtml(res, 400, renderErrorPage(message));
      return;
    }

    const query = parsed.data;
    const result = await service.recordFeedback({
      userId: query.user_id,
      articleId: query.article_id,
      category: query.category,
      action: query.action,
    });

    if (result.status === 'error') {
      sendHtml(res, toApiError(result).statusCode, renderErrorPage(result.message));
      return;
    }

    logger.info('Feedback recorded via link', {
      requestId: req.requestId,
      userId: query.user_id,
      category: result.category,
      score: result.score,
    });

    sendHtml(res, 200, renderThankYouPage(query.action === 'dislike' ? 'dislike' : 'like'));
  };
}

export function createFeedbackRouter(service: PersonalizationService): Router {
  const router = Router();
  router.get('/feedback', asyncHandler(createFeedbackHandler(service)));
  return router;
}
