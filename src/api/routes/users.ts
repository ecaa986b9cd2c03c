// ═══════════════════════════════════════════════════════════════════════════════
// USER ROUTES — Profile, Conversations, Interactions and Recommendations
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints (all under /users/:userId):
//   GET    /profile           Profile summary with engagement and top interests
//   PATCH  /profile           Update name, interests or preferences
//   GET    /recommendations   Categories to recommend and avoid
//   GET    /preferences       Likes, dislikes and category scores
//   GET    /conversations     Recent conversations (?limit=10)
//   POST   /conversations     Store a conversation exchange
//   POST   /views             Record an article view
//   POST   /saves             Record a saved article
//   POST   /feedback          Record a like or dislike
//   POST   /emails            Count a digest e-mail; returns its feedback links
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import type { z } from 'zod';

import { buildFeedbackUrl } from '../../config/index.js';
import type { OperationResult, PersonalizationService } from '../../core/personalization/index.js';
import { getLogger } from '../../logging/index.js';
import { asyncHandler, toApiError, ValidationError } from '../middleware/error-handler.js';
import { captureUserId } from '../middleware/request-context.js';
import {
  AppendConversationSchema,
  ArticleInteractionSchema,
  FeedbackBodySchema,
  RecentConversationsQuerySchema,
  RecordEmailSchema,
  UpdateProfileSchema,
  UserIdParamSchema,
  type DigestArticle,
} from '../schemas/index.js';

const logger = getLogger({ component: 'user-routes' });

// ─────────────────────────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(result.error.issues.map(issue => issue.message).join(', '), {
      fields: result.error.flatten().fieldErrors,
    });
  }
  return result.data;
}

function parseUserId(req: Request): string {
  return parseInput(UserIdParamSchema, req.params).userId;
}

function respond<T extends object>(res: Response, result: OperationResult<T>, statusCode: number = 200): void {
  if (result.status === 'error') {
    throw toApiError(result);
  }
  res.status(statusCode).json(result);
}

export interface FeedbackLinks {
  articleId: string;
  category: string;
  like: string;
  dislike: string;
}

function feedbackLinksFor(userId: string, articles: DigestArticle[]): FeedbackLinks[] {
  return articles.map(({ articleId, category }) => ({
    articleId,
    category,
    like: buildFeedbackUrl({ userId, articleId, category, action: 'like' }),
    dislike: buildFeedbackUrl({ userId, articleId, category, action: 'dislike' }),
  }));
}

// ─────────────────────────────────────────────────────────────────────────────────
// HANDLERS
// ─────────────────────────────────────────────────────────────────────────────────

export type UserHandler = (req: Request, res: Response) => Promise<void>;

export interface UserHandlers {
  getProfile: UserHandler;
  updateProfile: UserHandler;
  getRecommendations: UserHandler;
  getPreferences: UserHandler;
  getConversations: UserHandler;
  appendConversation: UserHandler;
  recordView: UserHandler;
  recordSave: UserHandler;
  recordFeedback: UserHandler;
  recordEmailSent: UserHandler;
}

/**
 * Route handlers, separate from the router so they can be called directly.
 */
export function createUserHandlers(service: PersonalizationService): UserHandlers {
  return {
    async getProfile(req, res) {
      respond(res, await service.getProfileSummary(parseUserId(req)));
    },

    async updateProfile(req, res) {
      const userId = parseUserId(req);
      const update = parseInput(UpdateProfileSchema, req.body);
      logger.info('Updating profile', {
        userId,
        fields: Object.keys(update),
        requestId: req.requestId,
      });
      respond(res, await service.updateProfile(userId, update));
    },

    async getRecommendations(req, res) {
      respond(res, await service.getRecommendations(parseUserId(req)));
    },

    async getPreferences(req, res) {
      respond(res, await service.getPreferenceLedger(parseUserId(req)));
    },

    async getConversations(req, res) {
      const userId = parseUserId(req);
      const { limit } = parseInput(RecentConversationsQuerySchema, req.query);
      respond(res, await service.getRecentConversations(userId, limit));
    },

    async appendConversation(req, res) {
      const userId = parseUserId(req);
      const input = parseInput(AppendConversationSchema, req.body);
      respond(res, await service.appendConversation(userId, input), 201);
    },

    async recordView(req, res) {
      const userId = parseUserId(req);
      const article = parseInput(ArticleInteractionSchema, req.body);
      respond(res, await service.recordView(userId, article), 201);
    },

    async recordSave(req, res) {
      const userId = parseUserId(req);
      const article = parseInput(ArticleInteractionSchema, req.body);
      respond(res, await service.recordSave(userId, article), 201);
    },

    async recordFeedback(req, res) {
      const userId = parseUserId(req);
      const feedback = parseInput(FeedbackBodySchema, req.body);
      respond(res, await service.recordFeedback({ userId, ...feedback }), 201);
    },

    async recordEmailSent(req, res) {
      const userId = parseUserId(req);
      const { articles } = parseInput(RecordEmailSchema, req.body ?? {});
      const result = await service.recordEmailSent(userId);
      if (result.status === 'error') {
        respond(res, result);
        return;
      }
      respond(res, { ...result, feedbackLinks: feedbackLinksFor(userId, articles) }, 201);
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROUTER
// ─────────────────────────────────────────────────────────────────────────────────

export function createUserRouter(service: PersonalizationService): Router {
  const router = Router();
  const handlers = createUserHandlers(service);

  router.param('userId', captureUserId);

  router.get('/:userId/profile', asyncHandler(handlers.getProfile));
  router.patch('/:userId/profile', asyncHandler(handlers.updateProfile));
  router.get('/:userId/recommendations', asyncHandler(handlers.getRecommendations));
  router.get('/:userId/preferences', asyncHandler(handlers.getPreferences));
  router.get('/:userId/conversations', asyncHandler(handlers.getConversations));
  router.post('/:userId/conversations', asyncHandler(handlers.appendConversation));
  router.post('/:userId/views', asyncHandler(handlers.recordView));
  router.post('/:userId/saves', asyncHandler(handlers.recordSave));
  router.post('/:userId/feedback', asyncHandler(handlers.recordFeedback));
  router.post('/:userId/emails', asyncHandler(handlers.recordEmailSent));

  return router;
}
