// ═══════════════════════════════════════════════════════════════════════════════
// PERSONALIZATION SCHEMAS — Feedback Webhook and User Route Payloads
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

import { CONVERSATION_CAPACITY, DEFAULT_RECENT_CONVERSATIONS, FEEDBACK_ACTIONS } from '../../core/personalization/index.js';
import { ArticleIdSchema, CategorySchema, firstQueryValue, queryParam } from './common.js';

// ─────────────────────────────────────────────────────────────────────────────────
// FEEDBACK WEBHOOK
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Query of the link behind an e-mailed like/dislike button.
 *
 * @example
 * GET /feedback?user_id=u1&article_id=a42&category=science&action=like
 */
export const FeedbackQuerySchema = z.object({
  user_id: queryParam('demo_user'),
  article_id: queryParam('unknown'),
  category: queryParam('general', 100),
  // Checked by the ledger so the page can name the bad value
  action: queryParam('like', 20),
});

export type FeedbackQuery = z.infer<typeof FeedbackQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// USER ROUTES
// ─────────────────────────────────────────────────────────────────────────────────

export const RecentConversationsQuerySchema = z.object({
  limit: z.preprocess(
    firstQueryValue,
    z.coerce
      .number()
      .int('Limit must be an integer')
      .min(1, 'Limit must be at least 1')
      .max(CONVERSATION_CAPACITY, `Limit must be ${CONVERSATION_CAPACITY} or less`)
      .default(DEFAULT_RECENT_CONVERSATIONS)
  ),
});

/**
 * @example
 * POST /api/v1/users/u1/conversations
 * { "userMessage": "Any science news?", "agentResponse": "Here are three stories..." }
 */
export const AppendConversationSchema = z.object({
  userMessage: z.string().min(1, 'User message is required').max(10000),
  agentResponse: z.string().max(20000),
  context: z.record(z.string(), z.unknown()).optional(),
});

export const ArticleInteractionSchema = z.object({
  title: z.string().trim().min(1, 'Title is required').max(500),
  url: z.string().url('URL must be valid').max(2000),
  category: CategorySchema,
});

export const FeedbackBodySchema = z.object({
  articleId: ArticleIdSchema,
  category: CategorySchema,
  action: z.enum(FEEDBACK_ACTIONS),
});

export const UpdateProfileSchema = z
  .object({
    name: z.string().trim().min(1, 'Name must not be blank').max(200).optional(),
    interests: z
      .array(z.string().trim().min(1).max(100))
      .max(50, 'Maximum 50 interests allowed')
      .optional(),
    preferences: z.record(z.string(), z.unknown()).optional(),
  })
  .refine(
    update => update.name !== undefined || update.interests !== undefined || update.preferences !== undefined,
    'At least one of name, interests or preferences is required'
  );

/**
 * Articles of the digest being sent; each gets like/dislike links back.
 *
 * @example
 * POST /api/v1/users/u1/emails
 * { "articles": [{ "articleId": "a42", "category": "science" }] }
 */
export const RecordEmailSchema = z.object({
  articles: z
    .array(z.object({ articleId: ArticleIdSchema, category: CategorySchema }))
    .max(50, 'Maximum 50 articles per digest')
    .default([]),
});

export type DigestArticle = z.infer<typeof RecordEmailSchema>['articles'][number];
