// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMAS INDEX — API Request Validation Schemas
// ═══════════════════════════════════════════════════════════════════════════════

export {
  firstQueryValue,
  queryParam,
  UserIdSchema,
  CategorySchema,
  ArticleIdSchema,
  UserIdParamSchema,
} from './common.js';

export {
  FeedbackQuerySchema,
  RecentConversationsQuerySchema,
  AppendConversationSchema,
  ArticleInteractionSchema,
  FeedbackBodySchema,
  UpdateProfileSchema,
  RecordEmailSchema,
  type FeedbackQuery,
  type DigestArticle,
} from './personalization.js';
