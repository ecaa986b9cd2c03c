// ═══════════════════════════════════════════════════════════════════════════════
// DOCUMENT SCHEMA — Validation, Legacy Migration, Serialization
// ═══════════════════════════════════════════════════════════════════════════════
//
// Two layouts are understood on load:
//   - schemaVersion 2: camelCase profiles under `usersById`
//   - legacy "1.0": snake_case profiles under `users`, with a separate
//     favourite-topics tally that is discarded; category scores are rebuilt
//     from the liked and disliked lists
//
// Anything else is reported as unreadable and the caller decides what to do.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

import type { Result } from '../../types/result.js';
import { ok, err } from '../../types/result.js';
import {
  SCHEMA_VERSION,
  CONVERSATION_CAPACITY,
  RECENT_TOPICS_CAPACITY,
  createEmptyDocument,
  addRecentTopic,
  adjustCategoryScore,
  reconcileCategoryOrder,
  type ArticleInteraction,
  type CategoryTally,
  type PersonalizationDocument,
  type SessionContext,
  type UserProfile,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// CURRENT LAYOUT
// ─────────────────────────────────────────────────────────────────────────────────

const FreeformSchema = z.record(z.string(), z.unknown());

export const ArticleInteractionSchema = z.object({
  timestamp: z.string(),
  title: z.string(),
  url: z.string(),
  category: z.string(),
  articleId: z.string().optional(),
});

export const ConversationEntrySchema = z.object({
  timestamp: z.string(),
  user: z.string(),
  agent: z.string(),
  context: FreeformSchema,
});

const CountSchema = z.number().int().nonnegative();

export const UserProfileSchema: z.ZodType<UserProfile, z.ZodTypeDef, unknown> = z
  .object({
    createdAt: z.string(),
    name: z.string().nullable(),
    interests: z.array(z.string()),
    preferences: FreeformSchema,
    conversations: z.array(ConversationEntrySchema).max(CONVERSATION_CAPACITY),
    interactions: z.object({
      viewed: z.array(ArticleInteractionSchema),
      liked: z.array(ArticleInteractionSchema),
      disliked: z.array(ArticleInteractionSchema),
      saved: z.array(ArticleInteractionSchema),
    }),
    categoryScores: z.record(z.string(), z.number().int()),
    // Absent in documents written before first-seen order was tracked
    categoryOrder: z.array(z.string()).default([]),
    stats: z.object({
      totalConversations: CountSchema,
      totalArticlesViewed: CountSchema,
      totalEmailsSent: CountSchema,
      engagementScore: z.number(),
    }),
    context: z.object({
      lastSession: z.string().nullable(),
      recentTopics: z.array(z.string()).max(RECENT_TOPICS_CAPACITY),
    }),
  })
  .transform(profile => ({
    ...profile,
    categoryOrder: reconcileCategoryOrder(profile.categoryScores, profile.categoryOrder),
  }));

export const PersonalizationDocumentSchema: z.ZodType<PersonalizationDocument, z.ZodTypeDef, unknown> =
  z.object({
    schemaVersion: z.literal(SCHEMA_VERSION),
    createdAt: z.string(),
    lastUpdated: z.string().nullable(),
    usersById: z.record(z.string(), UserProfileSchema),
  });

// ─────────────────────────────────────────────────────────────────────────────────
// LEGACY LAYOUT
// ─────────────────────────────────────────────────────────────────────────────────

const LegacyInteractionSchema = z.object({
  timestamp: z.string(),
  title: z.string().nullish(),
  url: z.string().nullish(),
  category: z.string().nullish(),
  article_id: z.string().nullish(),
});

const LegacyUserSchema = z.object({
  profile: z.object({
    created_at: z.string(),
    name: z.string().nullish(),
    interests: z.array(z.string()).default([]),
    preferences: FreeformSchema.default({}),
  }),
  conversations: z
    .array(
      z.object({
        timestamp: z.string(),
        user: z.string(),
        agent: z.string(),
        context: FreeformSchema.nullish(),
      })
    )
    .default([]),
  article_interactions: z
    .object({
      viewed: z.array(LegacyInteractionSchema).default([]),
      liked: z.array(LegacyInteractionSchema).default([]),
      disliked: z.array(LegacyInteractionSchema).default([]),
      saved: z.array(LegacyInteractionSchema).default([]),
    })
    .default({}),
  statistics: z
    .object({
      total_conversations: CountSchema.default(0),
      total_articles_viewed: CountSchema.default(0),
      total_emails_sent: CountSchema.default(0),
    })
    .default({}),
  context: z
    .object({
      last_session: z.string().nullish(),
      recent_topics: z.array(z.string()).default([]),
    })
    .default({}),
});

const LegacyDocumentSchema = z.object({
  version: z.string(),
  created_at: z.string().optional(),
  last_updated: z.string().optional(),
  users: z.record(z.string(), LegacyUserSchema),
});

type LegacyUser = z.infer<typeof LegacyUserSchema>;
type LegacyInteraction = z.infer<typeof LegacyInteractionSchema>;

function migrateInteraction(legacy: LegacyInteraction): ArticleInteraction {
  const interaction: ArticleInteraction = {
    timestamp: legacy.timestamp,
    title: legacy.title ?? '',
    url: legacy.url ?? '',
    category: legacy.category ?? 'general',
  };
  if (legacy.article_id) {
    interaction.articleId = legacy.article_id;
  }
  return interaction;
}

/**
 * Replay likes and dislikes in time order so categories come out in
 * first-seen order.
 */
function rebuildCategoryScores(liked: ArticleInteraction[], disliked: ArticleInteraction[]): CategoryTally {
  const events = [
    ...liked.map(interaction => ({ interaction, delta: 1 })),
    ...disliked.map(interaction => ({ interaction, delta: -1 })),
  ].sort((a, b) => a.interaction.timestamp.localeCompare(b.interaction.timestamp));

  const tally: CategoryTally = { categoryScores: {}, categoryOrder: [] };
  for (const { interaction, delta } of events) {
    adjustCategoryScore(tally, interaction.category, delta);
  }
  return tally;
}

function migrateUser(legacy: LegacyUser): UserProfile {
  const liked = legacy.article_interactions.liked.map(migrateInteraction);
  const disliked = legacy.article_interactions.disliked.map(migrateInteraction);

  const tally = rebuildCategoryScores(liked, disliked);
  const context: SessionContext = { lastSession: legacy.context.last_session ?? null, recentTopics: [] };
  for (const topic of legacy.context.recent_topics) {
    addRecentTopic(context, topic);
  }

  return {
    createdAt: legacy.profile.created_at,
    name: legacy.profile.name ?? null,
    interests: [...new Set(legacy.profile.interests)],
    preferences: legacy.profile.preferences,
    conversations: legacy.conversations.slice(-CONVERSATION_CAPACITY).map(entry => ({
      timestamp: entry.timestamp,
      user: entry.user,
      agent: entry.agent,
      context: entry.context ?? {},
    })),
    interactions: {
      viewed: legacy.article_interactions.viewed.map(migrateInteraction),
      liked,
      disliked,
      saved: legacy.article_interactions.saved.map(migrateInteraction),
    },
    categoryScores: tally.categoryScores,
    categoryOrder: tally.categoryOrder,
    stats: {
      totalConversations: legacy.statistics.total_conversations,
      totalArticlesViewed: legacy.statistics.total_articles_viewed,
      totalEmailsSent: legacy.statistics.total_emails_sent,
      engagementScore: 0,
    },
    context,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PARSING
// ─────────────────────────────────────────────────────────────────────────────────

export interface ParsedDocument {
  document: PersonalizationDocument;

  /** Layout the document was migrated from, null when already current */
  migratedFrom: string | null;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode a stored document. The error carries a human-readable reason.
 */
export function parseDocument(raw: string, now: string): Result<ParsedDocument, string> {
  if (raw.trim() === '') {
    return err('document is empty');
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    return err(`invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!isRecord(data)) {
    return err('document is not an object');
  }

  if ('schemaVersion' in data) {
    const parsed = PersonalizationDocumentSchema.safeParse(data);
    if (!parsed.success) {
      return err(describeIssues(parsed.error));
    }
    return ok({ document: parsed.data, migratedFrom: null });
  }

  if ('users' in data) {
    const parsed = LegacyDocumentSchema.safeParse(data);
    if (!parsed.success) {
      return err(describeIssues(parsed.error));
    }

    const document = createEmptyDocument(parsed.data.created_at ?? now);
    document.lastUpdated = parsed.data.last_updated ?? null;
    for (const [userId, legacy] of Object.entries(parsed.data.users)) {
      document.usersById[userId] = migrateUser(legacy);
    }
    return ok({ document, migratedFrom: parsed.data.version });
  }

  return err('unrecognized document layout');
}

/**
 * Validate a profile and strip it to plain JSON data, so what is committed in
 * memory is exactly what a reload would produce.
 */
export function normalizeProfile(profile: UserProfile): Result<UserProfile, string> {
  let plain: unknown;
  try {
    plain = JSON.parse(JSON.stringify(profile));
  } catch (error) {
    return err(`profile is not serializable: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = UserProfileSchema.safeParse(plain);
  if (!parsed.success) {
    return err(describeIssues(parsed.error));
  }
  return ok(parsed.data);
}

export function serializeDocument(document: PersonalizationDocument): string {
  return JSON.stringify(document, null, 2);
}
