// ═══════════════════════════════════════════════════════════════════════════════
// PERSONALIZATION TYPES — User Profile, Interactions, Derived Views
// ═══════════════════════════════════════════════════════════════════════════════
//
// One profile per user id, all of them held in a single versioned document.
// Feedback, views and conversations fold into the profile; summaries,
// recommendations and the preference ledger are computed from it on read.
//
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// LIMITS
// ─────────────────────────────────────────────────────────────────────────────────

export const SCHEMA_VERSION = 2;

/** Conversations kept per profile; the oldest are dropped first */
export const CONVERSATION_CAPACITY = 100;

/** Recent-topics window; set-like, oldest dropped first */
export const RECENT_TOPICS_CAPACITY = 5;

export const TOP_INTERESTS_LIMIT = 5;
export const FAVORITE_CATEGORIES_LIMIT = 3;
export const DEFAULT_RECENT_CONVERSATIONS = 10;

/** Reported when a user has no positive feedback yet */
export const DEFAULT_FAVORITE_CATEGORIES: readonly string[] = ['technology', 'science', 'business'];

// ─────────────────────────────────────────────────────────────────────────────────
// FEEDBACK & INTERACTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export const FEEDBACK_ACTIONS = ['like', 'dislike'] as const;

export type FeedbackAction = typeof FEEDBACK_ACTIONS[number];

export const INTERACTION_KINDS = ['viewed', 'liked', 'disliked', 'saved'] as const;

export type InteractionKind = typeof INTERACTION_KINDS[number];

export interface ArticleInteraction {
  timestamp: string;
  title: string;
  url: string;
  category: string;
  articleId?: string;
}

export type InteractionLists = Record<InteractionKind, ArticleInteraction[]>;

/**
 * A like/dislike as delivered by the feedback webhook. Folded into the
 * profile, never stored on its own.
 */
export interface FeedbackEvent {
  userId: string;
  articleId: string;
  category: string;
  action: FeedbackAction;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONVERSATIONS
// ─────────────────────────────────────────────────────────────────────────────────

export interface ConversationEntry {
  timestamp: string;
  user: string;
  agent: string;
  context: Record<string, unknown>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// USER PROFILE
// ─────────────────────────────────────────────────────────────────────────────────

export interface ProfileStats {
  totalConversations: number;
  totalArticlesViewed: number;
  totalEmailsSent: number;

  /** Recomputed on every read; the stored value is not authoritative */
  engagementScore: number;
}

export interface SessionContext {
  lastSession: string | null;
  recentTopics: string[];
}

export interface UserProfile {
  createdAt: string;
  name: string | null;
  interests: string[];
  preferences: Record<string, unknown>;
  conversations: ConversationEntry[];
  interactions: InteractionLists;

  /** +1 per like, -1 per dislike */
  categoryScores: Record<string, number>;

  /**
   * Categories in the order they first received feedback. Object keys cannot
   * carry this: integer-like keys such as "2024" always enumerate first.
   */
  categoryOrder: string[];

  stats: ProfileStats;
  context: SessionContext;
}

export interface ProfileUpdate {
  name?: string;
  interests?: string[];
  preferences?: Record<string, unknown>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// PERSISTED DOCUMENT
// ─────────────────────────────────────────────────────────────────────────────────

export interface PersonalizationDocument {
  schemaVersion: typeof SCHEMA_VERSION;
  createdAt: string;
  lastUpdated: string | null;
  usersById: Record<string, UserProfile>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// DERIVED VIEWS
// ─────────────────────────────────────────────────────────────────────────────────

export interface CategoryScore {
  category: string;
  score: number;
}

export interface ProfileSummary {
  userId: string;
  profile: UserProfile;
  engagementScore: number;
  topInterests: CategoryScore[];
  totalLiked: number;
  totalDisliked: number;
  totalSaved: number;
  recentTopics: string[];
  lastSession: string | null;
}

export interface Recommendations {
  recommend: string[];
  avoid: string[];
  recentInterests: string[];
}

export interface RecentConversations {
  conversations: ConversationEntry[];

  /** Every conversation ever stored, not just the retained window */
  totalConversations: number;
}

export interface FeedbackRecord {
  articleId: string;
  category: string;
  timestamp: string;
}

export interface PreferenceLedger {
  likes: FeedbackRecord[];
  dislikes: FeedbackRecord[];
  categoryScores: Record<string, number>;
  favoriteCategories: string[];
  totalLikes: number;
  totalDislikes: number;

  /** Share of feedback that was positive, as a percentage */
  engagementRate: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// FACTORIES & HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

export function createDefaultProfile(now: string): UserProfile {
  return {
    createdAt: now,
    name: null,
    interests: [],
    preferences: {},
    conversations: [],
    interactions: {
      viewed: [],
      liked: [],
      disliked: [],
      saved: [],
    },
    categoryScores: {},
    categoryOrder: [],
    stats: {
      totalConversations: 0,
      totalArticlesViewed: 0,
      totalEmailsSent: 0,
      engagementScore: 0,
    },
    context: {
      lastSession: null,
      recentTopics: [],
    },
  };
}

export function createEmptyDocument(now: string): PersonalizationDocument {
  return {
    schemaVersion: SCHEMA_VERSION,
    createdAt: now,
    lastUpdated: null,
    usersById: {},
  };
}

export function isFeedbackAction(value: string): value is FeedbackAction {
  return FEEDBACK_ACTIONS.some(action => action === value);
}

/**
 * Insert into the recent-topics window. A topic already present keeps its
 * position.
 */
export function addRecentTopic(context: SessionContext, topic: string): void {
  if (context.recentTopics.includes(topic)) return;
  context.recentTopics.push(topic);
  if (context.recentTopics.length > RECENT_TOPICS_CAPACITY) {
    context.recentTopics.splice(0, context.recentTopics.length - RECENT_TOPICS_CAPACITY);
  }
}

/**
 * Current score for a category, 0 when it has never received feedback.
 */
export function scoreOf(scores: Record<string, number>, category: string): number {
  return Object.hasOwn(scores, category) ? scores[category] ?? 0 : 0;
}

export type CategoryTally = Pick<UserProfile, 'categoryScores' | 'categoryOrder'>;

/**
 * Add `delta` to a category's score, recording the category on first sight.
 */
export function adjustCategoryScore(tally: CategoryTally, category: string, delta: number): void {
  if (!Object.hasOwn(tally.categoryScores, category)) {
    tally.categoryOrder.push(category);
  }
  tally.categoryScores[category] = scoreOf(tally.categoryScores, category) + delta;
}

/**
 * Order a score map by `order`, dropping unknown or repeated names and
 * appending scored categories the order does not mention.
 */
export function reconcileCategoryOrder(scores: Record<string, number>, order: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const category of order) {
    if (Object.hasOwn(scores, category)) seen.add(category);
  }
  for (const category of Object.keys(scores)) {
    seen.add(category);
  }
  return [...seen];
}

/**
 * Scores as a list in first-seen order.
 */
export function orderedCategoryScores(tally: CategoryTally): CategoryScore[] {
  return reconcileCategoryOrder(tally.categoryScores, tally.categoryOrder).map(category => ({
    category,
    score: scoreOf(tally.categoryScores, category),
  }));
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
