// ═══════════════════════════════════════════════════════════════════════════════
// PROFILE AGGREGATOR — Derived Statistics on Read
// ═══════════════════════════════════════════════════════════════════════════════

import type { ProfileStore } from './profile-store.js';
import {
  DEFAULT_FAVORITE_CATEGORIES,
  FAVORITE_CATEGORIES_LIMIT,
  TOP_INTERESTS_LIMIT,
  orderedCategoryScores,
  round2,
  type ArticleInteraction,
  type CategoryScore,
  type FeedbackRecord,
  type InteractionLists,
  type PreferenceLedger,
  type ProfileSummary,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// PURE CALCULATIONS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Interactions per viewed article, as a percentage. Not clamped: feedback
 * can arrive for articles never marked viewed, which pushes it past 100.
 */
export function computeEngagementScore(interactions: InteractionLists): number {
  const engaged = interactions.liked.length + interactions.disliked.length + interactions.saved.length;
  return round2((engaged / Math.max(interactions.viewed.length, 1)) * 100);
}

/**
 * Highest scores first. The sort is stable, so ties keep the order of
 * `scores` (first-seen order when built by `orderedCategoryScores`).
 */
export function rankTopInterests(scores: readonly CategoryScore[], limit: number = TOP_INTERESTS_LIMIT): CategoryScore[] {
  return [...scores]
    .sort((a, b) => b.score - a.score)
    .slice(0, limit);
}

function toFeedbackRecord(interaction: ArticleInteraction): FeedbackRecord {
  return {
    articleId: interaction.articleId ?? 'unknown',
    category: interaction.category,
    timestamp: interaction.timestamp,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// AGGREGATOR
// ─────────────────────────────────────────────────────────────────────────────────

export class ProfileAggregator {
  private readonly store: ProfileStore;

  constructor(store: ProfileStore) {
    this.store = store;
  }

  async summarize(userId: string): Promise<ProfileSummary> {
    const profile = await this.store.get(userId);
    const engagementScore = computeEngagementScore(profile.interactions);

    return {
      userId,
      profile: {
        ...profile,
        stats: { ...profile.stats, engagementScore },
      },
      engagementScore,
      topInterests: rankTopInterests(orderedCategoryScores(profile)),
      totalLiked: profile.interactions.liked.length,
      totalDisliked: profile.interactions.disliked.length,
      totalSaved: profile.interactions.saved.length,
      recentTopics: profile.context.recentTopics,
      lastSession: profile.context.lastSession,
    };
  }

  /**
   * Feedback-only view of a profile: likes, dislikes and the scores they
   * produced.
   */
  async preferenceLedger(userId: string): Promise<PreferenceLedger> {
    const profile = await this.store.get(userId);
    const totalLikes = profile.interactions.liked.length;
    const totalDislikes = profile.interactions.disliked.length;
    const totalFeedback = totalLikes + totalDislikes;

    const favorites = rankTopInterests(orderedCategoryScores(profile), Number.POSITIVE_INFINITY)
      .filter(entry => entry.score > 0)
      .slice(0, FAVORITE_CATEGORIES_LIMIT)
      .map(entry => entry.category);

    return {
      likes: profile.interactions.liked.map(toFeedbackRecord),
      dislikes: profile.interactions.disliked.map(toFeedbackRecord),
      categoryScores: profile.categoryScores,
      favoriteCategories: favorites.length > 0 ? favorites : [...DEFAULT_FAVORITE_CATEGORIES],
      totalLikes,
      totalDislikes,
      engagementRate: totalFeedback > 0 ? round2((totalLikes / totalFeedback) * 100) : 0,
    };
  }
}
