// ═══════════════════════════════════════════════════════════════════════════════
// FEEDBACK LEDGER — Likes, Dislikes, Views and Saves
// ═══════════════════════════════════════════════════════════════════════════════
//
// Category scores move only on likes and dislikes. Views and saves are
// exposure signals and leave scores alone. Recording the same feedback twice
// counts twice; callers that need idempotence dedupe by article id first.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Result } from '../../types/result.js';
import type { StoreError } from './errors.js';
import type { ProfileStore } from './profile-store.js';
import {
  addRecentTopic,
  adjustCategoryScore,
  type ArticleInteraction,
  type FeedbackAction,
  type UserProfile,
} from './types.js';
import { requireCategory, requireFeedbackAction, requireUserId } from './validation.js';

const FEEDBACK_LISTS: Record<FeedbackAction, 'liked' | 'disliked'> = {
  like: 'liked',
  dislike: 'disliked',
};

const FEEDBACK_DELTAS: Record<FeedbackAction, number> = {
  like: 1,
  dislike: -1,
};

export class FeedbackLedger {
  private readonly store: ProfileStore;

  constructor(store: ProfileStore) {
    this.store = store;
  }

  /**
   * @throws ValidationError for an action other than like/dislike, or a blank
   * user id or category; the store is not touched
   */
  async recordFeedback(
    userId: string,
    articleId: string,
    category: string,
    action: string
  ): Promise<Result<UserProfile, StoreError>> {
    requireUserId(userId);
    const feedback = requireFeedbackAction(action);
    const topic = requireCategory(category);
    const timestamp = this.store.now();

    return this.store.update(userId, profile => {
      const interaction: ArticleInteraction = {
        timestamp,
        title: '',
        url: '',
        category: topic,
        articleId,
      };
      profile.interactions[FEEDBACK_LISTS[feedback]].push(interaction);
      adjustCategoryScore(profile, topic, FEEDBACK_DELTAS[feedback]);
    });
  }

  async recordView(
    userId: string,
    title: string,
    url: string,
    category: string
  ): Promise<Result<UserProfile, StoreError>> {
    requireUserId(userId);
    const interaction = this.toInteraction(title, url, category);

    return this.store.update(userId, profile => {
      profile.interactions.viewed.push(interaction);
      profile.stats.totalArticlesViewed += 1;
      addRecentTopic(profile.context, interaction.category);
    });
  }

  async recordSave(
    userId: string,
    title: string,
    url: string,
    category: string
  ): Promise<Result<UserProfile, StoreError>> {
    requireUserId(userId);
    const interaction = this.toInteraction(title, url, category);

    return this.store.update(userId, profile => {
      profile.interactions.saved.push(interaction);
    });
  }

  private toInteraction(title: string, url: string, category: string): ArticleInteraction {
    return {
      timestamp: this.store.now(),
      title,
      url,
      category: requireCategory(category),
    };
  }
}
