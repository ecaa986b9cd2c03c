// ═══════════════════════════════════════════════════════════════════════════════
// PERSONALIZATION SERVICE — Facade for the Tool Layer and the Feedback Webhook
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every operation resolves to a status object; nothing here throws. Failures
// carry a code so the HTTP layer can pick a status without parsing messages.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger, toError } from '../../logging/index.js';
import type { Result } from '../../types/result.js';
import { unwrapOrThrow } from '../../types/result.js';
import { ProfileAggregator } from './aggregator.js';
import { ConversationMemory } from './conversation-memory.js';
import { isPersonalizationError, type StoreError, type StoreErrorCode } from './errors.js';
import { FeedbackLedger } from './feedback-ledger.js';
import { ProfileEditor } from './profile-editor.js';
import type { ProfileStore } from './profile-store.js';
import { RecommendationEngine } from './recommendations.js';
import type {
  ConversationEntry,
  FeedbackEvent,
  PreferenceLedger,
  ProfileSummary,
  ProfileUpdate,
  Recommendations,
  UserProfile,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// RESULT SHAPES
// ─────────────────────────────────────────────────────────────────────────────────

export type OperationErrorCode = 'VALIDATION_ERROR' | StoreErrorCode | 'INTERNAL_ERROR';

export type OperationSuccess<T extends object = Record<never, never>> = {
  status: 'success';
  message: string;
} & T;

export interface OperationFailure {
  status: 'error';
  code: OperationErrorCode;
  message: string;
}

export type OperationResult<T extends object = Record<never, never>> = OperationSuccess<T> | OperationFailure;

export type FeedbackInput = Omit<FeedbackEvent, 'action'> & { action: string };

export interface ArticleInput {
  title: string;
  url: string;
  category: string;
}

export interface ConversationInput {
  userMessage: string;
  agentResponse: string;
  context?: Record<string, unknown>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SERVICE
// ─────────────────────────────────────────────────────────────────────────────────

export class PersonalizationService {
  readonly store: ProfileStore;

  private readonly ledger: FeedbackLedger;
  private readonly memory: ConversationMemory;
  private readonly editor: ProfileEditor;
  private readonly aggregator: ProfileAggregator;
  private readonly recommender: RecommendationEngine;
  private readonly logger = getLogger({ component: 'personalization' });

  constructor(store: ProfileStore) {
    this.store = store;
    this.ledger = new FeedbackLedger(store);
    this.memory = new ConversationMemory(store);
    this.editor = new ProfileEditor(store);
    this.aggregator = new ProfileAggregator(store);
    this.recommender = new RecommendationEngine(store);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // MUTATIONS
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * `action` is checked here, so raw webhook input can be passed straight in.
   */
  async recordFeedback(event: FeedbackInput): Promise<OperationResult<{ category: string; score: number }>> {
    return this.run('recordFeedback', 'Failed to record feedback', event.userId, async () => {
      const profile = await this.commit(
        this.ledger.recordFeedback(event.userId, event.articleId, event.category, event.action)
      );
      const category = event.category.trim();
      return {
        message: `Feedback recorded: ${event.action} for ${category}`,
        category,
        score: profile.categoryScores[category] ?? 0,
      };
    });
  }

  async recordView(userId: string, article: ArticleInput): Promise<OperationResult> {
    return this.run('recordView', 'Failed to store interaction', userId, async () => {
      await this.commit(this.ledger.recordView(userId, article.title, article.url, article.category));
      return { message: "Article interaction 'viewed' recorded" };
    });
  }

  async recordSave(userId: string, article: ArticleInput): Promise<OperationResult> {
    return this.run('recordSave', 'Failed to store interaction', userId, async () => {
      await this.commit(this.ledger.recordSave(userId, article.title, article.url, article.category));
      return { message: "Article interaction 'saved' recorded" };
    });
  }

  async appendConversation(
    userId: string,
    input: ConversationInput
  ): Promise<OperationResult<{ totalConversations: number }>> {
    return this.run('appendConversation', 'Failed to store conversation', userId, async () => {
      const profile = await this.commit(
        this.memory.append(userId, input.userMessage, input.agentResponse, input.context)
      );
      return {
        message: 'Conversation stored in long-term memory',
        totalConversations: profile.stats.totalConversations,
      };
    });
  }

  async updateProfile(
    userId: string,
    update: ProfileUpdate
  ): Promise<OperationResult<{ profile: Pick<UserProfile, 'name' | 'interests' | 'preferences'> }>> {
    return this.run('updateProfile', 'Failed to update profile', userId, async () => {
      const profile = await this.commit(this.editor.updateProfile(userId, update));
      return {
        message: 'User profile updated successfully',
        profile: {
          name: profile.name,
          interests: profile.interests,
          preferences: profile.preferences,
        },
      };
    });
  }

  async recordEmailSent(userId: string): Promise<OperationResult<{ totalEmailsSent: number }>> {
    return this.run('recordEmailSent', 'Failed to record email', userId, async () => {
      const profile = await this.commit(this.editor.recordEmailSent(userId));
      return {
        message: 'Email delivery recorded',
        totalEmailsSent: profile.stats.totalEmailsSent,
      };
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // QUERIES
  // ─────────────────────────────────────────────────────────────────────────────

  async getRecentConversations(
    userId: string,
    limit?: number
  ): Promise<OperationResult<{ userId: string; conversations: ConversationEntry[]; totalConversations: number }>> {
    return this.run('getRecentConversations', 'Failed to retrieve history', userId, async () => {
      const recent = await this.memory.recent(userId, limit);
      return {
        message: `Retrieved ${recent.conversations.length} conversations`,
        userId,
        ...recent,
      };
    });
  }

  async getProfileSummary(userId: string): Promise<OperationResult<ProfileSummary>> {
    return this.run('getProfileSummary', 'Failed to get profile', userId, async () => {
      const summary = await this.aggregator.summarize(userId);
      return { message: 'Profile retrieved', ...summary };
    });
  }

  async getRecommendations(userId: string): Promise<OperationResult<{ userId: string } & Recommendations>> {
    return this.run('getRecommendations', 'Failed to get recommendations', userId, async () => {
      const recommendations = await this.recommender.recommend(userId);
      return { message: 'Recommendations ready', userId, ...recommendations };
    });
  }

  async getPreferenceLedger(userId: string): Promise<OperationResult<{ userId: string } & PreferenceLedger>> {
    return this.run('getPreferenceLedger', 'Failed to get preferences', userId, async () => {
      const ledger = await this.aggregator.preferenceLedger(userId);
      return { message: 'Preferences retrieved', userId, ...ledger };
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // HELPERS
  // ─────────────────────────────────────────────────────────────────────────────

  private async commit(pending: Promise<Result<UserProfile, StoreError>>): Promise<UserProfile> {
    return unwrapOrThrow(await pending);
  }

  private async run<T extends { message: string }>(
    operation: string,
    failureMessage: string,
    userId: string,
    fn: () => Promise<T>
  ): Promise<({ status: 'success' } & T) | OperationFailure> {
    try {
      const value = await fn();
      return { status: 'success' as const, ...value };
    } catch (error) {
      if (isPersonalizationError(error)) {
        this.logger.warn(`${operation} failed`, { userId, code: error.code, error: error.message });
        return { status: 'error', code: error.code, message: `${failureMessage}: ${error.message}` };
      }

      const failure = toError(error);
      this.logger.error(`${operation} failed unexpectedly`, failure, { userId });
      return { status: 'error', code: 'INTERNAL_ERROR', message: `${failureMessage}: ${failure.message}` };
    }
  }
}
