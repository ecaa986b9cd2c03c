// ═══════════════════════════════════════════════════════════════════════════════
// CONVERSATION MEMORY — Bounded Per-User Chat History
// ═══════════════════════════════════════════════════════════════════════════════

import type { Result } from '../../types/result.js';
import type { StoreError } from './errors.js';
import type { ProfileStore } from './profile-store.js';
import {
  CONVERSATION_CAPACITY,
  DEFAULT_RECENT_CONVERSATIONS,
  type ConversationEntry,
  type RecentConversations,
  type UserProfile,
} from './types.js';
import { requireLimit, requireUserId } from './validation.js';

export class ConversationMemory {
  private readonly store: ProfileStore;

  constructor(store: ProfileStore) {
    this.store = store;
  }

  /**
   * Store one exchange. Past capacity the oldest entries are dropped;
   * `totalConversations` keeps counting.
   */
  async append(
    userId: string,
    userMessage: string,
    agentResponse: string,
    context: Record<string, unknown> = {}
  ): Promise<Result<UserProfile, StoreError>> {
    requireUserId(userId);
    const timestamp = this.store.now();
    const entry: ConversationEntry = {
      timestamp,
      user: userMessage,
      agent: agentResponse,
      context,
    };

    return this.store.update(userId, profile => {
      profile.conversations.push(entry);
      profile.stats.totalConversations += 1;
      profile.context.lastSession = timestamp;

      const overflow = profile.conversations.length - CONVERSATION_CAPACITY;
      if (overflow > 0) {
        profile.conversations.splice(0, overflow);
      }
    });
  }

  /**
   * The latest `limit` entries, oldest first.
   */
  async recent(userId: string, limit: number = DEFAULT_RECENT_CONVERSATIONS): Promise<RecentConversations> {
    requireLimit(limit);
    const profile = await this.store.get(userId);

    return {
      conversations: profile.conversations.slice(-limit),
      totalConversations: profile.stats.totalConversations,
    };
  }
}
