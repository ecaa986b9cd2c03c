// ═══════════════════════════════════════════════════════════════════════════════
// PROFILE EDITOR — Explicit Profile Fields and Delivery Counters
// ═══════════════════════════════════════════════════════════════════════════════

import type { Result } from '../../types/result.js';
import { ValidationError, type StoreError } from './errors.js';
import type { ProfileStore } from './profile-store.js';
import type { ProfileUpdate, UserProfile } from './types.js';
import { requireUserId } from './validation.js';

function dedupe(values: string[]): string[] {
  return [...new Set(values)];
}

export class ProfileEditor {
  private readonly store: ProfileStore;

  constructor(store: ProfileStore) {
    this.store = store;
  }

  /**
   * A non-empty name replaces the current one, a non-empty interest list
   * replaces the current list, and preferences merge key by key. Empty values
   * leave the field as it is.
   */
  async updateProfile(userId: string, update: ProfileUpdate): Promise<Result<UserProfile, StoreError>> {
    requireUserId(userId);

    const preferences = Object.entries(update.preferences ?? {});
    if (preferences.some(([key]) => key === '__proto__')) {
      throw new ValidationError('preference key "__proto__" is reserved', 'preferences');
    }

    return this.store.update(userId, profile => {
      if (update.name) {
        profile.name = update.name;
      }
      if (update.interests && update.interests.length > 0) {
        profile.interests = dedupe(update.interests);
      }
      for (const [key, value] of preferences) {
        profile.preferences[key] = value;
      }
    });
  }

  /**
   * Count one outbound digest for the user.
   */
  async recordEmailSent(userId: string): Promise<Result<UserProfile, StoreError>> {
    requireUserId(userId);
    return this.store.update(userId, profile => {
      profile.stats.totalEmailsSent += 1;
    });
  }
}
