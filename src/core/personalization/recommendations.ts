// ═══════════════════════════════════════════════════════════════════════════════
// RECOMMENDATION ENGINE — Categories to Recommend and Avoid
// ═══════════════════════════════════════════════════════════════════════════════

import type { ProfileStore } from './profile-store.js';
import type { Recommendations } from './types.js';

function byName(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Split scores into positive (highest first) and negative (most negative
 * first). Equal scores order by name; zero scores land in neither list.
 */
export function rankCategories(scores: Record<string, number>): Pick<Recommendations, 'recommend' | 'avoid'> {
  const entries = Object.entries(scores);

  const recommend = entries
    .filter(([, score]) => score > 0)
    .sort(([nameA, a], [nameB, b]) => b - a || byName(nameA, nameB))
    .map(([category]) => category);

  const avoid = entries
    .filter(([, score]) => score < 0)
    .sort(([nameA, a], [nameB, b]) => a - b || byName(nameA, nameB))
    .map(([category]) => category);

  return { recommend, avoid };
}

export class RecommendationEngine {
  private readonly store: ProfileStore;

  constructor(store: ProfileStore) {
    this.store = store;
  }

  async recommend(userId: string): Promise<Recommendations> {
    const profile = await this.store.get(userId);
    return {
      ...rankCategories(profile.categoryScores),
      recentInterests: profile.context.recentTopics,
    };
  }
}
