// ═══════════════════════════════════════════════════════════════════════════════
// PERSONALIZATION MODULE — Profiles, Feedback, Conversations, Recommendations
// ═══════════════════════════════════════════════════════════════════════════════

import { loadConfig, type StorageConfig } from '../../config/index.js';
import { createStorage, type DocumentStorage } from '../../storage/index.js';
import { ProfileStore } from './profile-store.js';
import { PersonalizationService } from './service.js';

export * from './types.js';
export * from './errors.js';
export {
  parseDocument,
  normalizeProfile,
  serializeDocument,
  UserProfileSchema,
  PersonalizationDocumentSchema,
  type ParsedDocument,
} from './schema.js';
export {
  ProfileStore,
  type ProfileStoreOptions,
  type ProfileMutation,
  type StoreHealth,
} from './profile-store.js';
export { FeedbackLedger } from './feedback-ledger.js';
export { ConversationMemory } from './conversation-memory.js';
export { ProfileEditor } from './profile-editor.js';
export { ProfileAggregator, computeEngagementScore, rankTopInterests } from './aggregator.js';
export { RecommendationEngine, rankCategories } from './recommendations.js';
export {
  PersonalizationService,
  type OperationResult,
  type OperationSuccess,
  type OperationFailure,
  type OperationErrorCode,
  type FeedbackInput,
  type ArticleInput,
  type ConversationInput,
} from './service.js';

/**
 * Build a store over the given storage, with lock and retry settings from
 * config.
 */
export function createProfileStore(
  storage?: DocumentStorage,
  config: StorageConfig = loadConfig().storage
): ProfileStore {
  return new ProfileStore({
    storage: storage ?? createStorage(config),
    lockTimeoutMs: config.lockTimeoutMs,
    writeMaxRetries: config.writeMaxRetries,
    writeRetryDelayMs: config.writeRetryDelayMs,
  });
}

export function createPersonalizationService(store: ProfileStore = createProfileStore()): PersonalizationService {
  return new PersonalizationService(store);
}
