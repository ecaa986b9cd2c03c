// ═══════════════════════════════════════════════════════════════════════════════
// PERSONALIZATION SERVICE TESTS — Status Results for Every Operation
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, vi } from 'vitest';

import { MemoryDocumentStorage } from '../../../storage/index.js';
import { PersonalizationService } from '../service.js';
import { createTestStore, FlakyStorage } from './helpers.js';

describe('PersonalizationService', () => {
  let service: PersonalizationService;

  beforeEach(() => {
    service = new PersonalizationService(createTestStore(new MemoryDocumentStorage()));
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // MUTATIONS
  // ─────────────────────────────────────────────────────────────────────────────

  describe('recordFeedback', () => {
    it('should report the new category score', async () => {
      await service.recordFeedback({ userId: 'u1', articleId: 'a1', category: 'tech', action: 'like' });
      const result = await service.recordFeedback({ userId: 'u1', articleId: 'a2', category: ' tech', action: 'like' });

      expect(result).toEqual({
        status: 'success',
        message: 'Feedback recorded: like for tech',
        category: 'tech',
        score: 2,
      });
    });

    it('should turn an invalid action into a validation failure', async () => {
      const result = await service.recordFeedback({ userId: 'u1', articleId: 'a1', category: 'tech', action: 'meh' });

      expect(result).toEqual({
        status: 'error',
        code: 'VALIDATION_ERROR',
        message: 'Failed to record feedback: Invalid action "meh": expected like or dislike',
      });
    });

    it('should turn a write failure into a storage failure', async () => {
      const storage = new FlakyStorage();
      storage.writeFailuresRemaining = 3;
      const failing = new PersonalizationService(createTestStore(storage));

      const result = await failing.recordFeedback({ userId: 'u1', articleId: 'a1', category: 'tech', action: 'like' });

      expect(result).toEqual({
        status: 'error',
        code: 'WRITE_FAILED',
        message: 'Failed to record feedback: Failed to write memory storage: disk full',
      });
    });
  });

  it('should record views and saves', async () => {
    const article = { title: 'Orbit', url: 'https://example.com/orbit', category: 'science' };

    expect(await service.recordView('u1', article)).toEqual({
      status: 'success',
      message: "Article interaction 'viewed' recorded",
    });
    expect(await service.recordSave('u1', article)).toEqual({
      status: 'success',
      message: "Article interaction 'saved' recorded",
    });

    const summary = await service.getProfileSummary('u1');
    expect(summary.status === 'success' && summary.totalSaved).toBe(1);
    expect(summary.status === 'success' && summary.engagementScore).toBe(100);
  });

  it('should append conversations and report the running total', async () => {
    await service.appendConversation('u1', { userMessage: 'hi', agentResponse: 'hello' });
    const result = await service.appendConversation('u1', {
      userMessage: 'news?',
      agentResponse: 'here',
      context: { topic: 'tech' },
    });

    expect(result).toEqual({
      status: 'success',
      message: 'Conversation stored in long-term memory',
      totalConversations: 2,
    });
  });

  it('should update the profile and return the editable fields', async () => {
    const result = await service.updateProfile('u1', {
      name: 'Ada',
      interests: ['ai'],
      preferences: { format: 'digest' },
    });

    expect(result).toEqual({
      status: 'success',
      message: 'User profile updated successfully',
      profile: { name: 'Ada', interests: ['ai'], preferences: { format: 'digest' } },
    });
  });

  it('should count sent e-mails', async () => {
    await service.recordEmailSent('u1');

    expect(await service.recordEmailSent('u1')).toEqual({
      status: 'success',
      message: 'Email delivery recorded',
      totalEmailsSent: 2,
    });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // QUERIES
  // ─────────────────────────────────────────────────────────────────────────────

  it('should return recent conversations with a count message', async () => {
    for (let i = 1; i <= 3; i++) {
      await service.appendConversation('u1', { userMessage: `q${i}`, agentResponse: `a${i}` });
    }

    const result = await service.getRecentConversations('u1', 2);

    expect(result.status).toBe('success');
    if (result.status !== 'success') return;
    expect(result.message).toBe('Retrieved 2 conversations');
    expect(result.userId).toBe('u1');
    expect(result.conversations.map(entry => entry.user)).toEqual(['q2', 'q3']);
    expect(result.totalConversations).toBe(3);
  });

  it('should reject a bad limit', async () => {
    expect(await service.getRecentConversations('u1', -1)).toEqual({
      status: 'error',
      code: 'VALIDATION_ERROR',
      message: 'Failed to retrieve history: limit must be a positive integer, got -1',
    });
  });

  it('should return recommendations', async () => {
    await service.recordFeedback({ userId: 'u1', articleId: 'a1', category: 'tech', action: 'like' });
    await service.recordFeedback({ userId: 'u1', articleId: 'a2', category: 'sports', action: 'dislike' });

    expect(await service.getRecommendations('u1')).toEqual({
      status: 'success',
      message: 'Recommendations ready',
      userId: 'u1',
      recommend: ['tech'],
      avoid: ['sports'],
      recentInterests: [],
    });
  });

  it('should return the preference ledger', async () => {
    await service.recordFeedback({ userId: 'u1', articleId: 'a1', category: 'tech', action: 'like' });

    const result = await service.getPreferenceLedger('u1');

    expect(result.status === 'success' && result.favoriteCategories).toEqual(['tech']);
    expect(result.status === 'success' && result.engagementRate).toBe(100);
  });

  it('should report read failures on queries', async () => {
    const storage = new FlakyStorage();
    storage.readFailure = new Error('io error');
    const failing = new PersonalizationService(createTestStore(storage));

    expect(await failing.getProfileSummary('u1')).toEqual({
      status: 'error',
      code: 'READ_FAILED',
      message: 'Failed to get profile: Failed to read memory storage: io error',
    });
  });

  it('should report unexpected errors as internal', async () => {
    vi.spyOn(service.store, 'get').mockRejectedValueOnce(new Error('boom'));

    expect(await service.getRecommendations('u1')).toEqual({
      status: 'error',
      code: 'INTERNAL_ERROR',
      message: 'Failed to get recommendations: boom',
    });
  });
});
