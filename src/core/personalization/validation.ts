// ═══════════════════════════════════════════════════════════════════════════════
// INPUT VALIDATION — Checks Run Before Any Mutation
// ═══════════════════════════════════════════════════════════════════════════════

import { ValidationError } from './errors.js';
import { isFeedbackAction, type FeedbackAction } from './types.js';

// Would replace the prototype of the map it is stored under
const RESERVED_KEYS = new Set(['__proto__']);

function requireKey(value: string, field: string): string {
  if (value.trim() === '') {
    throw new ValidationError(`${field} must not be empty`, field);
  }
  if (RESERVED_KEYS.has(value)) {
    throw new ValidationError(`${field} "${value}" is reserved`, field);
  }
  return value;
}

/**
 * User ids are opaque: checked, never rewritten.
 */
export function requireUserId(userId: string): string {
  return requireKey(userId, 'userId');
}

/**
 * Categories are trimmed so " science" and "science" score together.
 */
export function requireCategory(category: string): string {
  return requireKey(category.trim(), 'category');
}

export function requireFeedbackAction(action: string): FeedbackAction {
  if (!isFeedbackAction(action)) {
    throw new ValidationError(`Invalid action "${action}": expected like or dislike`, 'action');
  }
  return action;
}

export function requireLimit(limit: number): number {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`limit must be a positive integer, got ${limit}`, 'limit');
  }
  return limit;
}
