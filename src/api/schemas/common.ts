// ═══════════════════════════════════════════════════════════════════════════════
// COMMON SCHEMAS — Shared Field and Query Helpers
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// QUERY STRINGS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Repeated query keys arrive as arrays; the first occurrence wins. Blank
 * values count as absent.
 */
export function firstQueryValue(value: unknown): unknown {
  const first = Array.isArray(value) ? value[0] : value;
  if (typeof first !== 'string') return undefined;
  const trimmed = first.trim();
  return trimmed === '' ? undefined : trimmed;
}

/**
 * Optional query string parameter with a fallback.
 */
export function queryParam(fallback: string, maxLength: number = 200) {
  return z.preprocess(
    firstQueryValue,
    z.string().max(maxLength, `Must be ${maxLength} characters or less`).default(fallback)
  );
}

// ─────────────────────────────────────────────────────────────────────────────────
// FIELDS
// ─────────────────────────────────────────────────────────────────────────────────

export const UserIdSchema = z
  .string()
  .min(1, 'User ID is required')
  .max(200, 'User ID must be 200 characters or less')
  .refine(value => value.trim() !== '', 'User ID must not be blank');

export const CategorySchema = z
  .string()
  .trim()
  .min(1, 'Category is required')
  .max(100, 'Category must be 100 characters or less');

export const ArticleIdSchema = z
  .string()
  .trim()
  .min(1, 'Article ID is required')
  .max(200, 'Article ID must be 200 characters or less');

export const UserIdParamSchema = z.object({
  userId: UserIdSchema,
});
