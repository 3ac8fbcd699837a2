import { z } from 'zod';
import type { FilterConditions } from './db-types.js';
import type { Result } from './formatting.js';

/** `/pattern/` marks a regex; anything else is a plain substring. */
export function isRegexLiteral(value: string): boolean {
  return value.length > 2 && value.startsWith('/') && value.endsWith('/');
}

/** Compile a filter pattern case-insensitively, or null when it is not valid. */
export function compilePattern(pattern: string): RegExp | null {
  const source = isRegexLiteral(pattern) ? pattern.slice(1, -1) : pattern;
  try {
    return new RegExp(source, 'i');
  } catch {
    return null;
  }
}

const conditionValue = z.string().trim().min(1).refine(
  (value) => !isRegexLiteral(value) || compilePattern(value) !== null,
  { message: 'invalid regular expression' },
);

const conditionValueOrList = z.union([conditionValue, z.array(conditionValue).min(1)]);

export const filterConditionsSchema = z.object({
  author: conditionValueOrList.optional(),
  author_email: conditionValueOrList.optional(),
  subject_keywords: z.array(conditionValue).min(1).optional(),
  subject_regex: z.string().trim().min(1).refine(
    (value) => compilePattern(value) !== null,
    { message: 'invalid regular expression' },
  ).optional(),
}).strict().refine(
  (conditions) => Object.values(conditions).some((value) => value !== undefined),
  { message: 'at least one condition is required' },
);

/** Validate conditions given as an object or as the JSON text a backend stored. */
export function parseFilterConditions(raw: unknown): Result<FilterConditions> {
  let value = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch (err) {
      return { ok: false, error: err instanceof Error ? err.message : String(err) };
    }
  }

  const parsed = filterConditionsSchema.safeParse(value);
  if (!parsed.success) {
    return {
      ok: false,
      error: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'conditions'}: ${issue.message}`).join('; '),
    };
  }
  return { ok: true, value: parsed.data };
}
