import { ValidationResult } from './types';

/**
 * Shallow read-only check: the first word must be SELECT or WITH.
 *
 * This is a guard against obviously destructive model output, not a security
 * boundary. A crafted SELECT (or a WITH that wraps a write, where the engine
 * allows one) passes; the demo database is opened query-only for that reason.
 */
export function validateReadOnly(sql: string): ValidationResult {
  const first = /^\s*([A-Za-z]+)\b/.exec(sql);
  if (!first) {
    return { ok: false, reason: 'No recognizable leading SQL keyword' };
  }
  const keyword = first[1].toUpperCase();
  if (keyword === 'SELECT' || keyword === 'WITH') {
    return { ok: true, keyword };
  }
  return { ok: false, keyword, reason: `${keyword} statements are not run automatically` };
}
