/**
 * Document Projector
 *
 * Flattens a job record into one synthetic text. Fields are weighted by
 * repetition: a term in the title appears three times in the projected
 * text, so its term frequency (and BM25 score) rises accordingly, without
 * scoring fields separately.
 *
 * @module ranking/projector
 */

import type { JobRecord } from '../schemas/job.js';
import { tokenize } from './tokenizer.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Number of copies of each field in the projected text.
 * `jd_keywords` applies per keyword.
 */
export const FIELD_WEIGHTS = {
  title: 3,
  company: 2,
  location: 2,
  jd_text: 1,
  jd_keywords: 2,
} as const;

// ============================================================================
// Projection
// ============================================================================

function repeat(parts: string[], value: string | null | undefined, times: number): void {
  if (!value) {
    return;
  }
  for (let i = 0; i < times; i++) {
    parts.push(value);
  }
}

/**
 * Build the projected text of a record: title x3, company x2, location x2,
 * description once, then each keyword x2, joined by single spaces.
 * Absent, null or empty fields contribute nothing.
 *
 * @example
 * ```typescript
 * projectText({ title: 'Data Engineer', jd_keywords: ['sql'] });
 * // 'Data Engineer Data Engineer Data Engineer sql sql'
 * ```
 */
export function projectText(record: JobRecord): string {
  const parts: string[] = [];

  repeat(parts, record.title, FIELD_WEIGHTS.title);
  repeat(parts, record.company, FIELD_WEIGHTS.company);
  repeat(parts, record.location, FIELD_WEIGHTS.location);
  repeat(parts, record.jd_text, FIELD_WEIGHTS.jd_text);

  for (const keyword of record.jd_keywords ?? []) {
    repeat(parts, keyword, FIELD_WEIGHTS.jd_keywords);
  }

  return parts.join(' ');
}

/**
 * Tokens of a record's projected text.
 */
export function projectTokens(record: JobRecord): string[] {
  return tokenize(projectText(record));
}
