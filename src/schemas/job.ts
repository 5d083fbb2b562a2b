/**
 * Job Record Schema
 *
 * Zod schemas for job postings handed to the ranker.
 * Only the five text fields the ranker reads are declared; any other
 * fields a caller carries (id, url, datePosted, source...) pass through.
 *
 * @module schemas/job
 */

import { z } from 'zod';

// ============================================================================
// Record Shape
// ============================================================================

/**
 * The fields the ranker reads from a job posting.
 * Every field is optional; `null` counts as absent.
 */
export interface JobRecord {
  readonly title?: string | null;
  readonly company?: string | null;
  readonly location?: string | null;
  /** Free-form job description */
  readonly jd_text?: string | null;
  /** Keywords extracted from the description, in order */
  readonly jd_keywords?: readonly string[] | null;
}

// ============================================================================
// Schemas
// ============================================================================

const OptionalTextSchema = z.string().nullish();

/**
 * JobRecordSchema: validates an untrusted job posting
 */
export const JobRecordSchema = z
  .object({
    title: OptionalTextSchema,
    company: OptionalTextSchema,
    location: OptionalTextSchema,
    jd_text: OptionalTextSchema,
    jd_keywords: z.array(z.string()).nullish(),
  })
  .passthrough();

export type ParsedJobRecord = z.infer<typeof JobRecordSchema>;

/**
 * JobRecordListSchema: a bare array of postings, or a search response
 * of the form `{ jobs: [...] }`. Both normalize to an array.
 */
export const JobRecordListSchema = z.union([
  z.array(JobRecordSchema),
  z.object({ jobs: z.array(JobRecordSchema) }).transform((value) => value.jobs),
]);
