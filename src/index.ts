/**
 * Job Relevance Ranker
 *
 * Library entry point. Rank job postings against a free-text query with
 * BM25 over a weighted projection of each posting's fields.
 *
 * @example
 * ```typescript
 * import { rank } from 'jobrank';
 *
 * const results = rank(jobs, 'senior python engineer', { topK: 5 });
 * ```
 *
 * @module jobrank
 */

export * from './ranking/index.js';
export * from './schemas/index.js';
export { loadJobRecords, JobFileError, type JobFileErrorReason } from './storage/index.js';
