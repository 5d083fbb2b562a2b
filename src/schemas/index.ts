/**
 * Zod Schemas
 *
 * Central export point for the schemas validating data at the library
 * boundary: job records read from files or APIs, and ranking parameters.
 */

// ============================================================================
// Job Records
// ============================================================================

export {
  JobRecordSchema,
  JobRecordListSchema,
  type JobRecord,
  type ParsedJobRecord,
} from './job.js';

// ============================================================================
// Ranking Parameters
// ============================================================================

export { Bm25ParamsSchema, TopKSchema } from './ranking.js';
