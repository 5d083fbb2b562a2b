/**
 * Ranking Parameter Schemas
 *
 * @module schemas/ranking
 */

import { z } from 'zod';

/**
 * Bm25Params: k1 saturates term frequency, b scales length normalization
 */
export const Bm25ParamsSchema = z.object({
  k1: z.number().finite().nonnegative(),
  b: z.number().min(0).max(1),
});

/**
 * TopK: how many results to keep. Anything other than a positive
 * integer is rejected here; the ranker itself simply ignores such values.
 */
export const TopKSchema = z.number().int().positive();
