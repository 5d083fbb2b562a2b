/**
 * BM25 Parameters
 *
 * Defaults and validation for the k1/b tuning pair. Parameters are passed
 * explicitly to every ranking call, so differently tuned rankings can run
 * side by side.
 *
 * @module ranking/params
 */

import type { ZodIssue } from 'zod';
import { Bm25ParamsSchema } from '../schemas/ranking.js';
import type { Bm25Params } from './types.js';

/**
 * Default tuning: k1 = 1.5, b = 0.75.
 */
export const DEFAULT_BM25_PARAMS: Readonly<Bm25Params> = Object.freeze({
  k1: 1.5,
  b: 0.75,
});

/**
 * Raised when k1 or b is outside its valid range.
 */
export class InvalidRankingParamsError extends Error {
  constructor(
    message: string,
    public readonly issues: ZodIssue[]
  ) {
    super(message);
    this.name = 'InvalidRankingParamsError';
  }
}

/**
 * Merge overrides over the defaults and validate the result.
 *
 * @param overrides - Partial parameters; undefined entries keep the default
 * @returns Complete, validated parameters
 * @throws InvalidRankingParamsError if k1 is negative/non-finite or b is outside [0, 1]
 */
export function resolveBm25Params(overrides?: Partial<Bm25Params>): Bm25Params {
  const merged = {
    k1: overrides?.k1 ?? DEFAULT_BM25_PARAMS.k1,
    b: overrides?.b ?? DEFAULT_BM25_PARAMS.b,
  };

  const result = Bm25ParamsSchema.safeParse(merged);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InvalidRankingParamsError(`Invalid BM25 parameters (${detail})`, result.error.issues);
  }
  return result.data;
}
