/**
 * Ranker
 *
 * Public entry point: fit a batch of job records, score every document
 * against a query, sort by score and optionally keep the top K.
 *
 * `rank()` rebuilds the index on every call. Callers ranking the same
 * batch against several queries should fit once through `createRanker()`.
 *
 * @module ranking/ranker
 */

import type { JobRecord } from '../schemas/job.js';
import { fit } from './corpus.js';
import { resolveBm25Params } from './params.js';
import { explainScore, scoreTokens } from './scorer.js';
import { tokenize } from './tokenizer.js';
import type {
  Bm25Params,
  CorpusIndex,
  Logger,
  RankOptions,
  ScoreExplanation,
  ScoredResult,
} from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Number of top results written to the debug log */
const DEBUG_PREVIEW_COUNT = 5;

// ============================================================================
// Types
// ============================================================================

/**
 * A corpus fitted once and scored against any number of queries.
 */
export interface FittedRanker<T extends JobRecord = JobRecord> {
  /** The fitted index */
  readonly index: CorpusIndex;
  /** Parameters every score from this ranker uses */
  readonly params: Readonly<Bm25Params>;
  score(query: string, docIndex: number): number;
  explain(query: string, docIndex: number): ScoreExplanation;
  rank(query: string, options?: Pick<RankOptions, 'topK' | 'logger'>): ScoredResult<T>[];
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Truncate to topK when it is a positive integer below the result count.
 */
function applyTopK<R>(results: R[], topK: number | null | undefined): R[] {
  if (topK == null || !Number.isInteger(topK) || topK <= 0 || topK >= results.length) {
    return results;
  }
  return results.slice(0, topK);
}

function logTopResults<T extends JobRecord>(logger: Logger, results: ScoredResult<T>[]): void {
  if (results.length === 0) return;
  logger.debug('[rank] Top results:');
  for (const result of results.slice(0, DEBUG_PREVIEW_COUNT)) {
    logger.debug(
      `  #${result.index} ${result.record.title ?? '(untitled)'}: ${result.score.toFixed(4)}`
    );
  }
}

// ============================================================================
// Ranker
// ============================================================================

/**
 * Fit `records` once and return a ranker bound to that corpus.
 *
 * @param records - Records to index; never modified. The ranker keeps its
 *   own copy of the array, so later edits to it do not reach the index.
 * @param params - k1/b overrides
 * @throws InvalidRankingParamsError if the parameters are out of range
 */
export function createRanker<T extends JobRecord>(
  records: readonly T[],
  params?: Partial<Bm25Params>
): FittedRanker<T> {
  const resolved = Object.freeze(resolveBm25Params(params));
  const snapshot: readonly T[] = [...records];
  const index = fit(snapshot);

  return {
    index,
    params: resolved,

    score(query: string, docIndex: number): number {
      return scoreTokens(index, tokenize(query), docIndex, resolved);
    },

    explain(query: string, docIndex: number): ScoreExplanation {
      return explainScore(index, query, docIndex, resolved);
    },

    rank(query: string, options: Pick<RankOptions, 'topK' | 'logger'> = {}): ScoredResult<T>[] {
      const { logger } = options;
      const queryTokens = tokenize(query);

      logger?.debug(
        `[rank] Scoring ${index.size} documents for ${queryTokens.length} query tokens ` +
          `(k1=${resolved.k1}, b=${resolved.b})`
      );

      const scored: ScoredResult<T>[] = snapshot.map((record, i) => ({
        record,
        index: i,
        score: scoreTokens(index, queryTokens, i, resolved),
      }));

      // Array.prototype.sort is stable: equal scores keep input order
      scored.sort((a, b) => b.score - a.score);

      const results = applyTopK(scored, options.topK);

      if (logger) {
        const matched = scored.filter((r) => r.score > 0).length;
        logger.debug(`[rank] ${matched} of ${index.size} documents matched; returning ${results.length}`);
        logTopResults(logger, results);
      }

      return results;
    },
  };
}

/**
 * Rank job records by BM25 relevance to `query`.
 *
 * Results are sorted by score descending; equal scores keep their input
 * order. An empty batch gives `[]`; a query with no alphanumeric tokens
 * scores every record 0 and returns them in input order.
 *
 * @param records - Candidate records; neither the array nor its elements are modified
 * @param query - Free-text query
 * @param options - topK, BM25 parameter overrides and an optional logger
 * @returns Scored records, best first
 *
 * @example
 * ```typescript
 * const results = rank(jobs, 'senior python engineer', { topK: 10 });
 * for (const { record, score } of results) {
 *   console.log(record.title, score.toFixed(3));
 * }
 * ```
 */
export function rank<T extends JobRecord>(
  records: readonly T[],
  query: string,
  options: RankOptions = {}
): ScoredResult<T>[] {
  return createRanker(records, options.params).rank(query, options);
}
