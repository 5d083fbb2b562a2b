/**
 * BM25 Scorer
 *
 * Scores one fitted document against a query:
 *
 * ```
 * score = Σ idf(t) * tf * (k1 + 1) / (tf + k1 * (1 - b + b * dl / avgdl))
 * ```
 *
 * summed over query tokens t in query order. A token repeated in the
 * query is counted once per occurrence.
 *
 * @module ranking/scorer
 */

import { resolveBm25Params } from './params.js';
import { tokenize } from './tokenizer.js';
import type { Bm25Params, CorpusIndex, ScoreExplanation, TermContribution } from './types.js';

// ============================================================================
// Helpers
// ============================================================================

function isDocIndex(index: CorpusIndex, docIndex: number): boolean {
  return Number.isInteger(docIndex) && docIndex >= 0 && docIndex < index.size;
}

/**
 * dl / avgdl; 1 when the corpus average is 0 (length left unnormalized).
 */
function lengthNormFor(index: CorpusIndex, docIndex: number): number {
  const docLength = index.docLengths[docIndex] ?? 0;
  return index.avgDocLen > 0 ? docLength / index.avgDocLen : 1;
}

/**
 * Per-occurrence contributions of query tokens that match the document.
 * Shared by scoring and explanation so the two always agree.
 */
function contributions(
  index: CorpusIndex,
  queryTokens: readonly string[],
  docIndex: number,
  params: Bm25Params
): TermContribution[] {
  const termFreq = index.termFreq[docIndex];
  if (!termFreq) {
    return [];
  }

  const { k1, b } = params;
  const lengthNorm = lengthNormFor(index, docIndex);
  const out: TermContribution[] = [];

  for (const term of queryTokens) {
    const idf = index.idf.get(term);
    if (idf === undefined) continue;

    const tf = termFreq.get(term) ?? 0;
    if (tf === 0) continue;

    const numerator = tf * (k1 + 1);
    const denominator = tf + k1 * (1 - b + b * lengthNorm);
    out.push({ term, tf, idf, contribution: idf * (numerator / denominator) });
  }

  return out;
}

function sum(terms: readonly TermContribution[]): number {
  let total = 0;
  for (const t of terms) {
    total += t.contribution;
  }
  return total;
}

// ============================================================================
// Scoring
// ============================================================================

/**
 * Score pre-tokenized query terms against one document with resolved
 * parameters. Used by the ranker to avoid re-tokenizing per document.
 *
 * @internal
 */
export function scoreTokens(
  index: CorpusIndex,
  queryTokens: readonly string[],
  docIndex: number,
  params: Bm25Params
): number {
  if (!isDocIndex(index, docIndex)) {
    return 0;
  }
  return sum(contributions(index, queryTokens, docIndex, params));
}

/**
 * BM25 score of document `docIndex` for `query`.
 *
 * Never throws for a bad document index: anything outside
 * `0..index.size - 1` scores 0.
 *
 * @param index - Fitted corpus
 * @param query - Free-text query
 * @param docIndex - Position of the document in the fitted batch
 * @param params - k1/b overrides (defaults 1.5 / 0.75)
 * @returns Non-negative score, 0 when no query token matched
 */
export function score(
  index: CorpusIndex,
  query: string,
  docIndex: number,
  params?: Partial<Bm25Params>
): number {
  return scoreTokens(index, tokenize(query), docIndex, resolveBm25Params(params));
}

/**
 * Break a document's score down by query token.
 *
 * `terms` holds one entry per matching query-token occurrence, in query
 * order, and `score` is their sum (identical to `score()` for the same
 * arguments).
 */
export function explainScore(
  index: CorpusIndex,
  query: string,
  docIndex: number,
  params?: Partial<Bm25Params>
): ScoreExplanation {
  const resolved = resolveBm25Params(params);

  if (!isDocIndex(index, docIndex)) {
    return { docIndex, score: 0, docLength: 0, lengthNorm: 1, terms: [] };
  }

  const terms = contributions(index, tokenize(query), docIndex, resolved);
  return {
    docIndex,
    score: sum(terms),
    docLength: index.docLengths[docIndex] ?? 0,
    lengthNorm: lengthNormFor(index, docIndex),
    terms,
  };
}
