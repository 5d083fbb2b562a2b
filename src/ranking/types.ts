/**
 * Ranking Types
 *
 * Shared types for the BM25 ranking core: the fitted corpus index,
 * tuning parameters, results and the injected logger contract.
 *
 * @module ranking/types
 */

import type { JobRecord } from '../schemas/job.js';

// ============================================================================
// Parameters
// ============================================================================

/**
 * BM25 tuning parameters, fixed for the lifetime of one ranking operation.
 */
export interface Bm25Params {
  /** Term-frequency saturation. Higher values let repeated terms matter longer. */
  k1: number;
  /** Length-normalization strength, 0 (ignore length) to 1 (full normalization). */
  b: number;
}

// ============================================================================
// Corpus Index
// ============================================================================

/**
 * Read-only index built by `fit` over an ordered batch of records.
 *
 * `documents`, `docLengths` and `termFreq` are index-aligned with the
 * input sequence: position i describes input record i.
 */
export interface CorpusIndex {
  /** Number of documents (N) */
  readonly size: number;
  /** Token sequence per document, in occurrence order, duplicates kept */
  readonly documents: ReadonlyArray<readonly string[]>;
  /** Token count per document */
  readonly docLengths: readonly number[];
  /** Token -> occurrence count, per document */
  readonly termFreq: ReadonlyArray<ReadonlyMap<string, number>>;
  /** Mean of docLengths, 0 for an empty corpus */
  readonly avgDocLen: number;
  /** Inverse document frequency of every vocabulary token */
  readonly idf: ReadonlyMap<string, number>;
}

// ============================================================================
// Results
// ============================================================================

/**
 * A record paired with its BM25 score.
 * `record` is the caller's object, never a copy.
 */
export interface ScoredResult<T extends JobRecord = JobRecord> {
  record: T;
  /** Position of the record in the input sequence */
  index: number;
  /** Non-negative BM25 score; 0 means no query token matched */
  score: number;
}

/**
 * Score contributed by one occurrence of a query token.
 */
export interface TermContribution {
  term: string;
  /** Occurrences of the term in the document */
  tf: number;
  idf: number;
  contribution: number;
}

/**
 * Per-term breakdown of a document's score for a query.
 */
export interface ScoreExplanation {
  docIndex: number;
  score: number;
  docLength: number;
  /** dl / avgDocLen, or 1 when the corpus average is 0 */
  lengthNorm: number;
  terms: TermContribution[];
}

/**
 * Diagnostic summary of a fitted corpus.
 */
export interface CorpusStats {
  documentCount: number;
  avgDocLen: number;
  vocabularySize: number;
  /** Highest-idf terms, rarest first */
  rarestTerms: Array<{ term: string; idf: number }>;
}

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for library code.
 * Allows callers to observe ranking without tying the core to a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden in production) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Options
// ============================================================================

/**
 * Options accepted by `rank`.
 */
export interface RankOptions {
  /** Keep only the best K results; ignored unless a positive integer below N */
  topK?: number | null;
  /** Overrides merged over DEFAULT_BM25_PARAMS */
  params?: Partial<Bm25Params>;
  logger?: Logger;
}
