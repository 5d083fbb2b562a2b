/**
 * Ranking Module Exports
 *
 * Central export point for BM25 job ranking.
 *
 * @module ranking
 */

// Tokenization and projection
export { tokenize } from './tokenizer.js';
export { FIELD_WEIGHTS, projectText, projectTokens } from './projector.js';

// Corpus index
export { fit, describeCorpus, inverseDocumentFrequency } from './corpus.js';

// Parameters
export {
  DEFAULT_BM25_PARAMS,
  InvalidRankingParamsError,
  resolveBm25Params,
} from './params.js';

// Scoring
export { score, explainScore } from './scorer.js';

// Ranking facade
export { rank, createRanker, type FittedRanker } from './ranker.js';

// Types
export type {
  Bm25Params,
  CorpusIndex,
  CorpusStats,
  Logger,
  RankOptions,
  ScoredResult,
  ScoreExplanation,
  TermContribution,
} from './types.js';
