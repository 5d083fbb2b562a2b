/**
 * Corpus Index
 *
 * Builds the per-document token tables and the corpus-wide IDF table
 * that BM25 scoring reads. All accumulation happens in locals; the
 * returned index is never modified afterwards.
 *
 * @module ranking/corpus
 */

import type { JobRecord } from '../schemas/job.js';
import { projectTokens } from './projector.js';
import type { CorpusIndex, CorpusStats } from './types.js';

// ============================================================================
// IDF
// ============================================================================

/**
 * Inverse document frequency with the +1 inside the logarithm, so the
 * weight stays positive even for terms present in every document.
 *
 * ```
 * idf = ln((N - df + 0.5) / (df + 0.5) + 1)
 * ```
 *
 * @param docCount - Total number of documents (N)
 * @param df - Number of documents containing the term
 */
export function inverseDocumentFrequency(docCount: number, df: number): number {
  return Math.log((docCount - df + 0.5) / (df + 0.5) + 1);
}

function countTerms(tokens: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

// ============================================================================
// Fit
// ============================================================================

/**
 * Index an ordered batch of records.
 *
 * Pure: the same records always produce an equal index, and nothing is
 * kept between calls. An empty batch yields N = 0, avgDocLen = 0 and an
 * empty vocabulary.
 *
 * @param records - Records to index, in ranking order
 * @returns Index aligned with `records`
 */
export function fit(records: readonly JobRecord[]): CorpusIndex {
  const documents: string[][] = [];
  const docLengths: number[] = [];
  const termFreq: Map<string, number>[] = [];
  const docFreq = new Map<string, number>();

  for (const record of records) {
    const tokens = projectTokens(record);
    const counts = countTerms(tokens);

    documents.push(tokens);
    docLengths.push(tokens.length);
    termFreq.push(counts);

    for (const term of counts.keys()) {
      docFreq.set(term, (docFreq.get(term) ?? 0) + 1);
    }
  }

  const size = documents.length;
  const totalLength = docLengths.reduce((sum, len) => sum + len, 0);
  const avgDocLen = size > 0 ? totalLength / size : 0;

  const idf = new Map<string, number>();
  for (const [term, df] of docFreq) {
    idf.set(term, inverseDocumentFrequency(size, df));
  }

  return { size, documents, docLengths, termFreq, avgDocLen, idf };
}

// ============================================================================
// Diagnostics
// ============================================================================

/**
 * Summarize a fitted corpus.
 *
 * @param index - Fitted corpus
 * @param limit - Number of rarest terms to list (default: 10)
 */
export function describeCorpus(index: CorpusIndex, limit = 10): CorpusStats {
  const rarestTerms = Array.from(index.idf, ([term, idf]) => ({ term, idf }))
    .sort((a, b) => b.idf - a.idf || (a.term < b.term ? -1 : a.term > b.term ? 1 : 0))
    .slice(0, Math.max(0, limit));

  return {
    documentCount: index.size,
    avgDocLen: index.avgDocLen,
    vocabularySize: index.idf.size,
    rarestTerms,
  };
}
