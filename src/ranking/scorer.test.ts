/**
 * Tests for BM25 scoring and parameter validation
 *
 * @module ranking/scorer.test
 */

import { describe, it, expect } from '@jest/globals';
import { fit } from './corpus.js';
import { score, explainScore } from './scorer.js';
import {
  DEFAULT_BM25_PARAMS,
  InvalidRankingParamsError,
  resolveBm25Params,
} from './params.js';
import type { JobRecord } from '../schemas/job.js';

const PYTHON_CORPUS: JobRecord[] = [
  { title: 'Senior Python Engineer', company: 'Acme', jd_text: 'We need Python and AWS skills' },
  { title: 'Barista', company: 'Cafe Co', jd_text: 'Serve coffee' },
];

/** BM25 term weight with the default parameters */
function bm25Term(idf: number, tf: number, dl: number, avgdl: number): number {
  return (idf * (tf * 2.5)) / (tf + 1.5 * (0.25 + (0.75 * dl) / avgdl));
}

// ============================================================================
// score
// ============================================================================

describe('score', () => {
  const index = fit(PYTHON_CORPUS);

  it('should score a matching document', () => {
    expect(score(index, 'python', 0)).toBeCloseTo(bm25Term(Math.log(2), 4, 17, 13), 12);
  });

  it('should sum contributions across query terms', () => {
    const expected = bm25Term(Math.log(2), 4, 17, 13) + bm25Term(Math.log(2), 1, 17, 13);

    expect(score(index, 'Python, AWS', 0)).toBeCloseTo(expected, 12);
  });

  it('should count a repeated query term once per occurrence', () => {
    expect(score(index, 'python python', 0)).toBeCloseTo(2 * score(index, 'python', 0), 12);
  });

  it('should score 0 when no query term is in the document', () => {
    expect(score(index, 'python', 1)).toBe(0);
  });

  it('should score 0 for terms outside the vocabulary', () => {
    expect(score(index, 'kubernetes', 0)).toBe(0);
  });

  it('should score 0 for an empty query', () => {
    expect(score(index, '', 0)).toBe(0);
    expect(score(index, '?!', 0)).toBe(0);
  });

  it('should score 0 for out-of-range document indexes', () => {
    expect(score(index, 'python', 2)).toBe(0);
    expect(score(index, 'python', -1)).toBe(0);
    expect(score(index, 'python', 0.5)).toBe(0);
    expect(score(index, 'python', Number.NaN)).toBe(0);
  });

  it('should score 0 against an empty corpus', () => {
    expect(score(fit([]), 'python', 0)).toBe(0);
  });

  it('should not decrease as term frequency rises at equal length', () => {
    const corpus = fit([
      { jd_text: 'java java filler' },
      { jd_text: 'java filler filler' },
      { jd_text: 'other words here' },
    ]);

    expect(score(corpus, 'java', 0)).toBeGreaterThan(score(corpus, 'java', 1));
  });

  it('should ignore document length when b is 0', () => {
    const corpus = fit([
      { title: 'rust' },
      { title: 'rust', jd_text: 'systems programming language' },
    ]);

    expect(score(corpus, 'rust', 0, { b: 0 })).toBeCloseTo(score(corpus, 'rust', 1, { b: 0 }), 12);
    expect(score(corpus, 'rust', 0)).toBeGreaterThan(score(corpus, 'rust', 1));
  });

  it('should let term frequency matter more with a higher k1', () => {
    const corpus = fit([{ jd_text: 'go go go go' }, { jd_text: 'go x y z' }, { jd_text: 'a b c d' }]);
    const ratio = (k1: number) => score(corpus, 'go', 0, { k1 }) / score(corpus, 'go', 1, { k1 });

    expect(ratio(3)).toBeGreaterThan(ratio(0.5));
  });

  it('should reject invalid parameters', () => {
    expect(() => score(index, 'python', 0, { k1: -1 })).toThrow(InvalidRankingParamsError);
  });
});

// ============================================================================
// explainScore
// ============================================================================

describe('explainScore', () => {
  const index = fit(PYTHON_CORPUS);

  it('should list each matching query token in query order', () => {
    const explanation = explainScore(index, 'aws python unknown python', 0);

    expect(explanation.terms.map((t) => t.term)).toEqual(['aws', 'python', 'python']);
    expect(explanation.terms.map((t) => t.tf)).toEqual([1, 4, 4]);
  });

  it('should sum to the score', () => {
    const explanation = explainScore(index, 'aws python python', 0);
    const total = explanation.terms.reduce((sum, t) => sum + t.contribution, 0);

    expect(explanation.score).toBeCloseTo(total, 12);
    expect(explanation.score).toBe(score(index, 'aws python python', 0));
  });

  it('should report length normalization inputs', () => {
    const explanation = explainScore(index, 'python', 0);

    expect(explanation.docIndex).toBe(0);
    expect(explanation.docLength).toBe(17);
    expect(explanation.lengthNorm).toBeCloseTo(17 / 13, 12);
    expect(explanation.terms[0].idf).toBeCloseTo(Math.log(2), 12);
  });

  it('should return an empty explanation for out-of-range documents', () => {
    expect(explainScore(index, 'python', 7)).toEqual({
      docIndex: 7,
      score: 0,
      docLength: 0,
      lengthNorm: 1,
      terms: [],
    });
  });

  it('should leave length unnormalized when the corpus average is 0', () => {
    const explanation = explainScore(fit([{}]), 'python', 0);

    expect(explanation.lengthNorm).toBe(1);
    expect(explanation.score).toBe(0);
  });
});

// ============================================================================
// Parameters
// ============================================================================

describe('resolveBm25Params', () => {
  it('should default to k1 = 1.5 and b = 0.75', () => {
    expect(resolveBm25Params()).toEqual({ k1: 1.5, b: 0.75 });
    expect(resolveBm25Params({})).toEqual(DEFAULT_BM25_PARAMS);
  });

  it('should merge partial overrides', () => {
    expect(resolveBm25Params({ k1: 2 })).toEqual({ k1: 2, b: 0.75 });
    expect(resolveBm25Params({ b: 0 })).toEqual({ k1: 1.5, b: 0 });
  });

  it('should accept boundary values', () => {
    expect(resolveBm25Params({ k1: 0, b: 1 })).toEqual({ k1: 0, b: 1 });
  });

  it('should reject a negative or non-finite k1', () => {
    expect(() => resolveBm25Params({ k1: -0.1 })).toThrow(InvalidRankingParamsError);
    expect(() => resolveBm25Params({ k1: Number.POSITIVE_INFINITY })).toThrow(
      InvalidRankingParamsError
    );
  });

  it('should reject b outside [0, 1]', () => {
    expect(() => resolveBm25Params({ b: 1.5 })).toThrow(/Invalid BM25 parameters \(b: /);
  });

  it('should expose the validation issues', () => {
    try {
      resolveBm25Params({ b: -1 });
      throw new Error('expected resolveBm25Params to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidRankingParamsError);
      if (error instanceof InvalidRankingParamsError) {
        expect(error.name).toBe('InvalidRankingParamsError');
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0].path).toEqual(['b']);
      }
    }
  });

  it('should keep the defaults immutable', () => {
    expect(Object.isFrozen(DEFAULT_BM25_PARAMS)).toBe(true);
  });
});
