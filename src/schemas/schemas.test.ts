/**
 * Unit Tests for Zod Schemas
 *
 * Tests each schema with valid and invalid data to ensure proper validation.
 */

import { describe, it, expect } from '@jest/globals';
import {
  JobRecordSchema,
  JobRecordListSchema,
  Bm25ParamsSchema,
  TopKSchema,
} from './index.js';

// ============================================================================
// Job Record Schemas
// ============================================================================

describe('JobRecordSchema', () => {
  it('should accept a complete record', () => {
    const record = {
      title: 'Backend Engineer',
      company: 'Acme',
      location: 'Austin, TX',
      jd_text: 'Build APIs',
      jd_keywords: ['go', 'postgres'],
    };

    expect(JobRecordSchema.parse(record)).toEqual(record);
  });

  it('should accept an empty record', () => {
    expect(JobRecordSchema.safeParse({}).success).toBe(true);
  });

  it('should accept null fields', () => {
    const result = JobRecordSchema.safeParse({ title: null, jd_keywords: null });
    expect(result.success).toBe(true);
  });

  it('should keep fields the ranker does not read', () => {
    const parsed = JobRecordSchema.parse({
      id: 'b7f3',
      url: 'https://jobs.example.com/b7f3',
      title: 'SRE',
    });

    expect(parsed).toEqual({ id: 'b7f3', url: 'https://jobs.example.com/b7f3', title: 'SRE' });
  });

  it('should reject non-string text fields', () => {
    expect(JobRecordSchema.safeParse({ title: 42 }).success).toBe(false);
    expect(JobRecordSchema.safeParse({ company: ['Acme'] }).success).toBe(false);
  });

  it('should reject keywords that are not strings', () => {
    expect(JobRecordSchema.safeParse({ jd_keywords: ['ok', 3] }).success).toBe(false);
    expect(JobRecordSchema.safeParse({ jd_keywords: 'python' }).success).toBe(false);
  });

  it('should reject non-objects', () => {
    expect(JobRecordSchema.safeParse('title').success).toBe(false);
    expect(JobRecordSchema.safeParse(null).success).toBe(false);
  });
});

describe('JobRecordListSchema', () => {
  it('should accept a bare array', () => {
    expect(JobRecordListSchema.parse([{ title: 'A' }, { title: 'B' }])).toEqual([
      { title: 'A' },
      { title: 'B' },
    ]);
  });

  it('should unwrap a search response', () => {
    expect(JobRecordListSchema.parse({ jobs: [{ title: 'A' }] })).toEqual([{ title: 'A' }]);
  });

  it('should accept an empty list', () => {
    expect(JobRecordListSchema.parse([])).toEqual([]);
    expect(JobRecordListSchema.parse({ jobs: [] })).toEqual([]);
  });

  it('should reject other shapes', () => {
    expect(JobRecordListSchema.safeParse({ results: [] }).success).toBe(false);
    expect(JobRecordListSchema.safeParse([{ title: 1 }]).success).toBe(false);
  });
});

// ============================================================================
// Ranking Parameter Schemas
// ============================================================================

describe('Bm25ParamsSchema', () => {
  it('should accept typical parameters', () => {
    expect(Bm25ParamsSchema.safeParse({ k1: 1.2, b: 0.75 }).success).toBe(true);
  });

  it('should reject a negative k1', () => {
    expect(Bm25ParamsSchema.safeParse({ k1: -1, b: 0.75 }).success).toBe(false);
  });

  it('should reject b above 1', () => {
    expect(Bm25ParamsSchema.safeParse({ k1: 1.2, b: 1.01 }).success).toBe(false);
  });

  it('should require both parameters', () => {
    expect(Bm25ParamsSchema.safeParse({ k1: 1.2 }).success).toBe(false);
  });
});

describe('TopKSchema', () => {
  it('should accept positive integers', () => {
    expect(TopKSchema.safeParse(1).success).toBe(true);
    expect(TopKSchema.safeParse(25).success).toBe(true);
  });

  it('should reject zero, negatives and fractions', () => {
    expect(TopKSchema.safeParse(0).success).toBe(false);
    expect(TopKSchema.safeParse(-3).success).toBe(false);
    expect(TopKSchema.safeParse(2.5).success).toBe(false);
  });
});
