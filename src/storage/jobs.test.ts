import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { JobFileError, loadJobRecords } from './jobs.js';

describe('job file storage', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'jobs-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeJobFile(name: string, content: string): Promise<string> {
    const filePath = path.join(tempDir, name);
    await fs.writeFile(filePath, content, 'utf-8');
    return filePath;
  }

  describe('loadJobRecords', () => {
    it('loads a bare array of postings', async () => {
      const filePath = await writeJobFile(
        'jobs.json',
        JSON.stringify([
          { title: 'Data Analyst', company: 'Acme' },
          { title: 'ML Engineer', jd_keywords: ['pytorch'] },
        ])
      );

      const records = await loadJobRecords(filePath);

      expect(records).toEqual([
        { title: 'Data Analyst', company: 'Acme' },
        { title: 'ML Engineer', jd_keywords: ['pytorch'] },
      ]);
    });

    it('unwraps a search response', async () => {
      const filePath = await writeJobFile(
        'response.json',
        JSON.stringify({ jobs: [{ id: 'j1', title: 'Designer', url: 'https://jobs.example.com/j1' }] })
      );

      const records = await loadJobRecords(filePath);

      expect(records).toEqual([{ id: 'j1', title: 'Designer', url: 'https://jobs.example.com/j1' }]);
    });

    it('loads an empty list', async () => {
      const filePath = await writeJobFile('empty.json', '[]');

      await expect(loadJobRecords(filePath)).resolves.toEqual([]);
    });

    it('reports a missing file', async () => {
      const filePath = path.join(tempDir, 'missing.json');

      await expect(loadJobRecords(filePath)).rejects.toThrow(`Job file not found: ${filePath}`);
    });

    it('reports invalid JSON', async () => {
      const filePath = await writeJobFile('broken.json', '[{ "title": ');

      await expect(loadJobRecords(filePath)).rejects.toThrow(/not valid JSON/);
    });

    it('reports data that is not a list of postings', async () => {
      const filePath = await writeJobFile('wrong.json', JSON.stringify({ results: [] }));

      await expect(loadJobRecords(filePath)).rejects.toThrow(/does not contain job postings/);
    });

    it('carries the file path and reason', async () => {
      const filePath = await writeJobFile('typed.json', JSON.stringify([{ title: 7 }]));

      try {
        await loadJobRecords(filePath);
        throw new Error('expected loadJobRecords to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(JobFileError);
        if (error instanceof JobFileError) {
          expect(error.filePath).toBe(filePath);
          expect(error.reason).toBe('invalid_schema');
        }
      }
    });
  });
});
