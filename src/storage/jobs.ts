/**
 * Job File Loading
 *
 * Reads job postings from a JSON file and validates them before they
 * reach the ranker. Accepts a bare array of postings or a search
 * response of the form `{ "jobs": [...] }`.
 *
 * @module storage/jobs
 */

import * as fs from 'node:fs/promises';
import { JobRecordListSchema, type ParsedJobRecord } from '../schemas/index.js';

/**
 * Why a job file could not be loaded.
 */
export type JobFileErrorReason = 'not_found' | 'unreadable' | 'invalid_json' | 'invalid_schema';

/**
 * Job file could not be read, parsed or validated.
 */
export class JobFileError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly reason: JobFileErrorReason
  ) {
    super(message);
    this.name = 'JobFileError';
  }
}

/**
 * Load and validate job postings from a JSON file.
 *
 * @param filePath - Path to the JSON file
 * @returns Validated records, in file order
 * @throws JobFileError if the file is missing, not JSON, or not a list of postings
 */
export async function loadJobRecords(filePath: string): Promise<ParsedJobRecord[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new JobFileError(`Job file not found: ${filePath}`, filePath, 'not_found');
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new JobFileError(`Cannot read job file ${filePath}: ${detail}`, filePath, 'unreadable');
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new JobFileError(`Job file is not valid JSON: ${filePath} (${detail})`, filePath, 'invalid_json');
  }

  const result = JobRecordListSchema.safeParse(data);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
    throw new JobFileError(
      `Job file does not contain job postings: ${filePath}${where}`,
      filePath,
      'invalid_schema'
    );
  }

  return result.data;
}
