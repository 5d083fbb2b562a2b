/**
 * Storage Layer
 *
 * File-based loading of job postings for the CLI.
 *
 * @module storage
 */

export { loadJobRecords, JobFileError, type JobFileErrorReason } from './jobs.js';
