/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

export {
  truncate,
  padRight,
  formatScore,
  formatResultHeader,
  formatResultRow,
  formatResultsTable,
  formatExplanation,
  formatCorpusStats,
} from './results.js';
