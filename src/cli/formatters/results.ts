/**
 * Ranking Result Formatters
 *
 * Terminal output for ranked job lists, score explanations and corpus
 * statistics.
 *
 * @module cli/formatters/results
 */

import chalk from 'chalk';
import type { CorpusStats, ScoreExplanation, ScoredResult } from '../../ranking/types.js';

// ============================================================================
// Constants
// ============================================================================

const COLUMN_WIDTHS = {
  rank: 5,
  score: 10,
  title: 32,
  company: 22,
  location: 20,
} as const;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Truncate a string to a maximum length, marking the cut with '...'.
 */
export function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + '...';
}

/**
 * Pad a string to a fixed visible width (ANSI codes excluded).
 */
export function padRight(str: string, width: number): string {
  const visibleLength = str.replace(/\x1b\[[0-9;]*m/g, '').length;
  const padding = Math.max(0, width - visibleLength);
  return str + ' '.repeat(padding);
}

/**
 * Format a score with four decimals.
 */
export function formatScore(score: number): string {
  return score.toFixed(4);
}

// ============================================================================
// Result Table
// ============================================================================

/**
 * Format the table header row.
 */
export function formatResultHeader(): string {
  const header =
    padRight('#', COLUMN_WIDTHS.rank) +
    padRight('SCORE', COLUMN_WIDTHS.score) +
    padRight('TITLE', COLUMN_WIDTHS.title) +
    padRight('COMPANY', COLUMN_WIDTHS.company) +
    'LOCATION';

  return chalk.bold(header);
}

/**
 * Format one ranked job as a table row. Zero-score rows are dimmed.
 *
 * @param result - Scored job
 * @param position - 1-based position in the ranking
 */
export function formatResultRow(result: ScoredResult, position: number): string {
  const { record } = result;
  const row =
    padRight(`${position}.`, COLUMN_WIDTHS.rank) +
    padRight(formatScore(result.score), COLUMN_WIDTHS.score) +
    padRight(truncate(record.title || '(untitled)', COLUMN_WIDTHS.title - 2), COLUMN_WIDTHS.title) +
    padRight(truncate(record.company || '-', COLUMN_WIDTHS.company - 2), COLUMN_WIDTHS.company) +
    truncate(record.location || '-', COLUMN_WIDTHS.location);

  return result.score > 0 ? row : chalk.dim(row);
}

/**
 * Format a full result table. When `explanations` (keyed by input index)
 * is given, each row is followed by its score breakdown.
 *
 * @example
 * ```
 * #    SCORE     TITLE                           COMPANY               LOCATION
 * ------------------------------------------------------------------------------
 * 1.   1.1856    Senior Python Engineer          Acme                  -
 * 2.   0.0000    Barista                         Cafe Co               -
 * ```
 */
export function formatResultsTable(
  results: ScoredResult[],
  explanations?: ReadonlyMap<number, ScoreExplanation>
): string {
  const width =
    COLUMN_WIDTHS.rank +
    COLUMN_WIDTHS.score +
    COLUMN_WIDTHS.title +
    COLUMN_WIDTHS.company +
    COLUMN_WIDTHS.location;

  const lines = [formatResultHeader(), chalk.dim('-'.repeat(width))];
  results.forEach((result, i) => {
    lines.push(formatResultRow(result, i + 1));
    const explanation = explanations?.get(result.index);
    if (explanation) {
      lines.push(formatExplanation(explanation));
    }
  });
  return lines.join('\n');
}

// ============================================================================
// Explanations
// ============================================================================

/**
 * Format a per-term score breakdown, one line per matching query token.
 *
 * @example
 * ```
 *   dl=17 norm=1.3077
 *   python     tf=4  idf=0.6931  +1.1856
 * ```
 */
export function formatExplanation(explanation: ScoreExplanation): string {
  const lines = [
    chalk.dim(`  dl=${explanation.docLength} norm=${explanation.lengthNorm.toFixed(4)}`),
  ];

  if (explanation.terms.length === 0) {
    lines.push(chalk.dim('  (no matching terms)'));
  }

  for (const term of explanation.terms) {
    lines.push(
      `  ${padRight(term.term, 10)} tf=${padRight(String(term.tf), 3)}` +
        `idf=${term.idf.toFixed(4)}  +${formatScore(term.contribution)}`
    );
  }

  return lines.join('\n');
}

// ============================================================================
// Corpus Statistics
// ============================================================================

/**
 * Format corpus statistics as key/value lines plus the rarest terms.
 */
export function formatCorpusStats(stats: CorpusStats): string {
  const lines = [
    `${chalk.dim('Documents:')}    ${stats.documentCount}`,
    `${chalk.dim('Avg length:')}   ${stats.avgDocLen.toFixed(2)}`,
    `${chalk.dim('Vocabulary:')}   ${stats.vocabularySize}`,
  ];

  if (stats.rarestTerms.length > 0) {
    lines.push(chalk.dim('Rarest terms:'));
    for (const { term, idf } of stats.rarestTerms) {
      lines.push(`  ${padRight(term, 16)}${idf.toFixed(4)}`);
    }
  }

  return lines.join('\n');
}
