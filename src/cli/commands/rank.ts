/**
 * Rank Command
 *
 * Ranks the job postings in a JSON file against a query and prints the
 * result as a table or JSON.
 *
 * @module cli/commands/rank
 */

import type { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { formatResultsTable } from '../formatters/results.js';
import { config } from '../../config/index.js';
import { createRanker } from '../../ranking/ranker.js';
import type { Bm25Params, ScoreExplanation } from '../../ranking/types.js';
import { loadJobRecords } from '../../storage/jobs.js';
import {
  handleCommandError,
  parseCountFlag,
  parseFormat,
  parseNumberFlag,
  type OutputFormat,
} from './options.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Raw options for the rank command, as commander delivers them.
 */
export interface RankCommandOptions {
  topK?: string;
  k1?: string;
  b?: string;
  format?: string;
  explain?: boolean;
}

/**
 * Parsed rank settings, with config defaults applied.
 */
export interface RankSettings {
  topK?: number;
  params: Partial<Bm25Params>;
  format: OutputFormat;
  explain: boolean;
}

// ============================================================================
// Settings
// ============================================================================

/**
 * Parse flags, falling back to configured defaults for anything not given.
 * BM25 ranges are checked later by the ranker itself.
 *
 * @throws CliUsageError for malformed flag values
 */
export function resolveRankSettings(
  options: RankCommandOptions,
  defaults: { k1: number; b: number; topK?: number } = config.ranking
): RankSettings {
  return {
    topK: parseCountFlag(options.topK, '--top-k') ?? defaults.topK,
    params: {
      k1: parseNumberFlag(options.k1, '--k1') ?? defaults.k1,
      b: parseNumberFlag(options.b, '--b') ?? defaults.b,
    },
    format: parseFormat(options.format),
    explain: options.explain === true,
  };
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Handle the rank command.
 *
 * @param file - Path to a JSON job file
 * @param query - Free-text query
 * @param options - Raw command options
 * @param base - Base command for output
 */
export async function handleRank(
  file: string,
  query: string,
  options: RankCommandOptions,
  base: BaseCommand,
  defaults?: { k1: number; b: number; topK?: number }
): Promise<void> {
  const settings = resolveRankSettings(options, defaults);

  base.debug(`Loading jobs from ${file}`);
  const jobs = await loadJobRecords(file);

  const ranker = createRanker(jobs, settings.params);
  const results = ranker.rank(query, { topK: settings.topK, logger: base.toLogger() });

  const explanations = new Map<number, ScoreExplanation>();
  if (settings.explain) {
    for (const result of results) {
      explanations.set(result.index, ranker.explain(query, result.index));
    }
  }

  if (settings.format === 'json') {
    base.json({
      query,
      total: jobs.length,
      params: ranker.params,
      results: results.map((result, i) => ({
        rank: i + 1,
        index: result.index,
        score: result.score,
        record: result.record,
        ...(settings.explain ? { explanation: explanations.get(result.index) } : {}),
      })),
    });
    return;
  }

  if (jobs.length === 0) {
    base.info('No jobs found in file.');
    return;
  }

  base.section(`Results for "${query}"`);
  console.log(formatResultsTable(results, settings.explain ? explanations : undefined));

  base.blank();
  const matched = results.filter((r) => r.score > 0).length;
  base.info(`Showing ${results.length} of ${jobs.length} jobs (${matched} matched)`);
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the rank command.
 *
 * @param program - Main commander program
 */
export function registerRankCommand(program: Command): void {
  program
    .command('rank <file> <query>')
    .description('Rank job postings in a JSON file by BM25 relevance to a query')
    .option('-k, --top-k <count>', 'Show only the best <count> jobs')
    .option('--k1 <value>', 'BM25 term-frequency saturation (default 1.5)')
    .option('--b <value>', 'BM25 length normalization, 0-1 (default 0.75)')
    .option('-f, --format <type>', 'Output format: table, json', 'table')
    .option('--explain', 'Show per-term score contributions')
    .action(async (file: string, query: string, options: RankCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);

      try {
        await handleRank(file, query, options, base);
      } catch (error) {
        handleCommandError(error, base);
      }
    });
}
