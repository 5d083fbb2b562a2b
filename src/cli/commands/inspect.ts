/**
 * Inspect Command
 *
 * Fits a job file and prints corpus statistics: document count, average
 * projected length, vocabulary size and the rarest terms.
 *
 * @module cli/commands/inspect
 */

import type { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { formatCorpusStats } from '../formatters/results.js';
import { describeCorpus, fit } from '../../ranking/corpus.js';
import { loadJobRecords } from '../../storage/jobs.js';
import { handleCommandError, parseCountFlag, parseFormat } from './options.js';

const DEFAULT_TERM_COUNT = 10;

/**
 * Raw options for the inspect command.
 */
export interface InspectCommandOptions {
  terms?: string;
  format?: string;
}

/**
 * Handle the inspect command.
 */
export async function handleInspect(
  file: string,
  options: InspectCommandOptions,
  base: BaseCommand
): Promise<void> {
  const termCount = parseCountFlag(options.terms, '--terms') ?? DEFAULT_TERM_COUNT;
  const format = parseFormat(options.format);

  base.debug(`Loading jobs from ${file}`);
  const stats = describeCorpus(fit(await loadJobRecords(file)), termCount);

  if (format === 'json') {
    base.json(stats);
    return;
  }

  base.section(`Corpus: ${file}`);
  console.log(formatCorpusStats(stats));
}

/**
 * Register the inspect command.
 *
 * @param program - Main commander program
 */
export function registerInspectCommand(program: Command): void {
  program
    .command('inspect <file>')
    .description('Show index statistics for a job file')
    .option('-t, --terms <count>', 'Number of rarest terms to list', String(DEFAULT_TERM_COUNT))
    .option('-f, --format <type>', 'Output format: table, json', 'table')
    .action(async (file: string, options: InspectCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);

      try {
        await handleInspect(file, options, base);
      } catch (error) {
        handleCommandError(error, base);
      }
    });
}
