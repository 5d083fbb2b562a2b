#!/usr/bin/env node
/**
 * Job Relevance Ranker CLI
 *
 * Main entry point for the jobrank CLI tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   jobrank --help
 *   jobrank rank jobs.json "senior python engineer" --top-k 5
 *   jobrank inspect jobs.json --terms 20
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, EXIT_CODES } from './base-command.js';
import { registerCommands } from './commands/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 *
 * @returns Configured commander Program instance
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('jobrank')
    .description('Job Relevance Ranker - Rank job postings against a free-text query with BM25')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output');

  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts();
    const baseCommand = new BaseCommand({
      verbose: opts['verbose'] === true,
      quiet: opts['quiet'] === true,
      color: opts['color'] !== false,
    });

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    if (baseCommand.isVerbose() && baseCommand.isQuiet()) {
      baseCommand.error('Cannot use both --verbose and --quiet flags', EXIT_CODES.USAGE_ERROR);
    }
  });

  registerCommands(program);

  program.exitOverride((err) => {
    if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
      process.exit(EXIT_CODES.SUCCESS);
    }
    process.exit(EXIT_CODES.USAGE_ERROR);
  });

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    // Commander and BaseCommand report their own errors
    if (error instanceof Error && error.message) {
      console.error(`Error: ${error.message}`);
    }
    process.exit(EXIT_CODES.ERROR);
  }
}

// Run if executed directly
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(EXIT_CODES.ERROR);
  });
}
