/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - rank: Rank a job file against a query
 * - inspect: Show corpus statistics for a job file
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerRankCommand } from './rank.js';
import { registerInspectCommand } from './inspect.js';

/**
 * Register all CLI commands with the program.
 *
 * @param program - Commander program instance
 */
export function registerCommands(program: Command): void {
  registerRankCommand(program);
  registerInspectCommand(program);
}
