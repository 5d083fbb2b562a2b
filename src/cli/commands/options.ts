/**
 * Shared Command Options
 *
 * Parsing of numeric/format flags and the mapping from thrown errors to
 * exit codes, shared by the rank and inspect commands.
 *
 * @module cli/commands/options
 */

import { z } from 'zod';
import { type BaseCommand, EXIT_CODES } from '../base-command.js';
import { InvalidRankingParamsError } from '../../ranking/params.js';
import { JobFileError } from '../../storage/jobs.js';
import { TopKSchema } from '../../schemas/ranking.js';

// ============================================================================
// Types
// ============================================================================

export type OutputFormat = 'table' | 'json';

const OutputFormatSchema = z.enum(['table', 'json']);

const NumberFlagSchema = z.number().finite();

/**
 * Invalid flag value or combination.
 */
export class CliUsageError extends Error {
  constructor(
    message: string,
    public readonly flag: string
  ) {
    super(message);
    this.name = 'CliUsageError';
  }
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse an optional numeric flag.
 *
 * @param value - Raw flag value from commander
 * @param flag - Flag name for error messages
 * @returns The number, or undefined when the flag was not given
 * @throws CliUsageError if the value is not a finite number
 */
export function parseNumberFlag(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;

  const parsed = NumberFlagSchema.safeParse(value.trim() === '' ? Number.NaN : Number(value));
  if (!parsed.success) {
    throw new CliUsageError(`${flag} must be a number (got "${value}")`, flag);
  }
  return parsed.data;
}

/**
 * Parse an optional result-count flag (positive integer).
 *
 * @throws CliUsageError if the value is not a positive integer
 */
export function parseCountFlag(value: string | undefined, flag: string): number | undefined {
  const count = parseNumberFlag(value, flag);
  if (count === undefined) return undefined;

  const parsed = TopKSchema.safeParse(count);
  if (!parsed.success) {
    throw new CliUsageError(`${flag} must be a positive integer (got "${value}")`, flag);
  }
  return parsed.data;
}

/**
 * Parse the --format flag.
 *
 * @throws CliUsageError for anything other than table or json
 */
export function parseFormat(value: string | undefined): OutputFormat {
  const parsed = OutputFormatSchema.safeParse(value ?? 'table');
  if (!parsed.success) {
    throw new CliUsageError(`--format must be one of: table, json (got "${value}")`, '--format');
  }
  return parsed.data;
}

// ============================================================================
// Error Handling
// ============================================================================

/**
 * Report a command failure and exit with the matching code.
 * Values that are not errors are rethrown untouched.
 */
export function handleCommandError(error: unknown, base: BaseCommand): never {
  if (error instanceof CliUsageError || error instanceof InvalidRankingParamsError) {
    base.error(error.message, EXIT_CODES.USAGE_ERROR);
  }
  if (error instanceof JobFileError) {
    base.error(
      error.message,
      error.reason === 'not_found' ? EXIT_CODES.NOT_FOUND : EXIT_CODES.ERROR
    );
  }
  if (error instanceof Error) {
    base.error(error.message, error);
  }
  throw error;
}
