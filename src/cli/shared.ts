/**
 * Defaults and exit-code mapping shared by the CLI commands.
 */
import { InvalidArgumentError } from 'commander';
import { isFatalError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_SOURCE_DIR = '~/Downloads';
export const DEFAULT_UNDO_DIR = '~/.downloads-tidy/undos';

export const ExitCode = {
  SUCCESS: 0,
  /** Some moves or undo steps failed */
  ITEM_ERRORS: 1,
  /** A precondition failed before anything was touched */
  FATAL: 2,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Log a command failure and pick its exit code.
 */
export function reportCommandError(error: unknown): ExitCodeValue {
  logger.error(errorMessage(error));
  return isFatalError(error) ? ExitCode.FATAL : ExitCode.ITEM_ERRORS;
}

/**
 * Run a command body and exit with its code when non-zero.
 */
export async function runCommand(body: () => Promise<ExitCodeValue>): Promise<void> {
  let code: ExitCodeValue;
  try {
    code = await body();
  } catch (error) {
    code = reportCommandError(error);
  }
  if (code !== ExitCode.SUCCESS) {
    process.exit(code);
  }
}

/**
 * Commander argument parser for counts and day thresholds.
 */
export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}
