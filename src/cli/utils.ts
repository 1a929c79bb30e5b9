import { CommanderError } from 'commander';
import { TesterError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';

export const EXIT_CODES = {
  ok: 0,
  testsFailed: 1,
  /** Bad arguments, a misconfigured harness, or an I/O failure of the runner. */
  fatal: 101,
} as const;

/**
 * Map an argument-parsing error to an exit code. Help and version output
 * surface as CommanderErrors with exit code 0.
 */
export function exitCodeForParseError(error: unknown): number {
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? EXIT_CODES.ok : EXIT_CODES.fatal;
  }
  reportFatalError(error, false);
  return EXIT_CODES.fatal;
}

/**
 * Centralized reporter for errors that abort the run before or around test
 * execution. Prints the stack for unexpected errors when verbose.
 */
export function reportFatalError(error: unknown, verbose: boolean, prefix = 'error'): void {
  const message = error instanceof Error ? error.message : String(error);
  logger.error(`${prefix}: ${message}`);
  if (verbose && error instanceof Error && !(error instanceof TesterError) && error.stack) {
    logger.error(error.stack);
  }
}
