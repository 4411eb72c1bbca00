// CLI error handling utilities

import { AcceptanceError, ConfigurationError } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigurationError) {
    const field = error.field ? ` (field: ${error.field})` : '';
    return `Configuration Error${field}: ${error.message}`;
  }

  if (error instanceof AcceptanceError) {
    return `Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

/**
 * Exit code for an error that aborted the run
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof AcceptanceError ? error.exitCode : 1;
}

/**
 * Handle CLI errors with proper exit codes
 */
export function handleError(error: unknown): never {
  console.error(`\n!!  ${formatError(error)}\n`);
  if (error instanceof Error && !(error instanceof AcceptanceError)) {
    getLogger().exception(error);
  }
  process.exit(exitCodeFor(error));
}
