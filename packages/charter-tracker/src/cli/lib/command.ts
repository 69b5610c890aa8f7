/**
 * Command Execution Helpers
 *
 * Exit codes and the error boundary shared by all commands.
 *
 * @module cli/lib/command
 */

import { ConfigurationError } from '../../core/errors.js';
import { createLogger } from '../../core/utils/logger.js';
import { getGlobalContext, type GlobalContext } from './context.js';
import { formatJson, printError, printOutput } from './output.js';

const log = createLogger({ module: 'cli' });

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  USER_CANCELLED: 10,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// Error Boundary
// ============================================================================

/**
 * Run a command body with the global context.
 *
 * The returned exit code is set on process.exitCode; thrown errors are
 * printed (as JSON in --json mode) and mapped to an error exit code. The
 * time since the context was created is logged at debug level.
 */
export async function runCommand(
  body: (context: GlobalContext) => Promise<ExitCode | void>
): Promise<void> {
  const context = getGlobalContext();

  try {
    const code = await body(context);
    process.exitCode = code ?? EXIT_CODES.SUCCESS;
  } catch (error) {
    const message =
      error instanceof ConfigurationError
        ? error.getSummary()
        : error instanceof Error
          ? error.message
          : String(error);

    if (context.config.json) {
      printOutput(formatJson({ error: message }));
    } else {
      printError(message);
    }

    process.exitCode =
      error instanceof ConfigurationError ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.ERRORS;
  }

  log.debug('Command finished', {
    exitCode: process.exitCode,
    durationMs: Date.now() - context.startTime,
  });
}

/**
 * Parse a positive integer option value
 *
 * @throws Error when the value is not a positive integer
 */
export function parsePositiveInt(value: string): number {
  const num = Number(value);
  if (!Number.isInteger(num) || num < 1) {
    throw new Error(`Expected a positive integer, got "${value}"`);
  }
  return num;
}
