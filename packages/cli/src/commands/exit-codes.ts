/**
 * Process exit codes and the error type commands throw to choose one.
 *
 * @module cli/commands/exit-codes
 */

import { ToolNotFoundError, ToolValidationError } from "@mcpml/core";

// =============================================================================
// Exit Code Constants
// =============================================================================

export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Usage/argument error */
  USAGE_ERROR: 2,
  /** Interrupted by signal (128 + SIGINT=2) */
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// =============================================================================
// CLI Errors
// =============================================================================

/**
 * A failure the CLI reports as a message, without a stack trace.
 */
export class CliError extends Error {
  readonly exitCode: ExitCode;
  /** Extra lines printed under the message */
  readonly details: string[];

  constructor(message: string, exitCode: ExitCode = EXIT_CODES.ERROR, details: string[] = []) {
    super(message);
    this.name = "CliError";
    this.exitCode = exitCode;
    this.details = details;
  }
}

export function usageError(message: string, details: string[] = []): CliError {
  return new CliError(message, EXIT_CODES.USAGE_ERROR, details);
}

/**
 * Map a thrown value to an exit code. Bad tool input is a usage error.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof CliError) {
    return error.exitCode;
  }
  if (error instanceof ToolValidationError || error instanceof ToolNotFoundError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  if (error instanceof Error && error.name === "AbortError") {
    return EXIT_CODES.INTERRUPTED;
  }
  return EXIT_CODES.ERROR;
}
