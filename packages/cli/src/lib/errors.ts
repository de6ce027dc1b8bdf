/**
 * CLI error handling and exit code mapping
 */

/**
 * Standard exit codes
 */
export const EXIT_CODE = {
  /** Success */
  SUCCESS: 0,
  /** Usage, validation, I/O or execution error */
  ERROR: 1,
  /** Script, category or body not found */
  NOT_FOUND: 2,
  /** Transaction rolled back */
  ROLLED_BACK: 3,
} as const;

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? EXIT_CODE.ERROR;
  }
}

const NOT_FOUND_ERRORS = new Set(["NotFoundError", "ScriptNotFoundError", "BodyNotFoundError"]);

/**
 * Map SDK errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/IO/execution/unknown error
 * - 2: script, category or body not found
 * - 3: transaction rolled back
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof Error) {
    const name = error.name || error.constructor.name;

    if (NOT_FOUND_ERRORS.has(name)) {
      return EXIT_CODE.NOT_FOUND;
    }
  }

  return EXIT_CODE.ERROR;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      const cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
      message += `\n  Cause: ${cause}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
