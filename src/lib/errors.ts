/**
 * Fatal error types. Anything thrown as an NtError aborts the current
 * invocation with the carried exit code.
 */

import { ExitCodes, type ExitCode } from "./models.js";

export class NtError extends Error {
  readonly exitCode: ExitCode;

  constructor(
    message: string,
    options: { exitCode?: ExitCode; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "NtError";
    this.exitCode = options.exitCode ?? ExitCodes.FAILURE;
  }
}

/**
 * Malformed command-line arguments.
 */
export class UsageError extends NtError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { exitCode: ExitCodes.USAGE_ERROR, cause: options.cause });
    this.name = "UsageError";
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
