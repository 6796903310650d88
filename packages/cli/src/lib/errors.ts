/**
 * CLI error handling and exit code mapping
 */

import { CalselError, NoSuitableCalibrationError } from "@calsel/sdk";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;
  /** Already written to stderr (by commander); print nothing more */
  reported: boolean;

  constructor(
    message: string,
    options?: { exitCode?: number; cause?: unknown; reported?: boolean }
  ) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
    this.reported = options?.reported ?? false;
  }
}

/**
 * Map SDK errors to CLI exit codes
 * - 0: success
 * - 1: usage/rule syntax/validation/IO/unknown error
 * - 2: no suitable calibration
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof NoSuitableCalibrationError) {
    return 2;
  }

  return 1;
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

    if (verbose && error instanceof CalselError) {
      message += ` [${error.code}]`;
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
