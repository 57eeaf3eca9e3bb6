/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import { isLabelbookError } from '../core/errors.js';

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'VALIDATION_FAILED'
  | 'IO_FAILED'
  | 'CONFIG_INVALID'
  | 'UNKNOWN';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `labelbook help <command>` for usage information.',
  VALIDATION_FAILED: 'Check the input values against the documented ranges.',
  IO_FAILED: 'Check that the path exists and is writable, or choose another with --out.',
  CONFIG_INVALID: 'Fix the configuration file or pass a different one with --config.',
  UNKNOWN: 'Re-run with --json for structured error details.',
};

/** Process exit codes per error class. */
export const EXIT_CODES: Record<CliErrorCode, number> = {
  INVALID_ARGUMENT: 2,
  VALIDATION_FAILED: 3,
  IO_FAILED: 4,
  CONFIG_INVALID: 5,
  UNKNOWN: 1,
};

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

/**
 * Map anything thrown during a command onto a CliError.
 */
export function classifyError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }
  if (isLabelbookError(error)) {
    const details = error.toJSON().details;
    switch (error.code) {
      case 'VALIDATION_ERROR':
        return createError('VALIDATION_FAILED', error.message, details);
      case 'IO_ERROR':
        return createError('IO_FAILED', error.message, details);
      case 'CONFIGURATION_ERROR':
        return createError('CONFIG_INVALID', error.message, details);
    }
  }
  if (error instanceof Error) {
    return createError('UNKNOWN', error.message);
  }
  return createError('UNKNOWN', String(error));
}

export function formatError(error: unknown): string {
  const cliError = classifyError(error);
  const lines = [`Error [${cliError.code}]: ${cliError.message}`];
  if (cliError.suggestion) {
    lines.push('', `Suggestion: ${cliError.suggestion}`);
  }
  return lines.join('\n');
}

export function formatErrorJson(error: unknown): string {
  const cliError = classifyError(error);
  return JSON.stringify(
    {
      error: {
        code: cliError.code,
        message: cliError.message,
        suggestion: cliError.suggestion,
        details: cliError.details,
      },
    },
    null,
    2,
  );
}

export function getExitCode(error: unknown): number {
  return EXIT_CODES[classifyError(error).code];
}
