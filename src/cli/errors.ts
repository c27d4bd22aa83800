/**
 * CLI error model.
 * Exit codes: 0=success, 1=validation, 2=runtime
 *
 * @module src/cli/errors
 */

import type { LoadError } from '../config/loader';

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

export type CliErrorCode = 'VALIDATION' | 'RUNTIME';

export class CliError extends Error {
  readonly code: CliErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: CliErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = 'CliError';
  }
}

/**
 * Map a config load failure to a CLI error.
 * Unreadable files are runtime errors; everything else is the user's input.
 */
export function configLoadError(error: LoadError): CliError {
  switch (error.code) {
    case 'NOT_FOUND':
      return new CliError('VALIDATION', error.message, { path: error.path });
    case 'PARSE_ERROR':
      return new CliError('VALIDATION', `${error.message}: ${error.details}`);
    case 'VERSION_MISMATCH':
      return new CliError('VALIDATION', error.message, {
        found: error.found,
        expected: error.expected,
      });
    case 'VALIDATION_ERROR': {
      const issues = error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
      );
      return new CliError(
        'VALIDATION',
        `${error.message}: ${issues.join('; ')}`,
        { issues }
      );
    }
    case 'IO_ERROR':
      return new CliError('RUNTIME', `${error.message} (${error.cause.message})`);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Exit Codes
// ─────────────────────────────────────────────────────────────────────────────

export function exitCodeFor(err: CliError): 1 | 2 {
  return err.code === 'VALIDATION' ? 1 : 2;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Formatting
// ─────────────────────────────────────────────────────────────────────────────

export type ErrorFormatOptions = {
  json?: boolean;
};

/**
 * Format error for output.
 * JSON mode returns { error: { code, message, details } } envelope.
 */
export function formatErrorForOutput(
  err: CliError,
  options: ErrorFormatOptions = {}
): string {
  if (options.json) {
    return JSON.stringify({
      error: {
        code: err.code,
        message: err.message,
        ...(err.details && { details: err.details }),
      },
    });
  }
  return `Error: ${err.message}`;
}
