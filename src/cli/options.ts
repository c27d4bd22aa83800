/**
 * Option value parsing and validation.
 * Values arrive from Commander as strings; these turn them into numbers or
 * throw a VALIDATION CliError naming the flag.
 *
 * @module src/cli/options
 */

import { CliError } from './errors';

const INTEGER_REGEX = /^\d+$/;
const DECIMAL_REGEX = /^(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parse and validate a non-negative integer option.
 * Throws CliError on invalid input.
 */
export function parseNonNegativeInt(name: string, value: unknown): number {
  if (value === undefined || value === null) {
    throw new CliError('VALIDATION', `--${name} requires a value`);
  }
  const strValue = String(value).trim();
  if (!INTEGER_REGEX.test(strValue)) {
    throw new CliError(
      'VALIDATION',
      `--${name} must be a non-negative integer, got: ${strValue}`
    );
  }
  return Number.parseInt(strValue, 10);
}

/**
 * Parse and validate a positive integer option.
 * Throws CliError on invalid input.
 */
export function parsePositiveInt(name: string, value: unknown): number {
  const num = parseNonNegativeInt(name, value);
  if (num < 1) {
    throw new CliError('VALIDATION', `--${name} must be positive, got: ${num}`);
  }
  return num;
}

/**
 * Parse optional non-negative integer, returning undefined if not provided.
 */
export function parseOptionalNonNegativeInt(
  name: string,
  value: unknown
): number | undefined {
  if (value === undefined || value === null) {
    return;
  }
  return parseNonNegativeInt(name, value);
}

/**
 * Parse optional non-negative decimal, returning undefined if not provided.
 */
export function parseOptionalNonNegativeFloat(
  name: string,
  value: unknown
): number | undefined {
  if (value === undefined || value === null) {
    return;
  }
  const strValue = String(value).trim();
  if (!DECIMAL_REGEX.test(strValue)) {
    throw new CliError(
      'VALIDATION',
      `--${name} must be a non-negative number, got: ${strValue}`
    );
  }
  return Number.parseFloat(strValue);
}

/**
 * Read an optional boolean flag from Commander opts.
 * Returns undefined when the flag was not given, so config defaults apply.
 */
export function optionalFlag(value: unknown): boolean | undefined {
  return value === undefined ? undefined : Boolean(value);
}
