import { describe, expect, test } from '@jest/globals';
import { CliError } from '../../src/cli/errors';
import {
  optionalFlag,
  parseNonNegativeInt,
  parseOptionalNonNegativeFloat,
  parseOptionalNonNegativeInt,
  parsePositiveInt,
} from '../../src/cli/options';

describe('parseNonNegativeInt', () => {
  test('accepts digits', () => {
    expect(parseNonNegativeInt('depth', '0')).toBe(0);
    expect(parseNonNegativeInt('depth', ' 12 ')).toBe(12);
  });

  test.each(['-1', '1.5', 'abc', ''])('rejects %p', (value) => {
    expect(() => parseNonNegativeInt('depth', value)).toThrow(CliError);
  });

  test('names the flag', () => {
    expect(() => parseNonNegativeInt('depth', 'x')).toThrow(
      '--depth must be a non-negative integer, got: x'
    );
  });
});

describe('parsePositiveInt', () => {
  test('rejects zero', () => {
    expect(() => parsePositiveInt('workers', '0')).toThrow(
      '--workers must be positive, got: 0'
    );
  });

  test('accepts one', () => {
    expect(parsePositiveInt('workers', '1')).toBe(1);
  });
});

describe('optional parsers', () => {
  test('undefined passes through', () => {
    expect(parseOptionalNonNegativeInt('depth', undefined)).toBeUndefined();
    expect(parseOptionalNonNegativeFloat('max-size', undefined)).toBeUndefined();
  });

  test('decimals', () => {
    expect(parseOptionalNonNegativeFloat('max-size', '0.5')).toBe(0.5);
    expect(parseOptionalNonNegativeFloat('max-size', '.25')).toBe(0.25);
    expect(parseOptionalNonNegativeFloat('max-size', '3')).toBe(3);
  });

  test('rejects negative sizes', () => {
    expect(() => parseOptionalNonNegativeFloat('max-size', '-2')).toThrow(
      '--max-size must be a non-negative number, got: -2'
    );
  });
});

describe('optionalFlag', () => {
  test('absent stays undefined', () => {
    expect(optionalFlag(undefined)).toBeUndefined();
    expect(optionalFlag(true)).toBe(true);
    expect(optionalFlag(false)).toBe(false);
  });
});
