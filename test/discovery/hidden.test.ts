import { describe, expect, test } from '@jest/globals';
import { isHidden } from '../../src/discovery/hidden';

describe('isHidden', () => {
  test('dot-prefixed names are hidden', () => {
    expect(isHidden('/repo/.git')).toBe(true);
    expect(isHidden('.env')).toBe(true);
  });

  test('only the final component counts', () => {
    expect(isHidden('/repo/.config/settings.yml')).toBe(false);
    expect(isHidden('/repo/src/index.ts')).toBe(false);
  });

  test('. and .. are not hidden', () => {
    expect(isHidden('.')).toBe(false);
    expect(isHidden('..')).toBe(false);
  });
});
