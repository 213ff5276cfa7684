import { describe, it, expect } from '@jest/globals';
import { envNumber } from '../src/utils/env';

describe('envNumber', () => {
  it('parses numeric values', () => {
    expect(envNumber('3', 2)).toBe(3);
    expect(envNumber(' 0.5 ', 1)).toBe(0.5);
  });

  it('falls back on unset, blank and non-numeric values', () => {
    expect(envNumber(undefined, 2)).toBe(2);
    expect(envNumber('', 2)).toBe(2);
    expect(envNumber('two', 2)).toBe(2);
    expect(envNumber('Infinity', 2)).toBe(2);
  });
});
