// Tests for identifier rules

import { describe, it, expect } from 'vitest';
import { isValidIdentifier } from './identifiers.js';
import { MAX_IDENTIFIER } from '../types/common.js';

describe('isValidIdentifier', () => {
  it('requires weapon identifiers divisible by 2 and 3', () => {
    expect(isValidIdentifier('weapon', 12n)).toBe(true);
    expect(isValidIdentifier('weapon', 10n)).toBe(false);
    expect(isValidIdentifier('weapon', 9n)).toBe(false);
  });

  it('requires armor identifiers to be prime', () => {
    expect(isValidIdentifier('armor', 7n)).toBe(true);
    expect(isValidIdentifier('armor', 9n)).toBe(false);
  });

  it('bounds armor identifiers', () => {
    expect(isValidIdentifier('armor', 1_000_003n)).toBe(false);
    expect(isValidIdentifier('armor', 1_000_003n, { armorIdBound: 2_000_000n })).toBe(true);
  });

  it('accepts any non-negative 63-bit purse or backpack identifier', () => {
    expect(isValidIdentifier('purse', 0n)).toBe(true);
    expect(isValidIdentifier('backpack', MAX_IDENTIFIER)).toBe(true);
  });

  it('rejects negative and oversized identifiers for every category', () => {
    for (const category of ['weapon', 'armor', 'purse', 'backpack'] as const) {
      expect(isValidIdentifier(category, -6n)).toBe(false);
      expect(isValidIdentifier(category, MAX_IDENTIFIER + 1n)).toBe(false);
    }
  });
});
