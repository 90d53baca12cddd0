// Tests for construction schemas

import { describe, it, expect } from 'vitest';
import {
  weaponInputSchema,
  armorInputSchema,
  purseInputSchema,
  backpackInputSchema,
} from './equipment.js';
import { heroInputSchema, monsterInputSchema } from './entities.js';

describe('equipment schemas', () => {
  it('fills weapon defaults', () => {
    const result = weaponInputSchema.parse({ weight: 10, damage: 49 });
    expect(result).toEqual({ weight: 10, baseValue: 0, shiny: true, damage: 49 });
  });

  it('rejects damage that is not a multiple of 7', () => {
    const result = weaponInputSchema.safeParse({ weight: 10, damage: 50 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['damage']);
      expect(result.error.issues[0]?.message).toBe('damage must be a multiple of 7');
    }
  });

  it('rejects negative weight', () => {
    const result = weaponInputSchema.safeParse({ weight: -1, damage: 7 });
    expect(result.success).toBe(false);
  });

  it('bounds weapon base value at 200', () => {
    expect(weaponInputSchema.safeParse({ weight: 1, damage: 7, baseValue: 200 }).success).toBe(true);
    expect(weaponInputSchema.safeParse({ weight: 1, damage: 7, baseValue: 201 }).success).toBe(false);
  });

  it('rejects armor protection above the type maximum', () => {
    const result = armorInputSchema.safeParse({ weight: 10, type: 'bronze', currentProtection: 95 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['currentProtection']);
    }
  });

  it('accepts armor protection at the type maximum', () => {
    const result = armorInputSchema.parse({ weight: 10, type: 'tin', currentProtection: 70 });
    expect(result.currentProtection).toBe(70);
  });

  it('rejects purse contents above capacity', () => {
    const result = purseInputSchema.safeParse({ weight: 1, capacity: 10, contents: 20 });
    expect(result.success).toBe(false);
  });

  it('fills purse defaults', () => {
    const result = purseInputSchema.parse({ weight: 1, capacity: 10 });
    expect(result).toEqual({ weight: 1, capacity: 10, contents: 0, shiny: true });
  });

  it('bounds backpack base value at 500', () => {
    expect(backpackInputSchema.safeParse({ weight: 1, capacity: 10, baseValue: 501 }).success).toBe(false);
  });
});

describe('entity schemas', () => {
  it('defaults hero protection to 10', () => {
    const result = heroInputSchema.parse({ name: 'Ben', maxHitPoints: 100, strength: 4 });
    expect(result.protection).toBe(10);
  });

  it('rejects invalid hero names', () => {
    const result = heroInputSchema.safeParse({ name: 'ben', maxHitPoints: 100, strength: 4 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['name']);
    }
  });

  it('rejects non-positive strength', () => {
    expect(heroInputSchema.safeParse({ name: 'Ben', maxHitPoints: 100, strength: 0 }).success).toBe(false);
  });

  it('rejects monster protection above the skin maximum', () => {
    const result = monsterInputSchema.safeParse({
      name: 'Tom',
      maxHitPoints: 70,
      damage: 49,
      skin: 'tough',
      currentProtection: 11,
    });
    expect(result.success).toBe(false);
  });

  it('rejects monster damage above 100', () => {
    const result = monsterInputSchema.safeParse({ name: 'Tom', maxHitPoints: 70, damage: 105, skin: 'scaly' });
    expect(result.success).toBe(false);
  });
});
