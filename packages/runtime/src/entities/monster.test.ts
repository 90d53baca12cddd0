// Tests for monsters and anchor points

import { describe, it, expect, beforeEach } from 'vitest';
import { Monster } from './monster.js';
import { Weapon } from '../equipment/weapon.js';
import { Backpack } from '../equipment/backpack.js';
import { IdentityRegistry } from '../identity/index.js';
import { createRng } from '../rng.js';
import {
  IllegalRelationshipTargetError,
  InvalidConstructionArgumentError,
} from '../errors.js';

// --- Test Fixtures ---

let identities: IdentityRegistry;

beforeEach(() => {
  identities = new IdentityRegistry({ rng: createRng(22) });
});

function createWeapon(weight: number): Weapon {
  return new Weapon({ weight, damage: 7 }, { identities });
}

const baseInput = {
  name: 'Grol',
  maxHitPoints: 40,
  damage: 21,
  skin: 'thick',
  anchorCount: 3,
} as const;

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

// --- Tests ---

describe('Monster', () => {
  describe('construction', () => {
    it('should get the requested number of anonymous anchor points', () => {
      const monster = new Monster(baseInput);
      const names = monster.anchorPoints().map((anchor) => anchor.name);

      expect(names).toEqual(['', '', '']);
      expect(monster.hitPoints).toBe(37);
    });

    it('should place its loadout in anchor order', () => {
      const first = createWeapon(10);
      const second = createWeapon(20);

      const monster = new Monster(baseInput, { items: [first, second] });

      expect(monster.items()).toEqual([first, second]);
      expect(monster.anchorPoints()[0].item).toBe(first);
      expect(first.owner).toBe(monster);
    });

    it('should carry exactly its loadout weight by default', () => {
      const monster = new Monster(baseInput, { items: [createWeapon(10), createWeapon(20)] });

      expect(monster.capacity).toBe(30);
      expect(monster.canCarry(0)).toBe(true);
      expect(monster.canCarry(1)).toBe(false);
    });

    it('should take a larger capacity', () => {
      const monster = new Monster({ ...baseInput, capacity: 100 }, { items: [createWeapon(10)] });
      expect(monster.capacity).toBe(100);
    });

    it('should reject a capacity below its loadout', () => {
      const error = captureError(
        () => new Monster({ ...baseInput, capacity: 5 }, { items: [createWeapon(10)] })
      );
      expect(error).toBeInstanceOf(InvalidConstructionArgumentError);
      expect(error).toMatchObject({ field: 'capacity' });
    });

    it('should reject a loadout larger than its anchor points', () => {
      const items = [createWeapon(1), createWeapon(1), createWeapon(1), createWeapon(1)];
      const error = captureError(() => new Monster(baseInput, { items }));

      expect(error).toMatchObject({ field: 'anchorCount' });
      expect(items[0].owner).toBeNull();
    });

    it('should reject protection above its skin maximum', () => {
      const error = captureError(() => new Monster({ ...baseInput, currentProtection: 21 }));
      expect(error).toMatchObject({ field: 'currentProtection' });
    });

    it('should reject an invalid name', () => {
      expect(() => new Monster({ ...baseInput, name: 'grol' })).toThrow(
        InvalidConstructionArgumentError
      );
    });
  });

  describe('protection and damage', () => {
    it('should default to the skin maximum', () => {
      const monster = new Monster(baseInput);

      expect(monster.maxProtection).toBe(20);
      expect(monster.protection).toBe(20);
      expect(monster.effectiveProtection()).toBe(20);
    });

    it('should update protection within the skin maximum', () => {
      const monster = new Monster(baseInput);
      monster.setCurrentProtection(5);

      expect(monster.currentProtection).toBe(5);
      expect(() => monster.setCurrentProtection(21)).toThrow(InvalidConstructionArgumentError);
    });

    it('should update damage in steps of 7', () => {
      const monster = new Monster(baseInput);
      monster.setDamage(49);

      expect(monster.damage).toBe(49);
      expect(() => monster.setDamage(50)).toThrow(InvalidConstructionArgumentError);
      expect(monster.damage).toBe(49);
    });
  });

  describe('anchor points', () => {
    it('should accept any item on any anchor point', () => {
      const monster = new Monster({ ...baseInput, capacity: 100 });
      const backpack = new Backpack({ weight: 5, capacity: 10 }, { identities });

      expect(monster.canAccept(backpack)).toBe(true);
      backpack.setOwner(monster);
      expect(monster.anchorPointOf(backpack)).toBe(monster.anchorPoints()[0]);
    });

    it('should report free anchor points', () => {
      const monster = new Monster({ ...baseInput, anchorCount: 1, capacity: 100 });
      expect(monster.hasFreeAnchorPoint()).toBe(true);

      createWeapon(1).setOwner(monster);
      expect(monster.hasFreeAnchorPoint()).toBe(false);
    });

    it('should grow anonymous anchor points', () => {
      const monster = new Monster({ ...baseInput, anchorCount: 0, capacity: 100 });
      const anchor = monster.addAnchorPoint();

      expect(anchor.name).toBe('');
      expect(anchor.holder).toBe(monster);
      expect(monster.anchorPoints()).toEqual([anchor]);
    });

    it('should refuse a duplicate anchor point name', () => {
      const monster = new Monster(baseInput);
      monster.addAnchorPoint('Tail');

      expect(() => monster.addAnchorPoint('tail')).toThrow(IllegalRelationshipTargetError);
      expect(monster.anchorPoint('TAIL')?.name).toBe('Tail');
    });

    it('should sum the weight and value of its items', () => {
      const monster = new Monster(baseInput, { items: [createWeapon(10), createWeapon(20)] });

      expect(monster.totalWeight()).toBe(30);
      expect(monster.totalValue()).toBe(28);
    });
  });
});
