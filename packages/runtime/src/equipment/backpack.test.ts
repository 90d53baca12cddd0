// Tests for backpacks

import { describe, it, expect, beforeEach } from 'vitest';
import { Backpack } from './backpack.js';
import { Weapon } from './weapon.js';
import { Purse } from './purse.js';
import { Hero } from '../entities/hero.js';
import { IdentityRegistry } from '../identity/index.js';
import { createRng, type Rng } from '../rng.js';
import {
  IllegalRelationshipTargetError,
  InconsistentRelationshipStateError,
} from '../errors.js';

// --- Test Fixtures ---

let identities: IdentityRegistry;

beforeEach(() => {
  identities = new IdentityRegistry({ rng: createRng(13) });
});

function createBackpack(capacity: number, weight = 10, baseValue = 0): Backpack {
  return new Backpack({ weight, capacity, baseValue }, { identities });
}

function createWeapon(weight: number, damage = 7): Weapon {
  return new Weapon({ weight, damage }, { identities });
}

// --- Tests ---

describe('Backpack', () => {
  describe('weight and value', () => {
    it('should add up nested contents', () => {
      const backpack = createBackpack(1000, 10, 40);
      const weapon = createWeapon(20, 14);
      const purse = new Purse({ weight: 5, capacity: 10, contents: 2 }, { identities });
      const inner = createBackpack(200, 3, 5);
      const innerWeapon = createWeapon(7, 7);

      innerWeapon.setBackpack(inner);
      weapon.setBackpack(backpack);
      purse.setBackpack(backpack);
      inner.setBackpack(backpack);

      expect(inner.totalWeight()).toBe(10);
      expect(backpack.contentWeight()).toBe(135);
      expect(backpack.totalWeight()).toBe(145);
      // 40 + 28 + 2 + (5 + 14)
      expect(backpack.totalValue()).toBe(89);
      expect(backpack.currentValue()).toBe(40);
    });
  });

  describe('setBackpack', () => {
    it('should link both sides', () => {
      const backpack = createBackpack(100);
      const weapon = createWeapon(10);

      weapon.setBackpack(backpack);

      expect(weapon.container).toBe(backpack);
      expect(backpack.has(weapon)).toBe(true);
      expect(backpack.items()).toEqual([weapon]);
    });

    it('should unlink both sides with null', () => {
      const backpack = createBackpack(100);
      const weapon = createWeapon(10);
      weapon.setBackpack(backpack);

      weapon.setBackpack(null);

      expect(weapon.container).toBeNull();
      expect(backpack.has(weapon)).toBe(false);
      expect(backpack.containsId(weapon.identifier)).toBe(false);
    });

    it('should move between backpacks', () => {
      const first = createBackpack(100);
      const second = createBackpack(100);
      const weapon = createWeapon(10);
      weapon.setBackpack(first);

      weapon.setBackpack(second);

      expect(first.has(weapon)).toBe(false);
      expect(second.has(weapon)).toBe(true);
    });

    it('should refuse items over capacity and change nothing', () => {
      const backpack = createBackpack(50);
      const first = createWeapon(30);
      const second = createWeapon(25);
      first.setBackpack(backpack);

      expect(() => second.setBackpack(backpack)).toThrow(IllegalRelationshipTargetError);
      expect(second.container).toBeNull();
      expect(backpack.items()).toEqual([first]);
    });

    it('should accept an item filling it exactly', () => {
      const backpack = createBackpack(50);
      createWeapon(30).setBackpack(backpack);
      const second = createWeapon(20);

      expect(backpack.canAccept(second)).toBe(true);
      second.setBackpack(backpack);
      expect(backpack.contentWeight()).toBe(50);
    });

    it('should refuse what an enclosing backpack has no room for', () => {
      const outer = createBackpack(20);
      const inner = createBackpack(100, 5);
      inner.setBackpack(outer);
      const weapon = createWeapon(16);

      expect(inner.acceptanceFailure(weapon)).toBe('adding weight 16 would exceed capacity 20');
      expect(() => weapon.setBackpack(inner)).toThrow(IllegalRelationshipTargetError);
    });

    it('should let an item move deeper within the same backpack', () => {
      const outer = createBackpack(20);
      const inner = createBackpack(100, 5);
      const weapon = createWeapon(15);
      inner.setBackpack(outer);
      weapon.setBackpack(outer);

      weapon.setBackpack(inner);

      expect(inner.has(weapon)).toBe(true);
      expect(outer.contentWeight()).toBe(20);
    });

    it('should not contain itself', () => {
      const backpack = createBackpack(100);

      expect(backpack.acceptanceFailure(backpack)).toBe('a backpack cannot contain itself');
      expect(() => backpack.setBackpack(backpack)).toThrow(IllegalRelationshipTargetError);
    });

    it('should not contain a backpack it is inside of', () => {
      const outer = createBackpack(100);
      const inner = createBackpack(50, 5);
      inner.setBackpack(outer);

      expect(() => outer.setBackpack(inner)).toThrow(IllegalRelationshipTargetError);
      expect(outer.container).toBeNull();
      expect(inner.container).toBe(outer);
    });

    it('should refuse items once destroyed', () => {
      const backpack = createBackpack(100);
      backpack.destroy();

      expect(backpack.acceptanceFailure(createWeapon(1))).toBe('backpack is destroyed');
    });

    it('should refuse what its owner cannot carry', () => {
      const hero = new Hero({ name: 'Alden', maxHitPoints: 50, strength: 1 });
      const backpack = createBackpack(100, 5);
      backpack.setOwner(hero);
      const weapon = createWeapon(20);

      expect(hero.capacity).toBe(20);
      expect(backpack.acceptanceFailure(weapon)).toBe('Alden cannot carry weight 20 more');
    });

    it('should take items from its owner without counting them twice', () => {
      const hero = new Hero({ name: 'Alden', maxHitPoints: 50, strength: 1 });
      const backpack = createBackpack(100, 5);
      const weapon = createWeapon(15);
      backpack.setOwner(hero);
      weapon.setOwner(hero);

      weapon.setBackpack(backpack);

      expect(hero.hasItem(weapon)).toBe(false);
      expect(weapon.owner).toBe(hero);
      expect(hero.totalWeight()).toBe(20);
    });
  });

  describe('destroy', () => {
    it('should empty out its contents without destroying them', () => {
      const backpack = createBackpack(100);
      const weapon = createWeapon(10);
      weapon.setBackpack(backpack);

      backpack.destroy();

      expect(backpack.isDestroyed()).toBe(true);
      expect(backpack.items()).toEqual([]);
      expect(weapon.container).toBeNull();
      expect(weapon.condition).toBe('good');
    });
  });

  describe('identifier index', () => {
    it('should group items sharing an identifier across categories', () => {
      // Every draw is 0, valid for weapons, purses and backpacks
      const zeros: Rng = { next: () => 0 };
      const sameIds = new IdentityRegistry({ rng: zeros, maxAttempts: 1 });
      const backpack = new Backpack({ weight: 1, capacity: 100 }, { identities: sameIds });
      const weapon = new Weapon({ weight: 1, damage: 7 }, { identities: sameIds });
      const purse = new Purse({ weight: 1, capacity: 0 }, { identities: sameIds });
      weapon.setBackpack(backpack);
      purse.setBackpack(backpack);

      expect(weapon.identifier).toBe(0n);
      expect(purse.identifier).toBe(0n);
      expect(backpack.countWithId(0n)).toBe(2);
      expect(backpack.itemWithId(0n, 1)).toBe(weapon);
      expect(backpack.itemWithId(0n, 2)).toBe(purse);
      expect(backpack.itemWithId(0n, 3)).toBeNull();
      expect(backpack.itemsWithId(0n)).toEqual([weapon, purse]);
      expect(backpack.containsId(1n)).toBe(false);
    });
  });

  describe('internal primitives', () => {
    it('should refuse to index an item that does not point to it', () => {
      const backpack = createBackpack(100);
      expect(() => backpack.addItem(createWeapon(1))).toThrow(InconsistentRelationshipStateError);
    });

    it('should refuse to drop an item it does not hold', () => {
      const backpack = createBackpack(100);
      expect(() => backpack.removeItem(createWeapon(1))).toThrow(
        InconsistentRelationshipStateError
      );
    });

    it('should refuse to drop an item that still points to it', () => {
      const backpack = createBackpack(100);
      const weapon = createWeapon(1);
      weapon.setBackpack(backpack);

      expect(() => backpack.removeItem(weapon)).toThrow(InconsistentRelationshipStateError);
      expect(backpack.has(weapon)).toBe(true);
    });
  });
});
