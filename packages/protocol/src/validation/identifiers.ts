// Identifier rules per equipment category

import type { Identifier } from '../types/common.js';
import { MAX_IDENTIFIER } from '../types/common.js';
import type { EquipmentCategory } from '../types/equipment.js';
import { isPrimeIdentifier } from './primes.js';

/**
 * Default exclusive upper bound for armor identifiers.
 *
 * Armor identifiers must be prime, and there are only 78,498 primes below
 * this bound. Generation slows down as that space fills up and eventually
 * gives up; raise the bound for long-running worlds.
 */
export const DEFAULT_ARMOR_ID_BOUND: Identifier = 1_000_000n;

export type IdentifierRules = {
  /** Exclusive upper bound for armor identifiers */
  armorIdBound: Identifier;
};

/**
 * Check the structural rule of a category, ignoring uniqueness.
 *
 * - weapon: divisible by 2 and 3
 * - armor: prime and below the armor bound
 * - purse, backpack: any value in [0, 2^63)
 */
export function isValidIdentifier(
  category: EquipmentCategory,
  identifier: Identifier,
  rules: IdentifierRules = { armorIdBound: DEFAULT_ARMOR_ID_BOUND }
): boolean {
  if (identifier < 0n || identifier > MAX_IDENTIFIER) return false;

  switch (category) {
    case 'weapon':
      return identifier % 6n === 0n;
    case 'armor':
      return identifier < rules.armorIdBound && isPrimeIdentifier(identifier);
    case 'purse':
    case 'backpack':
      return true;
  }
}
