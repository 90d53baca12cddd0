// Narrowing by equipment category

import type { Equipment } from './equipment.js';
import type { Weapon } from './weapon.js';
import type { Armor } from './armor.js';
import type { Purse } from './purse.js';
import type { Backpack } from './backpack.js';

export function isWeapon(item: Equipment | null): item is Weapon {
  return item?.category === 'weapon';
}

export function isArmor(item: Equipment | null): item is Armor {
  return item?.category === 'armor';
}

export function isPurse(item: Equipment | null): item is Purse {
  return item?.category === 'purse';
}

export function isBackpack(item: Equipment | null): item is Backpack {
  return item?.category === 'backpack';
}
