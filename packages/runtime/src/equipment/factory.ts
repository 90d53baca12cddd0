// Equipment factory - builds any category from a tagged input

import type { EquipmentInput } from '@armory/protocol';
import type { EquipmentOptions } from './equipment.js';
import { Weapon } from './weapon.js';
import { Armor } from './armor.js';
import { Purse } from './purse.js';
import { Backpack } from './backpack.js';

export type AnyEquipment = Weapon | Armor | Purse | Backpack;

export function createEquipment(input: EquipmentInput, options: EquipmentOptions = {}): AnyEquipment {
  switch (input.category) {
    case 'weapon':
      return new Weapon(input, options);
    case 'armor':
      return new Armor(input, options);
    case 'purse':
      return new Purse(input, options);
    case 'backpack':
      return new Backpack(input, options);
  }
}
