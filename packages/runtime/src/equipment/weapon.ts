// Weapon - adds its damage to the attack power of the hero holding it

import { WEAPON_VALUE_PER_DAMAGE, weaponInputSchema, type WeaponInput } from '@armory/protocol';
import { parseInput } from '../validation.js';
import { Equipment, type EquipmentOptions } from './equipment.js';

export class Weapon extends Equipment {
  declare readonly category: 'weapon';

  /** Positive multiple of 7, at most 100 */
  readonly damage: number;

  constructor(input: WeaponInput, options: EquipmentOptions = {}) {
    const parsed = parseInput(weaponInputSchema, input);
    super('weapon', parsed, options);
    this.damage = parsed.damage;
  }

  currentValue(): number {
    return this.damage * WEAPON_VALUE_PER_DAMAGE;
  }
}
