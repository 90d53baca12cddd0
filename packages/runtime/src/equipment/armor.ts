// Armor - raises the protection of the hero wearing it on the body

import {
  ARMOR_TYPES,
  armorInputSchema,
  type ArmorInput,
  type ArmorType,
} from '@armory/protocol';
import { z } from 'zod';
import { parseInput } from '../validation.js';
import { Equipment, type EquipmentOptions } from './equipment.js';

export class Armor extends Equipment {
  declare readonly category: 'armor';

  readonly type: ArmorType;
  private _currentProtection: number;

  constructor(input: ArmorInput, options: EquipmentOptions = {}) {
    const parsed = parseInput(armorInputSchema, input);
    super('armor', parsed, options);
    this.type = parsed.type;
    this._currentProtection = parsed.currentProtection ?? ARMOR_TYPES[parsed.type].maxProtection;
  }

  get maxProtection(): number {
    return ARMOR_TYPES[this.type].maxProtection;
  }

  get currentProtection(): number {
    return this._currentProtection;
  }

  /**
   * @throws InvalidConstructionArgumentError outside [0, maxProtection]
   */
  setCurrentProtection(protection: number): void {
    this._currentProtection = parseInput(
      z.number().int().min(0).max(this.maxProtection),
      protection,
      'currentProtection'
    );
  }

  /**
   * Base value scaled by how much protection is left
   */
  currentValue(): number {
    return Math.floor((this.baseValue * this._currentProtection) / this.maxProtection);
  }
}
