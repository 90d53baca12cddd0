// Monster
//
// Autonomous entity with anonymous anchor points that accept anything.
// Carries at most the weight of its starting loadout unless given a
// larger capacity.

import {
  SKIN_TYPES,
  damageSchema,
  monsterInputSchema,
  type MonsterInput,
  type SkinType,
} from '@armory/protocol';
import { z } from 'zod';
import { getConfig } from '../config.js';
import { InvalidConstructionArgumentError } from '../errors.js';
import type { Equipment } from '../equipment/equipment.js';
import { parseInput } from '../validation.js';
import type { AnchorPoint } from './anchor-point.js';
import { Entity, type StartingItemsOptions } from './entity.js';

export class Monster extends Entity {
  declare readonly category: 'monster';

  readonly skin: SkinType;
  private _damage: number;
  private _currentProtection: number;
  private readonly _capacity: number;

  /**
   * @throws InvalidConstructionArgumentError on bad input, or a loadout that
   *   needs more anchors or capacity than requested
   */
  constructor(input: MonsterInput, options: StartingItemsOptions = {}) {
    const parsed = parseInput(monsterInputSchema, input);
    const items = options.items ?? [];
    const anchorCount = parsed.anchorCount ?? getConfig().monsterAnchors;
    if (items.length > anchorCount) {
      throw new InvalidConstructionArgumentError(
        `${items.length} starting items need more than ${anchorCount} anchor points`,
        { field: 'anchorCount' }
      );
    }
    const loadoutWeight = items.reduce((sum, item) => sum + item.totalWeight(), 0);
    if (parsed.capacity !== undefined && parsed.capacity < loadoutWeight) {
      throw new InvalidConstructionArgumentError(
        `capacity ${parsed.capacity} is below the loadout weight ${loadoutWeight}`,
        { field: 'capacity' }
      );
    }

    super('monster', parsed.name, parsed.maxHitPoints, Array.from({ length: anchorCount }, () => ''));
    this.skin = parsed.skin;
    this._damage = parsed.damage;
    this._currentProtection = parsed.currentProtection ?? SKIN_TYPES[parsed.skin].maxProtection;
    this._capacity = parsed.capacity ?? loadoutWeight;
    this.takeStartingItems(items);
  }

  get damage(): number {
    return this._damage;
  }

  setDamage(damage: number): void {
    this._damage = parseInput(damageSchema, damage, 'damage');
  }

  get capacity(): number {
    return this._capacity;
  }

  get maxProtection(): number {
    return SKIN_TYPES[this.skin].maxProtection;
  }

  get currentProtection(): number {
    return this._currentProtection;
  }

  setCurrentProtection(protection: number): void {
    this._currentProtection = parseInput(
      z.number().int().min(0).max(this.maxProtection),
      protection,
      'currentProtection'
    );
  }

  /** The skin's current protection */
  get protection(): number {
    return this._currentProtection;
  }

  effectiveProtection(): number {
    return this._currentProtection;
  }

  protected canPlaceAt(_item: Equipment, _anchor: AnchorPoint): boolean {
    return true;
  }
}
