// Hero
//
// Player-controlled entity with five named anchor points. Hands hold
// weapons, the body holds armor, the belt holds a purse; the back and any
// anchor added later hold anything. Capacity follows from strength.

import {
  HERO_ANCHOR_NAMES,
  HERO_CAPACITY_PER_STRENGTH,
  HERO_MAX_ARMORS,
  HERO_MAX_PURSES,
  heroInputSchema,
  type HeroInput,
} from '@armory/protocol';
import { z } from 'zod';
import type { Equipment } from '../equipment/equipment.js';
import type { Weapon } from '../equipment/weapon.js';
import type { Armor } from '../equipment/armor.js';
import { isArmor, isPurse, isWeapon } from '../equipment/guards.js';
import { parseInput } from '../validation.js';
import type { AnchorPoint } from './anchor-point.js';
import { Entity, type StartingItemsOptions } from './entity.js';

const MIN_STRENGTH = 0.01;

const factorSchema = z.number().int().positive('must be a positive integer');

function roundStrength(strength: number): number {
  return Math.max(MIN_STRENGTH, Math.round(strength * 100) / 100);
}

export class Hero extends Entity {
  declare readonly category: 'hero';

  private _strength: number;
  private _protection: number;
  private _leftHandWeapon: Weapon | null = null;
  private _rightHandWeapon: Weapon | null = null;
  private _armor: Armor | null = null;

  /**
   * @throws InvalidConstructionArgumentError on a bad name, hit points, strength or protection
   * @throws IllegalRelationshipTargetError if a starting item cannot be placed
   */
  constructor(input: HeroInput, options: StartingItemsOptions = {}) {
    const parsed = parseInput(heroInputSchema, input);
    super('hero', parsed.name, parsed.maxHitPoints, HERO_ANCHOR_NAMES);
    this._strength = roundStrength(parsed.strength);
    this._protection = parsed.protection;
    this.takeStartingItems(options.items ?? []);
  }

  // --- Strength ---

  /** Kept to two decimals */
  get strength(): number {
    return this._strength;
  }

  multiplyStrength(factor: number): void {
    const checked = parseInput(factorSchema, factor, 'factor');
    this._strength = roundStrength(this._strength * checked);
  }

  /** Never drops below 0.01 */
  divideStrength(divisor: number): void {
    const checked = parseInput(factorSchema, divisor, 'divisor');
    this._strength = roundStrength(this._strength / checked);
  }

  get capacity(): number {
    return Math.floor(HERO_CAPACITY_PER_STRENGTH * this._strength);
  }

  /**
   * Strength plus the damage of the weapons in both hands
   */
  attackPower(): number {
    return (
      this._strength +
      (this._leftHandWeapon?.damage ?? 0) +
      (this._rightHandWeapon?.damage ?? 0)
    );
  }

  // --- Protection ---

  get protection(): number {
    return this._protection;
  }

  setProtection(protection: number): void {
    this._protection = parseInput(z.number().int().min(0), protection, 'protection');
  }

  /**
   * Base protection plus the armor worn on the body
   */
  effectiveProtection(): number {
    return this._protection + (this._armor?.currentProtection ?? 0);
  }

  // --- Equipped items ---

  get leftHandWeapon(): Weapon | null {
    return this._leftHandWeapon;
  }

  get rightHandWeapon(): Weapon | null {
    return this._rightHandWeapon;
  }

  /** Armor on the body */
  get armor(): Armor | null {
    return this._armor;
  }

  // --- Placement policy ---

  protected canPlaceAt(item: Equipment, anchor: AnchorPoint): boolean {
    switch (anchor.name) {
      case 'leftHand':
      case 'rightHand':
        return isWeapon(item);
      case 'body':
        return isArmor(item);
      case 'belt':
        return isPurse(item);
      default:
        return true;
    }
  }

  protected categoryFailure(item: Equipment): string | null {
    if (this.hasItem(item)) return null;
    const held = this.items();
    if (isArmor(item) && held.filter(isArmor).length >= HERO_MAX_ARMORS) {
      return `a hero carries at most ${HERO_MAX_ARMORS} armors`;
    }
    if (isPurse(item) && held.filter(isPurse).length >= HERO_MAX_PURSES) {
      return `a hero carries at most ${HERO_MAX_PURSES} purse`;
    }
    return null;
  }

  protected onAttach(item: Equipment, anchor: AnchorPoint): void {
    if (anchor.name === 'leftHand' && isWeapon(item)) this._leftHandWeapon = item;
    if (anchor.name === 'rightHand' && isWeapon(item)) this._rightHandWeapon = item;
    if (anchor.name === 'body' && isArmor(item)) this._armor = item;
  }

  protected onDetach(item: Equipment, _anchor: AnchorPoint): void {
    if (this._leftHandWeapon === item) this._leftHandWeapon = null;
    if (this._rightHandWeapon === item) this._rightHandWeapon = null;
    if (this._armor === item) this._armor = null;
  }
}
