// Purse - holds dukaten, rips when overfilled
//
// Every dukat weighs DUKAT_WEIGHT. Operations on a destroyed purse and
// non-positive amounts have no effect.

import { DUKAT_WEIGHT, purseInputSchema, type PurseInput } from '@armory/protocol';
import { parseInput } from '../validation.js';
import { Equipment, type EquipmentOptions } from './equipment.js';

export class Purse extends Equipment {
  declare readonly category: 'purse';

  readonly capacity: number;
  private _contents: number;

  constructor(input: PurseInput, options: EquipmentOptions = {}) {
    const parsed = parseInput(purseInputSchema, input);
    super('purse', { weight: parsed.weight, baseValue: 0, shiny: parsed.shiny }, options);
    this.capacity = parsed.capacity;
    this._contents = parsed.contents;
  }

  get contents(): number {
    return this._contents;
  }

  freeSpace(): number {
    return this.capacity - this._contents;
  }

  /**
   * Add dukaten. Going over capacity rips the purse: it is destroyed and
   * the contents are lost.
   */
  addToContents(amount: number): void {
    if (this.isDestroyed() || amount <= 0) return;
    if (this._contents + amount > this.capacity) {
      this.destroy();
      return;
    }
    this._contents += amount;
  }

  /**
   * Take dukaten out, never going below zero
   */
  removeFromContents(amount: number): void {
    if (this.isDestroyed() || amount <= 0) return;
    this._contents = Math.max(0, this._contents - amount);
  }

  empty(): void {
    this._contents = 0;
  }

  fillToCapacity(): void {
    if (this.isDestroyed()) return;
    this._contents = this.capacity;
  }

  /**
   * Move the other purse's dukaten into this one.
   *
   * If they fit, the other purse ends up empty. Otherwise this purse takes
   * as much as it has room for from the other one and then rips.
   */
  transferFrom(other: Purse): void {
    if (other === this || this.isDestroyed() || other.isDestroyed()) return;

    if (other.contents <= this.freeSpace()) {
      this._contents += other.contents;
      other.empty();
    } else {
      other.removeFromContents(this.freeSpace());
      this.destroy();
    }
  }

  currentValue(): number {
    return this._contents;
  }

  totalWeight(): number {
    return this.weight + DUKAT_WEIGHT * this._contents;
  }

  protected onDestroy(): void {
    this._contents = 0;
  }
}
