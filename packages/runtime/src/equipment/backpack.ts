// Backpack - a piece of equipment that holds other equipment
//
// Contents are indexed by identifier. Identifiers are only unique within a
// category, so a weapon and a purse may share a key; each key maps to the
// items carrying it in insertion order.

import { backpackInputSchema, type BackpackInput, type Identifier } from '@armory/protocol';
import {
  DuplicateOrInvalidIdentifierError,
  IllegalRelationshipTargetError,
  InconsistentRelationshipStateError,
} from '../errors.js';
import { parseInput } from '../validation.js';
import { Equipment, type EquipmentOptions } from './equipment.js';
import { isBackpack } from './guards.js';

export class Backpack extends Equipment {
  declare readonly category: 'backpack';

  /** Maximal total weight of the contents */
  readonly capacity: number;

  private readonly contents = new Map<Identifier, Equipment[]>();

  constructor(input: BackpackInput, options: EquipmentOptions = {}) {
    const parsed = parseInput(backpackInputSchema, input);
    super('backpack', parsed, options);
    this.capacity = parsed.capacity;
  }

  // --- Queries ---

  /**
   * Directly contained items, grouped by identifier
   */
  items(): Equipment[] {
    return Array.from(this.contents.values()).flat();
  }

  /**
   * Whether the item is directly inside this backpack
   */
  has(item: Equipment): boolean {
    return this.contents.get(item.identifier)?.includes(item) ?? false;
  }

  containsId(identifier: Identifier): boolean {
    return this.contents.has(identifier);
  }

  countWithId(identifier: Identifier): number {
    return this.contents.get(identifier)?.length ?? 0;
  }

  itemsWithId(identifier: Identifier): Equipment[] {
    return [...(this.contents.get(identifier) ?? [])];
  }

  /**
   * The index-th item (1-based) carrying the identifier, or null
   */
  itemWithId(identifier: Identifier, index: number): Equipment | null {
    return this.contents.get(identifier)?.[index - 1] ?? null;
  }

  /**
   * Total weight of everything inside, nested contents included
   */
  contentWeight(): number {
    return this.items().reduce((sum, item) => sum + item.totalWeight(), 0);
  }

  totalWeight(): number {
    return this.weight + this.contentWeight();
  }

  currentValue(): number {
    return this.baseValue;
  }

  totalValue(): number {
    return this.items().reduce((sum, item) => sum + item.totalValue(), this.currentValue());
  }

  // --- Acceptance ---

  canAccept(item: Equipment): boolean {
    return this.acceptanceFailure(item) === null;
  }

  /**
   * Why the item cannot be put in this backpack, or null if it can
   */
  acceptanceFailure(item: Equipment): string | null {
    if (this.isDestroyed()) return 'backpack is destroyed';
    if (item === this || (isBackpack(item) && this.isWithin(item))) {
      return 'a backpack cannot contain itself';
    }
    if (this.has(item)) return null;

    // Enclosing backpacks grow too, unless the item is already inside them
    const added = item.totalWeight();
    for (let target: Backpack | null = this; target !== null; target = target.container) {
      if (item.isWithin(target)) break;
      if (target.contentWeight() + added > target.capacity) {
        return `adding weight ${added} would exceed capacity ${target.capacity}`;
      }
    }

    const owner = this.owner;
    if (owner !== null && !owner.possesses(item) && !owner.canCarry(added)) {
      return `${owner.name} cannot carry weight ${added} more`;
    }
    return null;
  }

  // --- Internal primitives ---

  /**
   * Index an item whose container already points here.
   * @internal Called by Equipment.setBackpack only.
   */
  addItem(item: Equipment): void {
    if (item.container !== this) {
      throw new InconsistentRelationshipStateError(
        `Item ${item.identifier} must point to the backpack before it is added`
      );
    }
    if (this.has(item)) {
      throw new InconsistentRelationshipStateError(
        `Item ${item.identifier} is already in backpack ${this.identifier}`
      );
    }
    if (!item.hasValidIdentifier()) {
      throw new DuplicateOrInvalidIdentifierError(
        item.category,
        item.identifier,
        'not a valid identifier'
      );
    }
    if (this.contentWeight() + item.totalWeight() > this.capacity) {
      throw new IllegalRelationshipTargetError('backpack', `capacity ${this.capacity} exceeded`);
    }

    const group = this.contents.get(item.identifier);
    if (group) {
      group.push(item);
    } else {
      this.contents.set(item.identifier, [item]);
    }
  }

  /**
   * Drop an item whose container no longer points here.
   * @internal Called by Equipment.setBackpack and setOwner only.
   */
  removeItem(item: Equipment): void {
    if (item.container === this) {
      throw new InconsistentRelationshipStateError(
        `Item ${item.identifier} must leave the backpack before it is removed`
      );
    }
    const group = this.contents.get(item.identifier);
    const index = group?.indexOf(item) ?? -1;
    if (group === undefined || index === -1) {
      throw new InconsistentRelationshipStateError(
        `Item ${item.identifier} is not in backpack ${this.identifier}`
      );
    }

    group.splice(index, 1);
    if (group.length === 0) {
      this.contents.delete(item.identifier);
    }
  }

  /**
   * Contents are emptied out, not destroyed
   */
  protected onDestroy(): void {
    for (const item of this.items()) {
      item.setBackpack(null);
    }
  }
}
