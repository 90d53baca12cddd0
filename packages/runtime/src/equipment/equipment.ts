// Equipment
//
// Base of every carried item. An item has at most one direct owner (an
// entity holding it on an anchor point) and at most one container (a
// backpack). The two are exclusive: an item inside a backpack belongs to
// whoever owns the backpack.
//
// Both edges change only through setOwner and setBackpack. Each validates
// everything first, then detaches the old edge and attaches the new one,
// setting the item's side before calling the other side's primitive.

import type { Condition, EquipmentCategory, Identifier } from '@armory/protocol';
import { DuplicateOrInvalidIdentifierError, IllegalRelationshipTargetError } from '../errors.js';
import { getIdentityRegistry, type IdentityRegistry } from '../identity/index.js';
import type { Entity } from '../entities/entity.js';
import type { AnchorPoint } from '../entities/anchor-point.js';
import type { Backpack } from './backpack.js';

export type EquipmentOptions = {
  /** Registry the identifier is issued from, the process-wide one when omitted */
  identities?: IdentityRegistry;
};

export type PlacementOptions = {
  /** Anchor point name, matched case-insensitively. First accepting anchor when omitted. */
  anchor?: string;
};

/**
 * Where an item sits: on an anchor point, in a backpack, or loose
 */
export type ItemPlacement = {
  readonly anchor: AnchorPoint | null;
  readonly container: Backpack | null;
};

type EquipmentFields = {
  weight: number;
  baseValue: number;
  shiny: boolean;
};

export abstract class Equipment {
  readonly category: EquipmentCategory;
  readonly identifier: Identifier;
  readonly weight: number;
  readonly baseValue: number;

  /** Shiny items are looted first */
  shiny: boolean;

  private _condition: Condition = 'good';
  private _owner: Entity | null = null;
  private _container: Backpack | null = null;
  private readonly identities: IdentityRegistry;

  protected constructor(
    category: EquipmentCategory,
    fields: EquipmentFields,
    options: EquipmentOptions
  ) {
    this.identities = options.identities ?? getIdentityRegistry();
    this.category = category;
    this.weight = fields.weight;
    this.baseValue = fields.baseValue;
    this.shiny = fields.shiny;
    this.identifier = this.identities.issue(category);
  }

  // --- Value and weight ---

  /**
   * Worth of the item itself, in dukaten
   */
  abstract currentValue(): number;

  /**
   * Weight including anything the item holds
   */
  totalWeight(): number {
    return this.weight;
  }

  /**
   * Value including anything the item holds
   */
  totalValue(): number {
    return this.currentValue();
  }

  // --- Condition ---

  get condition(): Condition {
    return this._condition;
  }

  isDestroyed(): boolean {
    return this._condition === 'destroyed';
  }

  /**
   * Destroy the item. Idempotent. The item stays where it is.
   */
  destroy(): void {
    if (this.isDestroyed()) return;
    this.onDestroy();
    this._condition = 'destroyed';
  }

  /**
   * Runs once, just before the condition becomes 'destroyed'
   */
  protected onDestroy(): void {}

  // --- Identity ---

  /**
   * Whether the identifier still satisfies its category rule
   */
  hasValidIdentifier(): boolean {
    return this.identities.isValid(this.category, this.identifier);
  }

  // --- Relationships ---

  /**
   * Effective owner: the owner of the enclosing backpack when contained,
   * otherwise the entity holding the item on an anchor point.
   */
  get owner(): Entity | null {
    return this._container !== null ? this._container.owner : this._owner;
  }

  /**
   * Entity holding the item on one of its anchor points
   */
  get directOwner(): Entity | null {
    return this._owner;
  }

  get container(): Backpack | null {
    return this._container;
  }

  /**
   * Whether the item sits (possibly nested) inside the given backpack
   */
  isWithin(backpack: Backpack): boolean {
    for (let current = this._container; current !== null; current = current.container) {
      if (current === backpack) return true;
    }
    return false;
  }

  /**
   * Hand the item to an entity, placing it on an anchor point, or drop it
   * entirely with null. Leaves the backpack it was in.
   *
   * Moving an item the entity already holds to another anchor is allowed.
   * Same entity with no anchor change is a no-op.
   *
   * @throws IllegalRelationshipTargetError if the entity refuses the item; nothing changes
   */
  setOwner(entity: Entity | null, options: PlacementOptions = {}): void {
    if (entity === null) {
      this.leaveContainer();
      this.leaveOwner();
      return;
    }

    this.assertValidIdentifier();
    const anchor = entity.placementFor(this, options.anchor);
    if (this._owner === entity && anchor.item === this) return;

    this.leaveContainer();
    this.leaveOwner();
    this._owner = entity;
    entity.attachItem(this, anchor);
  }

  /**
   * Put the item into a backpack, or take it out with null. Putting it in
   * takes it off the anchor point it was on.
   *
   * @throws IllegalRelationshipTargetError if the backpack refuses the item; nothing changes
   */
  setBackpack(backpack: Backpack | null): void {
    if (backpack === null) {
      this.leaveContainer();
      return;
    }

    this.assertValidIdentifier();
    const reason = backpack.acceptanceFailure(this);
    if (reason !== null) {
      throw new IllegalRelationshipTargetError('backpack', reason);
    }
    if (this._container === backpack) return;

    this.leaveOwner();
    this.leaveContainer();
    this._container = backpack;
    backpack.addItem(this);
  }

  /**
   * @internal Paired with restorePlacement to undo a partly applied loadout.
   */
  placement(): ItemPlacement {
    return {
      anchor: this._owner === null ? null : this._owner.anchorPointOf(this),
      container: this._container,
    };
  }

  /**
   * Put the item back where placement() found it, on the same anchor
   * point or in the same backpack. The spot must be free again.
   * @internal
   */
  restorePlacement(placement: ItemPlacement): void {
    this.leaveContainer();
    this.leaveOwner();
    if (placement.container !== null) {
      this._container = placement.container;
      placement.container.addItem(this);
    } else if (placement.anchor !== null) {
      this._owner = placement.anchor.holder;
      placement.anchor.holder.attachItem(this, placement.anchor);
    }
  }

  private leaveOwner(): void {
    const previous = this._owner;
    if (previous === null) return;
    this._owner = null;
    previous.detachItem(this);
  }

  private leaveContainer(): void {
    const previous = this._container;
    if (previous === null) return;
    this._container = null;
    previous.removeItem(this);
  }

  private assertValidIdentifier(): void {
    if (!this.hasValidIdentifier()) {
      throw new DuplicateOrInvalidIdentifierError(
        this.category,
        this.identifier,
        'not a valid identifier'
      );
    }
  }
}
