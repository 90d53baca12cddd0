// Anchor Point - one slot on an entity, holding at most one item

import { InconsistentRelationshipStateError } from '../errors.js';
import type { Equipment } from '../equipment/equipment.js';
import type { Entity } from './entity.js';

export class AnchorPoint {
  /** Empty for the anonymous anchors of monsters */
  readonly name: string;
  readonly holder: Entity;
  private _item: Equipment | null = null;

  constructor(holder: Entity, name: string) {
    this.holder = holder;
    this.name = name;
  }

  get item(): Equipment | null {
    return this._item;
  }

  isEmpty(): boolean {
    return this._item === null;
  }

  /**
   * @internal Called by Entity.attachItem only.
   */
  occupy(item: Equipment): void {
    if (this._item !== null) {
      throw new InconsistentRelationshipStateError(`Anchor point "${this.name}" is occupied`);
    }
    if (item.directOwner !== this.holder) {
      throw new InconsistentRelationshipStateError(
        `Item ${item.identifier} must point to ${this.holder.name} before it is anchored`
      );
    }
    this._item = item;
  }

  /**
   * @internal Called by Entity.detachItem only.
   */
  vacate(item: Equipment): void {
    if (this._item !== item) {
      throw new InconsistentRelationshipStateError(
        `Item ${item.identifier} is not on anchor point "${this.name}"`
      );
    }
    if (item.directOwner === this.holder) {
      throw new InconsistentRelationshipStateError(
        `Item ${item.identifier} must leave ${this.holder.name} before it is unanchored`
      );
    }
    this._item = null;
  }
}
