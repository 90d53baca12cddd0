// Entity
//
// Base of heroes and monsters: hit points, anchor points and the policy
// deciding which item may go where. Equipment drives every change to the
// anchors through setOwner; the entity only answers whether a placement
// is allowed and applies it when asked.
//
// Hit points of an entity at rest are zero or prime. While fighting they
// may take any value; leaving the fight rounds them down to a prime.

import {
  normalizeHitPoints,
  type EntityCategory,
} from '@armory/protocol';
import {
  DuplicateOrInvalidIdentifierError,
  IllegalRelationshipTargetError,
  InconsistentRelationshipStateError,
} from '../errors.js';
import type { Equipment, ItemPlacement } from '../equipment/equipment.js';
import { hit, type HitOptions, type HitResult } from '../combat/hit.js';
import { AnchorPoint } from './anchor-point.js';

export type StartingItemsOptions = {
  /** Placed in order on construction; all of them or none */
  items?: readonly Equipment[];
};

type Placement = { anchor: AnchorPoint } | { reason: string };

export abstract class Entity {
  readonly category: EntityCategory;
  readonly name: string;
  readonly maxHitPoints: number;

  private _hitPoints: number;
  private _fighting = false;
  private readonly anchors: AnchorPoint[];

  protected constructor(
    category: EntityCategory,
    name: string,
    maxHitPoints: number,
    anchorNames: readonly string[]
  ) {
    this.category = category;
    this.name = name;
    this.maxHitPoints = maxHitPoints;
    this._hitPoints = normalizeHitPoints(maxHitPoints);
    this.anchors = anchorNames.map((anchorName) => new AnchorPoint(this, anchorName));
  }

  // --- Policy (per variant) ---

  /** Maximal total weight of everything carried */
  abstract get capacity(): number;

  /** Protection without any armor */
  abstract get protection(): number;

  /** Protection an attack roll has to reach */
  abstract effectiveProtection(): number;

  /** Whether the item may sit on the anchor point, ignoring occupancy */
  protected abstract canPlaceAt(item: Equipment, anchor: AnchorPoint): boolean;

  /** Extra limits of a variant, checked after placement and weight */
  protected categoryFailure(_item: Equipment): string | null {
    return null;
  }

  protected onAttach(_item: Equipment, _anchor: AnchorPoint): void {}

  protected onDetach(_item: Equipment, _anchor: AnchorPoint): void {}

  // --- Hit points ---

  get hitPoints(): number {
    return this._hitPoints;
  }

  isAlive(): boolean {
    return this._hitPoints > 0;
  }

  isFighting(): boolean {
    return this._fighting;
  }

  /**
   * Enter or leave combat. Leaving rounds hit points down to a prime.
   */
  setFighting(fighting: boolean): void {
    this._fighting = fighting;
    if (!fighting) {
      this._hitPoints = normalizeHitPoints(this._hitPoints);
    }
  }

  /**
   * Run `fn` with the fighting flag on. An entity already fighting stays
   * fighting afterwards; otherwise the flag is cleared again, even on error.
   */
  withFighting<T>(fn: () => T): T {
    if (this._fighting) return fn();
    this.setFighting(true);
    try {
      return fn();
    } finally {
      this.setFighting(false);
    }
  }

  addHitPoints(amount: number): void {
    if (amount <= 0) return;
    this.changeHitPoints(Math.min(this.maxHitPoints, this._hitPoints + amount));
  }

  removeHitPoints(amount: number): void {
    if (amount <= 0) return;
    this.changeHitPoints(Math.max(0, this._hitPoints - amount));
  }

  private changeHitPoints(hitPoints: number): void {
    this._hitPoints = this._fighting ? hitPoints : normalizeHitPoints(hitPoints);
  }

  // --- Anchor points ---

  anchorPoints(): readonly AnchorPoint[] {
    return [...this.anchors];
  }

  /**
   * Anchor point by name, case-insensitive
   */
  anchorPoint(name: string): AnchorPoint | null {
    const wanted = name.toLowerCase();
    return this.anchors.find((anchor) => anchor.name.toLowerCase() === wanted) ?? null;
  }

  anchorPointOf(item: Equipment): AnchorPoint | null {
    return this.anchors.find((anchor) => anchor.item === item) ?? null;
  }

  hasFreeAnchorPoint(): boolean {
    return this.anchors.some((anchor) => anchor.isEmpty());
  }

  /**
   * Append an anchor point. Anonymous when no name is given.
   *
   * @throws IllegalRelationshipTargetError if a named anchor point already exists
   */
  addAnchorPoint(name = ''): AnchorPoint {
    if (name !== '' && this.anchorPoint(name) !== null) {
      throw new IllegalRelationshipTargetError('anchor', `${this.name} already has "${name}"`);
    }
    const anchor = new AnchorPoint(this, name);
    this.anchors.push(anchor);
    return anchor;
  }

  // --- Items ---

  /**
   * Items on anchor points, in anchor order
   */
  items(): Equipment[] {
    return this.anchors.flatMap((anchor) => (anchor.item === null ? [] : [anchor.item]));
  }

  /**
   * Whether the item is on one of this entity's anchor points
   */
  hasItem(item: Equipment): boolean {
    return this.anchorPointOf(item) !== null;
  }

  /**
   * Whether the item is anchored here or nested in a backpack anchored here
   */
  possesses(item: Equipment): boolean {
    if (this.hasItem(item)) return true;
    for (let container = item.container; container !== null; container = container.container) {
      if (this.hasItem(container)) return true;
    }
    return false;
  }

  totalWeight(): number {
    return this.items().reduce((sum, item) => sum + item.totalWeight(), 0);
  }

  totalValue(): number {
    return this.items().reduce((sum, item) => sum + item.totalValue(), 0);
  }

  canCarry(weight: number): boolean {
    return this.totalWeight() + weight <= this.capacity;
  }

  // --- Acceptance ---

  canAccept(item: Equipment, anchorName?: string): boolean {
    return this.acceptanceFailure(item, anchorName) === null;
  }

  /**
   * Why the item cannot be given to this entity, or null if it can
   */
  acceptanceFailure(item: Equipment, anchorName?: string): string | null {
    const placement = this.resolvePlacement(item, anchorName);
    return 'reason' in placement ? placement.reason : null;
  }

  /**
   * Anchor point the item would go to.
   * @internal Called by Equipment.setOwner only.
   * @throws IllegalRelationshipTargetError when the item is refused
   */
  placementFor(item: Equipment, anchorName?: string): AnchorPoint {
    const placement = this.resolvePlacement(item, anchorName);
    if ('reason' in placement) {
      throw new IllegalRelationshipTargetError('owner', placement.reason);
    }
    return placement.anchor;
  }

  private resolvePlacement(item: Equipment, anchorName?: string): Placement {
    let anchor: AnchorPoint | undefined;

    if (anchorName !== undefined) {
      const named = this.anchorPoint(anchorName);
      if (named === null) {
        return { reason: `${this.name} has no anchor point "${anchorName}"` };
      }
      if (named.item !== null && named.item !== item) {
        return { reason: `anchor point "${named.name}" of ${this.name} is occupied` };
      }
      if (!this.canPlaceAt(item, named)) {
        return { reason: `a ${item.category} cannot be placed at "${named.name}"` };
      }
      anchor = named;
    } else {
      anchor =
        this.anchorPointOf(item) ??
        this.anchors.find((candidate) => candidate.isEmpty() && this.canPlaceAt(item, candidate));
      if (anchor === undefined) {
        return { reason: `${this.name} has no free anchor point for a ${item.category}` };
      }
    }

    const added = item.totalWeight();
    if (!this.possesses(item) && !this.canCarry(added)) {
      return { reason: `${this.name} cannot carry weight ${added} more` };
    }

    const policy = this.categoryFailure(item);
    if (policy !== null) return { reason: policy };

    return { anchor };
  }

  // --- Internal primitives ---

  /**
   * Put an item whose direct owner already points here on the anchor.
   * @internal Called by Equipment.setOwner only.
   */
  attachItem(item: Equipment, anchor: AnchorPoint): void {
    if (item.directOwner !== this) {
      throw new InconsistentRelationshipStateError(
        `Item ${item.identifier} must point to ${this.name} before it is attached`
      );
    }
    if (anchor.holder !== this) {
      throw new InconsistentRelationshipStateError(
        `Anchor point "${anchor.name}" does not belong to ${this.name}`
      );
    }
    if (!item.hasValidIdentifier()) {
      throw new DuplicateOrInvalidIdentifierError(item.category, item.identifier, 'not a valid identifier');
    }
    anchor.occupy(item);
    this.onAttach(item, anchor);
  }

  /**
   * Take an item whose direct owner no longer points here off its anchor.
   * @internal Called by Equipment.setOwner and setBackpack only.
   */
  detachItem(item: Equipment): void {
    const anchor = this.anchorPointOf(item);
    if (anchor === null) {
      throw new InconsistentRelationshipStateError(
        `Item ${item.identifier} is not anchored on ${this.name}`
      );
    }
    anchor.vacate(item);
    this.onDetach(item, anchor);
  }

  /**
   * Give each starting item to this entity. If one is refused, the ones
   * already moved go back to where they were and the error is rethrown.
   */
  protected takeStartingItems(items: readonly Equipment[]): void {
    const moved: { item: Equipment; from: ItemPlacement }[] = [];
    try {
      for (const item of items) {
        const from = item.placement();
        item.setOwner(this);
        moved.push({ item, from });
      }
    } catch (error) {
      for (const { item, from } of moved.reverse()) {
        item.restorePlacement(from);
      }
      throw error;
    }
  }

  // --- Combat ---

  /**
   * Attack another entity once
   *
   * @throws NullTargetError if target is null
   */
  hit(target: Entity | null, options: HitOptions = {}): HitResult {
    return hit(this, target, options);
  }
}
