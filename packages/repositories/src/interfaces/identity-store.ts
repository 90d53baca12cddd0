import type { EquipmentCategory, Identifier } from '@armory/protocol';

/**
 * Storage contract for issued equipment identifiers.
 *
 * An identifier is recorded once per category and stays recorded for the
 * lifetime of the store, even after the equipment that carried it is
 * destroyed. Stores never reclaim identifiers.
 *
 * Operations are synchronous: the store backs a single-process simulation.
 * A store shared between concurrent battles must be wrapped so that a
 * check-then-add pair runs under one lock.
 */
export interface IdentityStore {
  /**
   * Whether the identifier was already recorded for the category
   */
  has(category: EquipmentCategory, identifier: Identifier): boolean;

  /**
   * Record an identifier for a category.
   * @returns false if it was already recorded (the store is left unchanged)
   */
  add(category: EquipmentCategory, identifier: Identifier): boolean;

  /**
   * Number of identifiers recorded for a category
   */
  count(category: EquipmentCategory): number;

  /**
   * All identifiers recorded for a category, in recording order
   */
  list(category: EquipmentCategory): Identifier[];
}
