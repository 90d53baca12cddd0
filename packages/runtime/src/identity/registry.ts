// Identity Registry
//
// Issues equipment identifiers. Each category has its own structural rule
// (see isValidIdentifier) and its own set of issued identifiers, which
// never shrinks: an identifier stays taken after its item is destroyed.

import {
  DEFAULT_ARMOR_ID_BOUND,
  isValidIdentifier,
  type EquipmentCategory,
  type Identifier,
  type IdentifierRules,
} from '@armory/protocol';
import { createInMemoryIdentityStore, type IdentityStore } from '@armory/repositories';
import { getConfig } from '../config.js';
import { DuplicateOrInvalidIdentifierError, IdentifierExhaustedError } from '../errors.js';
import { getDefaultRng, nextBigInt63, type Rng } from '../rng.js';

export type IdentityRegistryOptions = {
  /** Where issued identifiers are recorded, a fresh in-memory store when omitted */
  store?: IdentityStore;

  /** Source of candidate identifiers */
  rng?: Rng;

  /** Draws generate() makes before throwing IdentifierExhaustedError */
  maxAttempts?: number;

  /** Exclusive upper bound of armor identifiers */
  armorIdBound?: Identifier;
};

const DEFAULT_MAX_ATTEMPTS = 100_000;

export class IdentityRegistry {
  readonly store: IdentityStore;
  readonly maxAttempts: number;
  readonly rules: IdentifierRules;
  private readonly rng: Rng;

  constructor(options: IdentityRegistryOptions = {}) {
    this.store = options.store ?? createInMemoryIdentityStore();
    this.rng = options.rng ?? getDefaultRng();
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.rules = { armorIdBound: options.armorIdBound ?? DEFAULT_ARMOR_ID_BOUND };
  }

  /**
   * Whether the identifier satisfies the category's structural rule
   */
  isValid(category: EquipmentCategory, identifier: Identifier): boolean {
    return isValidIdentifier(category, identifier, this.rules);
  }

  /**
   * Whether the identifier has never been issued for the category
   */
  isUnique(category: EquipmentCategory, identifier: Identifier): boolean {
    return !this.store.has(category, identifier);
  }

  /**
   * Draw a valid identifier not yet issued for the category. Does not record it.
   *
   * Weapon, purse and backpack identifiers come from a space of ~2^63, so
   * collisions are negligible. Armor identifiers must be prime and below
   * the armor bound, so draws fail more often as that space fills up.
   *
   * @throws IdentifierExhaustedError after maxAttempts failed draws
   */
  generate(category: EquipmentCategory): Identifier {
    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const candidate = this.draw(category);
      if (this.isValid(category, candidate) && this.isUnique(category, candidate)) {
        return candidate;
      }
    }
    throw new IdentifierExhaustedError(category, this.maxAttempts);
  }

  /**
   * Record an identifier as issued.
   *
   * @throws DuplicateOrInvalidIdentifierError if it breaks the category rule or was issued before
   */
  register(category: EquipmentCategory, identifier: Identifier): void {
    if (!this.isValid(category, identifier)) {
      throw new DuplicateOrInvalidIdentifierError(category, identifier, 'not a valid identifier');
    }
    if (!this.store.add(category, identifier)) {
      throw new DuplicateOrInvalidIdentifierError(category, identifier, 'already issued');
    }
  }

  /**
   * Generate and register in one step
   */
  issue(category: EquipmentCategory): Identifier {
    const identifier = this.generate(category);
    this.register(category, identifier);
    return identifier;
  }

  private draw(category: EquipmentCategory): Identifier {
    const raw = nextBigInt63(this.rng);
    switch (category) {
      case 'weapon':
        return raw - (raw % 6n);
      case 'armor':
        return raw % this.rules.armorIdBound;
      case 'purse':
      case 'backpack':
        return raw;
    }
  }
}

let registryInstance: IdentityRegistry | null = null;

/**
 * Get the process-wide identity registry singleton.
 *
 * Equipment built without an explicit registry draws from this one.
 */
export function getIdentityRegistry(): IdentityRegistry {
  if (!registryInstance) {
    const config = getConfig();
    registryInstance = new IdentityRegistry({
      maxAttempts: config.idMaxAttempts,
      armorIdBound: config.armorIdBound,
    });
  }
  return registryInstance;
}
