// In-memory repository implementations for development and testing
//
// Data does not persist between restarts.

import type { EquipmentCategory, Identifier } from '@armory/protocol';
import type { IdentityStore } from '../interfaces/index.js';

/**
 * Extended identity store with access to underlying data and a reset.
 */
export interface InMemoryIdentityStore extends IdentityStore {
  /** Direct access to the recorded identifiers (for debugging/testing) */
  _data: Map<EquipmentCategory, Set<Identifier>>;
  /** Forget every recorded identifier */
  clear(): void;
}

/**
 * Create an in-memory identity store.
 *
 * @example
 * ```typescript
 * const store = createInMemoryIdentityStore();
 * store.add('weapon', 42n); // true
 * store.add('weapon', 42n); // false, already recorded
 * store.has('armor', 42n);  // false, categories are independent
 * ```
 */
export function createInMemoryIdentityStore(): InMemoryIdentityStore {
  const data = new Map<EquipmentCategory, Set<Identifier>>();

  const issued = (category: EquipmentCategory): Set<Identifier> => {
    let set = data.get(category);
    if (!set) {
      set = new Set<Identifier>();
      data.set(category, set);
    }
    return set;
  };

  return {
    _data: data,
    has(category, identifier) {
      return data.get(category)?.has(identifier) ?? false;
    },
    add(category, identifier) {
      const set = issued(category);
      if (set.has(identifier)) return false;
      set.add(identifier);
      return true;
    },
    count(category) {
      return data.get(category)?.size ?? 0;
    },
    list(category) {
      return Array.from(data.get(category) ?? []);
    },
    clear() {
      data.clear();
    },
  };
}
