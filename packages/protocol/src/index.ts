// @armory/protocol
// Value types, constants and input validation shared by every package

export * from './types/index.js';

export {
  isPrime,
  closestLowerPrime,
  normalizeHitPoints,
  isPrimeIdentifier,
} from './validation/primes.js';

export {
  DEFAULT_ARMOR_ID_BOUND,
  isValidIdentifier,
  type IdentifierRules,
} from './validation/identifiers.js';

export { isValidHeroName, isValidMonsterName } from './validation/names.js';

export {
  damageSchema,
  weaponInputSchema,
  armorInputSchema,
  purseInputSchema,
  backpackInputSchema,
} from './validation/equipment.js';

export {
  heroInputSchema,
  monsterInputSchema,
} from './validation/entities.js';
