// @armory/runtime
// Ownership graph, identity registry and combat engine

// Error types
export {
  ArmoryError,
  InvalidConstructionArgumentError,
  DuplicateOrInvalidIdentifierError,
  IdentifierExhaustedError,
  IllegalRelationshipTargetError,
  InconsistentRelationshipStateError,
  NullTargetError,
  InvalidBattleStateError,
  type Relationship,
} from './errors.js';

// Configuration
export { loadConfig, getConfig, type ArmoryConfig } from './config.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createConsoleLogger,
  createCapturingLogger,
  getDefaultLogger,
  isLevelEnabled,
  type Logger,
  type LogEntry,
} from './logging.js';

// Randomness
export {
  createRng,
  randomRng,
  nextInt,
  nextBoolean,
  nextBigInt63,
  getDefaultRng,
  type Rng,
} from './rng.js';

// Identity registry
export * from './identity/index.js';

// Equipment
export * from './equipment/index.js';

// Entities
export * from './entities/index.js';

// Combat
export * from './combat/index.js';

// Invariant audit
export { findOwnershipViolations } from './invariants.js';
