// @armory/repositories
// Storage contracts and implementations for the identity registry.
//
// Interfaces define WHAT operations are available, not HOW they're
// implemented. The runtime codes against IdentityStore, so the in-memory
// store can be swapped for a shared or locked one without touching it.

export * from './interfaces/index.js';
export {
  createInMemoryIdentityStore,
  type InMemoryIdentityStore,
} from './in-memory/index.js';
