// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type { IdentityStore } from './identity-store.js';
