export {
  IdentityRegistry,
  getIdentityRegistry,
  type IdentityRegistryOptions,
} from './registry.js';
