import type { IStorage } from '../interfaces/index.js';
import { MemoryFederatedIdentityStorage } from './federated-identity-storage.js';

export { MemoryFederatedIdentityStorage } from './federated-identity-storage.js';

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(): IStorage {
  return {
    federatedIdentities: new MemoryFederatedIdentityStorage(),
  };
}
