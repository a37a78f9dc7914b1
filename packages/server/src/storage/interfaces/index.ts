import type { IFederatedIdentityStorage } from './federated-identity-storage.js';

export type {
  CreateFederatedIdentityInput,
  UpdateFederatedIdentityInput,
  IFederatedIdentityStorage,
} from './federated-identity-storage.js';

/**
 * Storage used by the SAML routes
 */
export interface IStorage {
  federatedIdentities?: IFederatedIdentityStorage;
}
