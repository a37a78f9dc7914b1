import type { FederatedIdentity } from '@saml-federation/shared';

export type { FederatedIdentity };

/**
 * Input for creating a federated identity
 */
export interface CreateFederatedIdentityInput {
  userId: string;
  providerName: string;
  providerUserId: string;
  providerUserData?: Record<string, unknown>;
}

/**
 * Input for updating a federated identity
 */
export interface UpdateFederatedIdentityInput {
  providerUserData?: Record<string, unknown>;
}

/**
 * Links between an IdP identity (provider name + permanent ID) and a local user
 */
export interface IFederatedIdentityStorage {
  /**
   * Create a new link
   * @throws AccountLinkConflictError if the provider identity is already linked
   */
  create(input: CreateFederatedIdentityInput): Promise<FederatedIdentity>;

  /**
   * Find the link for an IdP name and permanent ID
   */
  findByProviderIdentity(providerName: string, providerUserId: string): Promise<FederatedIdentity | null>;

  /**
   * Refresh the provider data of a link
   */
  update(id: string, input: UpdateFederatedIdentityInput): Promise<FederatedIdentity>;
}
