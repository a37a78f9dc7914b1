import { randomBytes } from 'node:crypto';
import type {
  FederatedIdentity,
  CreateFederatedIdentityInput,
  UpdateFederatedIdentityInput,
  IFederatedIdentityStorage,
} from '../interfaces/federated-identity-storage.js';
import { AccountLinkConflictError, SamlAuthError } from '../../errors/saml-error.js';

/**
 * In-memory account links, keyed by `${providerName}:${providerUserId}`
 */
export class MemoryFederatedIdentityStorage implements IFederatedIdentityStorage {
  private links = new Map<string, FederatedIdentity>();
  private idToKey = new Map<string, string>();

  async create(input: CreateFederatedIdentityInput): Promise<FederatedIdentity> {
    const key = `${input.providerName}:${input.providerUserId}`;
    if (this.links.has(key)) {
      throw new AccountLinkConflictError(input.providerName, input.providerUserId);
    }

    const now = new Date();
    const link: FederatedIdentity = {
      id: randomBytes(16).toString('base64url'),
      userId: input.userId,
      providerName: input.providerName,
      providerUserId: input.providerUserId,
      providerUserData: input.providerUserData,
      createdAt: now,
      updatedAt: now,
    };

    this.links.set(key, link);
    this.idToKey.set(link.id, key);
    return link;
  }

  async findByProviderIdentity(
    providerName: string,
    providerUserId: string
  ): Promise<FederatedIdentity | null> {
    return this.links.get(`${providerName}:${providerUserId}`) ?? null;
  }

  async update(id: string, input: UpdateFederatedIdentityInput): Promise<FederatedIdentity> {
    const key = this.idToKey.get(id);
    const link = key === undefined ? undefined : this.links.get(key);
    if (key === undefined || !link) {
      throw SamlAuthError.serverError('Account link not found');
    }

    const updated: FederatedIdentity = {
      ...link,
      providerUserData: input.providerUserData ?? link.providerUserData,
      updatedAt: new Date(),
    };
    this.links.set(key, updated);
    return updated;
  }
}
