import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryFederatedIdentityStorage } from '../../storage/memory/federated-identity-storage.js';
import { AccountLinkConflictError, SamlAuthError } from '../../errors/saml-error.js';

describe('MemoryFederatedIdentityStorage', () => {
  let storage: MemoryFederatedIdentityStorage;

  beforeEach(() => {
    storage = new MemoryFederatedIdentityStorage();
  });

  it('should create and find links by provider identity', async () => {
    const created = await storage.create({
      userId: 'testshib:alice123',
      providerName: 'testshib',
      providerUserId: 'alice123',
      providerUserData: { email: 'alice@example.com' },
    });

    expect(created.id).toMatch(/^[A-Za-z0-9_-]{22}$/);
    expect(await storage.findByProviderIdentity('testshib', 'alice123')).toEqual(created);
    expect(await storage.findByProviderIdentity('other', 'alice123')).toBeNull();
  });

  it('should refuse to link the same provider identity twice', async () => {
    const input = { userId: 'testshib:alice123', providerName: 'testshib', providerUserId: 'alice123' };
    await storage.create(input);

    try {
      await storage.create({ ...input, userId: 'local-user-9' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(AccountLinkConflictError);
      if (error instanceof AccountLinkConflictError) {
        expect(error.statusCode).toBe(409);
        expect(error.toJSON()).toEqual({
          error: 'account_link_conflict',
          error_description: 'This identity provider account is already linked.',
        });
        expect(error.providerUserId).toBe('alice123');
      }
    }

    const link = await storage.findByProviderIdentity('testshib', 'alice123');
    expect(link?.userId).toBe('testshib:alice123');
  });

  it('should refresh provider data on update', async () => {
    const created = await storage.create({
      userId: 'testshib:alice123',
      providerName: 'testshib',
      providerUserId: 'alice123',
      providerUserData: { email: 'old@example.com' },
    });

    const updated = await storage.update(created.id, { providerUserData: { email: 'new@example.com' } });
    expect(updated.providerUserData).toEqual({ email: 'new@example.com' });
    expect(updated.createdAt).toEqual(created.createdAt);
    expect(await storage.findByProviderIdentity('testshib', 'alice123')).toEqual(updated);
  });

  it('should keep provider data when the update carries none', async () => {
    const created = await storage.create({
      userId: 'u1',
      providerName: 'testshib',
      providerUserId: 'a',
      providerUserData: { email: 'a@example.com' },
    });

    const updated = await storage.update(created.id, {});
    expect(updated.providerUserData).toEqual({ email: 'a@example.com' });
  });

  it('should fail to update an unknown link with a server error', async () => {
    try {
      await storage.update('missing', {});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SamlAuthError);
      if (error instanceof SamlAuthError) {
        expect(error.code).toBe('server_error');
        expect(error.description).toBe('Account link not found');
      }
    }
  });
});
