import { describe, it, expect, beforeEach } from 'vitest';
import type { ProviderListResponse, SamlLoginResponse } from '@saml-federation/shared';
import { createSamlServiceProvider, type SamlServiceProviderOptions } from '../../app.js';
import { createMemoryStorage } from '../../storage/memory/index.js';
import { requireEntitlement } from '../../backend/saml-auth.js';
import { AccountLinkConflictError } from '../../errors/saml-error.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import { OID_MAIL } from '../../config/constants.js';
import {
  BASE_URL,
  FakeSamlEngine,
  TESTSHIB_SSO_URL,
  authenticatedResult,
  createRecordingLogger,
  createTestConfig,
  failedResult,
  type ErrorResponse,
} from '../test-setup.js';

function createTestApp(options: Partial<SamlServiceProviderOptions> = {}) {
  return createSamlServiceProvider({
    config: createTestConfig(),
    baseUrl: BASE_URL,
    enableLogging: false,
    logger: createRecordingLogger(),
    ...options,
  });
}

function postAcs(app: ReturnType<typeof createTestApp>, form: Record<string, string>) {
  return app.request('/saml/acs', {
    method: 'POST',
    headers: {
      'Content-Type': 'application/x-www-form-urlencoded',
    },
    body: new URLSearchParams(form),
  });
}

describe('SAML routes', () => {
  let engine: FakeSamlEngine;
  let storage: IStorage;
  let app: ReturnType<typeof createTestApp>;

  beforeEach(() => {
    engine = new FakeSamlEngine();
    storage = createMemoryStorage();
    app = createTestApp({ engine, storage });
  });

  describe('GET /health', () => {
    it('should report ok with security headers', async () => {
      const res = await app.request('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ok' });
      expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff');
      expect(res.headers.get('X-Frame-Options')).toBe('DENY');
    });
  });

  describe('GET /saml/providers', () => {
    it('should list the enabled IdPs with their login URLs', async () => {
      const res = await app.request('/saml/providers');
      const body = (await res.json()) as ProviderListResponse;

      expect(res.status).toBe(200);
      expect(body.providers[0]).toEqual({
        name: 'testshib',
        entityId: 'https://idp.testshib.example/idp/shibboleth',
        loginUrl: 'http://localhost:3000/saml/login?idp=testshib',
      });
      expect(body.providers.map((p) => p.name)).toEqual(['testshib', 'other', 'nameid']);
    });
  });

  describe('GET /saml/login', () => {
    it('should redirect to the IdP', async () => {
      const res = await app.request('/saml/login?idp=testshib');

      expect(res.status).toBe(302);
      const location = new URL(res.headers.get('Location') ?? '');
      expect(`${location.origin}${location.pathname}`).toBe(TESTSHIB_SSO_URL);
      expect(location.searchParams.get('RelayState')).toBe('testshib');
    });

    it('should reject an unknown IdP', async () => {
      const res = await app.request('/saml/login?idp=nope');

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'unknown_provider',
        error_description: 'Identity provider not found: nope',
      });
      expect(res.headers.get('Cache-Control')).toBe('no-store');
    });

    it('should reject a missing IdP name', async () => {
      const res = await app.request('/saml/login');
      const body = (await res.json()) as ErrorResponse;

      expect(res.status).toBe(400);
      expect(body.error_description).toBe('Missing identity provider name');
    });
  });

  describe('POST /saml/acs', () => {
    it('should complete the login and create an account link', async () => {
      const res = await postAcs(app, { SAMLResponse: 'test-saml-response', RelayState: 'testshib' });

      expect(res.status).toBe(200);
      expect(res.headers.get('Cache-Control')).toBe('no-store');

      const expected: SamlLoginResponse = {
        success: true,
        user_id: 'testshib:alice123',
        is_new_user: true,
        provider: 'testshib',
        provider_user_id: 'alice123',
        session_index: '_session-1',
        user_data: {
          full_name: 'Alice Example',
          first_name: 'Alice',
          last_name: 'Example',
          username: 'alice123',
          email: 'alice@example.com',
        },
      };
      expect(await res.json()).toEqual(expected);

      const link = await storage.federatedIdentities?.findByProviderIdentity('testshib', 'alice123');
      expect(link?.userId).toBe('testshib:alice123');
      expect(link?.providerUserData?.['email']).toBe('alice@example.com');
    });

    it('should reuse the existing link on the next login', async () => {
      await storage.federatedIdentities?.create({
        userId: 'local-user-7',
        providerName: 'testshib',
        providerUserId: 'alice123',
      });

      const res = await postAcs(app, { SAMLResponse: 'test-saml-response', RelayState: 'testshib' });
      const body = (await res.json()) as SamlLoginResponse;

      expect(body.user_id).toBe('local-user-7');
      expect(body.is_new_user).toBe(false);

      const link = await storage.federatedIdentities?.findByProviderIdentity('testshib', 'alice123');
      expect(link?.providerUserData?.['email']).toBe('alice@example.com');
    });

    it('should link once when the same login is posted twice at the same time', async () => {
      const form = { SAMLResponse: 'test-saml-response', RelayState: 'testshib' };

      const responses = await Promise.all([postAcs(app, form), postAcs(app, form)]);
      const bodies = await Promise.all(responses.map(async (res) => (await res.json()) as SamlLoginResponse));

      expect(responses.map((res) => res.status)).toEqual([200, 200]);
      expect(bodies.map((body) => body.user_id)).toEqual(['testshib:alice123', 'testshib:alice123']);
      expect(bodies.map((body) => body.is_new_user).sort()).toEqual([false, true]);
    });

    it('should report a conflicting link that cannot be read back', async () => {
      const conflicting = createTestApp({
        engine,
        storage: {
          federatedIdentities: {
            create: async ({ providerName, providerUserId }) => {
              throw new AccountLinkConflictError(providerName, providerUserId);
            },
            findByProviderIdentity: async () => null,
            update: async () => {
              throw new Error('update should not be called');
            },
          },
        },
      });

      const res = await postAcs(conflicting, { SAMLResponse: 'test-saml-response', RelayState: 'testshib' });

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        error: 'account_link_conflict',
        error_description: 'This identity provider account is already linked.',
      });
    });

    it('should use the SAML user ID when no storage is configured', async () => {
      const stateless = createTestApp({ engine });
      const res = await postAcs(stateless, { SAMLResponse: 'test-saml-response', RelayState: 'testshib' });
      const body = (await res.json()) as SamlLoginResponse;

      expect(body.user_id).toBe('testshib:alice123');
      expect(body.is_new_user).toBe(false);
    });

    it('should hand linking to onSamlLogin when given', async () => {
      const calls: string[] = [];
      const custom = createTestApp({
        engine,
        storage,
        onSamlLogin: async ({ providerName, providerUserId, identity }) => {
          calls.push(`${providerName}/${providerUserId}/${identity.email ?? ''}`);
          return { userId: 'custom-user', isNewUser: true };
        },
      });

      const res = await postAcs(custom, { SAMLResponse: 'test-saml-response', RelayState: 'testshib' });
      const body = (await res.json()) as SamlLoginResponse;

      expect(body.user_id).toBe('custom-user');
      expect(calls).toEqual(['testshib/alice123/alice@example.com']);
      expect(await storage.federatedIdentities?.findByProviderIdentity('testshib', 'alice123')).toBeNull();
    });

    it('should reject a request without SAMLResponse', async () => {
      const res = await postAcs(app, { RelayState: 'testshib' });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'invalid_request',
        error_description: 'Missing SAMLResponse',
      });
      expect(engine.processCalls).toBe(0);
    });

    it('should reject a missing RelayState as an unknown IdP', async () => {
      const res = await postAcs(app, { SAMLResponse: 'test-saml-response' });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'unknown_provider',
        error_description: 'Missing identity provider name',
      });
    });

    it('should report a rejected response', async () => {
      engine.nextResult = failedResult(['invalid_response'], 'Invalid signature');

      const res = await postAcs(app, { SAMLResponse: 'test-saml-response', RelayState: 'testshib' });

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        error: 'protocol_validation_failed',
        error_description: 'SAML login failed: invalid_response (Invalid signature)',
      });
    });

    it('should report a missing permanent ID', async () => {
      engine.nextResult = authenticatedResult({ [OID_MAIL]: ['alice@example.com'] });

      const res = await postAcs(app, { SAMLResponse: 'test-saml-response', RelayState: 'testshib' });
      const body = (await res.json()) as ErrorResponse;

      expect(res.status).toBe(401);
      expect(body.error).toBe('missing_attribute');
    });

    it('should enforce the configured entitlement check', async () => {
      const guarded = createTestApp({
        engine,
        storage,
        checkEntitlements: requireEntitlement('urn:mace:example.com:staff'),
      });

      const res = await postAcs(guarded, { SAMLResponse: 'test-saml-response', RelayState: 'testshib' });

      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({
        error: 'policy_rejected',
        error_description: 'The user is not entitled to sign in through this identity provider.',
      });
    });
  });

  describe('GET /saml/metadata.xml', () => {
    it('should serve the SP metadata as XML', async () => {
      const res = await app.request('/saml/metadata.xml');

      expect(res.status).toBe(200);
      expect(res.headers.get('Content-Type')).toBe('application/xml; charset=utf-8');
      expect(await res.text()).toBe('<EntityDescriptor entityID="https://sp.example.com/saml/metadata.xml"/>');
    });

    it('should fail with the joined errors', async () => {
      engine.metadataErrors = ['sp_acs_not_found', 'contact_not_enough_data'];

      const res = await app.request('/saml/metadata.xml');

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        error: 'server_error',
        error_description: 'Invalid SP metadata: sp_acs_not_found, contact_not_enough_data',
      });
    });
  });
});
