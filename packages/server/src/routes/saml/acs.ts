import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { NormalizedIdentity, SamlLoginResponse } from '@saml-federation/shared';
import type { SamlVariables } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { EntitlementCheck, SamlAuthBackend } from '../../backend/saml-auth.js';
import { AccountLinkConflictError } from '../../errors/saml-error.js';
import {
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  NO_CACHE_PRAGMA,
  NO_STORE_CACHE_CONTROL,
} from '../../config/constants.js';

const acsFormSchema = z.object({
  SAMLResponse: z.string({ required_error: 'Missing SAMLResponse' }).min(1, 'Missing SAMLResponse'),
  // A missing RelayState is reported as a missing IdP name
  RelayState: z.string().default(''),
});

export interface AcsRoutesOptions {
  backend: SamlAuthBackend;
  storage?: IStorage;
  /**
   * Entitlement check applied to every login through this route
   */
  checkEntitlements?: EntitlementCheck;
  /**
   * Callback to handle user creation/linking
   * If not provided, uses default behavior based on federated identity storage
   */
  onSamlLogin?: (params: {
    providerName: string;
    providerUserId: string;
    providerUserData: Record<string, unknown>;
    identity: NormalizedIdentity;
  }) => Promise<{ userId: string; isNewUser: boolean }>;
}

function toProviderUserData(identity: NormalizedIdentity): Record<string, unknown> {
  return {
    full_name: identity.fullName,
    first_name: identity.firstName,
    last_name: identity.lastName,
    username: identity.username,
    email: identity.email,
    attributes: identity.attributes,
  };
}

/**
 * POST /saml/acs
 * Assertion consumer service: validate the IdP response and link the account
 */
export function createAcsRoutes(options: AcsRoutesOptions): Hono<{ Variables: SamlVariables }> {
  const { backend, storage, checkEntitlements, onSamlLogin } = options;
  const app = new Hono<{ Variables: SamlVariables }>();

  const linkAccount = async (
    identity: NormalizedIdentity
  ): Promise<{ userId: string; isNewUser: boolean }> => {
    const providerUserData = toProviderUserData(identity);

    if (onSamlLogin) {
      // Use custom handler
      return onSamlLogin({
        providerName: identity.idpName,
        providerUserId: identity.permanentId,
        providerUserData,
        identity,
      });
    }

    const federatedIdentities = storage?.federatedIdentities;
    if (!federatedIdentities) {
      // No storage - just use the SAML user ID
      return { userId: identity.userId, isNewUser: false };
    }

    const existing = await federatedIdentities.findByProviderIdentity(
      identity.idpName,
      identity.permanentId
    );

    if (existing) {
      // Update provider data
      await federatedIdentities.update(existing.id, { providerUserData });
      return { userId: existing.userId, isNewUser: false };
    }

    try {
      await federatedIdentities.create({
        userId: identity.userId,
        providerName: identity.idpName,
        providerUserId: identity.permanentId,
        providerUserData,
      });
      return { userId: identity.userId, isNewUser: true };
    } catch (error) {
      if (!(error instanceof AccountLinkConflictError)) {
        throw error;
      }
      // A concurrent login for the same identity created the link first
      const linked = await federatedIdentities.findByProviderIdentity(
        identity.idpName,
        identity.permanentId
      );
      if (!linked) {
        throw error;
      }
      return { userId: linked.userId, isNewUser: false };
    }
  };

  app.post(
    '/',
    zValidator('form', acsFormSchema, (result) => {
      if (!result.success) {
        throw result.error;
      }
    }),
    async (c) => {
      const form = c.req.valid('form');
      c.set('idp', form.RelayState || undefined);

      const identity = await backend.completeLogin(
        { query: c.req.query(), body: form },
        { checkEntitlements }
      );
      const { userId, isNewUser } = await linkAccount(identity);

      const body: SamlLoginResponse = {
        success: true,
        user_id: userId,
        is_new_user: isNewUser,
        provider: identity.idpName,
        provider_user_id: identity.permanentId,
        session_index: identity.sessionIndex,
        user_data: {
          full_name: identity.fullName,
          first_name: identity.firstName,
          last_name: identity.lastName,
          username: identity.username,
          email: identity.email,
        },
      };

      c.header(HEADER_CACHE_CONTROL, NO_STORE_CACHE_CONTROL);
      c.header(HEADER_PRAGMA, NO_CACHE_PRAGMA);
      return c.json(body);
    }
  );

  return app;
}
