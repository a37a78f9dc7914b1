import { Hono } from 'hono';
import type { ProviderListResponse } from '@saml-federation/shared';
import type { SamlVariables } from '../../types/hono.js';
import type { SamlAuthBackend } from '../../backend/saml-auth.js';
import { LOGIN_PATH, PARAM_IDP, SAML_MOUNT_PATH } from '../../config/constants.js';

export interface ProvidersRoutesOptions {
  backend: SamlAuthBackend;
  baseUrl: string;
}

/**
 * Login URL of a configured IdP
 */
export function buildLoginUrl(baseUrl: string, idpName: string): string {
  const url = new URL(`${baseUrl}${SAML_MOUNT_PATH}${LOGIN_PATH}`);
  url.searchParams.set(PARAM_IDP, idpName);
  return url.toString();
}

/**
 * GET /saml/providers
 * List the enabled identity providers, for building a login page
 */
export function createProvidersRoutes(options: ProvidersRoutesOptions): Hono<{ Variables: SamlVariables }> {
  const { backend, baseUrl } = options;
  const app = new Hono<{ Variables: SamlVariables }>();

  app.get('/', (c) => {
    const body: ProviderListResponse = {
      providers: backend.registry.list().map((idp) => ({
        name: idp.name,
        entityId: idp.entityId,
        loginUrl: buildLoginUrl(baseUrl, idp.name),
      })),
    };

    return c.json(body);
  });

  return app;
}
