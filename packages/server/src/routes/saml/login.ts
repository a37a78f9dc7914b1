import { Hono } from 'hono';
import type { SamlVariables } from '../../types/hono.js';
import type { SamlAuthBackend } from '../../backend/saml-auth.js';
import { PARAM_IDP } from '../../config/constants.js';

export interface LoginRoutesOptions {
  backend: SamlAuthBackend;
}

/**
 * GET /saml/login?idp=<name>
 * Redirect the browser to the IdP with an AuthnRequest
 */
export function createLoginRoutes(options: LoginRoutesOptions): Hono<{ Variables: SamlVariables }> {
  const { backend } = options;
  const app = new Hono<{ Variables: SamlVariables }>();

  app.get('/', async (c) => {
    c.set('idp', c.req.query(PARAM_IDP));

    // Unknown or missing names are rejected by the backend
    const url = await backend.resolveRedirectTarget({ query: c.req.query(), body: {} });

    return c.redirect(url, 302);
  });

  return app;
}
