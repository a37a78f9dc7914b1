import { Hono } from 'hono';
import type { SamlVariables } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { SamlAuthBackend } from '../../backend/saml-auth.js';
import { ACS_PATH, LOGIN_PATH, METADATA_PATH, PROVIDERS_PATH } from '../../config/constants.js';
import { createProvidersRoutes } from './providers.js';
import { createLoginRoutes } from './login.js';
import { createAcsRoutes, type AcsRoutesOptions } from './acs.js';
import { createMetadataRoutes } from './metadata.js';

export interface SamlRoutesOptions {
  backend: SamlAuthBackend;
  baseUrl: string;
  storage?: IStorage;
  checkEntitlements?: AcsRoutesOptions['checkEntitlements'];
  /**
   * Custom callback for handling SAML login user creation/linking
   */
  onSamlLogin?: AcsRoutesOptions['onSamlLogin'];
}

/**
 * Create the SAML service provider routes
 *
 * Routes:
 * - GET /providers - List enabled IdPs
 * - GET /login?idp=<name> - Initiate SAML login
 * - POST /acs - Assertion consumer service
 * - GET /metadata.xml - SP metadata
 */
export function createSamlRoutes(options: SamlRoutesOptions): Hono<{ Variables: SamlVariables }> {
  const { backend, baseUrl, storage, checkEntitlements, onSamlLogin } = options;
  const app = new Hono<{ Variables: SamlVariables }>();

  app.route(PROVIDERS_PATH, createProvidersRoutes({ backend, baseUrl }));
  app.route(LOGIN_PATH, createLoginRoutes({ backend }));
  app.route(ACS_PATH, createAcsRoutes({ backend, storage, checkEntitlements, onSamlLogin }));
  app.route(METADATA_PATH, createMetadataRoutes({ backend }));

  return app;
}

export * from './providers.js';
export * from './login.js';
export * from './acs.js';
export * from './metadata.js';
