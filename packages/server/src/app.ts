import { Hono } from 'hono';
import type { ServiceProviderConfig } from '@saml-federation/shared';
import type { SamlVariables } from './types/hono.js';
import type { IStorage } from './storage/interfaces/index.js';
import type { SamlEngine } from './saml/engine.js';
import {
  SamlAuthBackend,
  type EntitlementCheck,
  type SamlAuthLogger,
} from './backend/saml-auth.js';
import { samlErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import { createSamlRoutes, type SamlRoutesOptions } from './routes/saml/index.js';
import { ACS_PATH, SAML_MOUNT_PATH } from './config/constants.js';

export interface SamlServiceProviderOptions {
  config: ServiceProviderConfig;
  /**
   * Public origin of the service, used for the ACS and login URLs
   */
  baseUrl?: string;
  storage?: IStorage;
  /**
   * Protocol engine (defaults to @node-saml/node-saml)
   */
  engine?: SamlEngine;
  /**
   * Entitlement check applied after each successful validation
   */
  checkEntitlements?: EntitlementCheck;
  /**
   * Custom callback for handling SAML login user creation/linking
   */
  onSamlLogin?: SamlRoutesOptions['onSamlLogin'];
  enableLogging?: boolean;
  logger?: SamlAuthLogger;
}

/**
 * Create the SAML service provider application
 *
 * @throws InvalidConfigurationError if an enabled IdP is misconfigured
 */
export function createSamlServiceProvider(
  options: SamlServiceProviderOptions
): Hono<{ Variables: SamlVariables }> {
  const {
    config,
    baseUrl = 'http://localhost:3000',
    storage,
    engine,
    checkEntitlements,
    onSamlLogin,
    enableLogging = true,
    logger,
  } = options;

  const backend = new SamlAuthBackend({
    config,
    acsUrl: `${baseUrl}${SAML_MOUNT_PATH}${ACS_PATH}`,
    engine,
    checkEntitlements,
    logger,
  });

  const app = new Hono<{ Variables: SamlVariables }>();

  // Global error handler
  app.onError(samlErrorHandler);

  // Security headers
  app.use('*', securityHeaders());

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger());
  }

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.route(SAML_MOUNT_PATH, createSamlRoutes({ backend, baseUrl, storage, onSamlLogin }));

  return app;
}
