import type {
  IdentityProviderConfig,
  IdentityProviderDescriptor,
  IdentityProviderInput,
} from '@saml-federation/shared';
import { InvalidConfigurationError } from '../errors/saml-error.js';
import {
  BINDING_HTTP_REDIRECT,
  PLACEHOLDER_IDP_ENTITY_ID,
  PLACEHOLDER_IDP_NAME,
  PLACEHOLDER_IDP_SSO_URL,
  USER_ID_SEPARATOR,
} from '../config/constants.js';

/**
 * Check that an IdP name is usable as a user ID prefix
 */
export function isValidProviderName(name: string): boolean {
  return name.length > 0 && !name.includes(USER_ID_SEPARATOR) && !/\s/.test(name);
}

/**
 * Build an immutable IdP configuration record
 *
 * @throws InvalidConfigurationError if the name is not a slug or a required field is empty
 */
export function createIdentityProviderConfig(
  name: string,
  input: IdentityProviderInput
): IdentityProviderConfig {
  if (!isValidProviderName(name)) {
    throw new InvalidConfigurationError(
      `IdP name "${name}" should be a slug (non-empty, no colons, no spaces)`
    );
  }

  if (!input.entityId) {
    throw new InvalidConfigurationError(`IdP "${name}" is missing its entity ID`);
  }

  if (!input.ssoUrl) {
    throw new InvalidConfigurationError(`IdP "${name}" is missing its SSO URL`);
  }

  return Object.freeze({
    name,
    entityId: input.entityId,
    ssoUrl: input.ssoUrl,
    binding: input.binding ?? BINDING_HTTP_REDIRECT,
    x509Certificate: input.x509Certificate,
    attributeOverrides: Object.freeze({ ...input.attributeOverrides }),
  });
}

/**
 * IdP settings in the format the SAML engine requires
 */
export function toIdentityProviderDescriptor(
  config: IdentityProviderConfig
): IdentityProviderDescriptor {
  return {
    entityId: config.entityId,
    singleSignOnService: {
      url: config.ssoUrl,
      binding: config.binding,
    },
    x509cert: config.x509Certificate,
  };
}

/**
 * Placeholder IdP for when the engine needs some IdP data that is not used,
 * e.g. when generating SP metadata
 */
export function createPlaceholderIdentityProvider(): IdentityProviderConfig {
  return createIdentityProviderConfig(PLACEHOLDER_IDP_NAME, {
    entityId: PLACEHOLDER_IDP_ENTITY_ID,
    ssoUrl: PLACEHOLDER_IDP_SSO_URL,
    x509Certificate: '',
  });
}
