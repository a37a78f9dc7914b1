import type {
  IdentityProviderDescriptor,
  SamlSettings,
  ServiceProviderConfig,
} from '@saml-federation/shared';
import {
  BINDING_HTTP_POST,
  DEFAULT_METADATA_CACHE_DURATION,
  DEFAULT_METADATA_VALID_UNTIL,
} from '../config/constants.js';

/**
 * Generate the settings the SAML engine needs for one IdP
 *
 * @param acsUrl - Absolute URL all IdPs post back to; listed in the SP metadata
 */
export function buildSamlSettings(
  sp: ServiceProviderConfig,
  idp: IdentityProviderDescriptor,
  acsUrl: string
): SamlSettings {
  return {
    // Strict mode is forced on
    strict: true,
    sp: {
      entityId: sp.entityId,
      assertionConsumerService: {
        url: acsUrl,
        binding: BINDING_HTTP_POST,
      },
      nameIdFormats: sp.nameIdFormats ?? [],
      x509cert: sp.publicCert,
      privateKey: sp.privateKey,
      ...sp.spExtra,
    },
    idp,
    security: {
      metadataValidUntil: DEFAULT_METADATA_VALID_UNTIL,
      metadataCacheDuration: DEFAULT_METADATA_CACHE_DURATION,
      ...sp.securityConfig,
    },
    organization: sp.organization,
    contactPerson: {
      technical: sp.technicalContact,
      support: sp.supportContact,
    },
  };
}
