import type { IdentityProviderDescriptor } from './identity-provider.js';
import type {
  ContactPerson,
  OrganizationInfo,
  SecurityConfig,
  ServiceProviderExtra,
} from './service-provider.js';
import type { AttributeSet } from './identity.js';

/**
 * Effective security settings (defaults merged with overrides)
 */
export interface SamlSecuritySettings extends SecurityConfig {
  metadataValidUntil: string;
  metadataCacheDuration: string;
}

export interface SamlServiceProviderSettings extends ServiceProviderExtra {
  entityId: string;
  assertionConsumerService: {
    url: string;
    binding: string;
  };
  nameIdFormats: string[];
  x509cert: string;
  privateKey: string;
}

/**
 * Settings handed to the SAML engine for one IdP
 */
export interface SamlSettings {
  strict: true;
  sp: SamlServiceProviderSettings;
  idp: IdentityProviderDescriptor;
  security: SamlSecuritySettings;
  organization: Record<string, OrganizationInfo>;
  contactPerson: {
    technical: ContactPerson;
    support: ContactPerson;
  };
}

/**
 * Request data the engine reads: query string and form body
 */
export interface SamlRequestData {
  query: Record<string, string>;
  body: Record<string, string>;
}

/**
 * Outcome of processing a SAML response
 */
export interface SamlProcessResult {
  authenticated: boolean;
  nameId: string | null;
  sessionIndex: string | null;
  attributes: AttributeSet;
  errors: string[];
  lastErrorReason: string | null;
}

export interface SamlMetadataResult {
  xml: string;
  errors: string[];
}
