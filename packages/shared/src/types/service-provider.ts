import type { IdentityProviderInput } from './identity-provider.js';

/**
 * Organization entry of the SP metadata, keyed by language tag (e.g. "en-US")
 */
export interface OrganizationInfo {
  name: string;
  displayname: string;
  url: string;
}

export interface ContactPerson {
  givenName: string;
  emailAddress: string;
}

/**
 * Security policy overrides merged over the defaults
 */
export interface SecurityConfig {
  metadataValidUntil?: string;
  metadataCacheDuration?: string;
  authnRequestsSigned?: boolean;
  wantAssertionsSigned?: boolean;
  wantMessagesSigned?: boolean;
  requestedAuthnContext?: boolean;
  signatureAlgorithm?: 'sha1' | 'sha256' | 'sha512';
  acceptedClockSkewMs?: number;
}

/**
 * Extra service provider fields merged over the generated `sp` block
 */
export interface ServiceProviderExtra {
  singleLogoutService?: {
    url: string;
    binding?: string;
  };
  providerName?: string;
  forceAuthn?: boolean;
  authnContext?: string[];
}

/**
 * Complete service provider configuration
 */
export interface ServiceProviderConfig {
  entityId: string;
  publicCert: string;
  privateKey: string;
  organization: Record<string, OrganizationInfo>;
  technicalContact: ContactPerson;
  supportContact: ContactPerson;
  enabledIdps: Record<string, IdentityProviderInput>;
  securityConfig?: SecurityConfig;
  spExtra?: ServiceProviderExtra;
  nameIdFormats?: string[];
}
