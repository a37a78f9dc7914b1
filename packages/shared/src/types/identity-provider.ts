/**
 * Logical attribute roles an IdP can override the attribute name for
 */
export type AttributeRole =
  | 'userPermanentId'
  | 'fullName'
  | 'firstName'
  | 'lastName'
  | 'username'
  | 'email';

/**
 * Attribute-name overrides keyed by role
 * Unset roles fall back to the well-known OID attribute names
 */
export type AttributeOverrides = Partial<Record<AttributeRole, string>>;

/**
 * Static configuration of a single IdP, as written in the enabled IdP table
 */
export interface IdentityProviderInput {
  /** e.g. "https://idp.example.org/idp/shibboleth" */
  entityId: string;
  /** e.g. "https://idp.example.org/idp/profile/SAML2/Redirect/SSO" */
  ssoUrl: string;
  binding?: string;
  x509Certificate: string;
  attributeOverrides?: AttributeOverrides;
}

/**
 * Identity Provider configuration
 *
 * `name` is a slug (no colons, no whitespace) because it prefixes user IDs.
 */
export interface IdentityProviderConfig {
  readonly name: string;
  readonly entityId: string;
  readonly ssoUrl: string;
  readonly binding: string;
  readonly x509Certificate: string;
  readonly attributeOverrides: Readonly<AttributeOverrides>;
}

/**
 * IdP data in the shape the SAML engine and metadata generator expect
 */
export interface IdentityProviderDescriptor {
  entityId: string;
  singleSignOnService: {
    url: string;
    binding: string;
  };
  x509cert: string;
}
