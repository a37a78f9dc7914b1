/**
 * SAML 2.0 Constants
 */

// Bindings
export const BINDING_HTTP_REDIRECT = 'urn:oasis:names:tc:SAML:2.0:bindings:HTTP-Redirect' as const;
export const BINDING_HTTP_POST = 'urn:oasis:names:tc:SAML:2.0:bindings:HTTP-POST' as const;

// Well-known attribute OIDs
export const OID_COMMON_NAME = 'urn:oid:2.5.4.3' as const;
export const OID_EDU_PERSON_PRINCIPAL_NAME = 'urn:oid:1.3.6.1.4.1.5923.1.1.1.6' as const;
export const OID_EDU_PERSON_ENTITLEMENT = 'urn:oid:1.3.6.1.4.1.5923.1.1.1.7' as const;
export const OID_GIVEN_NAME = 'urn:oid:2.5.4.42' as const;
export const OID_MAIL = 'urn:oid:0.9.2342.19200300.100.1.3' as const;
export const OID_SURNAME = 'urn:oid:2.5.4.4' as const;
export const OID_USERID = 'urn:oid:0.9.2342.19200300.100.1.1' as const;

// Synthetic attribute holding the subject NameID
export const ATTRIBUTE_NAME_ID = 'name_id' as const;

// Separator between IdP name and permanent ID in user IDs
export const USER_ID_SEPARATOR = ':' as const;

// Request parameters
export const PARAM_IDP = 'idp' as const;
export const PARAM_RELAY_STATE = 'RelayState' as const;

// Metadata defaults (ISO 8601 duration)
export const DEFAULT_METADATA_CACHE_DURATION = 'P10D';
export const DEFAULT_METADATA_VALID_UNTIL = '';

// Placeholder IdP, used when the engine needs IdP data that is not meaningful
export const PLACEHOLDER_IDP_NAME = 'dummy';
export const PLACEHOLDER_IDP_ENTITY_ID = 'https://dummy.none/saml2';
export const PLACEHOLDER_IDP_SSO_URL = 'https://dummy.none/SSO';

// Route paths (relative to the /saml mount point)
export const SAML_MOUNT_PATH = '/saml';
export const ACS_PATH = '/acs';
export const LOGIN_PATH = '/login';
export const METADATA_PATH = '/metadata.xml';
export const PROVIDERS_PATH = '/providers';

// Server defaults
export const DEFAULT_PORT = 3000;
export const DEFAULT_HOST = '0.0.0.0';

// Cache headers
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';
export const NO_STORE_CACHE_CONTROL = 'no-store';
export const NO_CACHE_PRAGMA = 'no-cache';
export const XML_CONTENT_TYPE = 'application/xml; charset=utf-8';
