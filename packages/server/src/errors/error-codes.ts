/**
 * SAML login error codes
 */

// Login flow errors
export const ERROR_UNKNOWN_PROVIDER = 'unknown_provider' as const;
export const ERROR_MISSING_ATTRIBUTE = 'missing_attribute' as const;
export const ERROR_PROTOCOL_VALIDATION_FAILED = 'protocol_validation_failed' as const;
export const ERROR_POLICY_REJECTED = 'policy_rejected' as const;
export const ERROR_ACCOUNT_LINK_CONFLICT = 'account_link_conflict' as const;

// Startup errors
export const ERROR_INVALID_CONFIGURATION = 'invalid_configuration' as const;

// HTTP layer errors
export const ERROR_INVALID_REQUEST = 'invalid_request' as const;
export const ERROR_SERVER_ERROR = 'server_error' as const;

/**
 * All SAML error codes
 */
export type SamlErrorCode =
  | typeof ERROR_UNKNOWN_PROVIDER
  | typeof ERROR_MISSING_ATTRIBUTE
  | typeof ERROR_PROTOCOL_VALIDATION_FAILED
  | typeof ERROR_POLICY_REJECTED
  | typeof ERROR_ACCOUNT_LINK_CONFLICT
  | typeof ERROR_INVALID_CONFIGURATION
  | typeof ERROR_INVALID_REQUEST
  | typeof ERROR_SERVER_ERROR;

export type SamlErrorStatus = 400 | 401 | 403 | 409 | 500;

/**
 * HTTP status codes for SAML errors
 */
export const ERROR_STATUS_CODES: Record<SamlErrorCode, SamlErrorStatus> = {
  [ERROR_UNKNOWN_PROVIDER]: 400,
  [ERROR_MISSING_ATTRIBUTE]: 401,
  [ERROR_PROTOCOL_VALIDATION_FAILED]: 401,
  [ERROR_POLICY_REJECTED]: 403,
  [ERROR_ACCOUNT_LINK_CONFLICT]: 409,
  [ERROR_INVALID_CONFIGURATION]: 500,
  [ERROR_INVALID_REQUEST]: 400,
  [ERROR_SERVER_ERROR]: 500,
};

/**
 * Default error descriptions
 */
export const ERROR_DESCRIPTIONS: Record<SamlErrorCode, string> = {
  [ERROR_UNKNOWN_PROVIDER]: 'The requested identity provider is not configured.',
  [ERROR_MISSING_ATTRIBUTE]:
    'The identity provider did not release an attribute required to identify the user.',
  [ERROR_PROTOCOL_VALIDATION_FAILED]: 'The SAML response could not be validated.',
  [ERROR_POLICY_REJECTED]: 'The user is not entitled to sign in through this identity provider.',
  [ERROR_ACCOUNT_LINK_CONFLICT]: 'This identity provider account is already linked.',
  [ERROR_INVALID_CONFIGURATION]: 'The SAML service provider is misconfigured.',
  [ERROR_INVALID_REQUEST]: 'The request is missing a required parameter or is otherwise malformed.',
  [ERROR_SERVER_ERROR]: 'The server encountered an unexpected condition.',
};
