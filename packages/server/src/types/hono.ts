/**
 * Hono context variables set by the SAML routes
 */
export type SamlVariables = {
  /** IdP handling the current login, once known */
  idp: string | undefined;
};
