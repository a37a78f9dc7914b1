import type {
  SamlMetadataResult,
  SamlProcessResult,
  SamlRequestData,
  SamlSettings,
} from '@saml-federation/shared';

/**
 * SAML protocol engine
 *
 * Owns signature verification, assertion parsing and condition checks.
 * Implementations report validation failures through `errors` rather than
 * throwing.
 */
export interface SamlEngine {
  /**
   * URL of the IdP login page carrying an AuthnRequest
   *
   * @param relayState - Opaque value the IdP echoes back with its response
   */
  buildLoginRedirect(
    request: SamlRequestData,
    settings: SamlSettings,
    relayState: string
  ): Promise<string>;

  /**
   * Validate the SAML response posted to the assertion consumer service
   */
  processResponse(request: SamlRequestData, settings: SamlSettings): Promise<SamlProcessResult>;

  /**
   * SP metadata document, with any problems found while generating it
   */
  buildMetadataDocument(settings: SamlSettings): Promise<SamlMetadataResult>;
}
