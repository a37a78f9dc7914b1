import type {
  AttributeSet,
  IdentityProviderConfig,
  NormalizedIdentity,
  SamlRequestData,
  SamlSettings,
  ServiceProviderConfig,
} from '@saml-federation/shared';
import { IdentityProviderRegistry } from '../idp/registry.js';
import { buildUserId, normalizeIdentity } from '../claims/claims-mapper.js';
import { buildSamlSettings } from '../saml/settings.js';
import type { SamlEngine } from '../saml/engine.js';
import { NodeSamlEngine } from '../saml/node-saml-engine.js';
import { PolicyRejectedError, ProtocolValidationError } from '../errors/saml-error.js';
import {
  ATTRIBUTE_NAME_ID,
  OID_EDU_PERSON_ENTITLEMENT,
  PARAM_IDP,
  PARAM_RELAY_STATE,
} from '../config/constants.js';

/**
 * Context handed to an entitlement check
 */
export interface EntitlementContext {
  idp: IdentityProviderConfig;
  attributes: AttributeSet;
}

/**
 * Decide whether a validated user may log in. Returning false rejects the
 * login; throwing PolicyRejectedError rejects it with a custom message.
 */
export type EntitlementCheck = (context: EntitlementContext) => boolean | Promise<boolean>;

export type SamlAuthLogger = Pick<Console, 'info' | 'warn'>;

export interface SamlAuthBackendOptions {
  config: ServiceProviderConfig;
  /**
   * Absolute URL of the assertion consumer service
   */
  acsUrl: string;
  /**
   * Protocol engine (defaults to the node-saml engine)
   */
  engine?: SamlEngine;
  /**
   * Default entitlement check; logins are allowed when none is given
   */
  checkEntitlements?: EntitlementCheck;
  logger?: SamlAuthLogger;
}

export interface CompleteLoginOptions {
  /**
   * Overrides the backend's default entitlement check for this login
   */
  checkEntitlements?: EntitlementCheck;
}

/**
 * Entitlement check requiring `value` among the values of `attributeName`
 */
export function requireEntitlement(
  value: string,
  attributeName: string = OID_EDU_PERSON_ENTITLEMENT
): EntitlementCheck {
  return ({ attributes }) => attributes[attributeName]?.includes(value) ?? false;
}

const allowAll: EntitlementCheck = () => true;

/**
 * SAML authentication backend
 *
 * Supports logins through any number of configured identity providers.
 * The provider name travels through the IdP round trip as RelayState.
 */
export class SamlAuthBackend {
  readonly name = 'saml';
  readonly registry: IdentityProviderRegistry;

  private readonly config: ServiceProviderConfig;
  private readonly acsUrl: string;
  private readonly engine: SamlEngine;
  private readonly defaultEntitlementCheck: EntitlementCheck | undefined;
  private readonly logger: SamlAuthLogger;

  /**
   * @throws InvalidConfigurationError if an enabled IdP is misconfigured
   */
  constructor(options: SamlAuthBackendOptions) {
    this.config = options.config;
    this.acsUrl = options.acsUrl;
    this.engine = options.engine ?? new NodeSamlEngine();
    this.defaultEntitlementCheck = options.checkEntitlements;
    this.logger = options.logger ?? console;
    this.registry = new IdentityProviderRegistry(options.config.enabledIdps);
  }

  /**
   * Given the name of an IdP, get its configuration
   *
   * @throws UnknownProviderError
   */
  getIdp(name: string): IdentityProviderConfig {
    return this.registry.resolve(name);
  }

  /**
   * Settings for the engine, for one IdP
   */
  generateSamlSettings(idp: IdentityProviderConfig): SamlSettings {
    return buildSamlSettings(this.config, this.registry.metadataDescriptor(idp.name), this.acsUrl);
  }

  /**
   * URL of the IdP login page for the provider named by the `idp` query
   * parameter
   */
  async resolveRedirectTarget(requestData: SamlRequestData): Promise<string> {
    const idp = this.getIdp(requestData.query[PARAM_IDP] ?? '');
    return this.engine.buildLoginRedirect(requestData, this.generateSamlSettings(idp), idp.name);
  }

  /**
   * Validate the posted SAML response and map it to a normalized identity
   *
   * @throws UnknownProviderError if RelayState names no configured provider
   * @throws ProtocolValidationError if the engine rejects the response
   * @throws PolicyRejectedError if the entitlement check fails
   * @throws MissingAttributeError if the permanent ID was not released
   */
  async completeLogin(
    requestData: SamlRequestData,
    options: CompleteLoginOptions = {}
  ): Promise<NormalizedIdentity> {
    const idp = this.getIdp(requestData.body[PARAM_RELAY_STATE] ?? '');
    const result = await this.engine.processResponse(requestData, this.generateSamlSettings(idp));

    if (result.errors.length > 0 || !result.authenticated) {
      this.logger.warn(
        JSON.stringify({
          event: 'saml_login_failed',
          idp: idp.name,
          errors: result.errors,
          reason: result.lastErrorReason,
        })
      );
      throw new ProtocolValidationError(result.errors, result.lastErrorReason);
    }

    const attributes: Record<string, readonly string[]> = { ...result.attributes };
    if (result.nameId !== null) {
      attributes[ATTRIBUTE_NAME_ID] = [result.nameId];
    }

    const check = options.checkEntitlements ?? this.defaultEntitlementCheck ?? allowAll;
    if (!(await check({ idp, attributes }))) {
      this.logger.warn(JSON.stringify({ event: 'saml_login_rejected', idp: idp.name }));
      throw new PolicyRejectedError();
    }

    const identity = normalizeIdentity(idp, attributes, result.sessionIndex);
    this.logger.info(
      JSON.stringify({ event: 'saml_login', idp: idp.name, userId: identity.userId })
    );

    return identity;
  }

  /**
   * SP metadata XML; `errors` is non-empty when the document is unusable
   */
  async generateMetadataXml(): Promise<{ metadata: string; errors: string[] }> {
    const settings = buildSamlSettings(this.config, this.registry.metadataDescriptor(), this.acsUrl);
    const { xml, errors } = await this.engine.buildMetadataDocument(settings);
    return { metadata: xml, errors };
  }

  /**
   * User ID, qualified by the IdP name
   */
  getUserId(identity: Pick<NormalizedIdentity, 'idpName' | 'permanentId'>): string {
    return buildUserId(identity.idpName, identity.permanentId);
  }
}
