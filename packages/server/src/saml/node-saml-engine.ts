import { SAML, type SamlConfig } from '@node-saml/node-saml';
import type {
  AttributeSet,
  SamlMetadataResult,
  SamlProcessResult,
  SamlRequestData,
  SamlSettings,
} from '@saml-federation/shared';
import type { SamlEngine } from './engine.js';
import { decorateMetadata, validateMetadataSettings } from './metadata.js';

/**
 * Stands in for a missing IdP certificate so the SP can still publish
 * metadata; every signature check against it fails.
 */
function missingIdpCertificate(callback: (err: Error | null, cert?: string | string[]) => void): void {
  callback(new Error('IdP certificate is not configured'));
}

function toAttributeValues(value: unknown): string[] {
  if (typeof value === 'string') {
    return [value];
  }
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  return [];
}

/**
 * Flatten the `attributes` of a validated profile into name -> values
 */
export function toAttributeSet(raw: unknown): AttributeSet {
  const attributes: Record<string, string[]> = {};

  if (raw !== null && typeof raw === 'object') {
    for (const [name, value] of Object.entries(raw)) {
      attributes[name] = toAttributeValues(value);
    }
  }

  return attributes;
}

function toMetadataOrganization(settings: SamlSettings): SamlConfig['metadataOrganization'] {
  const entries = Object.entries(settings.organization);
  if (entries.length === 0) {
    return undefined;
  }

  return {
    OrganizationName: entries.map(([lang, info]) => ({ '@xml:lang': lang, '#text': info.name })),
    OrganizationDisplayName: entries.map(([lang, info]) => ({ '@xml:lang': lang, '#text': info.displayname })),
    OrganizationURL: entries.map(([lang, info]) => ({ '@xml:lang': lang, '#text': info.url })),
  };
}

function toMetadataContactPerson(settings: SamlSettings): SamlConfig['metadataContactPerson'] {
  const { technical, support } = settings.contactPerson;
  return [
    { '@contactType': 'technical', GivenName: technical.givenName, EmailAddress: [technical.emailAddress] },
    { '@contactType': 'support', GivenName: support.givenName, EmailAddress: [support.emailAddress] },
  ];
}

function failedResult(errors: string[], reason: string | null): SamlProcessResult {
  return {
    authenticated: false,
    nameId: null,
    sessionIndex: null,
    attributes: {},
    errors,
    lastErrorReason: reason,
  };
}

/**
 * SamlEngine backed by @node-saml/node-saml
 */
export class NodeSamlEngine implements SamlEngine {
  createSaml(settings: SamlSettings): SAML {
    const { sp, idp, security } = settings;
    const signRequests = security.authnRequestsSigned === true && sp.privateKey.length > 0;

    const options: SamlConfig = {
      entryPoint: idp.singleSignOnService.url,
      issuer: sp.entityId,
      callbackUrl: sp.assertionConsumerService.url,
      audience: sp.entityId,
      idpIssuer: idp.entityId,
      idpCert: idp.x509cert ? idp.x509cert : missingIdpCertificate,
      identifierFormat: sp.nameIdFormats[0] ?? null,
      wantAssertionsSigned: security.wantAssertionsSigned ?? true,
      wantAuthnResponseSigned: security.wantMessagesSigned ?? false,
      acceptedClockSkewMs: security.acceptedClockSkewMs ?? 0,
      disableRequestedAuthnContext: security.requestedAuthnContext === false,
      signatureAlgorithm: security.signatureAlgorithm ?? 'sha256',
      privateKey: signRequests ? sp.privateKey : undefined,
      publicCert: sp.x509cert || undefined,
      decryptionPvk: sp.privateKey || undefined,
      providerName: sp.providerName,
      forceAuthn: sp.forceAuthn,
      authnContext: sp.authnContext,
      logoutUrl: sp.singleLogoutService?.url,
      metadataOrganization: toMetadataOrganization(settings),
      metadataContactPerson: toMetadataContactPerson(settings),
    };

    return new SAML(options);
  }

  async buildLoginRedirect(
    _request: SamlRequestData,
    settings: SamlSettings,
    relayState: string
  ): Promise<string> {
    const saml = this.createSaml(settings);
    return saml.getAuthorizeUrlAsync(relayState, undefined, {});
  }

  async processResponse(request: SamlRequestData, settings: SamlSettings): Promise<SamlProcessResult> {
    // Misconfiguration surfaces as a thrown error, not a failed login
    const saml = this.createSaml(settings);

    try {
      const { profile, loggedOut } = await saml.validatePostResponseAsync({ ...request.body });
      if (!profile || loggedOut) {
        return failedResult(['not_authenticated'], null);
      }

      return {
        authenticated: true,
        nameId: profile.nameID,
        sessionIndex: profile.sessionIndex ?? null,
        attributes: toAttributeSet(profile.attributes),
        errors: [],
        lastErrorReason: null,
      };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return failedResult(['invalid_response'], reason);
    }
  }

  async buildMetadataDocument(settings: SamlSettings): Promise<SamlMetadataResult> {
    const errors = validateMetadataSettings(settings);
    if (errors.length > 0) {
      return { xml: '', errors };
    }

    const saml = this.createSaml(settings);
    const cert = settings.sp.x509cert || null;

    try {
      const xml = saml.generateServiceProviderMetadata(cert, cert);
      return { xml: decorateMetadata(xml, settings), errors: [] };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return { xml: '', errors: [reason] };
    }
  }
}
