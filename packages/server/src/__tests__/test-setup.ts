import type {
  AttributeSet,
  SamlMetadataResult,
  SamlProcessResult,
  SamlRequestData,
  SamlSettings,
  ServiceProviderConfig,
} from '@saml-federation/shared';
import type { SamlEngine } from '../saml/engine.js';
import type { SamlAuthLogger } from '../backend/saml-auth.js';
import {
  OID_COMMON_NAME,
  OID_GIVEN_NAME,
  OID_MAIL,
  OID_SURNAME,
  OID_USERID,
} from '../config/constants.js';

/**
 * Test fixtures and helpers
 */

export const BASE_URL = 'http://localhost:3000';
export const ACS_URL = `${BASE_URL}/saml/acs`;
export const SP_ENTITY_ID = 'https://sp.example.com/saml/metadata.xml';

export const TESTSHIB_ENTITY_ID = 'https://idp.testshib.example/idp/shibboleth';
export const TESTSHIB_SSO_URL = 'https://idp.testshib.example/idp/profile/SAML2/Redirect/SSO';

export function createTestConfig(overrides: Partial<ServiceProviderConfig> = {}): ServiceProviderConfig {
  return {
    entityId: SP_ENTITY_ID,
    publicCert: '',
    privateKey: '',
    organization: {
      'en-US': { name: 'example', displayname: 'Example Inc.', url: 'https://example.com' },
    },
    technicalContact: { givenName: 'Tech Contact', emailAddress: 'tech@example.com' },
    supportContact: { givenName: 'Support Contact', emailAddress: 'support@example.com' },
    enabledIdps: {
      testshib: {
        entityId: TESTSHIB_ENTITY_ID,
        ssoUrl: TESTSHIB_SSO_URL,
        x509Certificate: 'test-idp-certificate',
      },
      other: {
        entityId: 'https://idp.other.example/idp',
        ssoUrl: 'https://idp.other.example/sso',
        x509Certificate: 'test-other-certificate',
        attributeOverrides: { userPermanentId: 'custom:attr' },
      },
      nameid: {
        entityId: 'https://idp.nameid.example/idp',
        ssoUrl: 'https://idp.nameid.example/sso',
        x509Certificate: 'test-nameid-certificate',
        attributeOverrides: { userPermanentId: 'name_id' },
      },
    },
    ...overrides,
  };
}

/**
 * Attributes a typical IdP releases for alice
 */
export function aliceAttributes(): AttributeSet {
  return {
    [OID_USERID]: ['alice123'],
    [OID_COMMON_NAME]: ['Alice Example'],
    [OID_GIVEN_NAME]: ['Alice'],
    [OID_SURNAME]: ['Example'],
    [OID_MAIL]: ['alice@example.com'],
  };
}

export function authenticatedResult(
  attributes: AttributeSet,
  nameId: string | null = 'test-name-id',
  sessionIndex: string | null = '_session-1'
): SamlProcessResult {
  return {
    authenticated: true,
    nameId,
    sessionIndex,
    attributes,
    errors: [],
    lastErrorReason: null,
  };
}

export function failedResult(errors: string[], lastErrorReason: string | null): SamlProcessResult {
  return {
    authenticated: false,
    nameId: null,
    sessionIndex: null,
    attributes: {},
    errors,
    lastErrorReason,
  };
}

/**
 * In-process SAML engine; records what it was asked and replays canned results
 */
export class FakeSamlEngine implements SamlEngine {
  nextResult: SamlProcessResult = authenticatedResult(aliceAttributes());
  metadataErrors: string[] = [];
  lastSettings: SamlSettings | null = null;
  lastRequest: SamlRequestData | null = null;
  processCalls = 0;

  async buildLoginRedirect(
    _request: SamlRequestData,
    settings: SamlSettings,
    relayState: string
  ): Promise<string> {
    this.lastSettings = settings;
    const url = new URL(settings.idp.singleSignOnService.url);
    url.searchParams.set('SAMLRequest', 'test-authn-request');
    url.searchParams.set('RelayState', relayState);
    return url.toString();
  }

  async processResponse(request: SamlRequestData, settings: SamlSettings): Promise<SamlProcessResult> {
    this.processCalls++;
    this.lastRequest = request;
    this.lastSettings = settings;
    return this.nextResult;
  }

  async buildMetadataDocument(settings: SamlSettings): Promise<SamlMetadataResult> {
    this.lastSettings = settings;
    if (this.metadataErrors.length > 0) {
      return { xml: '', errors: this.metadataErrors };
    }
    return { xml: `<EntityDescriptor entityID="${settings.sp.entityId}"/>`, errors: [] };
  }
}

/**
 * Logger that keeps its lines for assertions
 */
export function createRecordingLogger(): SamlAuthLogger & { infos: string[]; warnings: string[] } {
  const infos: string[] = [];
  const warnings: string[] = [];
  return {
    infos,
    warnings,
    info: (...data: unknown[]) => {
      infos.push(data.map(String).join(' '));
    },
    warn: (...data: unknown[]) => {
      warnings.push(data.map(String).join(' '));
    },
  };
}

// Type helpers for test responses
export interface ErrorResponse {
  error: string;
  error_description?: string;
}
