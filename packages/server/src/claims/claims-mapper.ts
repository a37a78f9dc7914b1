import type {
  AttributeRole,
  AttributeSet,
  IdentityProviderConfig,
  NormalizedIdentity,
  UserProfile,
} from '@saml-federation/shared';
import { MissingAttributeError } from '../errors/saml-error.js';
import {
  OID_COMMON_NAME,
  OID_GIVEN_NAME,
  OID_MAIL,
  OID_SURNAME,
  OID_USERID,
  USER_ID_SEPARATOR,
} from '../config/constants.js';

/**
 * Attribute read for each role when the IdP does not override it
 */
export const DEFAULT_ATTRIBUTE_NAMES: Readonly<Record<AttributeRole, string>> = {
  userPermanentId: OID_USERID,
  fullName: OID_COMMON_NAME,
  firstName: OID_GIVEN_NAME,
  lastName: OID_SURNAME,
  username: OID_USERID,
  email: OID_MAIL,
};

type AttributeLookupConfig = Pick<IdentityProviderConfig, 'attributeOverrides'>;

export function attributeNameFor(role: AttributeRole, config: AttributeLookupConfig): string {
  return config.attributeOverrides[role] ?? DEFAULT_ATTRIBUTE_NAMES[role];
}

/**
 * First value of the attribute mapped to `role`, or null.
 * An empty string counts as absent.
 */
export function getAttribute(
  attributes: AttributeSet,
  role: AttributeRole,
  config: AttributeLookupConfig
): string | null {
  const value = attributes[attributeNameFor(role, config)]?.[0];
  return value ? value : null;
}

/**
 * The most important lookup: a permanent, unique identifier for the user.
 * The NameID is available by overriding `userPermanentId` with `name_id`.
 *
 * @throws MissingAttributeError if the attribute is absent or empty
 */
export function extractPermanentId(
  attributes: AttributeSet,
  config: Pick<IdentityProviderConfig, 'name' | 'attributeOverrides'>
): string {
  const permanentId = getAttribute(attributes, 'userPermanentId', config);
  if (permanentId === null) {
    throw new MissingAttributeError(attributeNameFor('userPermanentId', config), config.name);
  }
  return permanentId;
}

/**
 * Profile fields; a missing attribute leaves its field null
 */
export function mapProfile(attributes: AttributeSet, config: AttributeLookupConfig): UserProfile {
  return {
    fullName: getAttribute(attributes, 'fullName', config),
    firstName: getAttribute(attributes, 'firstName', config),
    lastName: getAttribute(attributes, 'lastName', config),
    username: getAttribute(attributes, 'username', config),
    email: getAttribute(attributes, 'email', config),
  };
}

/**
 * User IDs are prefixed with the IdP name so several IdPs can assert the same ID
 */
export function buildUserId(idpName: string, permanentId: string): string {
  return `${idpName}${USER_ID_SEPARATOR}${permanentId}`;
}

export function normalizeIdentity(
  config: IdentityProviderConfig,
  attributes: AttributeSet,
  sessionIndex: string | null = null
): NormalizedIdentity {
  const permanentId = extractPermanentId(attributes, config);

  return {
    idpName: config.name,
    permanentId,
    userId: buildUserId(config.name, permanentId),
    sessionIndex,
    attributes,
    ...mapProfile(attributes, config),
  };
}
