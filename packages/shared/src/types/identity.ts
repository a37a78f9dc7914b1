/**
 * Attributes released by the IdP: attribute name (often an OID URN) to values.
 * Carries a synthetic `name_id` entry with the SAML subject NameID.
 */
export type AttributeSet = Readonly<Record<string, readonly string[]>>;

/**
 * Profile fields read from the attribute set; `null` when the IdP did not send them
 */
export interface UserProfile {
  fullName: string | null;
  firstName: string | null;
  lastName: string | null;
  username: string | null;
  email: string | null;
}

/**
 * Identity handed to account linking after a successful SAML login
 */
export interface NormalizedIdentity extends UserProfile {
  idpName: string;
  permanentId: string;
  /** `${idpName}:${permanentId}` */
  userId: string;
  sessionIndex: string | null;
  attributes: AttributeSet;
}

/**
 * Link between an IdP identity and a local user
 */
export interface FederatedIdentity {
  id: string;
  userId: string;
  providerName: string;
  providerUserId: string;
  providerUserData?: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}
